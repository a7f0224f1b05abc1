/**
 * Report Summary
 *
 * Human-readable lines for a GenerationReport. The CLI logs them one by one.
 */
import { VALID_MODEL_TYPES, VALID_ROLES } from '../classifier/classifier.types';
import { SummaryChanges } from '../versioning/versioning.types';
import { GenerationReport } from './generator.types';

/**
 * Roles with more models than this are abbreviated in the distribution
 */
const ROLE_LISTING_LIMIT = 5;
const ROLE_LISTING_PREVIEW = 3;

export function formatResults(report: GenerationReport): string[] {
  const skipped = report.excluded.length + report.skippedFree.length;
  const lines = [
    'Results:',
    `  Created: ${report.created.length} models`,
    `  Updated: ${report.updated.length} models`,
    `  Unchanged: ${report.unchanged.length} models`,
    `  Skipped: ${skipped} models`,
  ];
  if (report.invalid.length > 0) {
    lines.push(`  Invalid: ${report.invalid.length} records`);
  }
  if (report.failed.length > 0) {
    lines.push(`  Failed: ${report.failed.length} models`);
  }
  lines.push(`  Models with contextLength: ${report.contextLengthCount}`);
  return lines;
}

export function formatSummary(report: GenerationReport, autocompleteModels: readonly string[]): string[] {
  const lines: string[] = ['=== Summary Statistics ==='];

  lines.push('Model types:');
  for (const [modelType, count] of byCountDesc(VALID_MODEL_TYPES, report.typeCounts)) {
    lines.push(`  ${modelType}: ${count} models`);
  }

  lines.push('Roles distribution:');
  for (const [role, count] of byCountDesc(VALID_ROLES, report.roleCounts)) {
    lines.push(`  ${role}: ${count} models`);
    const names = report.modelsByRole[role] ?? [];
    // autocomplete is always listed in full
    if (role === 'autocomplete' || names.length <= ROLE_LISTING_LIMIT) {
      names.forEach((name) => lines.push(`    - ${name}`));
    } else {
      names.slice(0, ROLE_LISTING_PREVIEW).forEach((name) => lines.push(`    - ${name}`));
      lines.push(`    - ... and ${count - ROLE_LISTING_PREVIEW} more`);
    }
  }

  lines.push('Autocomplete configuration:');
  lines.push(`  Predefined autocomplete models: ${autocompleteModels.length}`);
  lines.push('  Models in predefined list:');
  autocompleteModels.forEach((id) => lines.push(`    - ${id}`));

  const missing = findMissingAutocompleteModels(report, autocompleteModels);
  if (missing.length > 0) {
    lines.push('  Warning: The following autocomplete models were not found in the model data:');
    missing.forEach((id) => lines.push(`    - ${id}`));
  }

  if (report.created.length > 0) {
    lines.push('Newly added models:');
    report.created.forEach((model) => lines.push(`  - ${model.name} (v${model.version})`));
  }

  if (report.updated.length > 0) {
    lines.push('Updated models:');
    for (const model of report.updated) {
      lines.push(`  - ${model.name} (v${model.version})`);
      if (model.changes) {
        lines.push(...formatChanges(model.changes));
      }
    }
  }

  return lines;
}

export function formatChanges(changes: SummaryChanges): string[] {
  const lines: string[] = [];
  if (changes.type) {
    lines.push(`    - Type: ${changes.type.old ?? 'none'} → ${changes.type.new}`);
  }
  if (changes.roles) {
    if (changes.roles.added.length > 0) {
      lines.push(`    - Added roles: ${changes.roles.added.join(', ')}`);
    }
    if (changes.roles.removed.length > 0) {
      lines.push(`    - Removed roles: ${changes.roles.removed.join(', ')}`);
    }
  }
  if (changes.contextLength) {
    lines.push(
      `    - Context length: ${changes.contextLength.old ?? 'none'} → ${changes.contextLength.new ?? 'none'}`,
    );
  }
  return lines;
}

/**
 * Allow-list entries that did not end up with the autocomplete role,
 * usually because the listing no longer carries them.
 */
export function findMissingAutocompleteModels(
  report: GenerationReport,
  autocompleteModels: readonly string[],
): string[] {
  const found = new Set<string>();
  for (const model of [...report.created, ...report.updated, ...report.unchanged]) {
    if (model.roles.includes('autocomplete')) {
      found.add(model.identifier);
    }
  }
  return autocompleteModels.filter((id) => !found.has(id));
}

/**
 * Present keys ordered by count, highest first; ties keep `keys` order.
 */
function byCountDesc<K extends string>(
  keys: readonly K[],
  counts: Partial<Record<K, number>>,
): Array<[K, number]> {
  const entries: Array<[K, number]> = [];
  for (const key of keys) {
    const count = counts[key];
    if (count !== undefined) {
      entries.push([key, count]);
    }
  }
  return entries.sort((a, b) => b[1] - a[1]);
}
