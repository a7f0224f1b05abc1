/**
 * Report Summary Tests
 */
import { createEmptyReport } from '../block-generator';
import {
  findMissingAutocompleteModels,
  formatChanges,
  formatResults,
  formatSummary,
} from '../report-summary';
import { GenerationReport, ModelOutcome } from '../generator.types';

// ===== Test Fixtures =====

function createOutcome(overrides: Partial<ModelOutcome> = {}): ModelOutcome {
  return {
    identifier: 'acme/m1',
    name: 'Acme M1',
    type: 'chat',
    roles: ['apply', 'chat'],
    contextLength: 16000,
    version: '1.0.0',
    path: 'blocks/acme_m1.yaml',
    ...overrides,
  };
}

function createReport(): GenerationReport {
  const report = createEmptyReport(4);
  report.created.push(createOutcome());
  report.updated.push({
    ...createOutcome({ identifier: 'acme/tiny', name: 'Acme Tiny', roles: ['autocomplete', 'chat'], version: '1.1.0' }),
    previousVersion: '1.0.0',
    changes: {
      roles: { added: ['autocomplete'], removed: ['apply'] },
      contextLength: { old: 16000, new: 4096 },
    },
  });
  report.excluded.push({ identifier: 'acme/m2', name: 'Acme Painter', reason: 'image' });
  report.skippedFree.push({ identifier: 'acme/free', name: 'Acme Free', reason: 'free' });
  report.typeCounts = { chat: 2 };
  report.roleCounts = { apply: 1, chat: 2, autocomplete: 1 };
  report.modelsByRole = { apply: ['Acme M1'], chat: ['Acme M1', 'Acme Tiny'], autocomplete: ['Acme Tiny'] };
  report.contextLengthCount = 2;
  return report;
}

describe('formatResults', () => {
  it('should list counts per outcome', () => {
    expect(formatResults(createReport())).toEqual([
      'Results:',
      '  Created: 1 models',
      '  Updated: 1 models',
      '  Unchanged: 0 models',
      '  Skipped: 2 models',
      '  Models with contextLength: 2',
    ]);
  });

  it('should include invalid and failed counts when present', () => {
    const report = createEmptyReport(2);
    report.invalid.push({ index: 0, issues: ['id: Required'] });
    report.failed.push({ identifier: 'acme/x', reason: 'disk full' });

    expect(formatResults(report)).toEqual([
      'Results:',
      '  Created: 0 models',
      '  Updated: 0 models',
      '  Unchanged: 0 models',
      '  Skipped: 0 models',
      '  Invalid: 1 records',
      '  Failed: 1 models',
      '  Models with contextLength: 0',
    ]);
  });
});

describe('formatSummary', () => {
  it('should describe types, roles, allow-list and changes', () => {
    expect(formatSummary(createReport(), ['acme/tiny', 'acme/gone'])).toEqual([
      '=== Summary Statistics ===',
      'Model types:',
      '  chat: 2 models',
      'Roles distribution:',
      '  chat: 2 models',
      '    - Acme M1',
      '    - Acme Tiny',
      '  apply: 1 models',
      '    - Acme M1',
      '  autocomplete: 1 models',
      '    - Acme Tiny',
      'Autocomplete configuration:',
      '  Predefined autocomplete models: 2',
      '  Models in predefined list:',
      '    - acme/tiny',
      '    - acme/gone',
      '  Warning: The following autocomplete models were not found in the model data:',
      '    - acme/gone',
      'Newly added models:',
      '  - Acme M1 (v1.0.0)',
      'Updated models:',
      '  - Acme Tiny (v1.1.0)',
      '    - Added roles: autocomplete',
      '    - Removed roles: apply',
      '    - Context length: 16000 → 4096',
    ]);
  });

  it('should abbreviate long role listings except autocomplete', () => {
    const report = createEmptyReport(6);
    const names = ['A', 'B', 'C', 'D', 'E', 'F'];
    report.roleCounts = { chat: 6, autocomplete: 6 };
    report.modelsByRole = { chat: names, autocomplete: names };

    const lines = formatSummary(report, []);

    expect(lines.slice(lines.indexOf('  chat: 6 models'), lines.indexOf('  chat: 6 models') + 5)).toEqual([
      '  chat: 6 models',
      '    - A',
      '    - B',
      '    - C',
      '    - ... and 3 more',
    ]);
    expect(lines.slice(lines.indexOf('  autocomplete: 6 models') + 1, lines.indexOf('  autocomplete: 6 models') + 7))
      .toEqual(names.map((name) => `    - ${name}`));
  });
});

describe('formatChanges', () => {
  it('should show a new type and a removed context length', () => {
    expect(
      formatChanges({ type: { old: null, new: 'chat' }, contextLength: { old: 4096, new: null } }),
    ).toEqual(['    - Type: none → chat', '    - Context length: 4096 → none']);
  });
});

describe('findMissingAutocompleteModels', () => {
  it('should ignore allow-listed models that got the role', () => {
    expect(findMissingAutocompleteModels(createReport(), ['acme/tiny'])).toEqual([]);
  });
});
