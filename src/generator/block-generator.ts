/**
 * BlockGenerator
 *
 * Runs one sequential pass over the model records:
 * validate -> skip free (optional) -> classify -> read prior block ->
 * reconcile version -> write block when created, changed or forced.
 *
 * A record that fails is logged and counted; the batch always completes.
 */
import { ModelRecord } from '../catalog/catalog.types';
import { parseModelRecords } from '../catalog/catalog.client';
import { ModelSummary } from '../classifier/classifier.types';
import { ModelClassifier, isFreeModel } from '../classifier/model-classifier';
import { ArtifactStore } from '../artifacts/artifact-store';
import {
  DEFAULT_PROVIDER,
  buildBlockDocument,
  displayNameOf,
  validateBlockDocument,
} from '../artifacts/block-document';
import { VersionReconciler } from '../versioning/version-reconciler';
import { DecisionKind } from '../versioning/versioning.types';
import { createModuleLogger, errorMessage } from '../common/logger';
import { GenerationReport, GeneratorOptions, ModelOutcome } from './generator.types';

const logger = createModuleLogger('block-generator');

const PROGRESS_INTERVAL = 10;

const DECISION_LABELS: Record<DecisionKind, string> = {
  create: 'Created',
  update: 'Updated',
  unchanged: 'Unchanged',
};

const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
  skipFree: false,
  provider: DEFAULT_PROVIDER,
};

/**
 * Types that normally report a context window
 */
const CONTEXT_EXPECTED_TYPES = new Set(['chat', 'language']);

export class BlockGenerator {
  private readonly options: GeneratorOptions;

  constructor(
    private readonly classifier: ModelClassifier,
    private readonly reconciler: VersionReconciler,
    private readonly store: ArtifactStore,
    options: Partial<GeneratorOptions> = {},
  ) {
    this.options = {
      skipFree: options.skipFree ?? DEFAULT_GENERATOR_OPTIONS.skipFree,
      provider: options.provider ?? DEFAULT_GENERATOR_OPTIONS.provider,
    };
  }

  async generate(rawRecords: unknown[]): Promise<GenerationReport> {
    const { records, invalid } = parseModelRecords(rawRecords);
    const report = createEmptyReport(rawRecords.length);
    report.invalid = invalid;

    const total = records.length;
    logger.info(`Processing ${total} models...`);

    for (let i = 0; i < total; i++) {
      const record = records[i];
      try {
        await this.processRecord(record, report);
      } catch (error) {
        const reason = errorMessage(error);
        logger.error(`Failed to process model ${record.id}`, { error: reason });
        report.failed.push({ identifier: record.id, reason });
      }

      const done = i + 1;
      if (done % PROGRESS_INTERVAL === 0 || done === total) {
        logger.info(`Progress: ${done}/${total} models (${((done / total) * 100).toFixed(1)}%)`);
      }
    }

    return report;
  }

  private async processRecord(record: ModelRecord, report: GenerationReport): Promise<void> {
    const name = displayNameOf(record);

    if (this.options.skipFree && isFreeModel(record)) {
      report.skippedFree.push({ identifier: record.id, name, reason: 'free' });
      return;
    }

    const classification = this.classifier.classify(record);
    if (classification.status === 'excluded') {
      logger.debug(`Excluding ${name}`, { reason: classification.reason });
      report.excluded.push({ identifier: record.id, name, reason: classification.modelType });
      return;
    }

    const summary = classification.summary;
    if (summary.contextLength === 0 && CONTEXT_EXPECTED_TYPES.has(summary.type)) {
      logger.warn(`No context_length found for ${name} (${record.id}), defaultCompletionOptions will be omitted`);
    }

    const filePath = this.store.pathFor(record.id);
    const prior = await this.store.readPrior(filePath);
    if (prior.status === 'malformed') {
      report.malformedPriors.push(filePath);
    }
    if (prior.status === 'found' && prior.artifact.identifier !== record.id) {
      const reason = `output file ${filePath} already holds model ${prior.artifact.identifier}`;
      logger.error(`Skipping ${name}: ${reason}`);
      report.failed.push({ identifier: record.id, reason });
      return;
    }

    const decision = this.reconciler.reconcile(record.id, summary, prior);

    if (decision.write) {
      const doc = buildBlockDocument(record, summary, decision.version, this.options.provider);
      const validationErrors = validateBlockDocument(doc, this.options.provider);
      if (validationErrors) {
        logger.error(`Validation errors for ${name}, skipping generation of ${filePath}`, {
          errors: validationErrors,
        });
        report.failed.push({ identifier: record.id, reason: validationErrors.join('; ') });
        return;
      }
      await this.store.write(filePath, doc);
      logger.info(`${DECISION_LABELS[decision.kind]} YAML for ${name} (version ${decision.version})`);
    }

    const outcome = toOutcome(record, name, summary, decision.version, filePath);
    switch (decision.kind) {
      case 'create':
        report.created.push(outcome);
        break;
      case 'update':
        report.updated.push({
          ...outcome,
          previousVersion: decision.previousVersion ?? decision.version,
          changes: decision.changes,
        });
        break;
      case 'unchanged':
        report.unchanged.push(outcome);
        break;
    }

    countOutcome(report, summary, name);
  }
}

export function createEmptyReport(total: number): GenerationReport {
  return {
    total,
    created: [],
    updated: [],
    unchanged: [],
    excluded: [],
    skippedFree: [],
    invalid: [],
    failed: [],
    malformedPriors: [],
    typeCounts: {},
    roleCounts: {},
    modelsByRole: {},
    contextLengthCount: 0,
  };
}

function toOutcome(
  record: ModelRecord,
  name: string,
  summary: ModelSummary,
  version: string,
  filePath: string,
): ModelOutcome {
  return {
    identifier: record.id,
    name,
    type: summary.type,
    roles: summary.roles,
    contextLength: summary.contextLength,
    version,
    path: filePath,
  };
}

function countOutcome(report: GenerationReport, summary: ModelSummary, name: string): void {
  report.typeCounts[summary.type] = (report.typeCounts[summary.type] ?? 0) + 1;
  for (const role of summary.roles) {
    report.roleCounts[role] = (report.roleCounts[role] ?? 0) + 1;
    const names = report.modelsByRole[role] ?? [];
    names.push(name);
    report.modelsByRole[role] = names;
  }
  if (summary.contextLength > 0) {
    report.contextLengthCount++;
  }
}
