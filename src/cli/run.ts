/**
 * Generator Run
 *
 * Wires configuration into the catalog, classifier, reconciler and
 * artifact store, runs one batch and logs the results.
 */
import { AppConfig } from '../config/app.config';
import { ArtifactStore } from '../artifacts/artifact-store';
import { CatalogClient, loadModelsFile, saveApiResponse } from '../catalog/catalog.client';
import { CatalogError } from '../catalog/catalog-error';
import { ModelClassifier } from '../classifier/model-classifier';
import { BlockGenerator } from '../generator/block-generator';
import { GenerationReport } from '../generator/generator.types';
import { formatResults, formatSummary } from '../generator/report-summary';
import { VersionReconciler } from '../versioning/version-reconciler';
import { createModuleLogger } from '../common/logger';

const logger = createModuleLogger('model-blocks');

export interface RunResult {
  exitCode: number;
  report: GenerationReport | null;
}

export interface RunDependencies {
  catalogClient?: CatalogClient;
}

export async function runGenerator(
  config: AppConfig,
  deps: RunDependencies = {},
): Promise<RunResult> {
  let rawRecords: unknown[];

  try {
    if (config.inputFile) {
      rawRecords = await loadModelsFile(config.inputFile);
    } else if (config.apiKey) {
      const client = deps.catalogClient
        ?? new CatalogClient(config.apiUrl, config.apiKey, config.apiTimeoutMs);
      rawRecords = await client.listModels();
      logger.info(`Successfully fetched ${rawRecords.length} models from API`);
      await saveApiResponse(config.outputDir, rawRecords);
    } else {
      logger.error(
        'Either --input-file or --api-key (or TOGETHER_API_KEY environment variable) must be provided',
      );
      return { exitCode: 1, report: null };
    }
  } catch (error) {
    if (error instanceof CatalogError) {
      logger.error(error.message, { kind: error.kind });
      return { exitCode: 1, report: null };
    }
    throw error;
  }

  const classifier = new ModelClassifier({
    autocompleteModels: config.autocompleteModels,
    applyContextThreshold: config.applyContextThreshold,
  });
  const reconciler = new VersionReconciler({
    forceRegenerate: config.forceRegenerate,
    changeLevel: config.changeLevel,
  });
  const store = new ArtifactStore(config.outputDir);
  const generator = new BlockGenerator(classifier, reconciler, store, {
    skipFree: config.skipFree,
    provider: config.provider,
  });

  const report = await generator.generate(rawRecords);

  formatResults(report).forEach((line) => logger.info(line));
  if (config.summary) {
    formatSummary(report, config.autocompleteModels).forEach((line) => logger.info(line));
  }

  return { exitCode: 0, report };
}
