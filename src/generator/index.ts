/**
 * Generator - Barrel Export
 */
export { BlockGenerator, createEmptyReport } from './block-generator';
export {
  formatResults,
  formatSummary,
  formatChanges,
  findMissingAutocompleteModels,
} from './report-summary';
export {
  GeneratorOptions,
  GenerationReport,
  ModelOutcome,
  UpdatedOutcome,
  SkippedRecord,
  FailedRecord,
} from './generator.types';
