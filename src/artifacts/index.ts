/**
 * Artifacts - Barrel Export
 */
export { ArtifactStore, BLOCK_FILE_EXTENSION } from './artifact-store';
export {
  DEFAULT_PROVIDER,
  apiKeyInput,
  buildBlockDocument,
  displayNameOf,
  renderBlockDocument,
  summaryFromBlock,
  validateBlockDocument,
} from './block-document';
export { sanitizeFilename } from './sanitize';
export {
  BLOCK_SCHEMA_VERSION,
  BlockDocument,
  BlockMetadata,
  BlockModelEntry,
  PriorBlock,
  priorBlockSchema,
} from './artifact.types';
