/**
 * Block Document
 *
 * Builds, validates, renders and reads back model block documents.
 */
import * as semver from 'semver';
import { stringify } from 'yaml';
import { ModelRecord } from '../catalog/catalog.types';
import { ModelSummary } from '../classifier/classifier.types';
import { isModelType, sortRoles } from '../classifier/model-classifier';
import { PersistedSummary } from '../versioning/versioning.types';
import {
  BLOCK_SCHEMA_VERSION,
  BlockDocument,
  BlockMetadata,
  BlockModelEntry,
  PriorBlock,
} from './artifact.types';

/**
 * Default provider written into every block
 */
export const DEFAULT_PROVIDER = 'together';

/**
 * Placeholder the consuming tool substitutes with the user's key
 */
export function apiKeyInput(provider: string): string {
  const inputName = `${provider.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_API_KEY`;
  return `\${{ inputs.${inputName} }}`;
}

/**
 * Name shown for a model: its display name, or the identifier when the
 * listing does not provide one.
 */
export function displayNameOf(record: ModelRecord): string {
  const displayName = record.display_name?.trim();
  return displayName ? displayName : record.id;
}

export function buildBlockDocument(
  record: ModelRecord,
  summary: ModelSummary,
  version: string,
  provider: string = DEFAULT_PROVIDER,
): BlockDocument {
  const name = displayNameOf(record);

  const metadata: BlockMetadata = { type: summary.type };
  if (record.description) metadata.description = record.description;
  if (record.organization) metadata.organization = record.organization;
  if (record.license) metadata.license = record.license;
  if (record.link) metadata.link = record.link;

  const model: BlockModelEntry = {
    name,
    provider,
    model: record.id,
    apiKey: apiKeyInput(provider),
    ...(summary.contextLength > 0
      ? { defaultCompletionOptions: { contextLength: summary.contextLength } }
      : {}),
    roles: [...summary.roles],
  };

  return {
    name,
    version,
    schema: BLOCK_SCHEMA_VERSION,
    metadata,
    models: [model],
  };
}

/**
 * Check a document before it is written. Returns the list of problems,
 * or null when there are none.
 */
export function validateBlockDocument(doc: BlockDocument, provider: string = DEFAULT_PROVIDER): string[] | null {
  const errors: string[] = [];

  if (!doc.name) {
    errors.push('Missing required top-level field: name');
  }
  if (semver.valid(doc.version) === null) {
    errors.push(`Invalid version: ${doc.version}`);
  }
  if (doc.schema !== BLOCK_SCHEMA_VERSION) {
    errors.push(`Invalid schema version: ${doc.schema} (expected '${BLOCK_SCHEMA_VERSION}')`);
  }

  if (doc.models.length === 0) {
    errors.push("'models' must be a non-empty array");
  }
  doc.models.forEach((model, i) => {
    for (const field of ['name', 'provider', 'model', 'apiKey'] as const) {
      if (!model[field]) {
        errors.push(`Model #${i + 1}: Missing required field: ${field}`);
      }
    }
    if (model.provider !== provider) {
      errors.push(`Model #${i + 1}: Provider should be '${provider}', got: ${model.provider}`);
    }
    if (model.roles.length === 0) {
      errors.push(`Model #${i + 1}: 'roles' must be a non-empty array`);
    }
  });

  return errors.length > 0 ? errors : null;
}

/**
 * Serialize with a leading document marker and 2-space indentation.
 */
export function renderBlockDocument(doc: BlockDocument): string {
  return `---\n${stringify(doc, { indent: 2, indentSeq: true })}`;
}

/**
 * Recover the summary a block was generated from.
 */
export function summaryFromBlock(block: PriorBlock): PersistedSummary {
  const model = block.models[0];
  const type = block.metadata?.type;

  return {
    type: type !== undefined && isModelType(type) ? type : null,
    roles: sortRoles(model.roles),
    contextLength: model.defaultCompletionOptions?.contextLength ?? 0,
  };
}
