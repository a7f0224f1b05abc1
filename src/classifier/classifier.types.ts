/**
 * Classifier Types
 *
 * Model types, role tags and the capability summary derived from a record.
 */

/**
 * Model types reported by the listing endpoint
 */
export type ModelType =
  | 'chat'
  | 'language'
  | 'embedding'
  | 'rerank'
  | 'image'
  | 'audio'
  | 'moderation';

/**
 * All known model types, for iteration and validation
 */
export const VALID_MODEL_TYPES: readonly ModelType[] = [
  'chat',
  'language',
  'embedding',
  'rerank',
  'image',
  'audio',
  'moderation',
];

/**
 * Role tags understood by the consuming editor tooling
 */
export type Role = 'chat' | 'apply' | 'autocomplete' | 'embed' | 'rerank' | 'edit';

export const VALID_ROLES: readonly Role[] = ['chat', 'apply', 'autocomplete', 'embed', 'rerank', 'edit'];

/**
 * Base roles for a model type, or `null` when models of that type are
 * excluded from output altogether.
 */
export type TypeRoleTable = Record<ModelType, readonly Role[] | null>;

/**
 * Normalized capability summary for a single model
 */
export interface ModelSummary {
  type: ModelType;
  roles: Role[];          // Sorted, no duplicates
  contextLength: number;  // 0 when the listing does not report one
}

/**
 * Static configuration the classifier is constructed with
 */
export interface ClassifierConfig {
  autocompleteModels: readonly string[];
  applyContextThreshold: number;
  typeRoles: TypeRoleTable;
}

export type ClassificationResult =
  | { status: 'classified'; summary: ModelSummary }
  | { status: 'excluded'; modelType: string; reason: string };
