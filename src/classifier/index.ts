/**
 * Classifier - Barrel Export
 */
export { ModelClassifier, isFreeModel, isModelType, sortRoles } from './model-classifier';
export {
  ModelType,
  Role,
  ModelSummary,
  ClassifierConfig,
  ClassificationResult,
  TypeRoleTable,
  VALID_MODEL_TYPES,
  VALID_ROLES,
} from './classifier.types';
export {
  DEFAULT_APPLY_CONTEXT_THRESHOLD,
  DEFAULT_AUTOCOMPLETE_MODELS,
  DEFAULT_TYPE_ROLES,
} from './classifier.defaults';
