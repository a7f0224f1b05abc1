/**
 * ModelClassifier
 *
 * Maps a raw model record to a capability summary and a set of role tags.
 *
 * Role assignment (in order):
 * 1. Look up the base roles for the record type. Excluded types (image,
 *    audio, moderation) and unknown types produce an `excluded` result.
 * 2. Add `apply` when the context length reaches the configured threshold.
 * 3. Add `autocomplete` when the identifier is on the allow-list,
 *    regardless of type or context length.
 *
 * The classifier holds no state beyond its configuration.
 */
import { ModelRecord } from '../catalog/catalog.types';
import {
  ClassificationResult,
  ClassifierConfig,
  ModelType,
  Role,
  VALID_MODEL_TYPES,
} from './classifier.types';
import {
  DEFAULT_APPLY_CONTEXT_THRESHOLD,
  DEFAULT_AUTOCOMPLETE_MODELS,
  DEFAULT_TYPE_ROLES,
} from './classifier.defaults';

export class ModelClassifier {
  private readonly config: ClassifierConfig;
  private readonly autocompleteModels: ReadonlySet<string>;

  constructor(config: Partial<ClassifierConfig> = {}) {
    this.config = {
      autocompleteModels: config.autocompleteModels ?? DEFAULT_AUTOCOMPLETE_MODELS,
      applyContextThreshold: config.applyContextThreshold ?? DEFAULT_APPLY_CONTEXT_THRESHOLD,
      typeRoles: config.typeRoles ?? DEFAULT_TYPE_ROLES,
    };
    this.autocompleteModels = new Set(this.config.autocompleteModels);
  }

  /**
   * Classify a single record.
   */
  classify(record: ModelRecord): ClassificationResult {
    const modelType = record.type;
    if (!isModelType(modelType)) {
      return {
        status: 'excluded',
        modelType,
        reason: `unknown model type '${modelType}'`,
      };
    }

    const baseRoles = this.config.typeRoles[modelType];
    if (baseRoles === null) {
      return {
        status: 'excluded',
        modelType,
        reason: `model type '${modelType}' is not applicable`,
      };
    }

    const contextLength = normalizeContextLength(record.context_length);
    const roles = new Set<Role>(baseRoles);

    if (contextLength >= this.config.applyContextThreshold) {
      roles.add('apply');
    }
    if (this.isAutocompleteModel(record.id)) {
      roles.add('autocomplete');
    }

    return {
      status: 'classified',
      summary: {
        type: modelType,
        roles: sortRoles(roles),
        contextLength,
      },
    };
  }

  /**
   * Check allow-list membership
   */
  isAutocompleteModel(modelId: string): boolean {
    return this.autocompleteModels.has(modelId);
  }

  /**
   * Get the current configuration
   */
  getConfig(): ClassifierConfig {
    return { ...this.config };
  }
}

/**
 * A model is free when its pricing lists zero input and zero output cost.
 * Records without pricing, or with an empty pricing object, are not free.
 */
export function isFreeModel(record: ModelRecord): boolean {
  const pricing = record.pricing;
  if (!pricing || Object.keys(pricing).length === 0) {
    return false;
  }
  return isZeroPrice(pricing.input) && isZeroPrice(pricing.output);
}

export function isModelType(value: string): value is ModelType {
  return VALID_MODEL_TYPES.some((modelType) => modelType === value);
}

export function sortRoles(roles: Iterable<Role>): Role[] {
  return Array.from(new Set(roles)).sort();
}

function isZeroPrice(value: number | null | undefined): boolean {
  return value === undefined || value === 0;
}

function normalizeContextLength(value: number | null | undefined): number {
  return typeof value === 'number' && value > 0 ? value : 0;
}
