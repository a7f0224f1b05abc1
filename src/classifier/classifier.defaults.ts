/**
 * Classifier Defaults
 *
 * Static configuration for role assignment. All of it can be replaced
 * through ClassifierConfig; see config/app.config.ts for the environment
 * and CLI overrides.
 */
import { TypeRoleTable } from './classifier.types';

/**
 * Minimum context length for the `apply` role.
 */
export const DEFAULT_APPLY_CONTEXT_THRESHOLD = 8192;

/**
 * Models that get the `autocomplete` role.
 *
 * Criteria for inclusion:
 * - fast, generally under 8B parameters
 * - good at code completion
 *
 * Membership is the only gate: a listed model gets `autocomplete` even
 * when its context window is below DEFAULT_APPLY_CONTEXT_THRESHOLD.
 */
export const DEFAULT_AUTOCOMPLETE_MODELS: readonly string[] = [
  // Meta Llama 3 (8B variants only)
  'meta-llama/Meta-Llama-3-8B-Instruct-Lite',
  'meta-llama/Meta-Llama-3-8B-Instruct-Turbo',
  'meta-llama/Meta-Llama-3.1-8B-Instruct-Turbo',
  'meta-llama/Llama-3-8b-chat-hf',

  // Google
  'google/gemma-2b-it',
  'google/gemma-2-9b-it',

  // Mistral
  'mistralai/Mistral-7B-Instruct-v0.2',
  'mistralai/Mistral-7B-v0.1',
];

/**
 * Base roles per model type. `null` marks types that are dropped entirely.
 */
export const DEFAULT_TYPE_ROLES: TypeRoleTable = {
  chat: ['chat'],
  language: ['chat'],
  embedding: ['embed'],
  rerank: ['rerank'],
  image: null,
  audio: null,
  moderation: null,
};
