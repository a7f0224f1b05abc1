/**
 * Versioning Types
 *
 * Persisted artifact state and the decisions the reconciler makes about it.
 */
import { ModelType, Role } from '../classifier/classifier.types';

/**
 * Which semantic version component a content change bumps.
 * `major` is never chosen automatically; an operator has to ask for it.
 */
export type ChangeLevel = 'patch' | 'minor' | 'major';

export const VALID_CHANGE_LEVELS: readonly ChangeLevel[] = ['patch', 'minor', 'major'];

/**
 * Summary as read back from disk. Artifacts written before the model type
 * was recorded have `type: null`; the missing type counts as a change.
 */
export interface PersistedSummary {
  type: ModelType | null;
  roles: Role[];
  contextLength: number;
}

/**
 * Artifact state read back from a previous run
 */
export interface VersionedArtifact {
  path: string;
  /** Model identifier the block was written for */
  identifier: string;
  version: string;
  summary: PersistedSummary;
}

/**
 * Outcome of looking up the prior artifact for a model. `absent` and
 * `malformed` are handled the same way by the reconciler but are kept
 * apart so callers can report corrupt files.
 */
export type PriorArtifactLookup =
  | { status: 'absent'; path: string }
  | { status: 'found'; artifact: VersionedArtifact }
  | { status: 'malformed'; path: string; reason: string };

export type DecisionKind = 'create' | 'update' | 'unchanged';

/**
 * Differences between a prior summary and a new one
 */
export interface SummaryChanges {
  type?: { old: ModelType | null; new: ModelType };
  roles?: { added: Role[]; removed: Role[] };
  contextLength?: { old: number | null; new: number | null };
}

/**
 * What to do with one model's artifact on this run
 */
export interface VersionDecision {
  identifier: string;
  kind: DecisionKind;
  version: string;
  previousVersion: string | null;
  write: boolean;                  // false only for `unchanged`
  changes: SummaryChanges | null;  // set when content differs from the prior artifact
}

export interface ReconcilerConfig {
  forceRegenerate: boolean;
  changeLevel: ChangeLevel;
}
