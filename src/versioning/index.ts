/**
 * Versioning - Barrel Export
 */
export {
  VersionReconciler,
  INITIAL_VERSION,
  bumpVersion,
  diffSummaries,
  summariesEqual,
} from './version-reconciler';
export {
  ChangeLevel,
  DecisionKind,
  PersistedSummary,
  PriorArtifactLookup,
  ReconcilerConfig,
  SummaryChanges,
  VersionDecision,
  VersionedArtifact,
  VALID_CHANGE_LEVELS,
} from './versioning.types';
