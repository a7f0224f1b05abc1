/**
 * VersionReconciler
 *
 * Decides, per model, whether the artifact is created, updated or left
 * alone, and which semantic version it carries.
 *
 * - no prior artifact (or a malformed one): create at 1.0.0
 * - equal summary: unchanged, same version, nothing written
 * - different summary: update, version bumped by the configured level
 * - forceRegenerate: equal summaries are rewritten as updates without a bump
 *
 * Versions never decrease for a given identifier.
 */
import * as semver from 'semver';
import { ModelSummary } from '../classifier/classifier.types';
import {
  ChangeLevel,
  PersistedSummary,
  PriorArtifactLookup,
  ReconcilerConfig,
  SummaryChanges,
  VersionDecision,
} from './versioning.types';

export const INITIAL_VERSION = '1.0.0';

const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  forceRegenerate: false,
  changeLevel: 'minor',
};

export class VersionReconciler {
  private readonly config: ReconcilerConfig;

  constructor(config: Partial<ReconcilerConfig> = {}) {
    this.config = {
      forceRegenerate: config.forceRegenerate ?? DEFAULT_RECONCILER_CONFIG.forceRegenerate,
      changeLevel: config.changeLevel ?? DEFAULT_RECONCILER_CONFIG.changeLevel,
    };
  }

  reconcile(
    identifier: string,
    summary: ModelSummary,
    prior: PriorArtifactLookup,
  ): VersionDecision {
    if (prior.status !== 'found') {
      return {
        identifier,
        kind: 'create',
        version: INITIAL_VERSION,
        previousVersion: null,
        write: true,
        changes: null,
      };
    }

    const previousVersion = prior.artifact.version;
    const changes = diffSummaries(prior.artifact.summary, summary);

    if (changes === null) {
      if (this.config.forceRegenerate) {
        return {
          identifier,
          kind: 'update',
          version: previousVersion,
          previousVersion,
          write: true,
          changes: null,
        };
      }
      return {
        identifier,
        kind: 'unchanged',
        version: previousVersion,
        previousVersion,
        write: false,
        changes: null,
      };
    }

    return {
      identifier,
      kind: 'update',
      version: bumpVersion(previousVersion, this.config.changeLevel),
      previousVersion,
      write: true,
      changes,
    };
  }

  /**
   * Get the current configuration
   */
  getConfig(): ReconcilerConfig {
    return { ...this.config };
  }
}

/**
 * Increment one component of a semantic version, resetting the lower ones.
 */
export function bumpVersion(version: string, level: ChangeLevel): string {
  const next = semver.inc(version, level);
  if (next === null) {
    throw new Error(`Invalid version '${version}': cannot apply ${level} bump`);
  }
  return next;
}

/**
 * Two summaries are equal when type, context length and the set of roles
 * match. Role order and duplicates are ignored.
 */
export function summariesEqual(a: PersistedSummary, b: ModelSummary): boolean {
  return diffSummaries(a, b) === null;
}

/**
 * Compare a prior summary with a new one. Returns null when they are equal.
 */
export function diffSummaries(prior: PersistedSummary, next: ModelSummary): SummaryChanges | null {
  const changes: SummaryChanges = {};

  if (prior.type !== next.type) {
    changes.type = { old: prior.type, new: next.type };
  }

  const priorRoles = new Set(prior.roles);
  const nextRoles = new Set(next.roles);
  const added = [...nextRoles].filter((role) => !priorRoles.has(role)).sort();
  const removed = [...priorRoles].filter((role) => !nextRoles.has(role)).sort();
  if (added.length > 0 || removed.length > 0) {
    changes.roles = { added, removed };
  }

  if (prior.contextLength !== next.contextLength) {
    changes.contextLength = {
      old: prior.contextLength > 0 ? prior.contextLength : null,
      new: next.contextLength > 0 ? next.contextLength : null,
    };
  }

  return Object.keys(changes).length > 0 ? changes : null;
}
