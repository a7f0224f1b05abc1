/**
 * Generator Types
 *
 * Options and the per-run report produced by BlockGenerator.
 */
import { InvalidRecord } from '../catalog/catalog.types';
import { ModelType, Role } from '../classifier/classifier.types';
import { SummaryChanges } from '../versioning/versioning.types';

export interface GeneratorOptions {
  skipFree: boolean;
  provider: string;
}

/**
 * A model that made it through classification
 */
export interface ModelOutcome {
  identifier: string;
  name: string;
  type: ModelType;
  roles: Role[];
  contextLength: number;
  version: string;
  path: string;
}

export interface UpdatedOutcome extends ModelOutcome {
  previousVersion: string;
  changes: SummaryChanges | null;  // null for forced rewrites of identical content
}

/**
 * A record left out of the output on purpose
 */
export interface SkippedRecord {
  identifier: string;
  name: string;
  reason: string;
}

/**
 * A record that could not be processed
 */
export interface FailedRecord {
  identifier: string;
  reason: string;
}

export interface GenerationReport {
  total: number;
  created: ModelOutcome[];
  updated: UpdatedOutcome[];
  unchanged: ModelOutcome[];
  excluded: SkippedRecord[];
  skippedFree: SkippedRecord[];
  invalid: InvalidRecord[];
  failed: FailedRecord[];
  malformedPriors: string[];
  typeCounts: Partial<Record<ModelType, number>>;
  roleCounts: Partial<Record<Role, number>>;
  modelsByRole: Partial<Record<Role, string[]>>;
  contextLengthCount: number;
}
