/**
 * Artifact Types
 *
 * The YAML model block written for each model, and the schema used to read
 * one back on the next run.
 */
import * as semver from 'semver';
import { z } from 'zod';
import { ModelType, Role, VALID_ROLES } from '../classifier/classifier.types';

export const BLOCK_SCHEMA_VERSION = 'v1';

export interface BlockMetadata {
  type: ModelType;
  description?: string;
  organization?: string;
  license?: string;
  link?: string;
}

export interface BlockModelEntry {
  name: string;
  provider: string;
  model: string;
  apiKey: string;
  defaultCompletionOptions?: {
    contextLength: number;
  };
  roles: Role[];
}

/**
 * A model block document. Key order here is the order written to disk.
 */
export interface BlockDocument {
  name: string;
  version: string;
  schema: typeof BLOCK_SCHEMA_VERSION;
  metadata: BlockMetadata;
  models: BlockModelEntry[];
}

const roleSchema = z.string().refine(
  (value): value is Role => VALID_ROLES.some((role) => role === value),
  { message: 'unknown role' },
);

/**
 * Only the fields the reconciler needs are checked; the rest passes through.
 */
export const priorBlockSchema = z
  .object({
    version: z.string().refine((value) => semver.valid(value) !== null, {
      message: 'invalid semantic version',
    }),
    metadata: z
      .object({
        type: z.string().optional(),
      })
      .passthrough()
      .optional(),
    models: z
      .array(
        z
          .object({
            model: z.string().min(1),
            roles: z.array(roleSchema),
            defaultCompletionOptions: z
              .object({
                contextLength: z.number().int().nonnegative().optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      )
      .min(1),
  })
  .passthrough();

export type PriorBlock = z.infer<typeof priorBlockSchema>;
