/**
 * Application Configuration
 *
 * Resolves the run configuration from three layers, highest first:
 * command-line options, environment variables (loaded by dotenv in
 * main.ts), built-in defaults. Empty values count as unset.
 */
import { z } from 'zod';
import { DEFAULT_MODELS_API_URL } from '../catalog';
import {
  DEFAULT_APPLY_CONTEXT_THRESHOLD,
  DEFAULT_AUTOCOMPLETE_MODELS,
} from '../classifier/classifier.defaults';
import { DEFAULT_PROVIDER } from '../artifacts/block-document';
import { ConfigError } from './config-error';

export const DEFAULT_OUTPUT_DIR = './blocks/public';
export const DEFAULT_API_TIMEOUT_MS = 30000;

/**
 * Options as they come from the command line (all strings or flags)
 */
export type CliOptions = {
  inputFile?: string;
  apiKey?: string;
  outputDir?: string;
  skipFree?: boolean;
  summary?: boolean;
  forceRegenerate?: boolean;
  bump?: string;
  autocomplete?: string;
  applyThreshold?: string;
};

const appConfigSchema = z.object({
  inputFile: z.string().optional(),
  apiKey: z.string().optional(),
  apiUrl: z.string().url(),
  apiTimeoutMs: z.coerce.number().int().positive(),
  provider: z.string().min(1),
  outputDir: z.string().min(1),
  skipFree: z.boolean(),
  summary: z.boolean(),
  forceRegenerate: z.boolean(),
  changeLevel: z.enum(['patch', 'minor', 'major']),
  autocompleteModels: z.array(z.string().min(1)),
  applyContextThreshold: z.coerce.number().int().nonnegative(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export function loadConfig(options: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const autocompleteList = firstSet(options.autocomplete, env.AUTOCOMPLETE_MODELS);

  const result = appConfigSchema.safeParse({
    inputFile: firstSet(options.inputFile),
    apiKey: firstSet(options.apiKey, env.TOGETHER_API_KEY),
    apiUrl: firstSet(env.MODELS_API_URL) ?? DEFAULT_MODELS_API_URL,
    apiTimeoutMs: firstSet(env.MODELS_API_TIMEOUT_MS) ?? DEFAULT_API_TIMEOUT_MS,
    provider: firstSet(env.MODEL_PROVIDER) ?? DEFAULT_PROVIDER,
    outputDir: firstSet(options.outputDir, env.OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR,
    skipFree: options.skipFree ?? false,
    summary: options.summary ?? false,
    forceRegenerate: options.forceRegenerate ?? false,
    changeLevel: firstSet(options.bump) ?? 'minor',
    autocompleteModels: autocompleteList === undefined
      ? [...DEFAULT_AUTOCOMPLETE_MODELS]
      : splitList(autocompleteList),
    applyContextThreshold:
      firstSet(options.applyThreshold, env.APPLY_CONTEXT_THRESHOLD) ?? DEFAULT_APPLY_CONTEXT_THRESHOLD,
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function firstSet(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}
