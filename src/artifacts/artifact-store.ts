/**
 * ArtifactStore
 *
 * Reads and writes model block files in the output directory. Each model
 * maps to exactly one file, derived from its identifier.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { parse } from 'yaml';
import { createModuleLogger, errorMessage } from '../common/logger';
import { PriorArtifactLookup } from '../versioning/versioning.types';
import { BlockDocument, priorBlockSchema } from './artifact.types';
import { renderBlockDocument, summaryFromBlock } from './block-document';
import { sanitizeFilename } from './sanitize';

const logger = createModuleLogger('artifact-store');

export const BLOCK_FILE_EXTENSION = '.yaml';

export class ArtifactStore {
  constructor(private readonly outputDir: string) {}

  /**
   * Output path for a model identifier
   */
  pathFor(identifier: string): string {
    return path.join(this.outputDir, `${sanitizeFilename(identifier)}${BLOCK_FILE_EXTENSION}`);
  }

  /**
   * Look up the artifact written on a previous run.
   *
   * A missing file is `absent`. A file that cannot be read, parsed, or does
   * not look like a block is `malformed`; the reconciler treats it as absent.
   */
  async readPrior(filePath: string): Promise<PriorArtifactLookup> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'absent', path: filePath };
      }
      return this.malformed(filePath, `could not read file: ${errorMessage(error)}`);
    }

    let data: unknown;
    try {
      data = parse(content);
    } catch (error) {
      return this.malformed(filePath, `invalid YAML: ${errorMessage(error)}`);
    }

    const result = priorBlockSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      return this.malformed(filePath, `unexpected block structure: ${issues}`);
    }

    return {
      status: 'found',
      artifact: {
        path: filePath,
        identifier: result.data.models[0].model,
        version: result.data.version,
        summary: summaryFromBlock(result.data),
      },
    };
  }

  /**
   * Write a block document, creating the output directory when needed.
   */
  async write(filePath: string, doc: BlockDocument): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, renderBlockDocument(doc), 'utf8');
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  private malformed(filePath: string, reason: string): PriorArtifactLookup {
    logger.warn(`Ignoring malformed block file ${filePath}`, { reason });
    return { status: 'malformed', path: filePath, reason };
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
