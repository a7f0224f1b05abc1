/**
 * CatalogClient
 *
 * Plain TypeScript HTTP client for the model listing endpoint, plus the
 * local-file and validation helpers that turn either source into the same
 * in-memory record sequence.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { createModuleLogger, errorMessage } from '../common/logger';
import { CatalogError } from './catalog-error';
import { InvalidRecord, ModelRecord, ParsedRecords, modelRecordSchema } from './catalog.types';

const logger = createModuleLogger('catalog');

/**
 * Default request timeout: 30 seconds
 */
const DEFAULT_TIMEOUT_MS = 30 * 1000;

/**
 * File name used when keeping a copy of the raw API response
 */
export const API_RESPONSE_FILENAME = 'together_api_response.json';

export class CatalogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    baseUrl: string,
    private readonly apiKey?: string,
    timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {
    // Remove trailing slash
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.timeoutMs = timeoutMs;
  }

  /**
   * Fetch the raw model list. The body must be a JSON array.
   */
  async listModels(): Promise<unknown[]> {
    const url = `${this.baseUrl}/models`;
    logger.info(`Fetching models data from ${url}...`);

    const data = await this.fetchFromApi(url);
    if (!Array.isArray(data)) {
      throw new CatalogError(
        `Unexpected API response format: expected list, got ${describeType(data)}`,
        'format',
      );
    }
    return data;
  }

  /**
   * Make HTTP request to the API
   */
  private async fetchFromApi(url: string): Promise<unknown> {
    let response: Response;

    try {
      const headers: Record<string, string> = {
        Accept: 'application/json',
      };
      if (this.apiKey) {
        headers['Authorization'] = `Bearer ${this.apiKey}`;
      }
      response = await fetch(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new CatalogError(
        `Model listing request failed: ${error instanceof Error && error.message ? error.message : 'Network error'}`,
        'request',
      );
    }

    if (!response.ok) {
      const statusText = response.statusText || 'Unknown error';
      throw new CatalogError(
        `Model listing API error (${response.status}): ${statusText}`,
        'http',
        response.status,
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new CatalogError(`Model listing response parse error: ${errorMessage(error)}`, 'parse');
    }
  }
}

/**
 * Load a raw model list from a local JSON file.
 */
export async function loadModelsFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new CatalogError(`Error loading input file ${filePath}: ${errorMessage(error)}`, 'file');
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new CatalogError(`Error parsing input file ${filePath}: ${errorMessage(error)}`, 'parse');
  }

  if (!Array.isArray(data)) {
    throw new CatalogError(
      `Input file ${filePath} must contain a list of models, got ${describeType(data)}`,
      'format',
    );
  }

  logger.info(`Loaded ${data.length} models from ${filePath}`);
  return data;
}

/**
 * Validate raw records. Records missing an identifier or type are
 * collected as invalid instead of failing the whole batch.
 */
export function parseModelRecords(raw: unknown[]): ParsedRecords {
  const records: ModelRecord[] = [];
  const invalid: InvalidRecord[] = [];

  raw.forEach((item, index) => {
    const result = modelRecordSchema.safeParse(item);
    if (result.success) {
      records.push(result.data);
      return;
    }

    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
    );
    const id = peekId(item);
    invalid.push(id === undefined ? { index, issues } : { index, id, issues });
    logger.warn('Skipping invalid model record', { index, id, issues });
  });

  return { records, invalid };
}

/**
 * Keep a copy of the raw API response next to the generated blocks.
 * Failure to write it is not fatal.
 */
export async function saveApiResponse(outputDir: string, data: unknown[]): Promise<string | null> {
  const outputFile = path.join(outputDir, API_RESPONSE_FILENAME);
  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(outputFile, JSON.stringify(data, null, 2), 'utf8');
    logger.info(`Saved API response to ${outputFile}`);
    return outputFile;
  } catch (error) {
    logger.warn(`Could not save API response to file: ${errorMessage(error)}`);
    return null;
  }
}

function peekId(item: unknown): string | undefined {
  if (typeof item === 'object' && item !== null && 'id' in item) {
    const id = item.id;
    if (typeof id === 'string' && id.length > 0) {
      return id;
    }
  }
  return undefined;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
