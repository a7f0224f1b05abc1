/**
 * Catalog - Barrel Export
 */
export {
  CatalogClient,
  loadModelsFile,
  parseModelRecords,
  saveApiResponse,
  API_RESPONSE_FILENAME,
} from './catalog.client';
export { CatalogError, CatalogErrorKind } from './catalog-error';
export {
  ModelRecord,
  ModelPricing,
  InvalidRecord,
  ParsedRecords,
  modelRecordSchema,
  modelPricingSchema,
} from './catalog.types';

import { CatalogClient } from './catalog.client';

/**
 * Default listing endpoint base URL
 */
export const DEFAULT_MODELS_API_URL = 'https://api.together.xyz/v1';

/**
 * Factory function to create a configured CatalogClient
 */
export function createCatalogClient(config?: {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}): CatalogClient {
  const baseUrl = config?.baseUrl || process.env.MODELS_API_URL || DEFAULT_MODELS_API_URL;
  return new CatalogClient(baseUrl, config?.apiKey, config?.timeoutMs);
}
