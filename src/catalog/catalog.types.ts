/**
 * Catalog Types
 *
 * Shape of the records returned by the model listing endpoint
 * (`GET /v1/models`) and of the local JSON files that mirror it.
 */
import { z } from 'zod';

/**
 * Pricing as reported by the listing endpoint. All values are optional and
 * may be null; only `input` and `output` matter for free-model detection.
 */
export const modelPricingSchema = z
  .object({
    hourly: z.number().nullish(),
    input: z.number().nullish(),
    output: z.number().nullish(),
    base: z.number().nullish(),
    finetune: z.number().nullish(),
  })
  .passthrough();

const metadataField = z.string().nullish().catch(undefined);

/**
 * A single model record. Only `id` and `type` can make a record invalid;
 * descriptive fields of the wrong shape are dropped. Unknown fields are
 * kept as-is.
 */
export const modelRecordSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    display_name: metadataField,
    description: metadataField,
    organization: metadataField,
    link: metadataField,
    license: metadataField,
    context_length: z.number().int().nonnegative().nullish().catch(null),
    pricing: modelPricingSchema.nullish().catch(null),
  })
  .passthrough();

export type ModelPricing = z.infer<typeof modelPricingSchema>;
export type ModelRecord = z.infer<typeof modelRecordSchema>;

/**
 * A record that failed validation, kept for reporting.
 */
export interface InvalidRecord {
  index: number;
  id?: string;
  issues: string[];
}

/**
 * Result of validating a raw record sequence
 */
export interface ParsedRecords {
  records: ModelRecord[];
  invalid: InvalidRecord[];
}
