import { z } from 'zod';

/**
 * Persisted market dataset. Field names are part of the file format read by
 * downstream consumers and stay snake_case.
 */

const boundsPair = z.tuple([z.number(), z.number()]);

export const BoundsRejectionSchema = z.object({
  code: z.string(),
  rate: z.number(),
  bounds: boundsPair
});

export const CrossCheckDeviationSchema = z.object({
  scraped: z.number(),
  reference: z.number(),
  deviation_pct: z.number()
});

export const AcquisitionAuditSchema = z.object({
  total_requested: z.number().int().nonnegative().default(0),
  fetched: z.number().int().nonnegative().default(0),
  validated: z.number().int().nonnegative().default(0),
  bounds_rejected: z.array(BoundsRejectionSchema).default([]),
  fetch_failed: z.array(z.string()).default([]),
  cross_check_deviations: z.record(z.string(), CrossCheckDeviationSchema).default({}),
  cross_check_source: z.string().nullable().default(null),
  final_count: z.number().int().nonnegative().default(0)
});

export const MarketItemSchema = z.object({
  ticker: z.string(),
  name: z.string(),
  price: z.number(),
  trend: z.number(),
  currency: z.string().nullable(),
  unit: z.string().nullable()
});

export const MarketDatasetSchema = z.object({
  last_update: z.string().default(''),
  totalItems: z.number().int().nonnegative().default(0),
  indices: z.array(MarketItemSchema).default([]),
  currencies: z.array(MarketItemSchema).default([]),
  energy: z.array(MarketItemSchema).default([]),
  metals: z.array(MarketItemSchema).default([]),
  agriculture: z.array(MarketItemSchema).default([]),
  rates: z.record(z.string(), z.number()).default({}),
  exchanger_audit: AcquisitionAuditSchema.optional()
});

export type BoundsRejection = z.infer<typeof BoundsRejectionSchema>;
export type CrossCheckDeviation = z.infer<typeof CrossCheckDeviationSchema>;
export type AcquisitionAudit = z.infer<typeof AcquisitionAuditSchema>;
export type MarketItem = z.infer<typeof MarketItemSchema>;
export type MarketDataset = z.infer<typeof MarketDatasetSchema>;

/**
 * The parts of a stored dataset the audit reads. `last_update` and `rates` are
 * checked by their own audit steps, and collector findings fall back to empty
 * lists, so a malformed market section never hides the rate checks.
 */
export const AuditedDatasetSchema = z
  .object({
    last_update: z.unknown(),
    rates: z.unknown(),
    exchanger_audit: z
      .object({
        fetch_failed: z.array(z.string()).catch([]),
        bounds_rejected: z.array(z.object({ code: z.string() }).passthrough()).catch([])
      })
      .passthrough()
      .optional()
      .catch(undefined)
  })
  .passthrough();

export const RatesSchema = z.record(z.string(), z.number());

export type AuditedDataset = z.infer<typeof AuditedDatasetSchema>;
