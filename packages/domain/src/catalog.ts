import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ERRORS, MarketDataError } from './errors.js';

const currencyCode = z.string().regex(/^[A-Z]{3}$/);

const boundsSchema = z
  .tuple([z.number().positive(), z.number().positive()])
  .refine(([low, high]) => low < high, { message: 'bounds must satisfy low < high' });

const currencyEntrySchema = z.object({
  code: currencyCode,
  name: z.string().min(1),
  symbol: z.string().min(1),
  invert: z.boolean(),
  bounds: boundsSchema.nullable()
});

export const CurrencyCatalogSchema = z.object({
  base: z.literal('USD'),
  required: z.array(currencyCode),
  currencies: z.array(currencyEntrySchema)
});

const instrumentSchema = z.object({
  ticker: z.string().min(1),
  name: z.string().min(1),
  unit: z.string().nullable()
});

export const MARKET_CATEGORIES = ['indices', 'currencies', 'energy', 'metals', 'agriculture'] as const;
export type MarketCategory = (typeof MARKET_CATEGORIES)[number];

const categorySchema = z.object({
  currency: z.string().nullable(),
  instruments: z.array(instrumentSchema)
});

export const InstrumentCatalogSchema = z.object({
  indices: categorySchema,
  currencies: categorySchema,
  energy: categorySchema,
  metals: categorySchema,
  agriculture: categorySchema
});

export type CurrencyCatalog = z.infer<typeof CurrencyCatalogSchema>;
export type CurrencyCatalogEntry = z.infer<typeof currencyEntrySchema>;
export type InstrumentCatalog = z.infer<typeof InstrumentCatalogSchema>;
export type Instrument = z.infer<typeof instrumentSchema>;

function readCatalog<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(url, 'utf8'));
  } catch (error) {
    throw new MarketDataError(ERRORS.CATALOG_INVALID, { path: url.pathname }, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new MarketDataError(ERRORS.CATALOG_INVALID, { path: url.pathname, issues: parsed.error.issues });
  }
  return parsed.data;
}

export function loadCurrencyCatalog(url: URL = new URL('../data/currencies.json', import.meta.url)): CurrencyCatalog {
  const catalog = readCatalog(url, CurrencyCatalogSchema);
  const codes = new Set<string>();
  for (const entry of catalog.currencies) {
    if (entry.code === catalog.base || codes.has(entry.code)) {
      throw new MarketDataError(ERRORS.CATALOG_INVALID, { path: url.pathname, code: entry.code }, {
        message: `Currency ${entry.code} is listed twice or duplicates the base currency.`
      });
    }
    codes.add(entry.code);
  }
  return catalog;
}

export function loadInstrumentCatalog(url: URL = new URL('../data/instruments.json', import.meta.url)): InstrumentCatalog {
  return readCatalog(url, InstrumentCatalogSchema);
}
