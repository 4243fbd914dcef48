/**
 * Currency registry for the exchange-rate collector.
 *
 * Every rate is expressed as "1 USD = rate units of code". A provider symbol
 * either quotes code per USD (direct, e.g. USDJPY=X) or USD per code
 * (inverted, e.g. EURUSD=X) and is flagged accordingly.
 */

import { loadCurrencyCatalog, type CurrencyCatalog } from './catalog.js';

export const BASE_CURRENCY = 'USD';

export interface QuoteRequest {
    code: string;
    /** Provider ticker. */
    symbol: string;
    /** True when the symbol quotes USD per unit of `code`. */
    invert: boolean;
}

export type Bounds = readonly [low: number, high: number];

/** Static sanity range per currency; absent codes are not bounds-checked. */
export type BoundsTable = ReadonlyMap<string, Bounds>;

export interface CurrencyRegistry {
    base: typeof BASE_CURRENCY;
    /** Fetch order; the base currency is implicit and never listed. */
    requests: readonly QuoteRequest[];
    bounds: BoundsTable;
    /** Codes that must be present in every dataset. */
    required: readonly string[];
}

export function buildCurrencyRegistry(catalog: CurrencyCatalog): CurrencyRegistry {
    const requests: QuoteRequest[] = [];
    const bounds = new Map<string, Bounds>();

    for (const entry of catalog.currencies) {
        requests.push(Object.freeze({ code: entry.code, symbol: entry.symbol, invert: entry.invert }));
        if (entry.bounds) {
            bounds.set(entry.code, Object.freeze([entry.bounds[0], entry.bounds[1]] as const));
        }
    }

    return Object.freeze({
        base: catalog.base,
        requests: Object.freeze(requests),
        bounds,
        required: Object.freeze([...catalog.required])
    });
}

let defaultRegistry: CurrencyRegistry | undefined;

/** Registry built from the bundled currency catalog, loaded once. */
export function getDefaultCurrencyRegistry(): CurrencyRegistry {
    defaultRegistry ??= buildCurrencyRegistry(loadCurrencyCatalog());
    return defaultRegistry;
}
