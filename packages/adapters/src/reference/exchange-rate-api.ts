import { ERRORS, MarketDataError, errorMessage } from '@ratewatch/domain';
import { log } from '@ratewatch/observability';
import { z } from 'zod';
import type { ReferenceRateProvider, ReferenceRates } from './types.js';

interface CacheEntry {
    rates: Record<string, number>;
    fetchedAt: Date;
}

const payloadSchema = z.object({
    result: z.string(),
    base_code: z.string().optional(),
    time_last_update_utc: z.string().optional(),
    rates: z.record(z.string(), z.number()).optional()
});

const STALE_LIMIT_MS = 24 * 3_600_000;

/**
 * Reference rates from ExchangeRate-API (free tier, no API key required).
 * Fetches from {baseUrl}/{base}; rates update daily, so responses are cached.
 * A failed refresh falls back to a cached set younger than 24h.
 */
export class ExchangeRateApiReferenceProvider implements ReferenceRateProvider {
    readonly source = 'exchangerate-api';
    private cache: CacheEntry | undefined;
    private readonly url: string;
    private readonly cacheTtlMs: number;
    private readonly timeoutMs: number;

    constructor(options?: { baseUrl?: string; cacheTtlMs?: number; timeoutMs?: number }) {
        this.url = `${(options?.baseUrl ?? 'https://open.er-api.com/v6/latest').replace(/\/+$/, '')}/USD`;
        this.cacheTtlMs = options?.cacheTtlMs ?? 3_600_000;
        this.timeoutMs = options?.timeoutMs ?? 10_000;
    }

    async fetchRates(): Promise<ReferenceRates> {
        const entry = await this.loadRates();
        return {
            source: this.source,
            base: 'USD',
            asOf: entry.fetchedAt.toISOString(),
            rates: entry.rates
        };
    }

    private async loadRates(): Promise<CacheEntry> {
        const cached = this.cache;
        if (cached && Date.now() - cached.fetchedAt.getTime() < this.cacheTtlMs) {
            return cached;
        }

        try {
            const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });

            if (!response.ok) {
                throw new Error(`ExchangeRate-API responded with status ${response.status}`);
            }

            const data = payloadSchema.parse(await response.json());
            if (data.result !== 'success' || !data.rates) {
                throw new Error(`ExchangeRate-API returned unexpected payload: ${data.result}`);
            }

            const entry: CacheEntry = { rates: data.rates, fetchedAt: new Date() };
            this.cache = entry;
            log('info', 'Reference rates fetched and cached', { source: this.source, currencyCount: Object.keys(data.rates).length });

            return entry;
        } catch (error) {
            if (cached) {
                const staleness = Date.now() - cached.fetchedAt.getTime();
                if (staleness < STALE_LIMIT_MS) {
                    log('warn', 'Reference rate fetch failed, using stale cache', {
                        source: this.source,
                        stalenessMs: staleness,
                        error: errorMessage(error)
                    });
                    return cached;
                }
            }

            throw new MarketDataError(ERRORS.REFERENCE_FEED_UNAVAILABLE, { source: this.source, reason: errorMessage(error) }, {
                cause: error,
                message: `Failed to fetch reference rates from ${this.source}: ${errorMessage(error)}`
            });
        }
    }

    /** Exposed for testing: clear internal cache. */
    clearCache(): void {
        this.cache = undefined;
    }
}
