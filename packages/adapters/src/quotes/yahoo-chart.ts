import { ERRORS, MarketDataError, errorMessage } from '@ratewatch/domain';
import { log } from '@ratewatch/observability';
import { z } from 'zod';
import type { DailyCloses, QuoteProvider, QuoteWindow } from './types.js';

const chartResponseSchema = z.object({
    chart: z.object({
        result: z
            .array(
                z.object({
                    meta: z.object({ symbol: z.string() }).passthrough(),
                    timestamp: z.array(z.number()).optional(),
                    indicators: z.object({
                        quote: z.array(z.object({ close: z.array(z.number().nullable()).optional() }).passthrough())
                    })
                })
            )
            .nullable(),
        error: z.object({ code: z.string().optional(), description: z.string().optional() }).nullable().optional()
    })
});

export interface YahooChartOptions {
    baseUrl?: string;
    timeoutMs?: number;
}

/**
 * Daily closes from the Yahoo Finance chart endpoint:
 * {baseUrl}/{symbol}?range=5d&interval=1d
 */
export class YahooChartQuoteProvider implements QuoteProvider {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(options?: YahooChartOptions) {
        this.baseUrl = (options?.baseUrl ?? 'https://query1.finance.yahoo.com/v8/finance/chart').replace(/\/+$/, '');
        this.timeoutMs = options?.timeoutMs ?? 15_000;
    }

    async fetchDailyCloses(symbol: string, window: QuoteWindow): Promise<DailyCloses> {
        const query = new URLSearchParams({ range: window.range, interval: window.interval });
        const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?${query.toString()}`;

        let response: Response;
        try {
            response = await fetch(url, {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (error) {
            throw new MarketDataError(ERRORS.QUOTE_FETCH_FAILED, { symbol, reason: errorMessage(error) }, { cause: error });
        }

        if (!response.ok) {
            throw new MarketDataError(ERRORS.QUOTE_FETCH_FAILED, { symbol, status: response.status }, {
                message: `Quote provider responded with status ${response.status} for ${symbol}.`
            });
        }

        const parsed = chartResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            log('warn', 'Quote provider payload rejected', { symbol, issues: parsed.error.issues.length });
            throw new MarketDataError(ERRORS.QUOTE_MALFORMED_RESPONSE, { symbol });
        }

        const result = parsed.data.chart.result?.[0];
        if (!result) {
            // The provider answers with an empty chart while a symbol has no fresh data.
            throw new MarketDataError(ERRORS.QUOTE_FETCH_FAILED, {
                symbol,
                reason: parsed.data.chart.error?.description ?? 'empty chart result'
            });
        }

        return {
            symbol,
            closes: result.indicators.quote[0]?.close ?? []
        };
    }
}
