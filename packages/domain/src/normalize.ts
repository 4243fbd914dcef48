import type { QuoteRequest } from './currency.js';
import { ERRORS, MarketDataError } from './errors.js';
import { PRECISION, roundTo } from './rounding.js';

/** The two most recent valid daily closes of a symbol. */
export interface RawQuote {
    symbol: string;
    latestClose: number;
    previousClose: number;
}

export interface NormalizedRate {
    code: string;
    /** 1 USD = rate units of `code`, 6 decimals. */
    rate: number;
    /** Percent change latest vs previous session, 2 decimals. */
    trend: number;
}

function isValidClose(value: number | null | undefined): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Picks the two most recent valid sessions from an oldest-first list of closes.
 * Gaps (null, zero, negative) left by holidays or partial sessions are skipped.
 */
export function selectRecentSessions(symbol: string, closes: ReadonlyArray<number | null | undefined>): RawQuote {
    const valid = closes.filter(isValidClose);
    const latestClose = valid[valid.length - 1];
    const previousClose = valid[valid.length - 2];

    if (latestClose === undefined || previousClose === undefined) {
        throw new MarketDataError(ERRORS.QUOTE_INSUFFICIENT_SESSIONS, { symbol, sessions: valid.length });
    }

    return { symbol, latestClose, previousClose };
}

export function computeTrend(latestClose: number, previousClose: number): number {
    return roundTo(((latestClose - previousClose) / previousClose) * 100, PRECISION.percent);
}

export function normalizeQuote(request: QuoteRequest, raw: RawQuote): NormalizedRate {
    if (!isValidClose(raw.latestClose) || !isValidClose(raw.previousClose)) {
        throw new MarketDataError(ERRORS.QUOTE_INVALID_PRICE, {
            symbol: raw.symbol,
            latestClose: raw.latestClose,
            previousClose: raw.previousClose
        });
    }

    const rate = request.invert ? 1 / raw.latestClose : raw.latestClose;

    return {
        code: request.code,
        rate: roundTo(rate, PRECISION.internal),
        trend: computeTrend(raw.latestClose, raw.previousClose)
    };
}
