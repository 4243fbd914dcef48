/**
 * Error codes raised by the collect and audit pipeline.
 *
 * `transient` marks failures that the retry helper may attempt again
 * (network errors, timeouts, empty or short quote windows).
 */

export interface MarketDataErrorDefinition {
    code: string;
    transient: boolean;
    message: string;
}

export class MarketDataError extends Error {
    readonly code: string;
    readonly transient: boolean;
    readonly details?: Record<string, unknown>;

    constructor(def: MarketDataErrorDefinition, details?: Record<string, unknown>, options?: { cause?: unknown; message?: string }) {
        super(options?.message ?? def.message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'MarketDataError';
        this.code = def.code;
        this.transient = def.transient;
        this.details = details;
    }
}

export const ERRORS = {
    // ── Quote provider ──
    QUOTE_FETCH_FAILED: { code: 'QUOTE_FETCH_FAILED', transient: true, message: 'Quote provider request failed.' },
    QUOTE_INSUFFICIENT_SESSIONS: {
        code: 'QUOTE_INSUFFICIENT_SESSIONS',
        transient: true,
        message: 'Fewer than two valid sessions in the quote window.'
    },
    QUOTE_INVALID_PRICE: { code: 'QUOTE_INVALID_PRICE', transient: true, message: 'Quote price must be positive.' },
    QUOTE_MALFORMED_RESPONSE: { code: 'QUOTE_MALFORMED_RESPONSE', transient: false, message: 'Quote provider returned an unexpected payload.' },

    // ── Reference feed ──
    REFERENCE_FEED_UNAVAILABLE: { code: 'REFERENCE_FEED_UNAVAILABLE', transient: true, message: 'Reference feed request failed.' },
    REFERENCE_FEED_MALFORMED: { code: 'REFERENCE_FEED_MALFORMED', transient: false, message: 'Reference feed returned an unexpected document.' },

    // ── Persisted documents ──
    DATASET_UNREADABLE: { code: 'DATASET_UNREADABLE', transient: false, message: 'Market dataset could not be read.' },
    AUDIT_REPORT_UNREADABLE: { code: 'AUDIT_REPORT_UNREADABLE', transient: false, message: 'Audit report could not be read.' },
    CATALOG_INVALID: { code: 'CATALOG_INVALID', transient: false, message: 'Catalog file is missing or invalid.' }
} as const satisfies Record<string, MarketDataErrorDefinition>;

export function isTransientError(error: unknown): boolean {
    if (error instanceof MarketDataError) {
        return error.transient;
    }
    // Network failures and AbortSignal timeouts surface as plain errors from fetch.
    return error instanceof Error;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
