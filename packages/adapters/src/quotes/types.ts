export interface QuoteWindow {
    /** Trailing range, wide enough to hold two sessions after a long weekend. */
    range: '5d' | '1mo';
    interval: '1d';
}

export const DEFAULT_QUOTE_WINDOW: QuoteWindow = { range: '5d', interval: '1d' };

export interface DailyCloses {
    symbol: string;
    /** Oldest first; null where the provider has no close for that session. */
    closes: Array<number | null>;
}

export interface QuoteProvider {
    /** Fetch the trailing daily closes of one symbol. */
    fetchDailyCloses(symbol: string, window: QuoteWindow): Promise<DailyCloses>;
}
