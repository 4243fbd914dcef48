export interface ReferenceRates {
    /** Feed identifier recorded in the acquisition audit (e.g. 'ECB'). */
    source: string;
    /** Currency the feed quotes against: 1 base = rate units of code. */
    base: string;
    /** Publication date reported by the feed, when it gives one. */
    asOf: string | null;
    rates: Record<string, number>;
}

export interface ReferenceRateProvider {
    readonly source: string;
    /** Fetch the whole reference set in one call. */
    fetchRates(): Promise<ReferenceRates>;
}
