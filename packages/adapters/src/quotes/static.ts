import { ERRORS, MarketDataError } from '@ratewatch/domain';
import type { DailyCloses, QuoteProvider, QuoteWindow } from './types.js';

type ScriptedResponse = Array<number | null> | Error;

/**
 * Quote provider answering from scripted responses, one queue per symbol.
 * The last response of a queue repeats once the queue is drained.
 * Used by tests and local dry runs.
 */
export class StaticQuoteProvider implements QuoteProvider {
    private readonly scripts = new Map<string, ScriptedResponse[]>();
    private readonly calls: Array<{ symbol: string; window: QuoteWindow }> = [];

    constructor(initial?: Record<string, ScriptedResponse[]>) {
        for (const [symbol, responses] of Object.entries(initial ?? {})) {
            this.script(symbol, ...responses);
        }
    }

    /** Queue the responses returned for `symbol`, in order. */
    script(symbol: string, ...responses: ScriptedResponse[]): this {
        this.scripts.set(symbol, [...responses]);
        return this;
    }

    async fetchDailyCloses(symbol: string, window: QuoteWindow): Promise<DailyCloses> {
        this.calls.push({ symbol, window });

        const queue = this.scripts.get(symbol);
        const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
        if (next === undefined) {
            throw new MarketDataError(ERRORS.QUOTE_FETCH_FAILED, { symbol, reason: 'no scripted response' });
        }
        if (next instanceof Error) {
            throw next;
        }
        return { symbol, closes: [...next] };
    }

    /** Symbols requested so far, in call order (for test assertions). */
    getCalls(): ReadonlyArray<{ symbol: string; window: QuoteWindow }> {
        return this.calls;
    }

    callCount(symbol: string): number {
        return this.calls.filter((call) => call.symbol === symbol).length;
    }
}
