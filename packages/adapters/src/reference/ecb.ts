import { ERRORS, MarketDataError, errorMessage } from '@ratewatch/domain';
import { log } from '@ratewatch/observability';
import { XMLParser } from 'fast-xml-parser';
import type { ReferenceRateProvider, ReferenceRates } from './types.js';

export const ECB_DAILY_URL = 'https://www.ecb.europa.eu/stats/eurofxref/eurofxref-daily.xml';

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    removeNSPrefix: true,
    parseAttributeValue: false
});

interface CubeScan {
    time: string | null;
    rates: Record<string, number>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Collects every `<Cube currency=".." rate=".."/>` at any depth. */
function scanCubes(node: unknown, scan: CubeScan): void {
    if (Array.isArray(node)) {
        for (const child of node) {
            scanCubes(child, scan);
        }
        return;
    }
    if (!isRecord(node)) {
        return;
    }

    const { currency, rate, time } = node;
    if (typeof time === 'string' && scan.time === null) {
        scan.time = time;
    }
    if (typeof currency === 'string' && typeof rate === 'string') {
        const value = Number(rate);
        if (Number.isFinite(value) && value > 0) {
            scan.rates[currency.toUpperCase()] = value;
        }
    }

    for (const child of Object.values(node)) {
        if (typeof child === 'object') {
            scanCubes(child, scan);
        }
    }
}

export function parseEcbDailyXml(xml: string): Omit<ReferenceRates, 'source'> {
    let document: unknown;
    try {
        document = parser.parse(xml, true);
    } catch (error) {
        throw new MarketDataError(ERRORS.REFERENCE_FEED_MALFORMED, { reason: errorMessage(error) }, { cause: error });
    }

    const scan: CubeScan = { time: null, rates: {} };
    scanCubes(document, scan);

    if (Object.keys(scan.rates).length === 0) {
        throw new MarketDataError(ERRORS.REFERENCE_FEED_MALFORMED, { reason: 'no currency cubes' });
    }

    return { base: 'EUR', asOf: scan.time, rates: scan.rates };
}

/**
 * European Central Bank daily reference rates (EUR-based XML, one document per
 * business day, about 30 currencies).
 */
export class EcbReferenceRateProvider implements ReferenceRateProvider {
    readonly source = 'ECB';
    private readonly url: string;
    private readonly timeoutMs: number;

    constructor(options?: { url?: string; timeoutMs?: number }) {
        this.url = options?.url ?? ECB_DAILY_URL;
        this.timeoutMs = options?.timeoutMs ?? 10_000;
    }

    async fetchRates(): Promise<ReferenceRates> {
        let body: string;
        try {
            const response = await fetch(this.url, {
                headers: { accept: 'application/xml' },
                signal: AbortSignal.timeout(this.timeoutMs)
            });
            if (!response.ok) {
                throw new Error(`ECB responded with status ${response.status}`);
            }
            body = await response.text();
        } catch (error) {
            throw new MarketDataError(ERRORS.REFERENCE_FEED_UNAVAILABLE, { source: this.source, reason: errorMessage(error) }, { cause: error });
        }

        const parsed = parseEcbDailyXml(body);
        log('info', 'Reference rates fetched', { source: this.source, asOf: parsed.asOf, currencyCount: Object.keys(parsed.rates).length });
        return { source: this.source, ...parsed };
    }
}
