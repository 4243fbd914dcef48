export type { ReferenceRateProvider, ReferenceRates } from './types.js';
export { ECB_DAILY_URL, EcbReferenceRateProvider, parseEcbDailyXml } from './ecb.js';
export { ExchangeRateApiReferenceProvider } from './exchange-rate-api.js';

import { EcbReferenceRateProvider } from './ecb.js';
import { ExchangeRateApiReferenceProvider } from './exchange-rate-api.js';
import type { ReferenceRateProvider } from './types.js';

export interface ReferenceProviderConfig {
    source: 'ecb' | 'exchangerate-api';
    url?: string;
    timeoutMs: number;
}

export function createReferenceRateProvider(config: ReferenceProviderConfig): ReferenceRateProvider {
    switch (config.source) {
        case 'ecb':
            return new EcbReferenceRateProvider({ timeoutMs: config.timeoutMs, ...(config.url ? { url: config.url } : {}) });
        case 'exchangerate-api':
            return new ExchangeRateApiReferenceProvider({ timeoutMs: config.timeoutMs, ...(config.url ? { baseUrl: config.url } : {}) });
        default: {
            const unknown: never = config.source;
            throw new Error(`Unknown reference source: ${String(unknown)}`);
        }
    }
}
