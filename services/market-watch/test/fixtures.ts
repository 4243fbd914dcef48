import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StaticQuoteProvider, type ReferenceRateProvider, type ReferenceRates } from '@ratewatch/adapters';
import { loadMarketWatchConfig, type MarketWatchConfig } from '@ratewatch/config';
import { buildCurrencyRegistry, ERRORS, MarketDataError, type CurrencyRegistry, type InstrumentCatalog } from '@ratewatch/domain';
import { createServiceLogger, setLogSink, type LogEntry, type ServiceLogger } from '@ratewatch/observability';
import { createMarketWatchContext, type MarketWatchContext } from '../src/context.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');
export const ONE_HOUR_AGO = '2026-03-01T11:00:00+00:00';
export const EIGHT_HOURS_AGO = '2026-03-01T04:00:00+00:00';

export const instantSleep = async (): Promise<void> => {};

/** Four currencies: two with bounds, one that rejects high rates, one without bounds. */
export const SMALL_REGISTRY: CurrencyRegistry = buildCurrencyRegistry({
  base: 'USD',
  required: ['EUR', 'JPY'],
  currencies: [
    { code: 'EUR', name: 'Euro', symbol: 'EURUSD=X', invert: true, bounds: [0.5, 1.5] },
    { code: 'JPY', name: 'Japanese Yen', symbol: 'USDJPY=X', invert: false, bounds: [70, 250] },
    { code: 'MAD', name: 'Moroccan Dirham', symbol: 'USDMAD=X', invert: false, bounds: [7, 14] },
    { code: 'ISK', name: 'Icelandic Krona', symbol: 'USDISK=X', invert: false, bounds: null }
  ]
});

export const ONE_INDEX_CATALOG: InstrumentCatalog = {
  indices: { currency: null, instruments: [{ ticker: '^GSPC', name: 'S&P 500', unit: 'pts' }] },
  currencies: { currency: null, instruments: [] },
  energy: { currency: 'USD', instruments: [{ ticker: 'CL=F', name: 'Crude Oil WTI', unit: '$/bbl' }] },
  metals: { currency: 'USD', instruments: [] },
  agriculture: { currency: null, instruments: [] }
};

/** Sixteen in-bounds rates including USD and every required currency. */
export const NOMINAL_RATES: Record<string, number> = {
  USD: 1,
  EUR: 0.92,
  GBP: 0.79,
  JPY: 150,
  CNY: 7.2,
  CHF: 0.88,
  CAD: 1.36,
  MAD: 10,
  AUD: 1.5,
  HKD: 7.8,
  SGD: 1.34,
  SEK: 10.5,
  NOK: 10.6,
  INR: 83,
  MXN: 17,
  ZAR: 18.5
};

export class FakeReferenceProvider implements ReferenceRateProvider {
  readonly source = 'ECB';
  calls = 0;

  constructor(private readonly response: ReferenceRates | Error) {}

  async fetchRates(): Promise<ReferenceRates> {
    this.calls += 1;
    if (this.response instanceof Error) {
      throw this.response;
    }
    return this.response;
  }
}

/** Reference quoted in EUR, the way the ECB feed publishes it. */
export function eurReference(rates: Record<string, number>): FakeReferenceProvider {
  return new FakeReferenceProvider({ source: 'ECB', base: 'EUR', asOf: '2026-02-27', rates });
}

export function usdReference(rates: Record<string, number>): FakeReferenceProvider {
  return new FakeReferenceProvider({ source: 'ECB', base: 'USD', asOf: '2026-02-27', rates });
}

export interface Workspace {
  dir: string;
  dataPath: string;
  reportPath: string;
  config: MarketWatchConfig;
  cleanup(): Promise<void>;
}

export async function createWorkspace(env: Record<string, string> = {}): Promise<Workspace> {
  const dir = await mkdtemp(join(tmpdir(), 'market-watch-'));
  const dataPath = join(dir, 'market_data.json');
  const reportPath = join(dir, 'audit_report.json');
  const config = loadMarketWatchConfig({
    MARKET_DATA_PATH: dataPath,
    AUDIT_REPORT_PATH: reportPath,
    FETCH_RETRY_BASE_DELAY_MS: '0',
    COLLECT_SCHEDULER_ENABLED: 'false',
    ...env
  });

  return {
    dir,
    dataPath,
    reportPath,
    config,
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
}

export async function writeDataset(path: string, dataset: Record<string, unknown>): Promise<void> {
  await writeFile(path, JSON.stringify(dataset), 'utf8');
}

export function captureLogs(): { entries: LogEntry[]; logger: ServiceLogger } {
  const entries: LogEntry[] = [];
  setLogSink((entry) => {
    entries.push(entry);
  });
  return { entries, logger: createServiceLogger({ service: 'market-watch', minLevel: 'debug' }) };
}

export function mixedQuotes(): StaticQuoteProvider {
  return new StaticQuoteProvider({
    'EURUSD=X': [[1.08, 1.0, 1.25]],
    'USDJPY=X': [[150, null, 151.5]],
    'USDMAD=X': [[20, 20]],
    'USDISK=X': [new MarketDataError(ERRORS.QUOTE_FETCH_FAILED, { symbol: 'USDISK=X' })]
  });
}

/** Context over SMALL_REGISTRY with in-memory providers and a fixed clock. */
export function createTestContext(
  workspace: Workspace,
  overrides: { quotes?: StaticQuoteProvider; reference?: ReferenceRateProvider } = {}
): { context: MarketWatchContext; entries: LogEntry[]; quotes: StaticQuoteProvider } {
  const { entries, logger } = captureLogs();
  const quotes = overrides.quotes ?? mixedQuotes();
  const context = createMarketWatchContext(workspace.config, {
    quotes,
    reference: overrides.reference ?? eurReference({ USD: 1.25, JPY: 189.375 }),
    currencies: SMALL_REGISTRY,
    instruments: null,
    logger,
    sleep: instantSleep,
    now: () => NOW
  });
  return { context, entries, quotes };
}
