import {
  createReferenceRateProvider,
  YahooChartQuoteProvider,
  type QuoteProvider,
  type ReferenceRateProvider
} from '@ratewatch/adapters';
import type { MarketWatchConfig } from '@ratewatch/config';
import {
  getDefaultCurrencyRegistry,
  loadInstrumentCatalog,
  type CurrencyRegistry,
  type InstrumentCatalog
} from '@ratewatch/domain';
import { createPipelineMetrics, createServiceLogger, type PipelineMetrics, type ServiceLogger } from '@ratewatch/observability';
import { Registry } from 'prom-client';
import { RateCollectorService } from './modules/acquisition/index.js';
import { AuditEngine } from './modules/audit/index.js';
import { ReferenceCrossChecker } from './modules/cross-check/service.js';

export const SERVICE_NAME = 'market-watch';

export interface MarketWatchContext {
  config: MarketWatchConfig;
  logger: ServiceLogger;
  registry: Registry;
  pipelineMetrics: PipelineMetrics;
  collector: RateCollectorService;
  auditEngine: AuditEngine;
}

/** Replaceable collaborators; tests swap in static providers and an instant clock. */
export interface MarketWatchOverrides {
  quotes?: QuoteProvider;
  reference?: ReferenceRateProvider;
  currencies?: CurrencyRegistry;
  instruments?: InstrumentCatalog | null;
  logger?: ServiceLogger;
  registry?: Registry;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export function createMarketWatchContext(config: MarketWatchConfig, overrides: MarketWatchOverrides = {}): MarketWatchContext {
  const logger =
    overrides.logger ?? createServiceLogger({ service: SERVICE_NAME, ...(config.LOG_LEVEL ? { minLevel: config.LOG_LEVEL } : {}) });
  const registry = overrides.registry ?? new Registry();
  const pipelineMetrics = createPipelineMetrics(SERVICE_NAME, registry);
  const currencies = overrides.currencies ?? getDefaultCurrencyRegistry();

  const quotes = overrides.quotes ?? new YahooChartQuoteProvider({ baseUrl: config.QUOTE_PROVIDER_URL, timeoutMs: config.QUOTE_TIMEOUT_MS });
  const reference =
    overrides.reference ??
    createReferenceRateProvider({
      source: config.REFERENCE_SOURCE,
      timeoutMs: config.REFERENCE_TIMEOUT_MS,
      ...(config.REFERENCE_FEED_URL ? { url: config.REFERENCE_FEED_URL } : {})
    });

  const retry = {
    maxAttempts: config.FETCH_MAX_ATTEMPTS,
    baseDelayMs: config.FETCH_RETRY_BASE_DELAY_MS,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {})
  };
  const crossChecker = new ReferenceCrossChecker(reference, retry, logger);

  const collector = new RateCollectorService({
    quotes,
    crossChecker,
    registry: currencies,
    instruments: overrides.instruments === undefined ? loadInstrumentCatalog() : overrides.instruments,
    policy: retry,
    minValidated: config.ACQUISITION_MIN_VALIDATED,
    logger,
    metrics: pipelineMetrics,
    ...(overrides.now ? { now: overrides.now } : {})
  });

  const auditEngine = new AuditEngine({
    registry: currencies,
    crossChecker,
    minRates: config.AUDIT_MIN_RATES,
    maxAgeHours: config.AUDIT_MAX_AGE_HOURS,
    logger,
    ...(overrides.now ? { now: overrides.now } : {})
  });

  return { config, logger, registry, pipelineMetrics, collector, auditEngine };
}
