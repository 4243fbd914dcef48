import { randomUUID } from 'node:crypto';
import type { QuoteProvider } from '@ratewatch/adapters';
import {
  BASE_CURRENCY,
  classifyBounds,
  computeTrend,
  formatBounds,
  MARKET_CATEGORIES,
  PRECISION,
  roundTo,
  type AcquisitionAudit,
  type CurrencyRegistry,
  type InstrumentCatalog,
  type MarketCategory,
  type MarketDataset,
  type MarketItem
} from '@ratewatch/domain';
import type { PipelineMetrics, ServiceLogger } from '@ratewatch/observability';
import type { ReferenceCrossChecker } from '../cross-check/service.js';
import { writeJsonAtomic } from '../storage/json-store.js';
import { fetchNormalizedRate, fetchRecentSessions, type FetchPolicy } from './normalizer.js';

export type MarketSections = Record<MarketCategory, MarketItem[]>;

export interface ExchangeRateCollection {
  /** code → rate at 4 decimals; always holds USD = 1. */
  rates: Record<string, number>;
  audit: AcquisitionAudit;
}

export interface CollectRunResult {
  runId: string;
  outputPath: string;
  dataset: MarketDataset;
  /** False when the run must fail the pipeline; the dataset is written either way. */
  ok: boolean;
  failures: string[];
}

export interface RateCollectorDependencies {
  quotes: QuoteProvider;
  crossChecker: ReferenceCrossChecker;
  registry: CurrencyRegistry;
  /** Null skips the non-FX market sections. */
  instruments: InstrumentCatalog | null;
  policy: FetchPolicy;
  minValidated: number;
  logger: ServiceLogger;
  metrics?: PipelineMetrics;
  now?: () => Date;
}

function emptySections(): MarketSections {
  return { indices: [], currencies: [], energy: [], metals: [], agriculture: [] };
}

function freezeAudit(audit: AcquisitionAudit): AcquisitionAudit {
  Object.freeze(audit.bounds_rejected);
  Object.freeze(audit.fetch_failed);
  Object.freeze(audit.cross_check_deviations);
  return Object.freeze(audit);
}

export class RateCollectorService {
  private readonly now: () => Date;

  constructor(private readonly deps: RateCollectorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetches, normalizes and bounds-checks every registry currency one at a time,
   * then flags deviations from the reference feed. Individual failures are
   * recorded in the audit and never abort the run.
   */
  async collectExchangeRates(): Promise<ExchangeRateCollection> {
    const { registry, logger, metrics } = this.deps;
    const rates: Record<string, number> = { [BASE_CURRENCY]: 1 };
    const audit: AcquisitionAudit = {
      total_requested: registry.requests.length,
      fetched: 0,
      validated: 0,
      bounds_rejected: [],
      fetch_failed: [],
      cross_check_deviations: {},
      cross_check_source: this.deps.crossChecker.source,
      final_count: 0
    };

    logger.info('Fetching exchange rates', { currencies: registry.requests.length });

    for (const request of registry.requests) {
      const outcome = await fetchNormalizedRate(this.deps.quotes, request, this.deps.policy, logger);
      if (!outcome.ok) {
        logger.error('All quote fetch attempts exhausted', {
          code: request.code,
          symbol: request.symbol,
          attempts: outcome.attempts,
          reason: outcome.reason
        });
        audit.fetch_failed.push(request.code);
        metrics?.fetchFailures.labels(request.code).inc();
        continue;
      }

      audit.fetched += 1;
      const { rate } = outcome.value;

      const classification = classifyBounds(request.code, rate, registry.bounds);
      if (classification.status === 'FAIL') {
        logger.warn('Rate rejected by sanity bounds', {
          code: request.code,
          rate,
          bounds: formatBounds(classification.bounds)
        });
        audit.bounds_rejected.push({
          code: request.code,
          rate,
          bounds: [classification.bounds[0], classification.bounds[1]]
        });
        metrics?.boundsRejections.labels(request.code).inc();
        continue;
      }

      audit.validated += 1;
      rates[request.code] = roundTo(rate, PRECISION.rate);
    }

    const reference = await this.deps.crossChecker.fetchReferenceSet();
    audit.cross_check_source = reference.source;
    if (Object.keys(reference.rates).length > 0) {
      audit.cross_check_deviations = this.deps.crossChecker.flagAcquisitionDeviations(rates, reference.rates);
    }

    audit.final_count = Object.keys(rates).length;
    logger.info('Exchange rates collected', {
      validated: audit.validated,
      requested: audit.total_requested,
      fetchFailed: audit.fetch_failed.length,
      boundsRejected: audit.bounds_rejected.length,
      crossCheckWarnings: Object.keys(audit.cross_check_deviations).length
    });

    return { rates, audit: freezeAudit(audit) };
  }

  async collectMarketSections(): Promise<MarketSections> {
    const sections = emptySections();
    const catalog = this.deps.instruments;
    if (!catalog) {
      return sections;
    }

    for (const category of MARKET_CATEGORIES) {
      const { currency, instruments } = catalog[category];
      for (const instrument of instruments) {
        const outcome = await fetchRecentSessions(this.deps.quotes, instrument.ticker, this.deps.policy, this.deps.logger);
        if (!outcome.ok) {
          this.deps.logger.warn('Skipping instrument', { category, ticker: instrument.ticker, reason: outcome.reason });
          continue;
        }

        sections[category].push({
          ticker: instrument.ticker,
          name: instrument.name,
          price: roundTo(outcome.value.latestClose, PRECISION.rate),
          trend: computeTrend(outcome.value.latestClose, outcome.value.previousClose),
          currency,
          unit: instrument.unit
        });
      }
      this.deps.logger.info('Market section collected', {
        category,
        fetched: sections[category].length,
        requested: instruments.length
      });
    }

    return sections;
  }

  /** One scheduled run: collect everything, persist atomically, report yield. */
  async runOnce(outputPath: string): Promise<CollectRunResult> {
    const runId = `collect_${randomUUID()}`;
    const { logger, metrics } = this.deps;
    logger.setRunId(runId);

    try {
      const sections = await this.collectMarketSections();
      const { rates, audit } = await this.collectExchangeRates();
      const totalItems = MARKET_CATEGORIES.reduce((sum, category) => sum + sections[category].length, 0);
      const completedAt = this.now();

      const dataset: MarketDataset = {
        last_update: completedAt.toISOString(),
        totalItems,
        ...sections,
        rates,
        exchanger_audit: audit
      };

      await writeJsonAtomic(outputPath, dataset);

      const failures: string[] = [];
      if (this.deps.instruments && totalItems === 0) {
        failures.push('No market items fetched.');
      }
      if (audit.validated < this.deps.minValidated) {
        failures.push(`Only ${audit.validated} rates validated, minimum ${this.deps.minValidated} required.`);
      }

      metrics?.ratesValidated.set(audit.validated);
      metrics?.lastCollectTimestamp.set(Math.floor(completedAt.getTime() / 1000));

      if (failures.length > 0) {
        logger.error('Collect run below minimum yield', { outputPath, failures });
      } else {
        logger.info('Collect run completed', { outputPath, totalItems, rates: Object.keys(rates).length });
      }

      return { runId, outputPath, dataset, ok: failures.length === 0, failures };
    } finally {
      logger.setRunId(undefined);
    }
  }
}
