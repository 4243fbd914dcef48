import type { ReferenceRateProvider } from '@ratewatch/adapters';
import {
  classifyAcquisitionDeviation,
  computeDeviations,
  errorMessage,
  isTransientError,
  PRECISION,
  rebaseReferenceRates,
  roundTo,
  withRetry,
  type CrossCheckDeviation,
  type Deviation,
  type ReferenceRateSet
} from '@ratewatch/domain';
import type { ServiceLogger } from '@ratewatch/observability';

export interface ReferenceSnapshot {
  source: string;
  asOf: string | null;
  /** USD-based; empty when the feed could not be used. */
  rates: ReferenceRateSet;
}

export interface CrossCheckerOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Reference Cross-Checker shared by the collector and the audit.
 * Fetches the reference feed in one batch call and rebases it to USD; every
 * failure degrades to an empty set.
 */
export class ReferenceCrossChecker {
  constructor(
    private readonly provider: ReferenceRateProvider,
    private readonly options: CrossCheckerOptions,
    private readonly logger: ServiceLogger
  ) {}

  get source(): string {
    return this.provider.source;
  }

  async fetchReferenceSet(): Promise<ReferenceSnapshot> {
    try {
      const { value } = await withRetry(() => this.provider.fetchRates(), {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        isRetryable: isTransientError,
        ...(this.options.sleep ? { sleep: this.options.sleep } : {})
      });

      const rates = rebaseReferenceRates(value.rates, value.base);
      if (Object.keys(rates).length === 0) {
        this.logger.warn('Reference feed has no usable USD entry, cross-check skipped', { source: value.source, asOf: value.asOf });
      } else {
        this.logger.info('Reference rates loaded', { source: value.source, asOf: value.asOf, currencyCount: Object.keys(rates).length });
      }
      return { source: value.source, asOf: value.asOf, rates };
    } catch (error) {
      this.logger.warn('Reference cross-check unavailable', { source: this.provider.source, error: errorMessage(error) });
      return { source: this.provider.source, asOf: null, rates: {} };
    }
  }

  deviations(scraped: Readonly<Record<string, number>>, reference: ReferenceRateSet): Deviation[] {
    return computeDeviations(scraped, reference);
  }

  /**
   * Acquisition ladder: deviations above the flag threshold are recorded, the
   * critical ones are also logged. Nothing here blocks the collect run.
   */
  flagAcquisitionDeviations(
    scraped: Readonly<Record<string, number>>,
    reference: ReferenceRateSet
  ): Record<string, CrossCheckDeviation> {
    const flagged: Record<string, CrossCheckDeviation> = {};

    for (const deviation of this.deviations(scraped, reference)) {
      const tier = classifyAcquisitionDeviation(deviation.deviationPct);
      if (tier === 'WITHIN') {
        continue;
      }

      const entry: CrossCheckDeviation = {
        scraped: deviation.scraped,
        reference: roundTo(deviation.reference, PRECISION.rate),
        deviation_pct: roundTo(deviation.deviationPct, PRECISION.percent)
      };
      flagged[deviation.code] = entry;

      if (tier === 'CRITICAL') {
        this.logger.error('Critical deviation from reference rate', { code: deviation.code, source: this.source, ...entry });
      }
    }

    return flagged;
  }
}
