import {
  aggregateStatus,
  PRECISION,
  roundTo,
  type AuditCheck,
  type AuditReport,
  type BoundsClassification,
  type CheckStatus,
  type CurrencyDetail
} from '@ratewatch/domain';

/**
 * Report Assembler. Checks are kept in the order they were added; the overall
 * status is derived once, in {@link AuditReportBuilder.build}.
 */
export class AuditReportBuilder {
  private readonly checks: AuditCheck[] = [];
  private readonly details = new Map<string, CurrencyDetail>();
  private totalRates = 0;
  private boundsViolations = 0;

  addCheck(check: string, status: CheckStatus, detail = ''): this {
    this.checks.push({ check, status, detail });
    return this;
  }

  setTotalRates(count: number): this {
    this.totalRates = count;
    return this;
  }

  recordBounds(code: string, rate: number, classification: BoundsClassification): this {
    const detail: CurrencyDetail = { rate, bounds_status: classification.status };
    if (classification.status === 'FAIL') {
      detail.bounds = [classification.bounds[0], classification.bounds[1]];
      this.boundsViolations += 1;
    }
    this.details.set(code, detail);
    return this;
  }

  recordReference(code: string, rate: number, referenceRate: number, deviationPct: number): this {
    const existing = this.details.get(code);
    const detail: CurrencyDetail = existing ?? { rate, bounds_status: 'NO_BOUNDS' };
    detail.reference_rate = roundTo(referenceRate, PRECISION.rate);
    detail.deviation_pct = roundTo(deviationPct, PRECISION.percent);
    this.details.set(code, detail);
    return this;
  }

  build(now: Date): AuditReport {
    const status = aggregateStatus(this.checks.map((check) => check.status));
    return {
      timestamp: now.toISOString(),
      status,
      checks: this.checks.map((check) => ({ ...check })),
      summary: {
        total_rates: this.totalRates,
        bounds_violations: this.boundsViolations,
        warnings: this.checks.filter((check) => check.status === 'WARNING').length,
        critical: status === 'CRITICAL'
      },
      details_per_currency: Object.fromEntries(
        [...this.details].map(([code, detail]) => [code, { ...detail }])
      )
    };
  }
}
