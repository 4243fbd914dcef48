import {
  AUDIT_DEVIATION_THRESHOLDS,
  AuditedDatasetSchema,
  BASE_CURRENCY,
  classifyAuditDeviation,
  classifyBounds,
  RatesSchema,
  type AuditedDataset,
  type AuditReport,
  type CurrencyRegistry
} from '@ratewatch/domain';
import type { ServiceLogger } from '@ratewatch/observability';
import type { ReferenceCrossChecker } from '../cross-check/service.js';
import { readJsonAs, type ReadResult } from '../storage/json-store.js';
import { AuditReportBuilder } from './report-builder.js';
import { ageInHours, parseLastUpdate } from './timestamps.js';

export type DatasetLoad = ReadResult<AuditedDataset>;

export interface AuditEngineOptions {
  registry: CurrencyRegistry;
  crossChecker: ReferenceCrossChecker;
  minRates: number;
  maxAgeHours: number;
  logger: ServiceLogger;
  now?: () => Date;
}

/** Reads the fields of a stored dataset the audit checks; any JSON object loads. */
export function loadDataset(path: string): Promise<DatasetLoad> {
  return readJsonAs(path, AuditedDatasetSchema);
}

function describeValue(value: unknown): string {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function formatHours(hours: number): string {
  return `${hours.toFixed(1)}h`;
}

/**
 * Audit Engine: ordered checks over one persisted dataset. A missing dataset
 * and an empty or malformed rate set end the audit immediately; every other finding is
 * recorded and the audit continues. The dataset is only ever read.
 */
export class AuditEngine {
  private readonly now: () => Date;

  constructor(private readonly options: AuditEngineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(datasetPath: string): Promise<AuditReport> {
    return this.evaluate(await loadDataset(datasetPath), datasetPath);
  }

  async evaluate(load: DatasetLoad, datasetPath: string): Promise<AuditReport> {
    const { registry, minRates, maxAgeHours, logger } = this.options;
    const startedAt = this.now();
    const report = new AuditReportBuilder();

    // 1. file_exists
    if (load.status === 'missing') {
      logger.error('Market dataset not found', { path: datasetPath });
      return report.addCheck('file_exists', 'CRITICAL', `${datasetPath} not found`).build(startedAt);
    }
    if (load.status === 'invalid') {
      logger.error('Market dataset unreadable', { path: datasetPath, error: load.error });
      return report
        .addCheck('file_exists', 'CRITICAL', `${datasetPath} is not a valid market dataset (${load.error})`)
        .build(startedAt);
    }
    report.addCheck('file_exists', 'PASS');
    const dataset = load.value;

    // 2. freshness
    const lastUpdate = typeof dataset.last_update === 'string' ? parseLastUpdate(dataset.last_update) : null;
    if (!lastUpdate) {
      report.addCheck('freshness', 'CRITICAL', `Cannot parse last_update: ${describeValue(dataset.last_update)}`);
    } else {
      const age = ageInHours(lastUpdate, startedAt);
      if (age > maxAgeHours) {
        report.addCheck('freshness', 'WARNING', `Data is ${formatHours(age)} old (max ${maxAgeHours}h)`);
      } else {
        report.addCheck('freshness', 'PASS', `${formatHours(age)} old`);
      }
    }

    // 3. rates_present
    const parsedRates = RatesSchema.safeParse(dataset.rates ?? {});
    if (!parsedRates.success) {
      const issue = parsedRates.error.issues[0];
      const reason = issue ? `${issue.path.join('.') || 'rates'}: ${issue.message}` : parsedRates.error.message;
      report.setTotalRates(0);
      return report.addCheck('rates_present', 'CRITICAL', `Malformed 'rates' block (${reason})`).build(startedAt);
    }
    const rates = parsedRates.data;
    const codes = Object.keys(rates);
    report.setTotalRates(codes.length);
    if (codes.length === 0) {
      return report.addCheck('rates_present', 'CRITICAL', "No 'rates' block in the market dataset").build(startedAt);
    }
    report.addCheck('rates_present', 'PASS', `${codes.length} rates found`);

    // 4. minimum_count
    if (codes.length < minRates) {
      report.addCheck('minimum_count', 'CRITICAL', `Only ${codes.length} rates (min ${minRates})`);
    } else {
      report.addCheck('minimum_count', 'PASS', `${codes.length} >= ${minRates}`);
    }

    // 5. usd_base
    const usd = rates[BASE_CURRENCY];
    if (usd !== 1) {
      report.addCheck('usd_base', 'CRITICAL', `USD rate = ${usd ?? 'missing'}, expected 1.0`);
    } else {
      report.addCheck('usd_base', 'PASS');
    }

    // 6. required_currencies
    const missing = registry.required.filter((code) => !(code in rates)).sort();
    if (missing.length > 0) {
      report.addCheck('required_currencies', 'WARNING', `Missing: ${missing.join(', ')}`);
    } else {
      report.addCheck('required_currencies', 'PASS');
    }

    // 7. bounds_validation
    const violations: string[] = [];
    for (const [code, rate] of Object.entries(rates)) {
      if (code === BASE_CURRENCY) {
        continue;
      }
      const classification = classifyBounds(code, rate, registry.bounds);
      if (classification.status === 'FAIL') {
        violations.push(code);
      }
      report.recordBounds(code, rate, classification);
    }
    if (violations.length > 0) {
      report.addCheck('bounds_validation', 'WARNING', `Out of bounds: ${violations.join(', ')}`);
    } else {
      report.addCheck('bounds_validation', 'PASS');
    }

    // 8. reference_cross_check
    await this.crossCheck(rates, report);

    // 9. upstream acquisition audit
    const acquisition = dataset.exchanger_audit;
    if (acquisition) {
      const failed = acquisition.fetch_failed;
      const rejected = acquisition.bounds_rejected.map((entry) => entry.code);
      if (failed.length > 0) {
        report.addCheck('acquisition_fetch_failures', 'WARNING', `Collector failed to fetch: ${failed.join(', ')}`);
      }
      if (rejected.length > 0) {
        report.addCheck('acquisition_bounds_rejected', 'WARNING', `Collector rejected: ${rejected.join(', ')}`);
      }
      if (failed.length === 0 && rejected.length === 0) {
        report.addCheck('acquisition_audit', 'PASS', 'No collector-level issues');
      }
    }

    return report.build(startedAt);
  }

  private async crossCheck(rates: Readonly<Record<string, number>>, report: AuditReportBuilder): Promise<void> {
    const { crossChecker } = this.options;
    const reference = await crossChecker.fetchReferenceSet();

    if (Object.keys(reference.rates).length === 0) {
      report.addCheck('reference_cross_check', 'WARNING', `${reference.source} reference data unavailable, skipped`);
      return;
    }

    const critical: string[] = [];
    const warnings: string[] = [];
    for (const deviation of crossChecker.deviations(rates, reference.rates)) {
      report.recordReference(deviation.code, deviation.scraped, deviation.reference, deviation.deviationPct);
      const label = `${deviation.code}(${deviation.deviationPct.toFixed(1)}%)`;
      const tier = classifyAuditDeviation(deviation.deviationPct);
      if (tier === 'CRITICAL') {
        critical.push(label);
      } else if (tier === 'WARNING') {
        warnings.push(label);
      }
    }

    if (critical.length > 0) {
      report.addCheck('reference_cross_check', 'CRITICAL', `Critical deviations: ${critical.join(', ')}`);
    } else if (warnings.length > 0) {
      report.addCheck('reference_cross_check', 'WARNING', `Deviations: ${warnings.join(', ')}`);
    } else {
      report.addCheck('reference_cross_check', 'PASS', `All rates within ${AUDIT_DEVIATION_THRESHOLDS.warningPct}% of ${reference.source}`);
    }
  }
}
