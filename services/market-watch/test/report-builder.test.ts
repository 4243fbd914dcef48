import { describe, expect, it } from 'vitest';
import { AuditReportBuilder } from '../src/modules/audit/report-builder.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('AuditReportBuilder', () => {
  it('keeps checks in order and derives the overall status once', () => {
    const report = new AuditReportBuilder()
      .addCheck('file_exists', 'PASS')
      .addCheck('freshness', 'WARNING', 'Data is 7.0h old (max 6h)')
      .addCheck('usd_base', 'CRITICAL', 'USD rate = 1.1, expected 1.0')
      .setTotalRates(16)
      .build(NOW);

    expect(report.status).toBe('CRITICAL');
    expect(report.checks.map((check) => check.check)).toEqual(['file_exists', 'freshness', 'usd_base']);
    expect(report.summary).toEqual({ total_rates: 16, bounds_violations: 0, warnings: 1, critical: true });
    expect(report.timestamp).toBe('2026-03-01T12:00:00.000Z');
  });

  it('merges bounds and reference findings per currency', () => {
    const report = new AuditReportBuilder()
      .recordBounds('EUR', 0.92, { status: 'PASS', bounds: [0.5, 1.5] })
      .recordBounds('GBP', 1.9, { status: 'FAIL', bounds: [0.4, 1.3] })
      .recordBounds('ISK', 130, { status: 'NO_BOUNDS' })
      .recordReference('EUR', 0.92, 0.80000123, 14.99998)
      .build(NOW);

    expect(report.details_per_currency).toEqual({
      EUR: { rate: 0.92, bounds_status: 'PASS', reference_rate: 0.8, deviation_pct: 15 },
      GBP: { rate: 1.9, bounds_status: 'FAIL', bounds: [0.4, 1.3] },
      ISK: { rate: 130, bounds_status: 'NO_BOUNDS' }
    });
    expect(report.summary.bounds_violations).toBe(1);
    expect(report.status).toBe('PASS');
  });

  it('returns a report detached from later builder changes', () => {
    const builder = new AuditReportBuilder().addCheck('file_exists', 'PASS');
    const first = builder.build(NOW);
    builder.addCheck('freshness', 'WARNING', 'stale');

    expect(first.checks).toHaveLength(1);
    expect(first.status).toBe('PASS');
  });
});
