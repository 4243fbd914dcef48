import type { AuditReport, CheckStatus } from '@ratewatch/domain';
import type { CollectRunResult } from '../acquisition/service.js';

const CHECK_MARK: Record<CheckStatus, string> = {
  PASS: 'ok',
  WARNING: 'warn',
  CRITICAL: 'FAIL'
};

export function formatAuditSummary(report: AuditReport): string[] {
  const lines = [
    `AUDIT STATUS: ${report.status}`,
    `  Rates: ${report.summary.total_rates}`,
    `  Bounds violations: ${report.summary.bounds_violations}`,
    `  Warnings: ${report.summary.warnings}`
  ];

  for (const check of report.checks) {
    const head = `  [${CHECK_MARK[check.status]}] ${check.check}`;
    lines.push(check.detail ? `${head}: ${check.detail}` : head);
  }

  lines.push(report.status === 'CRITICAL' ? 'Audit failed, the dataset must not be published.' : 'Audit passed.');
  return lines;
}

export function formatCollectSummary(result: CollectRunResult): string[] {
  const audit = result.dataset.exchanger_audit;
  const lines = [`Market data saved to ${result.outputPath} (${result.dataset.totalItems} items)`];

  if (audit) {
    lines.push(
      `  Rates: ${audit.validated}/${audit.total_requested} validated, ${audit.final_count} stored`,
      `  Fetch failures: ${audit.fetch_failed.length ? audit.fetch_failed.join(', ') : 'none'}`,
      `  Bounds rejections: ${audit.bounds_rejected.length ? audit.bounds_rejected.map((entry) => entry.code).join(', ') : 'none'}`,
      `  Reference deviations: ${Object.keys(audit.cross_check_deviations).join(', ') || 'none'}`
    );
  }

  for (const failure of result.failures) {
    lines.push(`  ERROR: ${failure}`);
  }
  return lines;
}
