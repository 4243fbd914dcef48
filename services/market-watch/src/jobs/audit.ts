import { randomUUID } from 'node:crypto';
import { statusSeverity, type AuditReport } from '@ratewatch/domain';
import type { MarketWatchContext } from '../context.js';
import { formatAuditSummary } from '../modules/reporting/summary.js';
import { writeJsonAtomic } from '../modules/storage/json-store.js';

export interface AuditJobOptions {
  inputPath?: string;
  reportPath?: string;
  print?: (line: string) => void;
}

export interface AuditJobResult {
  exitCode: 0 | 1;
  report: AuditReport;
  reportPath: string;
}

/**
 * Audits the persisted dataset and writes the report. Only a CRITICAL verdict
 * exits 1; warnings are reported but let the pipeline continue.
 */
export async function runAuditJob(context: MarketWatchContext, options: AuditJobOptions = {}): Promise<AuditJobResult> {
  const inputPath = options.inputPath ?? context.config.MARKET_DATA_PATH;
  const reportPath = options.reportPath ?? context.config.AUDIT_REPORT_PATH;
  const { logger } = context;

  logger.setRunId(`audit_${randomUUID()}`);
  try {
    const report = await context.auditEngine.run(inputPath);
    await writeJsonAtomic(reportPath, report);
    context.pipelineMetrics.auditStatus.set(statusSeverity(report.status));

    const metadata = { inputPath, reportPath, status: report.status, warnings: report.summary.warnings };
    if (report.status === 'CRITICAL') {
      logger.error('Audit completed with critical findings', metadata);
    } else {
      logger.info('Audit completed', metadata);
    }

    for (const line of formatAuditSummary(report)) {
      options.print?.(line);
    }
    return { exitCode: report.status === 'CRITICAL' ? 1 : 0, report, reportPath };
  } finally {
    logger.setRunId(undefined);
  }
}
