import { errorMessage } from '@ratewatch/domain';
import type { MarketWatchContext } from './context.js';
import { runAuditJob, runCollectJob } from './jobs/index.js';

export interface PipelineScheduler {
  /** Runs one collect-then-audit cycle unless one is already in flight. */
  runCycle(): Promise<void>;
  stop(): void;
}

export function startPipelineScheduler(context: MarketWatchContext, intervalMs: number): PipelineScheduler {
  const { logger } = context;
  let running = false;

  const runCycle = async (): Promise<void> => {
    if (running) {
      logger.warn('Previous pipeline cycle still running, skipping tick');
      return;
    }
    running = true;
    try {
      const collect = await runCollectJob(context);
      const audit = await runAuditJob(context);
      logger.info('Scheduled pipeline cycle completed', {
        collectOk: collect.exitCode === 0,
        auditStatus: audit.report.status
      });
    } catch (error) {
      logger.error('Scheduled pipeline cycle failed', { error: errorMessage(error) });
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void runCycle();
  }, intervalMs);

  return {
    runCycle,
    stop: () => clearInterval(timer)
  };
}
