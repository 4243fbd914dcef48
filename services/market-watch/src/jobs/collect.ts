import type { MarketWatchContext } from '../context.js';
import type { CollectRunResult } from '../modules/acquisition/index.js';
import { formatCollectSummary } from '../modules/reporting/summary.js';

export interface CollectJobOptions {
  outputPath?: string;
  print?: (line: string) => void;
}

export interface CollectJobResult {
  exitCode: 0 | 1;
  run: CollectRunResult;
}

/** Runs one collection; a yield below the configured minimum exits 1 although the dataset is written. */
export async function runCollectJob(context: MarketWatchContext, options: CollectJobOptions = {}): Promise<CollectJobResult> {
  const run = await context.collector.runOnce(options.outputPath ?? context.config.MARKET_DATA_PATH);
  for (const line of formatCollectSummary(run)) {
    options.print?.(line);
  }
  return { exitCode: run.ok ? 0 : 1, run };
}
