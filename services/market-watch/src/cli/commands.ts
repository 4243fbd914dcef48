import type { MarketWatchContext } from '../context.js';
import { runAuditJob, runCollectJob } from '../jobs/index.js';
import type { ParsedCommand } from './types.js';

/** Executes a parsed command and returns the process exit code. */
export async function executeCommand(
  command: ParsedCommand,
  context: MarketWatchContext,
  print: (line: string) => void
): Promise<number> {
  switch (command.kind) {
    case 'collect': {
      const result = await runCollectJob(context, { ...(command.outputPath ? { outputPath: command.outputPath } : {}), print });
      return result.exitCode;
    }
    case 'audit': {
      const result = await runAuditJob(context, {
        ...(command.inputPath ? { inputPath: command.inputPath } : {}),
        ...(command.reportPath ? { reportPath: command.reportPath } : {}),
        print
      });
      return result.exitCode;
    }
    case 'run': {
      const collect = await runCollectJob(context, { ...(command.outputPath ? { outputPath: command.outputPath } : {}), print });
      const audit = await runAuditJob(context, {
        ...(command.outputPath ? { inputPath: command.outputPath } : {}),
        ...(command.reportPath ? { reportPath: command.reportPath } : {}),
        print
      });
      return Math.max(collect.exitCode, audit.exitCode);
    }
    default: {
      const unknown: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unknown)}`);
    }
  }
}
