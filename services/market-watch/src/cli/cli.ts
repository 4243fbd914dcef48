#!/usr/bin/env node
import { loadMarketWatchConfig } from '@ratewatch/config';
import { errorMessage } from '@ratewatch/domain';
import { createMarketWatchContext } from '../context.js';
import { executeCommand } from './commands.js';
import { parseCommand, usage } from './parser.js';

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
    console.log(usage());
    process.exit(0);
  }

  const command = parseCommand(rawArgs);
  const context = createMarketWatchContext(loadMarketWatchConfig());
  process.exitCode = await executeCommand(command, context, (line) => console.log(line));
}

main().catch((error: unknown) => {
  console.error(`market-watch error: ${errorMessage(error)}`);
  process.exit(1);
});
