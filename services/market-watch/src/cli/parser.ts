import type { ParsedCommand } from './types.js';

const KNOWN_FLAGS: Record<ParsedCommand['kind'], readonly string[]> = {
  collect: ['output'],
  audit: ['input', 'report'],
  run: ['output', 'report']
};

function readFlags(command: ParsedCommand['kind'], args: string[]): Map<string, string> {
  const allowed = KNOWN_FLAGS[command];
  const flags = new Map<string, string>();

  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    if (!current?.startsWith('--')) {
      throw new Error(`Unexpected argument: ${current ?? ''}`);
    }

    const name = current.slice(2);
    if (!allowed.includes(name)) {
      throw new Error(`Unknown option --${name} for ${command}.`);
    }

    const value = args[i + 1];
    if (!value || value.startsWith('--')) {
      throw new Error(`Missing value for --${name}.`);
    }
    flags.set(name, value);
    i += 1;
  }

  return flags;
}

export function parseCommand(argv: string[]): ParsedCommand {
  const [command, ...rest] = argv;

  if (command === 'collect') {
    const flags = readFlags(command, rest);
    const outputPath = flags.get('output');
    return { kind: 'collect', ...(outputPath ? { outputPath } : {}) };
  }

  if (command === 'audit') {
    const flags = readFlags(command, rest);
    const inputPath = flags.get('input');
    const reportPath = flags.get('report');
    return {
      kind: 'audit',
      ...(inputPath ? { inputPath } : {}),
      ...(reportPath ? { reportPath } : {})
    };
  }

  if (command === 'run') {
    const flags = readFlags(command, rest);
    const outputPath = flags.get('output');
    const reportPath = flags.get('report');
    return {
      kind: 'run',
      ...(outputPath ? { outputPath } : {}),
      ...(reportPath ? { reportPath } : {})
    };
  }

  throw new Error('Unknown command. Supported: collect, audit, run.');
}

export function usage(): string {
  return [
    'Usage:',
    '  market-watch collect [--output <path>]',
    '  market-watch audit [--input <path>] [--report <path>]',
    '  market-watch run [--output <path>] [--report <path>]'
  ].join('\n');
}
