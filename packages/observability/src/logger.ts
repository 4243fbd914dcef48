export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry, line: string) => void;

const consoleSink: LogSink = (entry, line) => {
  if (entry.level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
};

let activeSink: LogSink = consoleSink;

/** Replace the output sink. Passing nothing restores console output. */
export function setLogSink(sink?: LogSink): void {
  activeSink = sink ?? consoleSink;
}

export function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  };

  activeSink(entry, JSON.stringify(entry));
}
