import { log } from '@ratewatch/observability';
import type { FastifyInstance } from 'fastify';

type CleanupFn = () => Promise<void> | void;

export interface ServiceBootstrapOptions {
  serviceName: string;
  buildApp: () => Promise<FastifyInstance>;
  port: number;
  host: string;
  /** Runs before listening; may return a cleanup run on shutdown (e.g. stopping a scheduler). */
  onReady?: (app: FastifyInstance) => Promise<void | CleanupFn> | void | CleanupFn;
}

function assertHost(host: string): string {
  const resolved = host.trim();
  if (resolved.length === 0) {
    throw new Error('Service host must be a non-empty string.');
  }
  return resolved;
}

function assertPort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('Service port must be an integer between 1 and 65535.');
  }
  return port;
}

export async function runService(options: ServiceBootstrapOptions): Promise<void> {
  const host = assertHost(options.host);
  const port = assertPort(options.port);
  const app = await options.buildApp();
  const extraCleanup = await options.onReady?.(app);

  await app.listen({ port, host });
  log('info', `${options.serviceName} listening`, { host, port });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    log('warn', `${options.serviceName} shutting down`, { signal });

    if (extraCleanup) {
      await extraCleanup();
    }

    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

export function runServiceAndExit(options: ServiceBootstrapOptions): void {
  void runService(options).catch((error: unknown) => {
    log('error', `${options.serviceName} failed to start`, {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  });
}
