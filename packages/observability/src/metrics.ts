import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<string>;
  requestCount: Counter<string>;
  errorCount: Counter<string>;
}

export interface PipelineMetrics {
  ratesValidated: Gauge<string>;
  fetchFailures: Counter<string>;
  boundsRejections: Counter<string>;
  auditStatus: Gauge<string>;
  lastCollectTimestamp: Gauge<string>;
}

function metricPrefix(serviceName: string): string {
  return serviceName.replaceAll('-', '_');
}

export function createServiceMetrics(serviceName: string, registry: Registry = new Registry()): ServiceMetrics {
  const prefix = metricPrefix(serviceName);

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount
  };
}

/**
 * Gauges and counters describing collect and audit runs.
 * `auditStatus` is 0 for PASS, 1 for WARNING and 2 for CRITICAL.
 */
export function createPipelineMetrics(serviceName: string, registry: Registry): PipelineMetrics {
  const prefix = metricPrefix(serviceName);

  return {
    ratesValidated: new Gauge({
      name: `${prefix}_rates_validated`,
      help: 'Exchange rates admitted by the last collect run',
      registers: [registry]
    }),
    fetchFailures: new Counter({
      name: `${prefix}_quote_fetch_failures_total`,
      help: 'Currencies whose quote fetch exhausted all attempts',
      labelNames: ['code'] as const,
      registers: [registry]
    }),
    boundsRejections: new Counter({
      name: `${prefix}_bounds_rejections_total`,
      help: 'Rates rejected by the sanity bounds during collection',
      labelNames: ['code'] as const,
      registers: [registry]
    }),
    auditStatus: new Gauge({
      name: `${prefix}_audit_status`,
      help: 'Status of the last audit (0 PASS, 1 WARNING, 2 CRITICAL)',
      registers: [registry]
    }),
    lastCollectTimestamp: new Gauge({
      name: `${prefix}_last_collect_timestamp_seconds`,
      help: 'Unix time of the last completed collect run',
      registers: [registry]
    })
  };
}
