import type { FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import { createServiceMetrics, type ServiceMetrics } from '@ratewatch/observability';

/** Request duration, count and error metrics for every route of `app`. */
export function registerServiceMetrics(app: FastifyInstance, serviceName: string, registry?: Registry): ServiceMetrics {
  const metrics = createServiceMetrics(serviceName, registry);

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? request.url;
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(reply.elapsedTime);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  return metrics;
}
