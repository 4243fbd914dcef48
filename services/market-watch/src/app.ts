import { AuditReportSchema, ERRORS, MarketDatasetSchema } from '@ratewatch/domain';
import { deny, errorEnvelope, registerServiceMetrics } from '@ratewatch/http';
import Fastify, { type FastifyInstance } from 'fastify';
import { SERVICE_NAME, type MarketWatchContext } from './context.js';
import { readJsonAs } from './modules/storage/json-store.js';

export async function buildMarketWatchApp(context: MarketWatchContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const { config, logger } = context;

  const metrics = registerServiceMetrics(app, SERVICE_NAME, context.registry);

  app.get('/healthz', async () => ({ ok: true, service: SERVICE_NAME }));
  app.get('/readyz', async () => ({ ok: true }));
  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  app.get('/v1/rates', async (request, reply) => {
    const load = await readJsonAs(config.MARKET_DATA_PATH, MarketDatasetSchema);

    if (load.status === 'missing') {
      return deny({
        request,
        reply,
        code: 'DATASET_NOT_FOUND',
        message: 'No market dataset has been collected yet.',
        status: 404
      });
    }
    if (load.status === 'invalid') {
      logger.error('Stored market dataset is invalid', { path: config.MARKET_DATA_PATH, error: load.error });
      return deny({
        request,
        reply,
        code: ERRORS.DATASET_UNREADABLE.code,
        message: ERRORS.DATASET_UNREADABLE.message,
        status: 500
      });
    }

    return reply.send(load.value);
  });

  app.get('/v1/audit/latest', async (request, reply) => {
    const document = await readJsonAs(config.AUDIT_REPORT_PATH, AuditReportSchema);

    if (document.status === 'missing') {
      return deny({
        request,
        reply,
        code: 'AUDIT_REPORT_NOT_FOUND',
        message: 'No audit report has been written yet.',
        status: 404
      });
    }

    if (document.status === 'invalid') {
      logger.error('Stored audit report is invalid', { path: config.AUDIT_REPORT_PATH, error: document.error });
      return deny({
        request,
        reply,
        code: ERRORS.AUDIT_REPORT_UNREADABLE.code,
        message: ERRORS.AUDIT_REPORT_UNREADABLE.message,
        status: 500
      });
    }

    return reply.send(document.value);
  });

  app.setErrorHandler((error, request, reply) => {
    logger.error('market-watch unhandled error', {
      message: error.message,
      stack: error.stack,
      requestId: request.id
    });

    void reply.status(500).send(errorEnvelope(request, 'INTERNAL_ERROR', 'Unexpected internal error.'));
  });

  return app;
}
