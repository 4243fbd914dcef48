import { loadMarketWatchConfig } from '@ratewatch/config';
import { runServiceAndExit } from '@ratewatch/http';
import { buildMarketWatchApp } from './app.js';
import { createMarketWatchContext, SERVICE_NAME } from './context.js';
import { startPipelineScheduler } from './scheduler.js';

const config = loadMarketWatchConfig();
const context = createMarketWatchContext(config);

runServiceAndExit({
  serviceName: SERVICE_NAME,
  buildApp: () => buildMarketWatchApp(context),
  port: config.MARKET_WATCH_PORT,
  host: config.MARKET_WATCH_HOST,
  onReady: () => {
    if (!config.COLLECT_SCHEDULER_ENABLED) {
      context.logger.info('Pipeline scheduler disabled');
      return;
    }
    const scheduler = startPipelineScheduler(context, config.COLLECT_INTERVAL_MS);
    context.logger.info('Pipeline scheduler started', { intervalMs: config.COLLECT_INTERVAL_MS });
    return () => scheduler.stop();
  }
});
