export { log, setLogSink, type LogEntry, type LogLevel, type LogSink } from './logger.js';
export {
  createServiceLogger,
  type ExtendedLogLevel,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
export { createServiceMetrics, createPipelineMetrics, type PipelineMetrics, type ServiceMetrics } from './metrics.js';
