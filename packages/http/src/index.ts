export { errorEnvelope, deny, type ErrorEnvelope } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, runServiceAndExit, type ServiceBootstrapOptions } from './bootstrap.js';
