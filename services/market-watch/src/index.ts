export { buildMarketWatchApp } from './app.js';
export { createMarketWatchContext, SERVICE_NAME, type MarketWatchContext, type MarketWatchOverrides } from './context.js';
export { runAuditJob, runCollectJob, type AuditJobResult, type CollectJobResult } from './jobs/index.js';
export { startPipelineScheduler, type PipelineScheduler } from './scheduler.js';
export { executeCommand } from './cli/commands.js';
export { parseCommand } from './cli/parser.js';
export * from './modules/acquisition/index.js';
export * from './modules/audit/index.js';
export { ReferenceCrossChecker, type CrossCheckerOptions, type ReferenceSnapshot } from './modules/cross-check/service.js';
