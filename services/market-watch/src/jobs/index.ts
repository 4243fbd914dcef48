export { runAuditJob, type AuditJobOptions, type AuditJobResult } from './audit.js';
export { runCollectJob, type CollectJobOptions, type CollectJobResult } from './collect.js';
