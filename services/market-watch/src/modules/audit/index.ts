export { AuditEngine, loadDataset, type AuditEngineOptions, type DatasetLoad } from './engine.js';
export { AuditReportBuilder } from './report-builder.js';
export { ageInHours, parseLastUpdate } from './timestamps.js';
