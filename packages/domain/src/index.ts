export { withRetry, calculateBackoff, type RetryOptions, type RetryResult } from './retry.js';
export { ERRORS, MarketDataError, errorMessage, isTransientError, type MarketDataErrorDefinition } from './errors.js';
export { PRECISION, roundTo } from './rounding.js';
export {
  MARKET_CATEGORIES,
  loadCurrencyCatalog,
  loadInstrumentCatalog,
  type CurrencyCatalog,
  type CurrencyCatalogEntry,
  type Instrument,
  type InstrumentCatalog,
  type MarketCategory
} from './catalog.js';
export {
  BASE_CURRENCY,
  buildCurrencyRegistry,
  getDefaultCurrencyRegistry,
  type Bounds,
  type BoundsTable,
  type CurrencyRegistry,
  type QuoteRequest
} from './currency.js';
export { classifyBounds, formatBounds, type BoundsClassification, type BoundsStatus } from './bounds.js';
export { computeTrend, normalizeQuote, selectRecentSessions, type NormalizedRate, type RawQuote } from './normalize.js';
export {
  ACQUISITION_DEVIATION_THRESHOLDS,
  AUDIT_DEVIATION_THRESHOLDS,
  classifyAcquisitionDeviation,
  classifyAuditDeviation,
  computeDeviations,
  deviationPercent,
  rebaseReferenceRates,
  type AcquisitionDeviationTier,
  type AuditDeviationTier,
  type Deviation,
  type ReferenceRateSet
} from './deviation.js';
export {
  AcquisitionAuditSchema,
  AuditedDatasetSchema,
  MarketDatasetSchema,
  MarketItemSchema,
  RatesSchema,
  type AcquisitionAudit,
  type AuditedDataset,
  type BoundsRejection,
  type CrossCheckDeviation,
  type MarketDataset,
  type MarketItem
} from './dataset.js';
export {
  AuditReportSchema,
  CHECK_STATUSES,
  aggregateStatus,
  statusSeverity,
  type AuditCheck,
  type AuditReport,
  type AuditSummary,
  type CheckStatus,
  type CurrencyDetail
} from './report.js';
