export { fetchNormalizedRate, fetchRecentSessions, type FetchPolicy, type QuoteOutcome } from './normalizer.js';
export {
  RateCollectorService,
  type CollectRunResult,
  type ExchangeRateCollection,
  type MarketSections,
  type RateCollectorDependencies
} from './service.js';
