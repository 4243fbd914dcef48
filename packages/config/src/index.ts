export { loadMarketWatchConfig, type MarketWatchConfig } from './env.js';
