import { describe, expect, it } from 'vitest';
import { loadMarketWatchConfig } from '../src/env.js';

describe('loadMarketWatchConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadMarketWatchConfig({});

    expect(config.FETCH_MAX_ATTEMPTS).toBe(3);
    expect(config.FETCH_RETRY_BASE_DELAY_MS).toBe(2000);
    expect(config.ACQUISITION_MIN_VALIDATED).toBe(10);
    expect(config.AUDIT_MIN_RATES).toBe(15);
    expect(config.AUDIT_MAX_AGE_HOURS).toBe(6);
    expect(config.COLLECT_INTERVAL_MS).toBe(7_200_000);
    expect(config.COLLECT_SCHEDULER_ENABLED).toBe(true);
    expect(config.LOG_LEVEL).toBeUndefined();
    expect(config.REFERENCE_SOURCE).toBe('ecb');
    expect(config.REFERENCE_FEED_URL).toBeUndefined();
  });

  it('coerces numeric and boolean strings', () => {
    const config = loadMarketWatchConfig({
      NODE_ENV: 'test',
      FETCH_RETRY_BASE_DELAY_MS: '0',
      AUDIT_MAX_AGE_HOURS: '2.5',
      COLLECT_SCHEDULER_ENABLED: 'false',
      MARKET_WATCH_PORT: '4100',
      QUOTE_TIMEOUT_MS: ''
    });

    expect(config.FETCH_RETRY_BASE_DELAY_MS).toBe(0);
    expect(config.AUDIT_MAX_AGE_HOURS).toBe(2.5);
    expect(config.COLLECT_SCHEDULER_ENABLED).toBe(false);
    expect(config.MARKET_WATCH_PORT).toBe(4100);
    expect(config.QUOTE_TIMEOUT_MS).toBe(15_000);
  });

  it('falls back to the default port when the variable is empty', () => {
    expect(loadMarketWatchConfig({ MARKET_WATCH_PORT: '' }).MARKET_WATCH_PORT).toBe(3010);
  });

  it('rejects an unknown reference source', () => {
    expect(() => loadMarketWatchConfig({ REFERENCE_SOURCE: 'fed' })).toThrow();
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => loadMarketWatchConfig({ FETCH_MAX_ATTEMPTS: '0' })).toThrow();
  });

  it('rejects writing the report over the dataset', () => {
    expect(() =>
      loadMarketWatchConfig({
        MARKET_DATA_PATH: '/tmp/market.json',
        AUDIT_REPORT_PATH: '/tmp/market.json'
      })
    ).toThrow(/must differ from MARKET_DATA_PATH/);
  });
});
