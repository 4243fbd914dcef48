import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const boolFromString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const positiveInt = (fallback: number) => z.preprocess(emptyStringToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional()),
    MARKET_DATA_PATH: z.string().min(1).default('data/market_data.json'),
    AUDIT_REPORT_PATH: z.string().min(1).default('data/audit_report.json'),
    QUOTE_PROVIDER_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
    REFERENCE_SOURCE: z.enum(['ecb', 'exchangerate-api']).default('ecb'),
    REFERENCE_FEED_URL: z.preprocess(emptyStringToUndefined, z.string().url().optional()),
    QUOTE_TIMEOUT_MS: positiveInt(15_000),
    REFERENCE_TIMEOUT_MS: positiveInt(10_000),
    FETCH_MAX_ATTEMPTS: positiveInt(3),
    FETCH_RETRY_BASE_DELAY_MS: z.preprocess(emptyStringToUndefined, z.coerce.number().int().min(0).default(2_000)),
    ACQUISITION_MIN_VALIDATED: positiveInt(10),
    AUDIT_MIN_RATES: positiveInt(15),
    AUDIT_MAX_AGE_HOURS: z.preprocess(emptyStringToUndefined, z.coerce.number().positive().default(6)),
    COLLECT_INTERVAL_MS: positiveInt(2 * 60 * 60 * 1000),
    COLLECT_SCHEDULER_ENABLED: boolFromString('true'),
    MARKET_WATCH_PORT: z.preprocess(emptyStringToUndefined, z.coerce.number().int().min(1).max(65_535).default(3010)),
    MARKET_WATCH_HOST: z.string().min(1).default('0.0.0.0')
  })
  .superRefine((value, context) => {
    if (value.MARKET_DATA_PATH === value.AUDIT_REPORT_PATH) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUDIT_REPORT_PATH'],
        message: 'AUDIT_REPORT_PATH must differ from MARKET_DATA_PATH.'
      });
    }
  });

export type MarketWatchConfig = z.infer<typeof envSchema>;

export function loadMarketWatchConfig(input: NodeJS.ProcessEnv = process.env): MarketWatchConfig {
  return envSchema.parse(input);
}
