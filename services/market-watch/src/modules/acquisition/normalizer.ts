import { DEFAULT_QUOTE_WINDOW, type QuoteProvider, type QuoteWindow } from '@ratewatch/adapters';
import {
  errorMessage,
  isTransientError,
  normalizeQuote,
  selectRecentSessions,
  withRetry,
  type NormalizedRate,
  type QuoteRequest,
  type RawQuote
} from '@ratewatch/domain';
import type { ServiceLogger } from '@ratewatch/observability';

export interface FetchPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  window?: QuoteWindow;
  sleep?: (ms: number) => Promise<void>;
}

export type QuoteOutcome<T> = { ok: true; value: T; attempts: number } | { ok: false; reason: string; attempts: number };

/**
 * Fetches the two most recent sessions of a symbol. Empty windows, fewer than two
 * valid closes and network errors are retried with doubling delays; exhaustion is
 * reported as a failed outcome rather than thrown.
 */
export async function fetchRecentSessions(
  provider: QuoteProvider,
  symbol: string,
  policy: FetchPolicy,
  logger: ServiceLogger
): Promise<QuoteOutcome<RawQuote>> {
  let attempts = 0;

  try {
    const result = await withRetry(
      async (attempt) => {
        attempts = attempt;
        const { closes } = await provider.fetchDailyCloses(symbol, policy.window ?? DEFAULT_QUOTE_WINDOW);
        return selectRecentSessions(symbol, closes);
      },
      {
        maxAttempts: policy.maxAttempts,
        baseDelayMs: policy.baseDelayMs,
        isRetryable: isTransientError,
        ...(policy.sleep ? { sleep: policy.sleep } : {}),
        onRetry: (attempt, error, delayMs) => {
          logger.warn('Quote fetch attempt failed, retrying', {
            symbol,
            attempt,
            maxAttempts: policy.maxAttempts,
            delayMs,
            error: errorMessage(error)
          });
        }
      }
    );
    return { ok: true, value: result.value, attempts: result.attempts };
  } catch (error) {
    return { ok: false, reason: errorMessage(error), attempts };
  }
}

/** Quote Normalizer: one registry entry in, one USD-based rate (or a failure) out. */
export async function fetchNormalizedRate(
  provider: QuoteProvider,
  request: QuoteRequest,
  policy: FetchPolicy,
  logger: ServiceLogger
): Promise<QuoteOutcome<NormalizedRate>> {
  const sessions = await fetchRecentSessions(provider, request.symbol, policy, logger);
  if (!sessions.ok) {
    return sessions;
  }
  return { ok: true, value: normalizeQuote(request, sessions.value), attempts: sessions.attempts };
}
