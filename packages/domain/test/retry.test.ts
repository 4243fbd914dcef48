import { describe, expect, it } from 'vitest';
import { ERRORS, MarketDataError, isTransientError } from '../src/errors.js';
import { calculateBackoff, withRetry } from '../src/retry.js';

const noWait = async (): Promise<void> => {};

describe('calculateBackoff', () => {
    it('returns base delay for first attempt', () => {
        expect(calculateBackoff(1, 2000, 30000)).toBe(2000);
    });

    it('doubles delay for each subsequent attempt', () => {
        expect([1, 2, 3].map((attempt) => calculateBackoff(attempt, 2000, 30000))).toEqual([2000, 4000, 8000]);
    });

    it('caps delay at maxDelayMs', () => {
        expect(calculateBackoff(20, 200, 5000)).toBe(5000);
    });
});

describe('withRetry', () => {
    it('returns on first success', async () => {
        let calls = 0;
        const result = await withRetry(
            async () => {
                calls += 1;
                return 'ok';
            },
            { maxAttempts: 3, isRetryable: () => true, sleep: noWait }
        );

        expect(result).toEqual({ value: 'ok', attempts: 1 });
        expect(calls).toBe(1);
    });

    it('waits base, then twice base, between three attempts', async () => {
        const waits: number[] = [];
        const result = await withRetry(
            async (attempt) => {
                if (attempt < 3) {
                    throw new MarketDataError(ERRORS.QUOTE_INSUFFICIENT_SESSIONS);
                }
                return 1.0842;
            },
            {
                maxAttempts: 3,
                baseDelayMs: 2000,
                isRetryable: isTransientError,
                sleep: async (ms) => {
                    waits.push(ms);
                }
            }
        );

        expect(result.attempts).toBe(3);
        expect(waits).toEqual([2000, 4000]);
    });

    it('throws immediately on non-retryable error', async () => {
        let calls = 0;
        await expect(
            withRetry(
                async () => {
                    calls += 1;
                    throw new MarketDataError(ERRORS.QUOTE_MALFORMED_RESPONSE);
                },
                { maxAttempts: 5, isRetryable: isTransientError, sleep: noWait }
            )
        ).rejects.toMatchObject({ code: 'QUOTE_MALFORMED_RESPONSE' });

        expect(calls).toBe(1);
    });

    it('throws last error when all attempts exhausted', async () => {
        let calls = 0;
        await expect(
            withRetry(
                async () => {
                    calls += 1;
                    throw new Error(`fail-${calls}`);
                },
                { maxAttempts: 3, isRetryable: () => true, sleep: noWait }
            )
        ).rejects.toThrow('fail-3');

        expect(calls).toBe(3);
    });

    it('calls onRetry before each retry wait but not after the last attempt', async () => {
        const retries: Array<{ attempt: number; delayMs: number }> = [];

        await expect(
            withRetry(
                async () => {
                    throw new Error('timeout');
                },
                {
                    maxAttempts: 3,
                    baseDelayMs: 10,
                    isRetryable: () => true,
                    sleep: noWait,
                    onRetry: (attempt, _error, delayMs) => {
                        retries.push({ attempt, delayMs });
                    }
                }
            )
        ).rejects.toThrow('timeout');

        expect(retries).toEqual([
            { attempt: 1, delayMs: 10 },
            { attempt: 2, delayMs: 20 }
        ]);
    });

    it('rejects a non-positive attempt budget', async () => {
        await expect(withRetry(async () => 1, { maxAttempts: 0, isRetryable: () => true })).rejects.toBeInstanceOf(RangeError);
    });
});

describe('isTransientError', () => {
    it('treats network errors as transient and malformed payloads as permanent', () => {
        expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
        expect(isTransientError(new MarketDataError(ERRORS.QUOTE_FETCH_FAILED))).toBe(true);
        expect(isTransientError(new MarketDataError(ERRORS.REFERENCE_FEED_MALFORMED))).toBe(false);
        expect(isTransientError('boom')).toBe(false);
    });
});
