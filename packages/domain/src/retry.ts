/**
 * Retry utility with exponential backoff.
 *
 * Shared by the quote fetches and the reference feed fetch. The delay sequence is
 * deterministic (base, 2×base, 4×base, …) up to a cap.
 * Retryable and non-retryable errors are separated by a discriminator function.
 */

export interface RetryOptions {
    /** Maximum number of attempts (including the initial call). */
    maxAttempts: number;
    /** Delay in ms before the first retry (default: 2_000). */
    baseDelayMs?: number;
    /** Maximum delay cap in ms (default: 30_000). */
    maxDelayMs?: number;
    /** Return true if the error is retryable. All other errors are thrown immediately. */
    isRetryable: (error: unknown) => boolean;
    /** Optional callback fired before each retry wait. */
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
    /** Replaces the timer-based wait. */
    sleep?: (ms: number) => Promise<void>;
}

export interface RetryResult<T> {
    value: T;
    attempts: number;
}

/**
 * Delay before the retry that follows `attempt`.
 * Formula:  min(baseDelay * 2^(attempt-1), maxDelay)
 */
export function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute `fn` with retry logic.
 *
 * @returns The result value and the number of attempts made.
 * @throws The last error if all attempts are exhausted, or any non-retryable error immediately.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<RetryResult<T>> {
    const {
        maxAttempts,
        baseDelayMs = 2_000,
        maxDelayMs = 30_000,
        isRetryable,
        onRetry,
        sleep: wait = sleep
    } = options;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}.`);
    }

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn(attempt);
            return { value, attempts: attempt };
        } catch (error) {
            lastError = error;

            if (!isRetryable(error)) {
                throw error;
            }

            if (attempt < maxAttempts) {
                const delay = calculateBackoff(attempt, baseDelayMs, maxDelayMs);
                onRetry?.(attempt, error, delay);
                await wait(delay);
            }
        }
    }

    throw lastError;
}
