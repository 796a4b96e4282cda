import axios from 'axios';

/**
 * Exponential backoff shared by remote downloads (`withRetry`) and the
 * stage retry loop in the job engine (`computeBackoffDelay`).
 */

export interface RetryOptions {
    /** Total tries including the first one. Default 3 */
    maxAttempts?: number;
    /** Delay after the first failure. Default 1000 */
    initialBackoffMs?: number;
    /** Ceiling for any single delay. Default 30000 */
    maxBackoffMs?: number;
    /** Fraction of the delay added or removed at random (0-1). Default 0.1 */
    jitter?: number;
    /** Errors that fail this check are rethrown at once */
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULTS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { },
    sleep,
};

/**
 * Runs `fn` until it resolves, the attempts are used up, or it throws a
 * non-retryable error. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
    const settings = { ...DEFAULTS, ...options };

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= settings.maxAttempts || !settings.isRetryable(error)) {
                throw error;
            }

            const base = computeBackoffDelay(attempt, settings.initialBackoffMs, settings.maxBackoffMs);
            const spread = base * settings.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(base + spread, settings.maxBackoffMs));

            settings.onRetry(attempt, error, delay);
            await settings.sleep(delay);
        }
    }
}

/**
 * Delay before the retry that follows `attempt` (1-based): initial * 2^(attempt-1), capped.
 */
export function computeBackoffDelay(attempt: number, initialBackoffMs: number, maxBackoffMs: number): number {
    return Math.min(initialBackoffMs * 2 ** (attempt - 1), maxBackoffMs);
}

/**
 * True for network failures without a response, 429 and 5xx.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }
    const status = error.response?.status;
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
