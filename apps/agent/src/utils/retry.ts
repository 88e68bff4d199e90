// Retry Utility
// Exponential backoff retry with cancellation, used for live session reconnects

import { CancelledError } from './errors.js';

export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    signal?: AbortSignal;
    delay?: DelayFn;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>> = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
};

/**
 * Sleep for specified milliseconds; rejects with CancelledError when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError('Delay aborted'));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError('Delay aborted'));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(
    attempt: number,
    initialDelayMs: number,
    maxDelayMs: number,
    backoffMultiplier: number = 2
): number {
    return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
}

/**
 * Wrap an async function with retry logic
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const delay = options.delay ?? sleep;

    let lastError: unknown;

    for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            throw new CancelledError('Retry aborted');
        }

        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (attempt >= opts.maxAttempts) {
                // Max attempts reached
                break;
            }

            if (options.shouldRetry && !options.shouldRetry(error, attempt)) {
                // Error is not retryable
                break;
            }

            const delayMs = backoffDelay(attempt, opts.initialDelayMs, opts.maxDelayMs, opts.backoffMultiplier);

            if (options.onRetry) {
                options.onRetry(error, attempt, delayMs);
            }

            await delay(delayMs, options.signal);
        }
    }

    throw lastError;
}
