// Backoff schedule and retry control

import { describe, it, expect, vi } from 'vitest';
import { CancelledError } from '../src/utils/errors.js';
import { backoffDelay, sleep, withRetry } from '../src/utils/retry.js';

describe('backoffDelay', () => {
    it('doubles from the initial delay up to the cap', () => {
        const delays = [1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, 2000, 30000));

        expect(delays).toEqual([2000, 4000, 8000, 16000, 30000, 30000]);
    });
});

describe('withRetry', () => {
    it('retries until success, waiting between attempts', async () => {
        const delay = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
        const fn = vi.fn(async (attempt: number) => {
            if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
            return 'connected';
        });

        await expect(withRetry(fn, { maxAttempts: 5, initialDelayMs: 100, delay })).resolves.toBe('connected');
        expect(fn).toHaveBeenCalledTimes(3);
        expect(delay.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    });

    it('throws the last error once attempts run out', async () => {
        const delay = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
        const fn = vi.fn(async (attempt: number): Promise<string> => {
            throw new Error(`attempt ${attempt} failed`);
        });

        await expect(withRetry(fn, { maxAttempts: 3, delay })).rejects.toThrow('attempt 3 failed');
        expect(delay).toHaveBeenCalledTimes(2);
    });

    it('stops at an error that should not be retried', async () => {
        const delay = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
        const onRetry = vi.fn();
        const fn = vi.fn(async (): Promise<string> => {
            throw new Error('fatal');
        });

        await expect(withRetry(fn, { maxAttempts: 5, delay, onRetry, shouldRetry: () => false })).rejects.toThrow('fatal');
        expect(fn).toHaveBeenCalledTimes(1);
        expect(delay).not.toHaveBeenCalled();
        expect(onRetry).not.toHaveBeenCalled();
    });

    it('does not start once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const fn = vi.fn(async () => 'never');

        await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
        expect(fn).not.toHaveBeenCalled();
    });
});

describe('sleep', () => {
    it('rejects when aborted', async () => {
        const controller = new AbortController();
        const pending = sleep(60000, controller.signal);
        controller.abort();

        await expect(pending).rejects.toThrow('Delay aborted');
    });
});
