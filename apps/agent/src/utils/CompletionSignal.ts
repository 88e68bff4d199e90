// Completion Signal
// Single-fire awaitable with three terminal outcomes for a waiter: value, error, timeout

import { CancelledError, SetupTimeoutError } from './errors.js';

type Outcome<T> =
    | { status: 'resolved'; value: T }
    | { status: 'failed'; error: Error };

interface Waiter<T> {
    resolve: (value: T) => void;
    reject: (error: Error) => void;
}

/**
 * Settled at most once: the first resolve() or fail() wins, later calls are ignored.
 * Any number of wait() calls observe the same outcome.
 */
export class CompletionSignal<T = void> {
    private outcome: Outcome<T> | null = null;
    private waiters = new Set<Waiter<T>>();

    resolve(value: T): boolean {
        return this.settle({ status: 'resolved', value });
    }

    fail(error: Error): boolean {
        return this.settle({ status: 'failed', error });
    }

    /**
     * Wait for the outcome. Rejects with SetupTimeoutError once `timeoutMs` elapses
     * and with CancelledError when `signal` aborts; neither settles the signal itself.
     */
    wait(timeoutMs?: number, signal?: AbortSignal): Promise<T> {
        const outcome = this.outcome;
        if (outcome) {
            return outcome.status === 'resolved'
                ? Promise.resolve(outcome.value)
                : Promise.reject(outcome.error);
        }

        if (signal?.aborted) {
            return Promise.reject(new CancelledError('Wait aborted'));
        }

        return new Promise<T>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;

            const cleanup = () => {
                if (timer) clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                this.waiters.delete(waiter);
            };

            const waiter: Waiter<T> = {
                resolve: (value) => {
                    cleanup();
                    resolve(value);
                },
                reject: (error) => {
                    cleanup();
                    reject(error);
                },
            };

            const onAbort = () => waiter.reject(new CancelledError('Wait aborted'));

            if (timeoutMs !== undefined) {
                timer = setTimeout(() => waiter.reject(new SetupTimeoutError(timeoutMs)), timeoutMs);
            }
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.add(waiter);
        });
    }

    private settle(outcome: Outcome<T>): boolean {
        if (this.outcome) {
            return false;
        }
        this.outcome = outcome;

        for (const waiter of [...this.waiters]) {
            if (outcome.status === 'resolved') {
                waiter.resolve(outcome.value);
            } else {
                waiter.reject(outcome.error);
            }
        }
        return true;
    }
}
