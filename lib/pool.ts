import { CancelledError } from './errors.js';
import { toError } from './util.js';

/**
 * Counting semaphore. Waiters are released in the order they queued.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.permits = permits;
    }

    /**
     * Acquire a permit, waiting if necessary
     */
    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise<void>((resolve) => {
            this.waiting.push(resolve);
        });
    }

    /**
     * Run `task` while holding a permit
     */
    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    /**
     * Release a permit, handing it straight to the next waiter if there is one
     */
    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
            return;
        }
        this.permits++;
    }
}

export type TaskOutcome<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; error: Error };

export interface RunOptions {
    concurrency: number;
    // Checked when a task gets its permit; aborted tasks never start
    signal?: AbortSignal;
    // Once a task fails with a matching error, tasks that have not started fail with the same error
    haltOn?: (error: Error) => boolean;
    onProgress?: (completed: number, total: number) => void;
}

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight
 *
 * Tasks start in submission order. The result holds one outcome per item at
 * the item's position, whatever order the tasks finished in. A failing task
 * never stops its siblings unless `haltOn` says so.
 */
export async function runOrdered<I, T>(
    items: readonly I[],
    worker: (item: I, index: number) => Promise<T>,
    options: RunOptions,
): Promise<TaskOutcome<T>[]> {
    const semaphore = new Semaphore(options.concurrency);
    const total = items.length;
    let completed = 0;
    let haltError: Error | undefined;

    const run = async (item: I, index: number): Promise<TaskOutcome<T>> => {
        await semaphore.acquire();
        try {
            if (options.signal?.aborted) {
                return { status: 'rejected', error: new CancelledError() };
            }
            if (haltError) {
                return { status: 'rejected', error: haltError };
            }
            try {
                return { status: 'fulfilled', value: await worker(item, index) };
            } catch (thrown) {
                const error = toError(thrown);
                if (!haltError && options.haltOn?.(error)) {
                    haltError = error;
                }
                return { status: 'rejected', error };
            }
        } finally {
            completed++;
            options.onProgress?.(completed, total);
            semaphore.release();
        }
    };

    return Promise.all(items.map((item, index) => run(item, index)));
}
