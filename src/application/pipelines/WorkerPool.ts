/**
 * Bounded worker pool for per-shot stage work.
 *
 * Shots within one version have no ordering dependency at the audio and
 * effect stages, so they run in parallel up to `concurrency` at a time.
 */

/**
 * Simple semaphore for limiting concurrent operations.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error(`Semaphore permits must be a positive integer, got: ${permits}`);
        }
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

export type TaskOutcome<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; error: unknown }
    | { status: 'cancelled' };

export interface WorkerPoolOptions {
    concurrency: number;
    /** Checked before each task starts; tasks not yet started are cancelled */
    signal?: AbortSignal;
}

/**
 * Runs `worker` over every item with bounded concurrency.
 * Never rejects: each item's outcome is reported in input order.
 */
export async function runPool<TItem, TResult>(
    items: TItem[],
    worker: (item: TItem, index: number) => Promise<TResult>,
    options: WorkerPoolOptions
): Promise<TaskOutcome<TResult>[]> {
    const semaphore = new Semaphore(options.concurrency);

    const runOne = async (item: TItem, index: number): Promise<TaskOutcome<TResult>> => {
        await semaphore.acquire();
        try {
            if (options.signal?.aborted) {
                return { status: 'cancelled' };
            }
            const value = await worker(item, index);
            return { status: 'fulfilled', value };
        } catch (error) {
            return { status: 'rejected', error };
        } finally {
            semaphore.release();
        }
    };

    return Promise.all(items.map((item, index) => runOne(item, index)));
}
