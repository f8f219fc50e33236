/**
 * Simple semaphore for concurrency control.
 * Keeps simultaneous calls to an external service under its rate limit.
 */
export class Semaphore {
    private current = 0;
    private queue: Array<() => void> = [];

    constructor(private readonly max: number) {
        if (!Number.isInteger(max) || max < 1) {
            throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
        }
    }

    async acquire(): Promise<void> {
        if (this.current < this.max) {
            this.current++;
            return;
        }
        return new Promise<void>(resolve => {
            this.queue.push(resolve);
        });
    }

    release(): void {
        this.current--;
        const next = this.queue.shift();
        if (next) {
            this.current++;
            next();
        }
    }
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results land at their item's index, whatever order the calls finish in.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const semaphore = new Semaphore(limit);

    return Promise.all(items.map(async (item, index) => {
        await semaphore.acquire();
        try {
            return await fn(item, index);
        } finally {
            semaphore.release();
        }
    }));
}
