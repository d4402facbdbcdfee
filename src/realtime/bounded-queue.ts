interface PendingPut<T> {
    item: T;
    resolve: (accepted: boolean) => void;
    timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Fixed-capacity FIFO shared by one consumer and any number of producers.
 *
 * Closing is a one-way "no more data" signal: waiting producers are refused,
 * items already queued can still be taken, and consumers receive `undefined`
 * once the queue is closed and empty.
 */
export class BoundedQueue<T> {
    readonly #capacity: number;
    readonly #items: T[] = [];
    readonly #takers: Array<(item: T | undefined) => void> = [];
    readonly #putters: PendingPut<T>[] = [];
    #closed = false;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Queue capacity must be a positive integer, got ${capacity}.`);
        }
        this.#capacity = capacity;
    }

    get capacity(): number {
        return this.#capacity;
    }

    get size(): number {
        return this.#items.length;
    }

    get closed(): boolean {
        return this.#closed;
    }

    /** Enqueue without waiting. Returns false when the queue is full or closed. */
    offer(item: T): boolean {
        if (this.#closed) return false;

        const taker = this.#takers.shift();
        if (taker) {
            taker(item);
            return true;
        }

        if (this.#items.length >= this.#capacity) return false;
        this.#items.push(item);
        return true;
    }

    /**
     * Enqueue, waiting for space. With `timeoutMs` the wait is bounded and the
     * promise resolves false when it runs out.
     */
    put(item: T, timeoutMs?: number): Promise<boolean> {
        if (this.offer(item)) return Promise.resolve(true);
        if (this.#closed) return Promise.resolve(false);

        return new Promise((resolve) => {
            const pending: PendingPut<T> = { item, resolve, timer: null };
            if (timeoutMs !== undefined) {
                pending.timer = setTimeout(() => {
                    const index = this.#putters.indexOf(pending);
                    if (index >= 0) this.#putters.splice(index, 1);
                    resolve(false);
                }, Math.max(0, timeoutMs));
            }
            this.#putters.push(pending);
        });
    }

    /** Wait for the next item; `undefined` once closed and drained. */
    take(): Promise<T | undefined> {
        if (this.#items.length > 0) {
            const item = this.#items.shift();
            this.#admitPutter();
            return Promise.resolve(item);
        }
        if (this.#closed) return Promise.resolve(undefined);

        return new Promise((resolve) => {
            this.#takers.push(resolve);
        });
    }

    /** Remove and return everything available right now. */
    drain(): T[] {
        const drained: T[] = [];
        while (this.#items.length > 0) {
            drained.push(...this.#items.splice(0));
            while (this.#items.length < this.#capacity && this.#admitPutter()) {
                // keep admitting waiting producers into the freed space
            }
        }
        return drained;
    }

    close(): void {
        if (this.#closed) return;
        this.#closed = true;

        for (const taker of this.#takers.splice(0)) {
            taker(undefined);
        }
        for (const pending of this.#putters.splice(0)) {
            if (pending.timer) clearTimeout(pending.timer);
            pending.resolve(false);
        }
    }

    #admitPutter(): boolean {
        const pending = this.#putters.shift();
        if (!pending) return false;

        if (pending.timer) clearTimeout(pending.timer);
        this.#items.push(pending.item);
        pending.resolve(true);
        return true;
    }
}
