/**
 * Per-key async mutex. Callers holding different keys never wait on each other;
 * callers on the same key run one at a time in arrival order.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    /**
     * Runs `task` once every earlier task for `key` has settled.
     * The task's result or rejection is passed through unchanged.
     */
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            // Drop the entry once nobody is queued behind us.
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** Number of keys with a running or queued task. */
    get size(): number {
        return this.tails.size;
    }
}
