/**
 * Serializes async work per key. Tasks for different keys run concurrently;
 * tasks for the same key run one after another in arrival order.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        // The caller observes the task's failure through `result`; the chain only needs to settle.
        const tail = result.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);

        try {
            return await result;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    get pendingKeys(): number {
        return this.tails.size;
    }
}
