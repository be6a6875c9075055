/**
 * Per-key critical sections built from promise chains.
 *
 * Tasks sharing a key run one after another in submission order; tasks with
 * different keys run concurrently. A failing task does not poison the chain.
 * Not re-entrant: a task must not wait on another task for its own key.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(() => task());
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);
        void tail.then(() => {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        });
        return run;
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    /**
     * Resolves once every task queued so far has settled.
     */
    async drain(): Promise<void> {
        await Promise.all([...this.tails.values()]);
    }
}
