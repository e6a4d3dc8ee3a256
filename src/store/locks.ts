/**
 * Keyed mutual exclusion for async work
 *
 * Each key holds the tail of a promise chain. `runExclusive` appends to the chain
 * so callers for the same key run one after another in arrival order, while
 * different keys proceed independently. A rejected task does not poison the
 * chain for later callers.
 */
export class LockManager {
    private _tails: Map<string, Promise<void>> = new Map();

    /**
     * Run `task` once every earlier task for `key` has settled
     *
     * @returns Whatever `task` resolves to; rejections propagate to the caller
     */
    runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this._tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(
            () => undefined,
            () => undefined
        );
        this._tails.set(key, tail);

        void tail.then(() => {
            if (this._tails.get(key) === tail) {
                this._tails.delete(key);
            }
        });

        return result;
    }

    /**
     * Whether any task is queued or running for `key`
     */
    isLocked(key: string): boolean {
        return this._tails.has(key);
    }
}
