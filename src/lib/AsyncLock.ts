/**
 * Serializes async critical sections: each `run` starts only after every
 * previously queued one has settled.
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();

    run<T>(fn: () => Promise<T> | T): Promise<T> {
        const result = this.tail.then(() => fn());
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
