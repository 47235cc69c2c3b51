/**
 * Promise-chain mutex: callers of `inLock` run one at a time, in call order.
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();

    async inLock<T>(fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => {};
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });

        await previous;
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
