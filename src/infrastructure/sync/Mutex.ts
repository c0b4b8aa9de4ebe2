export type Release = () => void;

/**
 * Async mutual exclusion. Waiters are granted the lock in arrival order.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    /**
     * Resolves with a release function once every earlier holder has released.
     * Calling the release function more than once has no further effect.
     */
    acquire(): Promise<Release> {
        const previous = this.tail;
        let unlockNext: () => void = () => {};
        this.tail = new Promise<void>(resolve => {
            unlockNext = resolve;
        });

        return previous.then(() => {
            let released = false;
            return () => {
                if (released) {
                    return;
                }
                released = true;
                unlockNext();
            };
        });
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
