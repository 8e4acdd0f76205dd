/**
 * mutex.ts
 *
 * "There can be only one."
 *
 * Promise-chained exclusive lock. Holders run strictly one at a time in
 * acquisition order; the lock is held across awaits inside the task, which is
 * what lets a key edge hold it through its outbound command.
 */

export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private held = false;
    private waiting = 0;

    public async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
        let release: () => void = () => undefined;
        const next = new Promise<void>((resolve) => {
            release = resolve;
        });
        const previous = this.tail;
        this.tail = previous.then(() => next);

        this.waiting++;
        await previous;
        this.waiting--;
        this.held = true;
        try {
            return await task();
        } finally {
            this.held = false;
            release();
        }
    }

    public isLocked(): boolean {
        return this.held;
    }

    /** Callers queued behind the current holder. */
    public getWaitingCount(): number {
        return this.waiting;
    }
}
