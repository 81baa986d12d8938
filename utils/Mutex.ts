/**
 * Mutex
 * 
 * Promise-chained exclusive section. Callers queue in arrival order;
 * a rejected section releases the lock for the next caller.
 */

export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    async runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });

        await previous;
        try {
            return await section();
        } finally {
            release();
        }
    }
}
