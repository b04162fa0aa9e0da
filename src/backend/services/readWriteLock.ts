/**
 * Readers-writer lock for async code.
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are served in arrival order, so a reader that arrives after a
 * waiting writer waits for that writer.
 */

interface Waiter {
    write: boolean;
    resolve: () => void;
}

export class ReadWriteLock {
    private readers = 0;
    private writing = false;
    private readonly queue: Waiter[] = [];

    async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire(false);
        try {
            return await fn();
        } finally {
            this.release(false);
        }
    }

    async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire(true);
        try {
            return await fn();
        } finally {
            this.release(true);
        }
    }

    private acquire(write: boolean): Promise<void> {
        if (this.queue.length === 0 && this.canEnter(write)) {
            this.enter(write);
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.queue.push({ write, resolve });
        });
    }

    private release(write: boolean): void {
        if (write) {
            this.writing = false;
        } else {
            this.readers -= 1;
        }
        this.drain();
    }

    private drain(): void {
        let next = this.queue[0];
        while (next && this.canEnter(next.write)) {
            this.queue.shift();
            this.enter(next.write);
            next.resolve();
            next = this.queue[0];
        }
    }

    private canEnter(write: boolean): boolean {
        return write ? !this.writing && this.readers === 0 : !this.writing;
    }

    private enter(write: boolean): void {
        if (write) {
            this.writing = true;
        } else {
            this.readers += 1;
        }
    }
}
