type LockKind = 'read' | 'write';

interface Waiter {
    kind: LockKind;
    grant: () => void;
}

/**
 * Single-writer / multi-reader lock.
 *
 * Readers share access with each other but never with a writer. Waiters are
 * granted in arrival order, so a queued writer blocks readers that arrive
 * after it.
 */
export class ReadWriteLock {
    private readers = 0;
    private writing = false;
    private readonly waiters: Waiter[] = [];

    async read<T>(task: () => Promise<T> | T): Promise<T> {
        await this.acquire('read');
        try {
            return await task();
        } finally {
            this.readers -= 1;
            this.pump();
        }
    }

    async write<T>(task: () => Promise<T> | T): Promise<T> {
        await this.acquire('write');
        try {
            return await task();
        } finally {
            this.writing = false;
            this.pump();
        }
    }

    get activeReaders(): number {
        return this.readers;
    }

    get isWriting(): boolean {
        return this.writing;
    }

    private acquire(kind: LockKind): Promise<void> {
        if (this.waiters.length === 0 && this.canGrant(kind)) {
            this.take(kind);
            return Promise.resolve();
        }
        return new Promise(resolve => {
            this.waiters.push({ kind, grant: resolve });
        });
    }

    private canGrant(kind: LockKind): boolean {
        return kind === 'read' ? !this.writing : !this.writing && this.readers === 0;
    }

    private take(kind: LockKind): void {
        if (kind === 'read') {
            this.readers += 1;
        } else {
            this.writing = true;
        }
    }

    private pump(): void {
        let head = this.waiters[0];
        while (head && this.canGrant(head.kind)) {
            this.waiters.shift();
            this.take(head.kind);
            head.grant();
            if (head.kind === 'write') {
                return;
            }
            head = this.waiters[0];
        }
    }
}
