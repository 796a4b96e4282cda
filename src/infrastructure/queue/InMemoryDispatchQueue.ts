import { IDispatchQueue } from '../../domain/ports/IDispatchQueue';

interface Waiter {
    resolve: (jobId: string | null) => void;
    timer: NodeJS.Timeout;
}

/**
 * In-process FIFO queue. Consumers waiting in `dequeue` are served in arrival order.
 * Contents are lost on restart; JobRecoveryService re-enqueues pending jobs.
 */
export class InMemoryDispatchQueue implements IDispatchQueue {
    private readonly items: string[] = [];
    private readonly waiters: Waiter[] = [];
    private closed = false;

    async enqueue(jobId: string): Promise<void> {
        if (this.closed) {
            throw new Error('Dispatch queue is closed');
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            clearTimeout(waiter.timer);
            waiter.resolve(jobId);
            return;
        }
        this.items.push(jobId);
    }

    async dequeue(timeoutMs: number): Promise<string | null> {
        const next = this.items.shift();
        if (next !== undefined) {
            return next;
        }
        if (this.closed || timeoutMs <= 0) {
            return null;
        }

        return new Promise((resolve) => {
            const waiter: Waiter = {
                resolve,
                timer: setTimeout(() => {
                    const index = this.waiters.indexOf(waiter);
                    if (index >= 0) {
                        this.waiters.splice(index, 1);
                    }
                    resolve(null);
                }, timeoutMs),
            };
            this.waiters.push(waiter);
        });
    }

    async size(): Promise<number> {
        return this.items.length;
    }

    /**
     * Wakes every waiting consumer with null. Queued ids are kept.
     */
    async close(): Promise<void> {
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            clearTimeout(waiter.timer);
            waiter.resolve(null);
        }
    }
}
