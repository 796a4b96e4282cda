/**
 * IDispatchQueue - Port for the queue of job ids waiting for a worker.
 * Ordering is best effort; the queue never looks inside a job.
 */
export interface IDispatchQueue {
    enqueue(jobId: string): Promise<void>;

    /**
     * Waits up to `timeoutMs` for a job id.
     * @returns null when nothing arrived in time or the queue was closed
     */
    dequeue(timeoutMs: number): Promise<string | null>;

    size(): Promise<number>;

    close(): Promise<void>;
}
