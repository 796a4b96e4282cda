import { releaseJob } from '../domain/entities/RenderJob';
import { StaleJobVersionError } from '../domain/errors/CompositionErrors';
import { IDispatchQueue } from '../domain/ports/IDispatchQueue';
import { IJobRepository } from '../domain/ports/IJobRepository';

/**
 * Service that puts interrupted jobs back in the queue.
 */
export class JobRecoveryService {
    private readonly repository: IJobRepository;
    private readonly queue: IDispatchQueue;

    constructor(repository: IJobRepository, queue: IDispatchQueue) {
        this.repository = repository;
        this.queue = queue;
    }

    /**
     * Re-enqueues every pending job. Run once at start-up: an in-process queue
     * loses its contents on restart while the job records survive.
     * @returns Number of jobs re-enqueued
     */
    async recover(): Promise<number> {
        const pending = await this.repository.list({ status: 'pending' });
        if (pending.length === 0) {
            return 0;
        }

        console.log(`🚀 Re-queueing ${pending.length} pending job(s)...`);
        // Oldest first so the original submission order is kept
        for (const job of [...pending].reverse()) {
            await this.queue.enqueue(job.id);
        }
        return pending.length;
    }

    /**
     * Returns processing jobs untouched for longer than `timeoutMs` to pending
     * and re-enqueues them. Completed stages are kept, so the plan resumes
     * where it stopped.
     * @returns Ids of the released jobs
     */
    async requeueStalled(timeoutMs: number, now: Date = new Date()): Promise<string[]> {
        const processing = await this.repository.list({ status: 'processing' });
        const released: string[] = [];

        for (const job of processing) {
            const idleMs = now.getTime() - job.updatedAt.getTime();
            if (idleMs <= timeoutMs) {
                continue;
            }

            try {
                await this.repository.update(releaseJob(job));
            } catch (error) {
                if (error instanceof StaleJobVersionError) {
                    // The worker wrote in the meantime, so it is alive
                    continue;
                }
                throw error;
            }

            console.warn(`[Recovery] Job ${job.id} stalled on ${job.workerId ?? 'unknown worker'} for ${idleMs}ms, re-queued`);
            await this.queue.enqueue(job.id);
            released.push(job.id);
        }

        return released;
    }
}
