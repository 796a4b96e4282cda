import { IDispatchQueue } from '../domain/ports/IDispatchQueue';
import { sleep } from '../lib/RetryUtils';
import { JobLifecycleEngine } from './JobLifecycleEngine';

/**
 * The part of the lifecycle engine a worker needs.
 */
export type JobProcessor = Pick<JobLifecycleEngine, 'processJob'>;

export interface WorkerPoolOptions {
    concurrency: number;
    /** How long one dequeue call waits before the loop checks for shutdown */
    pollIntervalMs: number;
    /** Prefix for worker ids; defaults to the process id */
    name?: string;
}

/**
 * Worker Pool
 *
 * Runs `concurrency` loops that pull job ids from the dispatch queue and hand
 * them to the lifecycle engine. A job id is never processed by two loops of
 * the same pool at once; across processes the engine's versioned claim decides.
 * A duplicate dequeued while its job is running is held back and re-enqueued
 * once that run ends, since the job may have been released in the meantime.
 */
export class WorkerPool {
    private readonly engine: JobProcessor;
    private readonly queue: IDispatchQueue;
    private readonly options: WorkerPoolOptions;
    private readonly activeJobs = new Set<string>();
    private readonly heldBackJobs = new Set<string>();
    private loops: Promise<void>[] = [];
    private running = false;

    constructor(engine: JobProcessor, queue: IDispatchQueue, options: WorkerPoolOptions) {
        if (options.concurrency < 1) {
            throw new Error('WorkerPool concurrency must be at least 1');
        }
        this.engine = engine;
        this.queue = queue;
        this.options = options;
    }

    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        const prefix = this.options.name ?? `pid${process.pid}`;
        this.loops = Array.from({ length: this.options.concurrency }, (_, i) => this.runLoop(`${prefix}-${i + 1}`));
        console.log(`[Worker] Started ${this.options.concurrency} worker(s)`);
    }

    /**
     * Stops taking new jobs. Resolves once every loop has finished its current job.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }
        this.running = false;
        await Promise.all(this.loops);
        this.loops = [];
        console.log('[Worker] All workers stopped');
    }

    isRunning(): boolean {
        return this.running;
    }

    getActiveJobIds(): string[] {
        return Array.from(this.activeJobs);
    }

    private async runLoop(workerId: string): Promise<void> {
        while (this.running) {
            let jobId: string | null;
            try {
                jobId = await this.queue.dequeue(this.options.pollIntervalMs);
            } catch (error) {
                console.error(`[Worker ${workerId}] Dequeue failed:`, error);
                await sleep(this.options.pollIntervalMs);
                continue;
            }

            if (!jobId) {
                continue;
            }
            if (this.activeJobs.has(jobId)) {
                console.warn(`[Worker ${workerId}] Job ${jobId} is already running in this process, holding it back`);
                this.heldBackJobs.add(jobId);
                continue;
            }

            this.activeJobs.add(jobId);
            try {
                await this.engine.processJob(jobId, workerId);
            } catch (error) {
                console.error(`[Worker ${workerId}] Job ${jobId} failed:`, error);
            } finally {
                this.activeJobs.delete(jobId);
            }

            if (this.heldBackJobs.delete(jobId)) {
                await this.requeue(jobId, workerId);
            }
        }
    }

    private async requeue(jobId: string, workerId: string): Promise<void> {
        try {
            await this.queue.enqueue(jobId);
            console.log(`[Worker ${workerId}] Re-enqueued held back job ${jobId}`);
        } catch (error) {
            console.error(`[Worker ${workerId}] Could not re-enqueue job ${jobId}:`, error);
        }
    }
}
