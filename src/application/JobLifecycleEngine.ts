import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import {
    JobFailure,
    RenderJob,
    RenderJobStatus,
    claimJob,
    completeJob,
    completeStage,
    createRenderJob,
    failJob,
    finalizeCancellation,
    getStage,
    recordStageAttempt,
    recordStageFailure,
    requestCancellation,
} from '../domain/entities/RenderJob';
import { PlanWarning, RenderStage, getFinalStage } from '../domain/entities/RenderPlan';
import {
    JobAccessError,
    StageError,
    StaleJobVersionError,
    describeError,
} from '../domain/errors/CompositionErrors';
import { IDispatchQueue } from '../domain/ports/IDispatchQueue';
import { IJobRepository } from '../domain/ports/IJobRepository';
import { IRenderEngine } from '../domain/ports/IRenderEngine';
import { computeBackoffDelay, sleep } from '../lib/RetryUtils';
import { CompositionPlanner } from './CompositionPlanner';

export interface JobLifecycleDependencies {
    planner: CompositionPlanner;
    repository: IJobRepository;
    queue: IDispatchQueue;
    renderEngine: IRenderEngine;
}

export interface JobLifecycleOptions {
    workDir: string;
    maxStageAttempts: number;
    stageRetryInitialBackoffMs: number;
    stageRetryMaxBackoffMs: number;
    /** Replaceable for tests */
    sleep?: (ms: number) => Promise<void>;
}

export interface SubmissionReceipt {
    jobId: string;
    status: RenderJobStatus;
    estimatedSeconds: number;
    warnings: PlanWarning[];
}

export interface JobOutput {
    filename: string;
    contentType: string;
    sizeBytes: number;
    openStream(): Readable;
}

export interface ListJobsOptions {
    status?: RenderJobStatus;
    limit?: number;
    offset?: number;
}

export interface QueueStatus {
    user: Record<RenderJobStatus, number>;
    global: { pending: number; processing: number };
    queueLength: number;
}

const MAX_WRITE_RETRIES = 5;
const DEFAULT_LIST_LIMIT = 10;
const MAX_LIST_LIMIT = 100;

const CONTENT_TYPES: Record<string, string> = {
    mp4: 'video/mp4',
    mov: 'video/quicktime',
    avi: 'video/x-msvideo',
};

type StageOutcome =
    | { outcome: 'completed'; job: RenderJob }
    | { outcome: 'failed'; failure: JobFailure }
    /** The job was taken from this worker while the stage ran */
    | { outcome: 'released'; job: RenderJob };

/**
 * Owns the job state machine: submission, status, cancellation, output
 * retrieval and the execution of a job's render plan by a worker.
 *
 * Every write goes through `mutateJob`, which re-reads and re-applies on a
 * version conflict so concurrent writers never overwrite each other.
 */
export class JobLifecycleEngine {
    private readonly deps: JobLifecycleDependencies;
    private readonly options: JobLifecycleOptions;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(deps: JobLifecycleDependencies, options: JobLifecycleOptions) {
        this.deps = deps;
        this.options = options;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Plans a composition and queues it. Planning errors propagate and no job is created.
     */
    async submit(raw: unknown, ownerId: string): Promise<SubmissionReceipt> {
        const { spec, plan, estimatedSeconds } = await this.deps.planner.plan(raw);

        const id = `job_${uuidv4().substring(0, 8)}`;
        const job = await this.deps.repository.create(createRenderJob(id, ownerId, spec, plan));
        await this.deps.queue.enqueue(job.id);

        console.log(
            `[Engine] Job ${job.id} queued: "${spec.title}", ${plan.stages.length} stages, ` +
            `${plan.totalDurationSeconds}s of video`
        );
        plan.warnings.forEach((warning) => console.warn(`[Engine] ${job.id}: ${warning.message}`));

        return {
            jobId: job.id,
            status: job.status,
            estimatedSeconds,
            warnings: plan.warnings,
        };
    }

    async getStatus(jobId: string, ownerId: string): Promise<RenderJob> {
        return this.getOwnedJob(jobId, ownerId);
    }

    /**
     * Cancels a pending job outright, or flags a processing job for its worker.
     */
    async cancel(jobId: string, ownerId: string): Promise<RenderJob> {
        await this.getOwnedJob(jobId, ownerId);
        const { job } = await this.mutateJob(jobId, requestCancellation);
        console.log(
            job.status === 'cancelled'
                ? `[Engine] Job ${jobId} cancelled`
                : `[Engine] Job ${jobId} cancellation requested, waiting for the current stage`
        );
        return job;
    }

    async getOutput(jobId: string, ownerId: string): Promise<JobOutput> {
        const job = await this.getOwnedJob(jobId, ownerId);
        if (job.status !== 'completed' || !job.outputPath) {
            throw new JobAccessError('NotReady', `Job is not completed. Current status: ${job.status}`);
        }

        const outputPath = job.outputPath;
        let stats: fs.Stats;
        try {
            stats = await fs.promises.stat(outputPath);
        } catch (error) {
            console.error(`[Engine] Output file for ${jobId} is missing:`, error);
            throw new JobAccessError('ArtifactNotFound', 'Output file not found on server');
        }

        const format = job.spec.output.format;
        return {
            filename: `video_${job.id}.${format}`,
            contentType: CONTENT_TYPES[format] ?? 'application/octet-stream',
            sizeBytes: stats.size,
            openStream: () => fs.createReadStream(outputPath),
        };
    }

    /**
     * Newest first.
     */
    async listJobs(ownerId: string, options: ListJobsOptions = {}): Promise<RenderJob[]> {
        const limit = Math.min(Math.max(options.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
        return this.deps.repository.list({
            ownerId,
            status: options.status,
            limit,
            offset: Math.max(options.offset ?? 0, 0),
        });
    }

    /**
     * Number of the caller's jobs, optionally in one status.
     */
    async countJobs(ownerId: string, status?: RenderJobStatus): Promise<number> {
        const counts = await this.deps.repository.countByStatus(ownerId);
        return status ? counts[status] : Object.values(counts).reduce((sum, count) => sum + count, 0);
    }

    async queueStatus(ownerId: string): Promise<QueueStatus> {
        const [user, global, queueLength] = await Promise.all([
            this.deps.repository.countByStatus(ownerId),
            this.deps.repository.countByStatus(),
            this.deps.queue.size(),
        ]);
        return {
            user,
            global: { pending: global.pending, processing: global.processing },
            queueLength,
        };
    }

    /**
     * Claims a pending job and runs its remaining stages in plan order.
     * Returns the final record, or null when the job did not exist.
     */
    async processJob(jobId: string, workerId: string): Promise<RenderJob | null> {
        const existing = await this.deps.repository.get(jobId);
        if (!existing) {
            console.warn(`[Worker ${workerId}] Job ${jobId} no longer exists, skipping`);
            return null;
        }

        const claim = await this.mutateJob(jobId, (job) =>
            job.status === 'pending' ? claimJob(job, workerId) : null
        );
        if (!claim.written) {
            console.log(`[Worker ${workerId}] Job ${jobId} is ${claim.job.status}, skipping`);
            return claim.job;
        }

        console.log(`[Worker ${workerId}] Processing job ${jobId}`);
        try {
            await fs.promises.mkdir(this.jobDir(jobId), { recursive: true });
            return await this.runStages(claim.job, workerId);
        } catch (error) {
            console.error(`[Worker ${workerId}] Job ${jobId} crashed:`, error);
            const { job } = await this.mutateJob(jobId, (job) =>
                this.ownedBy(job, workerId) ? failJob(job, describeError(error)) : null
            );
            return job;
        }
    }

    /**
     * Directory holding a job's stage artifacts.
     */
    jobDir(jobId: string): string {
        return path.resolve(this.options.workDir, jobId);
    }

    private async runStages(claimed: RenderJob, workerId: string): Promise<RenderJob> {
        const jobId = claimed.id;
        let job = claimed;

        for (const planned of claimed.plan.stages) {
            if (planned.status === 'completed') {
                continue;
            }

            const boundary = await this.checkBoundary(jobId, workerId);
            if (boundary.stop) {
                return boundary.job;
            }

            const result = await this.runStage(jobId, planned.id, workerId);
            if (result.outcome === 'released') {
                console.warn(
                    `[Worker ${workerId}] Job ${jobId} was released during ${planned.id} ` +
                    `(now ${result.job.status}), dropping the stage result`
                );
                return result.job;
            }
            if (result.outcome === 'failed') {
                console.error(`[Worker ${workerId}] Job ${jobId} failed at ${planned.id}: ${result.failure.message}`);
                const failed = await this.mutateJob(jobId, (current) =>
                    this.ownedBy(current, workerId) ? failJob(current, result.failure) : null
                );
                return failed.job;
            }
            job = result.job;
            console.log(`[Worker ${workerId}] Job ${jobId}: ${planned.id} done (${job.progress}%)`);
        }

        const boundary = await this.checkBoundary(jobId, workerId);
        if (boundary.stop) {
            return boundary.job;
        }

        const outputPath = this.artifactPath(jobId, getFinalStage(job.plan));
        const completed = await this.mutateJob(jobId, (current) =>
            this.ownedBy(current, workerId) ? completeJob(current, outputPath) : null
        );
        console.log(`[Worker ${workerId}] ✅ Job ${jobId} completed: ${outputPath}`);
        return completed.job;
    }

    /**
     * Stage boundary: finishes a requested cancellation, or stops when the job
     * was taken away from this worker.
     */
    private async checkBoundary(jobId: string, workerId: string): Promise<{ stop: boolean; job: RenderJob }> {
        const current = await this.requireJob(jobId);
        if (!this.ownedBy(current, workerId)) {
            console.warn(`[Worker ${workerId}] Job ${jobId} is no longer held by this worker, stopping`);
            return { stop: true, job: current };
        }
        if (current.cancelRequested) {
            const { job } = await this.mutateJob(jobId, (latest) =>
                this.ownedBy(latest, workerId) ? finalizeCancellation(latest) : null
            );
            console.log(`[Worker ${workerId}] Job ${jobId} cancelled at ${job.progress}%`);
            return { stop: true, job };
        }
        return { stop: false, job: current };
    }

    private async runStage(jobId: string, stageId: string, workerId: string): Promise<StageOutcome> {
        for (;;) {
            const started = await this.mutateJob(jobId, (job) =>
                this.ownedBy(job, workerId) ? recordStageAttempt(job, stageId) : null
            );
            if (!started.written) {
                return { outcome: 'released', job: started.job };
            }
            const stage = getStage(started.job, stageId);

            let engineError: unknown = null;
            try {
                await this.deps.renderEngine.execute({
                    jobId,
                    stage,
                    inputPaths: this.resolveInputs(started.job, stage),
                    outputPath: this.artifactPath(jobId, stage),
                });
            } catch (error) {
                engineError = error;
            }

            if (engineError === null) {
                const done = await this.mutateJob(jobId, (job) =>
                    this.ownedBy(job, workerId) ? completeStage(job, stageId) : null
                );
                return done.written
                    ? { outcome: 'completed', job: done.job }
                    : { outcome: 'released', job: done.job };
            }

            const { kind, message } = describeError(engineError);
            const transient = engineError instanceof StageError && engineError.transient;
            const recorded = await this.mutateJob(jobId, (job) =>
                this.ownedBy(job, workerId)
                    ? recordStageFailure(job, stageId, { kind, message, transient, at: new Date() })
                    : null
            );
            if (!recorded.written) {
                return { outcome: 'released', job: recorded.job };
            }

            if (!transient || stage.attempts >= this.options.maxStageAttempts) {
                return { outcome: 'failed', failure: { kind, message, stageId } };
            }

            const delay = computeBackoffDelay(
                stage.attempts,
                this.options.stageRetryInitialBackoffMs,
                this.options.stageRetryMaxBackoffMs
            );
            console.warn(
                `[Worker ${workerId}] ${jobId}/${stageId} attempt ${stage.attempts} failed (${kind}), ` +
                `retrying in ${delay}ms`
            );
            await this.sleep(delay);
        }
    }

    private resolveInputs(job: RenderJob, stage: RenderStage): string[] {
        return stage.inputs.map((input) =>
            input.type === 'media'
                ? input.path
                : this.artifactPath(job.id, getStage(job, input.stageId))
        );
    }

    private artifactPath(jobId: string, stage: RenderStage): string {
        return path.join(this.jobDir(jobId), stage.output);
    }

    private ownedBy(job: RenderJob, workerId: string): boolean {
        return job.status === 'processing' && job.workerId === workerId;
    }

    private async getOwnedJob(jobId: string, ownerId: string): Promise<RenderJob> {
        const job = await this.requireJob(jobId);
        if (job.ownerId !== ownerId) {
            throw new JobAccessError('Forbidden', 'Access denied to this job');
        }
        return job;
    }

    private async requireJob(jobId: string): Promise<RenderJob> {
        const job = await this.deps.repository.get(jobId);
        if (!job) {
            throw new JobAccessError('JobNotFound', `Job not found: ${jobId}`);
        }
        return job;
    }

    /**
     * Read-modify-write with optimistic versioning. `mutate` returning null
     * means nothing needs writing.
     */
    private async mutateJob(
        jobId: string,
        mutate: (job: RenderJob) => RenderJob | null
    ): Promise<{ job: RenderJob; written: boolean }> {
        for (let attempt = 1; ; attempt++) {
            const current = await this.requireJob(jobId);
            const next = mutate(current);
            if (!next) {
                return { job: current, written: false };
            }
            try {
                return { job: await this.deps.repository.update(next), written: true };
            } catch (error) {
                if (!(error instanceof StaleJobVersionError) || attempt >= MAX_WRITE_RETRIES) {
                    throw error;
                }
                console.warn(`[Engine] Version conflict on ${jobId} (attempt ${attempt}), retrying`);
            }
        }
    }
}

