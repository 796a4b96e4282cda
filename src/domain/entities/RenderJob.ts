import { CompositionSpec } from './CompositionSpec';
import { RenderPlan, RenderStage, StageFailure, computePlanProgress } from './RenderPlan';
import { JobAccessError } from '../errors/CompositionErrors';

/**
 * Possible statuses for a RenderJob.
 *
 * pending -> processing -> completed | failed
 * pending | processing -> cancelled
 */
export type RenderJobStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled';

export const JOB_STATUSES: readonly RenderJobStatus[] = ['pending', 'processing', 'completed', 'failed', 'cancelled'];

export function emptyStatusCounts(): Record<RenderJobStatus, number> {
    return { pending: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
}

export interface JobFailure {
    kind: string;
    message: string;
    /** Stage that failed, absent for failures outside stage execution */
    stageId?: string;
}

/**
 * RenderJob is the tracked unit of asynchronous work executing one render plan.
 */
export interface RenderJob {
    id: string;
    /** Opaque owner identifier supplied by the auth layer */
    ownerId: string;
    status: RenderJobStatus;
    /** Incremented on every persisted write; used for compare-and-swap */
    version: number;
    title: string;
    spec: CompositionSpec;
    plan: RenderPlan;
    /** 0-100, from completed stage weights */
    progress: number;
    /** Set by a cancel request while processing; honoured between stages */
    cancelRequested: boolean;
    /** Worker currently holding the job */
    workerId: string | null;
    error: JobFailure | null;
    outputPath: string | null;

    createdAt: Date;
    updatedAt: Date;
    startedAt: Date | null;
    completedAt: Date | null;
}

/**
 * Creates a new RenderJob in the pending state.
 */
export function createRenderJob(
    id: string,
    ownerId: string,
    spec: CompositionSpec,
    plan: RenderPlan
): RenderJob {
    if (!id.trim()) {
        throw new Error('RenderJob id cannot be empty');
    }
    if (!ownerId.trim()) {
        throw new Error('RenderJob ownerId cannot be empty');
    }

    const now = new Date();
    return {
        id: id.trim(),
        ownerId,
        status: 'pending',
        version: 0,
        title: spec.title,
        spec,
        plan,
        progress: 0,
        cancelRequested: false,
        workerId: null,
        error: null,
        outputPath: null,
        createdAt: now,
        updatedAt: now,
        startedAt: null,
        completedAt: null,
    };
}

/**
 * Checks if a job is in a terminal state.
 */
export function isJobTerminal(job: RenderJob): boolean {
    return job.status === 'completed' || job.status === 'failed' || job.status === 'cancelled';
}

/**
 * Worker claims a pending job.
 */
export function claimJob(job: RenderJob, workerId: string): RenderJob {
    assertStatus(job, 'pending', 'claim');
    const now = new Date();
    return {
        ...job,
        status: 'processing',
        workerId,
        startedAt: job.startedAt ?? now,
        updatedAt: now,
    };
}

/**
 * Records the start of an attempt on a stage.
 */
export function recordStageAttempt(job: RenderJob, stageId: string): RenderJob {
    assertStatus(job, 'processing', 'start a stage of');
    return withStage(job, stageId, (stage) => ({ ...stage, attempts: stage.attempts + 1 }));
}

export function recordStageFailure(job: RenderJob, stageId: string, failure: StageFailure): RenderJob {
    assertStatus(job, 'processing', 'record a failure on');
    return withStage(job, stageId, (stage) => ({ ...stage, lastError: failure }));
}

/**
 * Marks a stage done and recomputes progress, which never decreases.
 */
export function completeStage(job: RenderJob, stageId: string): RenderJob {
    assertStatus(job, 'processing', 'complete a stage of');
    const updated = withStage(job, stageId, (stage) => ({ ...stage, status: 'completed', lastError: null }));
    return {
        ...updated,
        progress: Math.max(job.progress, computePlanProgress(updated.plan)),
    };
}

export function completeJob(job: RenderJob, outputPath: string): RenderJob {
    assertStatus(job, 'processing', 'complete');
    const now = new Date();
    return {
        ...job,
        status: 'completed',
        progress: 100,
        outputPath,
        workerId: null,
        updatedAt: now,
        completedAt: now,
    };
}

/**
 * Marks a job as failed. Progress stays where it was.
 */
export function failJob(job: RenderJob, failure: JobFailure): RenderJob {
    if (isJobTerminal(job)) {
        throw new Error(`Cannot fail job ${job.id} in status ${job.status}`);
    }
    const now = new Date();
    return {
        ...job,
        status: 'failed',
        error: failure,
        workerId: null,
        updatedAt: now,
        completedAt: now,
    };
}

/**
 * External cancel request. A pending job is cancelled outright; a processing
 * job is flagged and the worker finishes the cancellation between stages.
 */
export function requestCancellation(job: RenderJob): RenderJob {
    if (isJobTerminal(job) || job.cancelRequested) {
        throw new JobAccessError(
            'InvalidStateForCancel',
            job.cancelRequested && !isJobTerminal(job)
                ? `Job ${job.id} is already being cancelled`
                : `Cannot cancel job with status: ${job.status}`
        );
    }
    if (job.status === 'pending') {
        return finalizeCancellation({ ...job, cancelRequested: true });
    }
    return { ...job, cancelRequested: true, updatedAt: new Date() };
}

/**
 * Moves a flagged job to cancelled. Progress is frozen.
 */
export function finalizeCancellation(job: RenderJob): RenderJob {
    if (isJobTerminal(job)) {
        throw new Error(`Cannot cancel job ${job.id} in status ${job.status}`);
    }
    const now = new Date();
    return {
        ...job,
        status: 'cancelled',
        cancelRequested: true,
        workerId: null,
        error: { kind: 'Cancelled', message: 'Job cancelled by user' },
        updatedAt: now,
        completedAt: now,
    };
}

/**
 * Returns a stalled processing job to the queue. Completed stages are kept so
 * the plan resumes where it stopped.
 */
export function releaseJob(job: RenderJob): RenderJob {
    assertStatus(job, 'processing', 'release');
    return {
        ...job,
        status: 'pending',
        workerId: null,
        updatedAt: new Date(),
    };
}

export function getStage(job: RenderJob, stageId: string): RenderStage {
    const stage = job.plan.stages.find((candidate) => candidate.id === stageId);
    if (!stage) {
        throw new Error(`Job ${job.id} has no stage ${stageId}`);
    }
    return stage;
}

function withStage(job: RenderJob, stageId: string, update: (stage: RenderStage) => RenderStage): RenderJob {
    getStage(job, stageId);
    return {
        ...job,
        plan: {
            ...job.plan,
            stages: job.plan.stages.map((stage) => (stage.id === stageId ? update(stage) : stage)),
        },
        updatedAt: new Date(),
    };
}

function assertStatus(job: RenderJob, expected: RenderJobStatus, action: string): void {
    if (job.status !== expected) {
        throw new Error(`Cannot ${action} job ${job.id} in status ${job.status}`);
    }
}
