import { Router, Request, Response } from 'express';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { JobLifecycleEngine, JobOutput } from '../../application/JobLifecycleEngine';
import { JOB_STATUSES, RenderJob, RenderJobStatus } from '../../domain/entities/RenderJob';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';
import { getOwnerId } from '../middleware/apiKeyAuth';

/**
 * Creates job status routes with dependency injection.
 */
export function createJobRoutes(engine: JobLifecycleEngine): Router {
    const router = Router();

    /**
     * GET /jobs
     *
     * Lists the caller's jobs, newest first. `total` counts every matching
     * job, `count` the ones on this page.
     * Query: status, limit (1-100, default 10), offset (default 0)
     */
    router.get(
        '/jobs',
        asyncHandler(async (req: Request, res: Response) => {
            const ownerId = getOwnerId(res);
            const status = parseStatus(req.query.status);
            const [jobs, total] = await Promise.all([
                engine.listJobs(ownerId, {
                    status,
                    limit: parseInteger(req.query.limit, 'limit', 1, 100),
                    offset: parseInteger(req.query.offset, 'offset', 0, Number.MAX_SAFE_INTEGER),
                }),
                engine.countJobs(ownerId, status),
            ]);

            res.json({
                total,
                count: jobs.length,
                jobs: jobs.map(toSummary),
            });
        })
    );

    /**
     * GET /jobs/:jobId
     *
     * Returns the current status, progress and per-stage state of a job.
     */
    router.get(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const job = await engine.getStatus(req.params.jobId, getOwnerId(res));
            res.json(toDetail(job));
        })
    );

    /**
     * DELETE /jobs/:jobId
     *
     * Cancels a pending job, or asks the worker to stop a processing one after
     * its current stage.
     */
    router.delete(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const job = await engine.cancel(req.params.jobId, getOwnerId(res));
            res.json({
                jobId: job.id,
                status: job.status,
                cancelRequested: job.cancelRequested,
                message: job.status === 'cancelled'
                    ? `Job ${job.id} has been cancelled`
                    : `Job ${job.id} will be cancelled after its current stage`,
            });
        })
    );

    /**
     * GET /download/:jobId
     *
     * Streams the rendered video of a completed job.
     */
    router.get(
        '/download/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const output = await engine.getOutput(req.params.jobId, getOwnerId(res));

            res.setHeader('Content-Type', output.contentType);
            res.setHeader('Content-Length', String(output.sizeBytes));
            res.setHeader('Content-Disposition', `attachment; filename=${output.filename}`);
            res.setHeader('Cache-Control', 'no-cache');

            await streamOutput(req.params.jobId, output, res);
        })
    );

    return router;
}

/**
 * Copies a finished video to the client. Either side closing early destroys
 * both streams, so the file handle never outlives the request.
 * @returns false when the transfer stopped before the end
 */
export async function streamOutput(
    jobId: string,
    output: Pick<JobOutput, 'openStream'>,
    destination: Writable
): Promise<boolean> {
    try {
        await pipeline(output.openStream(), destination);
        return true;
    } catch (error) {
        // The response was destroyed with the file stream, so nothing more can be sent
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Download] Transfer of ${jobId} stopped early: ${reason}`);
        return false;
    }
}

function toSummary(job: RenderJob): Record<string, unknown> {
    return {
        jobId: job.id,
        title: job.title,
        status: job.status,
        progress: job.progress,
        createdAt: job.createdAt.toISOString(),
        updatedAt: job.updatedAt.toISOString(),
        startedAt: job.startedAt?.toISOString() ?? null,
        completedAt: job.completedAt?.toISOString() ?? null,
        error: job.error,
    };
}

function toDetail(job: RenderJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        ...toSummary(job),
        cancelRequested: job.cancelRequested,
        durationSeconds: job.plan.totalDurationSeconds,
        warnings: job.plan.warnings,
        stages: job.plan.stages.map((stage) => ({
            id: stage.id,
            kind: stage.kind,
            status: stage.status,
            attempts: stage.attempts,
            lastError: stage.lastError ? { kind: stage.lastError.kind, message: stage.lastError.message } : null,
        })),
    };

    if (job.status === 'completed') {
        response.downloadUrl = `/download/${job.id}`;
    }
    return response;
}

function parseStatus(value: unknown): RenderJobStatus | undefined {
    if (value === undefined || value === '') {
        return undefined;
    }
    const status = JOB_STATUSES.find((candidate) => candidate === value);
    if (!status) {
        throw new BadRequestError(`status must be one of: ${JOB_STATUSES.join(', ')}`);
    }
    return status;
}

function parseInteger(value: unknown, name: string, min: number, max: number): number | undefined {
    if (value === undefined || value === '') {
        return undefined;
    }
    const parsed = typeof value === 'string' ? Number(value) : NaN;
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        throw new BadRequestError(`${name} must be an integer between ${min} and ${max}`);
    }
    return parsed;
}
