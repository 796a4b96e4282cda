import { Router, Request, Response } from 'express';
import { JobLifecycleEngine } from '../../application/JobLifecycleEngine';
import { asyncHandler } from '../middleware/errorHandler';
import { getOwnerId } from '../middleware/apiKeyAuth';

/**
 * Creates composition submission routes with dependency injection.
 */
export function createComposeRoutes(engine: JobLifecycleEngine): Router {
    const router = Router();

    /**
     * POST /compose
     *
     * Validates a composition, resolves its media and queues it for rendering.
     * Invalid compositions are rejected here and never become jobs.
     */
    router.post(
        '/compose',
        asyncHandler(async (req: Request, res: Response) => {
            const receipt = await engine.submit(req.body, getOwnerId(res));
            const title = typeof req.body?.title === 'string' ? req.body.title : 'composition';

            res.status(202).json({
                jobId: receipt.jobId,
                status: receipt.status,
                message: `Video composition job '${title}' has been queued for processing`,
                estimatedSeconds: receipt.estimatedSeconds,
                warnings: receipt.warnings,
            });
        })
    );

    /**
     * GET /compose/queue-status
     *
     * Job counts for the caller plus global queue figures.
     */
    router.get(
        '/compose/queue-status',
        asyncHandler(async (req: Request, res: Response) => {
            const status = await engine.queueStatus(getOwnerId(res));
            res.json({
                userJobs: status.user,
                queue: {
                    pending: status.global.pending,
                    processing: status.global.processing,
                    waiting: status.queueLength,
                },
            });
        })
    );

    return router;
}
