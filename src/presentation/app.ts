import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { ApiKeyRegistry } from '../application/ApiKeyRegistry';
import { CompositionPlanner } from '../application/CompositionPlanner';
import { JobLifecycleEngine } from '../application/JobLifecycleEngine';
import { JobRecoveryService } from '../application/JobRecoveryService';
import { MediaReferenceResolver } from '../application/MediaReferenceResolver';
import { WorkerPool } from '../application/WorkerPool';
import { IApiKeyStore } from '../domain/ports/IApiKeyStore';
import { IDispatchQueue } from '../domain/ports/IDispatchQueue';
import { IJobRepository } from '../domain/ports/IJobRepository';

// Infrastructure imports
import { InMemoryApiKeyStore } from '../infrastructure/auth/InMemoryApiKeyStore';
import { RedisApiKeyStore } from '../infrastructure/auth/RedisApiKeyStore';
import { FileJobRepository } from '../infrastructure/persistence/FileJobRepository';
import { InMemoryDispatchQueue } from '../infrastructure/queue/InMemoryDispatchQueue';
import { RedisDispatchQueue } from '../infrastructure/queue/RedisDispatchQueue';
import { HttpRemoteFetcher } from '../infrastructure/storage/HttpRemoteFetcher';
import { LocalUploadStore } from '../infrastructure/storage/LocalUploadStore';
import { FFmpegRenderEngine } from '../infrastructure/video/FFmpegRenderEngine';
import { FfprobeMediaProber } from '../infrastructure/video/FfprobeMediaProber';

// Route imports
import { createComposeRoutes } from './routes/composeRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { requireApiKey } from './middleware/apiKeyAuth';
import { NotFoundError, errorHandler } from './middleware/errorHandler';

export interface AppDependencies {
    engine: JobLifecycleEngine;
    apiKeyRegistry: ApiKeyRegistry;
}

export interface ServiceContainer extends AppDependencies {
    repository: IJobRepository;
    queue: IDispatchQueue;
    workerPool: WorkerPool;
    recovery: JobRecoveryService;
    /** Releases connections held by the queue and key store */
    close(): Promise<void>;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(deps: AppDependencies): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Routes
    app.use(requireApiKey(deps.apiKeyRegistry));
    app.use(createComposeRoutes(deps.engine));
    app.use(createJobRoutes(deps.engine));
    app.use((req: Request) => {
        throw new NotFoundError(`Route not found: ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 * Redis backs the queue and key store when REDIS_URL is set; otherwise both
 * live in this process.
 */
export function createDependencies(config: Config): ServiceContainer {
    const repository = new FileJobRepository(config.jobStorePath);
    const { queue, keyStore, disconnectKeyStore } = createSharedState(config);

    const resolver = new MediaReferenceResolver(
        new LocalUploadStore(config.uploadDir),
        new HttpRemoteFetcher({
            downloadDir: config.downloadDir,
            timeoutMs: config.remoteFetchTimeoutMs,
        }),
        new FfprobeMediaProber(),
        {
            remoteFetchMaxBytes: config.remoteFetchMaxBytes,
            allowedRemoteDomains: config.allowedRemoteDomains,
        }
    );
    const planner = new CompositionPlanner(resolver, {
        defaultSceneDurationSeconds: config.defaultSceneDurationSeconds,
        timePrecisionDigits: config.timePrecisionDigits,
    });

    const engine = new JobLifecycleEngine(
        {
            planner,
            repository,
            queue,
            renderEngine: new FFmpegRenderEngine({ timeoutMs: config.stageTimeoutMs }),
        },
        {
            workDir: config.workDir,
            maxStageAttempts: config.maxStageAttempts,
            stageRetryInitialBackoffMs: config.stageRetryInitialBackoffMs,
            stageRetryMaxBackoffMs: config.stageRetryMaxBackoffMs,
        }
    );

    const workerPool = new WorkerPool(engine, queue, {
        concurrency: config.workerConcurrency,
        pollIntervalMs: config.queuePollIntervalMs,
    });

    return {
        engine,
        apiKeyRegistry: new ApiKeyRegistry(keyStore, config.apiKeys),
        repository,
        queue,
        workerPool,
        recovery: new JobRecoveryService(repository, queue),
        close: async () => {
            await queue.close();
            await disconnectKeyStore();
        },
    };
}

function createSharedState(config: Config): {
    queue: IDispatchQueue;
    keyStore: IApiKeyStore;
    disconnectKeyStore: () => Promise<void>;
} {
    if (config.redisUrl) {
        console.log('📦 Using Redis for the dispatch queue and API keys');
        const keyStore = new RedisApiKeyStore(config.redisUrl);
        return {
            queue: new RedisDispatchQueue(config.redisUrl),
            keyStore,
            disconnectKeyStore: () => keyStore.disconnect(),
        };
    }

    console.log('📦 Using in-process dispatch queue and API keys');
    return {
        queue: new InMemoryDispatchQueue(),
        keyStore: new InMemoryApiKeyStore(),
        disconnectKeyStore: async () => undefined,
    };
}
