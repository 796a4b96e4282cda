import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { Application } from 'express';
import { PassThrough } from 'stream';
import { ApiKeyRegistry } from '../../../src/application/ApiKeyRegistry';
import { CompositionPlanner } from '../../../src/application/CompositionPlanner';
import { JobLifecycleEngine } from '../../../src/application/JobLifecycleEngine';
import { MediaReferenceResolver } from '../../../src/application/MediaReferenceResolver';
import { StageInstructions } from '../../../src/domain/ports/IRenderEngine';
import { InMemoryApiKeyStore } from '../../../src/infrastructure/auth/InMemoryApiKeyStore';
import { FileJobRepository } from '../../../src/infrastructure/persistence/FileJobRepository';
import { InMemoryDispatchQueue } from '../../../src/infrastructure/queue/InMemoryDispatchQueue';
import { createApp } from '../../../src/presentation/app';
import { streamOutput } from '../../../src/presentation/routes/jobRoutes';
import { twoSceneComposition } from '../../helpers/compositions';

const API_KEY = 'test-secret-key';
const OTHER_KEY = 'test-secret-other';
const AUTH = `Bearer ${API_KEY}`;

describe('HTTP API', () => {
    let workDir: string;
    let queue: InMemoryDispatchQueue;
    let engine: JobLifecycleEngine;
    let app: Application;

    const submit = async (): Promise<string> => {
        const response = await request(app).post('/compose').set('Authorization', AUTH).send(twoSceneComposition());
        return response.body.jobId;
    };

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-test-'));
        queue = new InMemoryDispatchQueue();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });

        const resolver = new MediaReferenceResolver(
            {
                resolve: jest.fn().mockImplementation(async (fileId: string) => ({
                    fileId,
                    path: `/uploads/${fileId}`,
                    mediaType: fileId.endsWith('.mp4') ? 'video' : 'image',
                    sizeBytes: 2048,
                })),
            },
            { fetch: jest.fn() },
            { probeDurationSeconds: jest.fn().mockResolvedValue(30) },
            { remoteFetchMaxBytes: 1024, allowedRemoteDomains: [] }
        );
        const planner = new CompositionPlanner(resolver, { defaultSceneDurationSeconds: 5, timePrecisionDigits: 6 });
        const renderEngine = {
            execute: jest.fn().mockImplementation(async ({ outputPath }: StageInstructions) => {
                await fs.promises.writeFile(outputPath, 'data');
                return outputPath;
            }),
        };

        engine = new JobLifecycleEngine(
            { planner, repository: new FileJobRepository(), queue, renderEngine },
            {
                workDir,
                maxStageAttempts: 3,
                stageRetryInitialBackoffMs: 1,
                stageRetryMaxBackoffMs: 1,
                sleep: jest.fn().mockResolvedValue(undefined),
            }
        );
        app = createApp({
            engine,
            apiKeyRegistry: new ApiKeyRegistry(new InMemoryApiKeyStore(), [API_KEY, OTHER_KEY]),
        });
    });

    afterEach(async () => {
        await queue.close();
        fs.rmSync(workDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    describe('GET /health', () => {
        it('should answer without an API key', async () => {
            const response = await request(app).get('/health');

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ status: 'ok', timestamp: expect.any(String), version: '1.0.0' });
        });
    });

    describe('authentication', () => {
        it('should reject requests without a bearer token', async () => {
            const response = await request(app).post('/compose').send(twoSceneComposition());

            expect(response.status).toBe(401);
            expect(response.headers['www-authenticate']).toBe('Bearer');
            expect(response.body).toEqual({
                error: { message: 'Missing authorization header', code: 'UnauthorizedError' },
            });
        });

        it('should reject unknown keys', async () => {
            const response = await request(app).get('/jobs').set('Authorization', 'Bearer test-secret-wrong');

            expect(response.status).toBe(401);
            expect(response.body.error.message).toBe('Invalid API key');
        });
    });

    describe('POST /compose', () => {
        it('should accept a valid composition', async () => {
            const response = await request(app).post('/compose').set('Authorization', AUTH).send(twoSceneComposition());

            expect(response.status).toBe(202);
            expect(response.body).toEqual({
                jobId: expect.stringMatching(/^job_[0-9a-f]{8}$/),
                status: 'pending',
                message: "Video composition job 'Test Composition' has been queued for processing",
                estimatedSeconds: 65,
                warnings: [],
            });
            expect(await queue.size()).toBe(1);
        });

        it('should reject an invalid composition without creating a job', async () => {
            const response = await request(app)
                .post('/compose')
                .set('Authorization', AUTH)
                .send({ title: 'Empty', scenes: [] });

            expect(response.status).toBe(400);
            expect(response.body.error.code).toBe('MalformedSpec');
            expect(response.body.error.details).toEqual(['/scenes must NOT have fewer than 1 items']);
            expect(await queue.size()).toBe(0);
        });

        it('should reject a body that is not JSON', async () => {
            const response = await request(app)
                .post('/compose')
                .set('Authorization', AUTH)
                .set('Content-Type', 'application/json')
                .send('{"title":');

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                error: { message: 'Request body is not valid JSON', code: 'MalformedSpec' },
            });
        });
    });

    describe('GET /compose/queue-status', () => {
        it('should combine the caller\'s counts with global figures', async () => {
            await submit();
            await request(app).post('/compose').set('Authorization', `Bearer ${OTHER_KEY}`).send(twoSceneComposition());

            const response = await request(app).get('/compose/queue-status').set('Authorization', AUTH);

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                userJobs: { pending: 1, processing: 0, completed: 0, failed: 0, cancelled: 0 },
                queue: { pending: 2, processing: 0, waiting: 2 },
            });
        });
    });

    describe('GET /jobs', () => {
        it('should list the caller\'s jobs', async () => {
            await submit();
            const jobId = await submit();

            const response = await request(app).get('/jobs?limit=1').set('Authorization', AUTH);

            expect(response.status).toBe(200);
            expect(response.body.total).toBe(2);
            expect(response.body.count).toBe(1);
            expect(response.body.jobs[0]).toEqual({
                jobId,
                title: 'Test Composition',
                status: 'pending',
                progress: 0,
                createdAt: expect.any(String),
                updatedAt: expect.any(String),
                startedAt: null,
                completedAt: null,
                error: null,
            });
        });

        it('should filter by status', async () => {
            await submit();

            const response = await request(app).get('/jobs?status=completed').set('Authorization', AUTH);

            expect(response.body).toEqual({ total: 0, count: 0, jobs: [] });
        });

        it('should validate query parameters', async () => {
            const badStatus = await request(app).get('/jobs?status=done').set('Authorization', AUTH);
            const badLimit = await request(app).get('/jobs?limit=0').set('Authorization', AUTH);

            expect(badStatus.status).toBe(400);
            expect(badStatus.body.error.message).toBe(
                'status must be one of: pending, processing, completed, failed, cancelled'
            );
            expect(badLimit.status).toBe(400);
            expect(badLimit.body.error.message).toBe('limit must be an integer between 1 and 100');
        });
    });

    describe('GET /jobs/:jobId', () => {
        it('should describe a job stage by stage', async () => {
            const jobId = await submit();

            const response = await request(app).get(`/jobs/${jobId}`).set('Authorization', AUTH);

            expect(response.status).toBe(200);
            expect(response.body.durationSeconds).toBe(14);
            expect(response.body.cancelRequested).toBe(false);
            expect(response.body.downloadUrl).toBeUndefined();
            expect(response.body.stages.map((stage: { id: string }) => stage.id)).toEqual([
                'scene-0',
                'scene-1',
                'blend-0-1',
                'final-encode',
            ]);
            expect(response.body.stages[0]).toEqual({
                id: 'scene-0',
                kind: 'scene-render',
                status: 'pending',
                attempts: 0,
                lastError: null,
            });
        });

        it('should not show a job to another key', async () => {
            const jobId = await submit();

            const response = await request(app).get(`/jobs/${jobId}`).set('Authorization', `Bearer ${OTHER_KEY}`);

            expect(response.status).toBe(403);
            expect(response.body.error.code).toBe('Forbidden');
        });

        it('should report unknown jobs', async () => {
            const response = await request(app).get('/jobs/job_missing').set('Authorization', AUTH);

            expect(response.status).toBe(404);
            expect(response.body.error).toEqual({ message: 'Job not found: job_missing', code: 'JobNotFound' });
        });
    });

    describe('DELETE /jobs/:jobId', () => {
        it('should cancel a pending job once', async () => {
            const jobId = await submit();

            const first = await request(app).delete(`/jobs/${jobId}`).set('Authorization', AUTH);
            const second = await request(app).delete(`/jobs/${jobId}`).set('Authorization', AUTH);

            expect(first.status).toBe(200);
            expect(first.body).toEqual({
                jobId,
                status: 'cancelled',
                cancelRequested: true,
                message: `Job ${jobId} has been cancelled`,
            });
            expect(second.status).toBe(409);
            expect(second.body.error).toEqual({
                message: 'Cannot cancel job with status: cancelled',
                code: 'InvalidStateForCancel',
            });
        });
    });

    describe('GET /download/:jobId', () => {
        it('should refuse jobs that are not complete', async () => {
            const jobId = await submit();

            const response = await request(app).get(`/download/${jobId}`).set('Authorization', AUTH);

            expect(response.status).toBe(409);
            expect(response.body.error).toEqual({
                message: 'Job is not completed. Current status: pending',
                code: 'NotReady',
            });
        });

        it('should stream the rendered video', async () => {
            const jobId = await submit();
            await engine.processJob(jobId, 'worker-1');

            const status = await request(app).get(`/jobs/${jobId}`).set('Authorization', AUTH);
            const response = await request(app).get(`/download/${jobId}`).set('Authorization', AUTH);

            expect(status.body.status).toBe('completed');
            expect(status.body.progress).toBe(100);
            expect(status.body.downloadUrl).toBe(`/download/${jobId}`);
            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toBe('video/mp4');
            expect(response.headers['content-length']).toBe('4');
            expect(response.headers['content-disposition']).toBe(`attachment; filename=video_${jobId}.mp4`);
            expect(response.headers['cache-control']).toBe('no-cache');
            expect(Buffer.from(response.body).toString()).toBe('data');
        });

        it('should close the file stream when the client goes away mid-download', async () => {
            const file = new PassThrough();
            const client = new PassThrough();
            file.write('partial');

            const transfer = streamOutput('job_1', { openStream: () => file }, client);
            client.destroy();

            expect(await transfer).toBe(false);
            expect(file.destroyed).toBe(true);
        });

        it('should report a transfer that reached the end', async () => {
            const file = new PassThrough();
            const client = new PassThrough();
            const received: Buffer[] = [];
            client.on('data', (chunk: Buffer) => received.push(chunk));
            file.end('data');

            expect(await streamOutput('job_1', { openStream: () => file }, client)).toBe(true);
            expect(Buffer.concat(received).toString()).toBe('data');
        });
    });

    describe('unknown routes', () => {
        it('should answer with a not-found error', async () => {
            const response = await request(app).get('/nowhere').set('Authorization', AUTH);

            expect(response.status).toBe(404);
            expect(response.body.error).toEqual({ message: 'Route not found: GET /nowhere', code: 'NotFoundError' });
        });
    });
});
