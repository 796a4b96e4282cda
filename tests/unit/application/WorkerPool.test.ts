import { WorkerPool } from '../../../src/application/WorkerPool';
import { RenderJob } from '../../../src/domain/entities/RenderJob';
import { IDispatchQueue } from '../../../src/domain/ports/IDispatchQueue';
import { InMemoryDispatchQueue } from '../../../src/infrastructure/queue/InMemoryDispatchQueue';
import { deferred, waitFor } from '../../helpers/async';

describe('WorkerPool', () => {
    let queue: InMemoryDispatchQueue;
    let processJob: jest.Mock<Promise<RenderJob | null>, [string, string]>;
    let pool: WorkerPool | null;

    beforeEach(() => {
        queue = new InMemoryDispatchQueue();
        processJob = jest.fn<Promise<RenderJob | null>, [string, string]>().mockResolvedValue(null);
        pool = null;
    });

    afterEach(async () => {
        if (pool) {
            await pool.stop();
        }
        await queue.close();
    });

    function startPool(concurrency: number, source: IDispatchQueue = queue): WorkerPool {
        pool = new WorkerPool({ processJob }, source, { concurrency, pollIntervalMs: 20, name: 'test' });
        pool.start();
        return pool;
    }

    it('should reject a concurrency below one', () => {
        expect(() => new WorkerPool({ processJob }, queue, { concurrency: 0, pollIntervalMs: 20 }))
            .toThrow('WorkerPool concurrency must be at least 1');
    });

    it('should hand queued jobs to the engine', async () => {
        await queue.enqueue('job_1');
        await queue.enqueue('job_2');

        startPool(1);
        await waitFor(() => processJob.mock.calls.length === 2);

        expect(processJob.mock.calls).toEqual([['job_1', 'test-1'], ['job_2', 'test-1']]);
    });

    it('should run up to `concurrency` jobs at once', async () => {
        const gate = deferred<RenderJob | null>();
        processJob.mockReturnValue(gate.promise);
        const workers = startPool(2);

        await queue.enqueue('job_1');
        await queue.enqueue('job_2');
        await waitFor(() => processJob.mock.calls.length === 2);

        expect(workers.getActiveJobIds().sort()).toEqual(['job_1', 'job_2']);
        expect(processJob.mock.calls.map(([, workerId]) => workerId).sort()).toEqual(['test-1', 'test-2']);
        gate.resolve(null);
    });

    it('should hold back a duplicate of a running job and re-enqueue it when the run ends', async () => {
        const gate = deferred<RenderJob | null>();
        processJob.mockReturnValueOnce(gate.promise);
        startPool(2);

        await queue.enqueue('job_1');
        await queue.enqueue('job_1');
        await new Promise((resolve) => setTimeout(resolve, 30));

        expect(processJob).toHaveBeenCalledTimes(1);
        expect(await queue.size()).toBe(0);

        gate.resolve(null);
        await waitFor(() => processJob.mock.calls.length === 2);

        expect(processJob.mock.calls.map(([jobId]) => jobId)).toEqual(['job_1', 'job_1']);
    });

    it('should keep going after a job throws', async () => {
        processJob.mockRejectedValueOnce(new Error('boom'));
        await queue.enqueue('job_1');
        await queue.enqueue('job_2');

        startPool(1);
        await waitFor(() => processJob.mock.calls.length === 2);

        expect(processJob.mock.calls[1][0]).toBe('job_2');
    });

    it('should keep polling after the queue fails', async () => {
        const flaky: IDispatchQueue = {
            enqueue: jest.fn(),
            size: jest.fn().mockResolvedValue(0),
            close: jest.fn(),
            dequeue: jest.fn()
                .mockRejectedValueOnce(new Error('connection lost'))
                .mockResolvedValueOnce('job_9')
                .mockImplementation(() => new Promise((resolve) => setTimeout(() => resolve(null), 5))),
        };

        startPool(1, flaky);
        await waitFor(() => processJob.mock.calls.length === 1);

        expect(processJob).toHaveBeenCalledWith('job_9', 'test-1');
    });

    it('should wait for running jobs when stopped', async () => {
        const gate = deferred<RenderJob | null>();
        processJob.mockReturnValue(gate.promise);
        const workers = startPool(1);
        await queue.enqueue('job_1');
        await waitFor(() => processJob.mock.calls.length === 1);

        let stopped = false;
        const stopping = workers.stop().then(() => {
            stopped = true;
        });
        await new Promise((resolve) => setTimeout(resolve, 30));
        expect(stopped).toBe(false);
        expect(workers.isRunning()).toBe(false);

        gate.resolve(null);
        await stopping;
        expect(stopped).toBe(true);
        expect(workers.getActiveJobIds()).toEqual([]);
    });
});
