import { RedisDispatchQueue } from '../../../src/infrastructure/queue/RedisDispatchQueue';

const mockClients: MockRedis[] = [];

class MockRedis {
    lpush = jest.fn().mockResolvedValue(1);
    brpop = jest.fn().mockResolvedValue(null);
    llen = jest.fn().mockResolvedValue(0);
    quit = jest.fn().mockResolvedValue('OK');
    disconnect = jest.fn();
    on = jest.fn();

    constructor(
        public readonly url: string,
        public readonly options: Record<string, unknown>
    ) {
        mockClients.push(this);
    }
}

jest.mock('ioredis', () => ({
    __esModule: true,
    default: jest.fn().mockImplementation((url: string, options: Record<string, unknown>) => new MockRedis(url, options)),
}));

describe('RedisDispatchQueue', () => {
    let queue: RedisDispatchQueue;
    let client: MockRedis;
    let blockingClient: MockRedis;

    beforeEach(() => {
        mockClients.length = 0;
        queue = new RedisDispatchQueue('redis://localhost:6379');
        [client, blockingClient] = mockClients;
    });

    it('should open a separate connection for blocking reads', () => {
        expect(mockClients).toHaveLength(2);
        expect(client.options.maxRetriesPerRequest).toBe(3);
        expect(blockingClient.options.maxRetriesPerRequest).toBeNull();
        expect(client.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should push a JSON envelope onto the jobs list', async () => {
        await queue.enqueue('job_1');

        const [key, payload] = client.lpush.mock.calls[0];
        expect(key).toBe('video_jobs');
        expect(JSON.parse(payload)).toEqual({ job_id: 'job_1', enqueued_at: expect.any(String) });
    });

    it('should block in seconds and unwrap the envelope', async () => {
        blockingClient.brpop.mockResolvedValueOnce(['video_jobs', JSON.stringify({ job_id: 'job_1' })]);

        const jobId = await queue.dequeue(2500);

        expect(blockingClient.brpop).toHaveBeenCalledWith('video_jobs', 2.5);
        expect(jobId).toBe('job_1');
    });

    it('should never block forever on a zero timeout', async () => {
        await queue.dequeue(0);

        expect(blockingClient.brpop).toHaveBeenCalledWith('video_jobs', 0.01);
    });

    it('should return null when the wait times out', async () => {
        expect(await queue.dequeue(100)).toBeNull();
    });

    it('should accept bare job ids', async () => {
        blockingClient.brpop.mockResolvedValueOnce(['video_jobs', 'job_plain']);
        blockingClient.brpop.mockResolvedValueOnce(['video_jobs', '42']);

        expect(await queue.dequeue(100)).toBe('job_plain');
        expect(await queue.dequeue(100)).toBe('42');
    });

    it('should skip envelopes without a job id', async () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        blockingClient.brpop.mockResolvedValueOnce(['video_jobs', '{"id":"job_1"}']);

        expect(await queue.dequeue(100)).toBeNull();
        expect(warn).toHaveBeenCalledWith('[RedisQueue] Ignoring malformed message: {"id":"job_1"}');
        warn.mockRestore();
    });

    it('should report the list length as its size', async () => {
        client.llen.mockResolvedValueOnce(7);

        expect(await queue.size()).toBe(7);
        expect(client.llen).toHaveBeenCalledWith('video_jobs');
    });

    it('should close both connections once and stop reading', async () => {
        await queue.close();
        await queue.close();

        expect(blockingClient.disconnect).toHaveBeenCalledTimes(1);
        expect(client.quit).toHaveBeenCalledTimes(1);
        expect(await queue.dequeue(100)).toBeNull();
        expect(blockingClient.brpop).not.toHaveBeenCalled();
    });
});
