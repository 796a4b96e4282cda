import Redis from 'ioredis';
import { IDispatchQueue } from '../../domain/ports/IDispatchQueue';

export const DISPATCH_QUEUE_KEY = 'video_jobs';

interface QueueMessage {
    job_id: string;
    enqueued_at: string;
}

/**
 * Redis-backed dispatch queue: LPUSH on enqueue, BRPOP on dequeue.
 *
 * BRPOP blocks its connection, so reads use a dedicated client and never
 * hold up enqueue or size calls.
 */
export class RedisDispatchQueue implements IDispatchQueue {
    private readonly client: Redis;
    private readonly blockingClient: Redis;
    private closed = false;

    constructor(redisUrl: string, private readonly key: string = DISPATCH_QUEUE_KEY) {
        const options = {
            retryStrategy: (times: number) => Math.min(times * 50, 2000),
            maxRetriesPerRequest: 3,
        };
        this.client = new Redis(redisUrl, options);
        this.blockingClient = new Redis(redisUrl, { ...options, maxRetriesPerRequest: null });

        this.client.on('error', (err) => {
            console.error('[RedisQueue] Connection error:', err);
        });
        this.blockingClient.on('error', (err) => {
            console.error('[RedisQueue] Blocking connection error:', err);
        });
    }

    async enqueue(jobId: string): Promise<void> {
        const message: QueueMessage = { job_id: jobId, enqueued_at: new Date().toISOString() };
        await this.client.lpush(this.key, JSON.stringify(message));
    }

    async dequeue(timeoutMs: number): Promise<string | null> {
        if (this.closed) {
            return null;
        }
        // BRPOP takes seconds; 0 would block forever
        const timeoutSeconds = Math.max(timeoutMs / 1000, 0.01);
        const result = await this.blockingClient.brpop(this.key, timeoutSeconds);
        if (!result) {
            return null;
        }
        return parseMessage(result[1]);
    }

    async size(): Promise<number> {
        return this.client.llen(this.key);
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.blockingClient.disconnect();
        await this.client.quit();
    }
}

/**
 * Accepts the JSON envelope and bare job ids pushed by other producers.
 */
function parseMessage(raw: string): string | null {
    try {
        const parsed: unknown = JSON.parse(raw);
        if (typeof parsed === 'string' || typeof parsed === 'number') {
            return String(parsed);
        }
        if (typeof parsed === 'object' && parsed !== null && 'job_id' in parsed) {
            const jobId = parsed.job_id;
            if (typeof jobId === 'string' || typeof jobId === 'number') {
                return String(jobId);
            }
        }
        console.warn(`[RedisQueue] Ignoring malformed message: ${raw}`);
        return null;
    } catch {
        return raw.trim() || null;
    }
}
