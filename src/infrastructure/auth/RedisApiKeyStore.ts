import Redis from 'ioredis';
import { IApiKeyStore } from '../../domain/ports/IApiKeyStore';

export const API_KEYS_KEY = 'api_keys';

// Check and push in one server-side step so concurrent adds cannot both insert
const ADD_IF_ABSENT_SCRIPT = `
if redis.call('LPOS', KEYS[1], ARGV[1]) then
    return 0
end
redis.call('RPUSH', KEYS[1], ARGV[1])
return 1
`;

/**
 * API keys shared by every instance, kept in the Redis list `api_keys`.
 */
export class RedisApiKeyStore implements IApiKeyStore {
    private client: Redis;

    constructor(redisUrl: string, private readonly key: string = API_KEYS_KEY) {
        this.client = new Redis(redisUrl, {
            retryStrategy: (times) => {
                const delay = Math.min(times * 50, 2000);
                return delay;
            },
            maxRetriesPerRequest: 3
        });

        this.client.on('error', (err) => {
            console.error('[RedisApiKeyStore] Connection error:', err);
        });
    }

    async list(): Promise<string[]> {
        return this.client.lrange(this.key, 0, -1);
    }

    async add(key: string): Promise<boolean> {
        const added = await this.client.eval(ADD_IF_ABSENT_SCRIPT, 1, this.key, key);
        return added === 1;
    }

    async remove(key: string): Promise<boolean> {
        const removed = await this.client.lrem(this.key, 0, key);
        return removed > 0;
    }

    async replaceAll(keys: string[]): Promise<void> {
        const pipeline = this.client.multi().del(this.key);
        if (keys.length > 0) {
            pipeline.rpush(this.key, ...keys);
        }
        await pipeline.exec();
    }

    /**
     * Gracefully close the Redis connection.
     */
    async disconnect(): Promise<void> {
        await this.client.quit();
    }
}
