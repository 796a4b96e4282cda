import crypto from 'crypto';
import { ApiKeyRegistry, maskKey } from '../src/application/ApiKeyRegistry';
import { getConfig } from '../src/config';
import { RedisApiKeyStore } from '../src/infrastructure/auth/RedisApiKeyStore';

/**
 * Manages the API keys shared through Redis.
 *
 * Usage:
 *   npm run keys -- list
 *   npm run keys -- add [key]
 *   npm run keys -- remove <key>
 *   npm run keys -- rotate <key> [key...]
 *   npm run keys -- init
 */

function generateKey(): string {
    return `vc_${crypto.randomBytes(24).toString('hex')}`;
}

async function run(registry: ApiKeyRegistry, command: string, args: string[]): Promise<void> {
    switch (command) {
        case 'list': {
            const keys = await registry.list();
            console.log(`🔑 ${keys.length} key(s):`);
            keys.forEach((key) => console.log(`  - ${maskKey(key)}`));
            return;
        }
        case 'add': {
            const key = args[0] ?? generateKey();
            const added = await registry.add(key);
            console.log(added ? `✅ Added key: ${key}` : `⚠️ Key already present: ${maskKey(key)}`);
            return;
        }
        case 'remove': {
            if (!args[0]) {
                throw new Error('remove needs the key to delete');
            }
            const removed = await registry.remove(args[0]);
            console.log(removed ? `🗑️ Removed key: ${maskKey(args[0])}` : `⚠️ Key not found: ${maskKey(args[0])}`);
            return;
        }
        case 'rotate': {
            await registry.rotate(args);
            console.log(`🔄 Key set replaced with ${args.length} key(s)`);
            return;
        }
        case 'init': {
            const count = await registry.initializeFromConfig();
            console.log(`✅ Key store holds ${count} key(s)`);
            return;
        }
        default:
            throw new Error(`Unknown command '${command}'. Use list, add, remove, rotate or init.`);
    }
}

async function main(): Promise<void> {
    const [command = 'list', ...args] = process.argv.slice(2);
    const config = getConfig();
    if (!config.redisUrl) {
        console.error('❌ REDIS_URL is not set; keys come from API_KEYS in this setup.');
        process.exit(1);
    }

    const store = new RedisApiKeyStore(config.redisUrl);
    try {
        await run(new ApiKeyRegistry(store, config.apiKeys), command, args);
    } finally {
        await store.disconnect();
    }
}

main().catch((error) => {
    console.error('💥', error instanceof Error ? error.message : error);
    process.exit(1);
});
