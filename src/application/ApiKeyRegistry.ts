import crypto from 'crypto';
import { IApiKeyStore } from '../domain/ports/IApiKeyStore';

const MIN_KEY_LENGTH = 10;

/**
 * Accepted API keys, read from the shared key store with the configured
 * keys as the fallback while the store is empty or unreachable.
 */
export class ApiKeyRegistry {
    private readonly store: IApiKeyStore;
    private readonly staticKeys: string[];

    constructor(store: IApiKeyStore, staticKeys: string[]) {
        this.store = store;
        this.staticKeys = staticKeys;
    }

    /**
     * Seeds an empty store with the configured keys.
     * @returns Number of keys in the store afterwards
     */
    async initializeFromConfig(): Promise<number> {
        const existing = await this.store.list();
        if (existing.length > 0 || this.staticKeys.length === 0) {
            return existing.length;
        }
        await this.store.replaceAll(this.staticKeys);
        console.log(`[ApiKeys] Initialized key store with ${this.staticKeys.length} key(s)`);
        return this.staticKeys.length;
    }

    async isValid(key: string): Promise<boolean> {
        if (!key) {
            return false;
        }
        return (await this.currentKeys()).includes(key);
    }

    async list(): Promise<string[]> {
        return this.currentKeys();
    }

    async add(key: string): Promise<boolean> {
        assertKey(key);
        return this.store.add(key);
    }

    async remove(key: string): Promise<boolean> {
        return this.store.remove(key);
    }

    /**
     * Replaces every key at once.
     */
    async rotate(keys: string[]): Promise<void> {
        const cleaned = Array.from(new Set(keys.map((key) => key.trim()).filter((key) => key.length > 0)));
        if (cleaned.length === 0) {
            throw new Error('Key rotation needs at least one key');
        }
        cleaned.forEach(assertKey);
        await this.store.replaceAll(cleaned);
        console.log(`[ApiKeys] Rotated to ${cleaned.length} key(s)`);
    }

    private async currentKeys(): Promise<string[]> {
        try {
            const stored = await this.store.list();
            return stored.length > 0 ? stored : this.staticKeys;
        } catch (error) {
            console.error('[ApiKeys] Key store unavailable, using configured keys:', error);
            return this.staticKeys;
        }
    }
}

/**
 * Stable, non-reversible owner id for a key. Jobs are scoped by this id.
 */
export function ownerIdForKey(key: string): string {
    return `owner_${crypto.createHash('sha256').update(key).digest('hex').substring(0, 16)}`;
}

/**
 * First characters of a key, for logs.
 */
export function maskKey(key: string): string {
    return `${key.substring(0, Math.min(10, key.length))}...`;
}

function assertKey(key: string): void {
    if (key.trim().length < MIN_KEY_LENGTH) {
        throw new Error(`API keys must be at least ${MIN_KEY_LENGTH} characters long`);
    }
}
