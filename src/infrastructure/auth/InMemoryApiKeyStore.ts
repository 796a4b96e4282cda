import { IApiKeyStore } from '../../domain/ports/IApiKeyStore';

/**
 * Process-local key store, used when no Redis is configured.
 */
export class InMemoryApiKeyStore implements IApiKeyStore {
    private keys: string[];

    constructor(initialKeys: string[] = []) {
        this.keys = Array.from(new Set(initialKeys));
    }

    async list(): Promise<string[]> {
        return [...this.keys];
    }

    async add(key: string): Promise<boolean> {
        if (this.keys.includes(key)) {
            return false;
        }
        this.keys.push(key);
        return true;
    }

    async remove(key: string): Promise<boolean> {
        const before = this.keys.length;
        this.keys = this.keys.filter((existing) => existing !== key);
        return this.keys.length < before;
    }

    async replaceAll(keys: string[]): Promise<void> {
        this.keys = Array.from(new Set(keys));
    }
}
