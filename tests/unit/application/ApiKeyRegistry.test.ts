import { ApiKeyRegistry, maskKey, ownerIdForKey } from '../../../src/application/ApiKeyRegistry';
import { IApiKeyStore } from '../../../src/domain/ports/IApiKeyStore';
import { InMemoryApiKeyStore } from '../../../src/infrastructure/auth/InMemoryApiKeyStore';
import { captureAsyncError } from '../../helpers/compositions';

const STATIC_KEYS = ['test-secret-one', 'test-secret-two'];

describe('ApiKeyRegistry', () => {
    let store: InMemoryApiKeyStore;
    let registry: ApiKeyRegistry;

    beforeEach(() => {
        store = new InMemoryApiKeyStore();
        registry = new ApiKeyRegistry(store, STATIC_KEYS);
    });

    describe('initializeFromConfig', () => {
        it('should seed an empty store with the configured keys', async () => {
            expect(await registry.initializeFromConfig()).toBe(2);
            expect(await store.list()).toEqual(STATIC_KEYS);
        });

        it('should leave a populated store untouched', async () => {
            await store.add('test-secret-stored');

            expect(await registry.initializeFromConfig()).toBe(1);
            expect(await store.list()).toEqual(['test-secret-stored']);
        });
    });

    describe('isValid', () => {
        it('should fall back to the configured keys while the store is empty', async () => {
            expect(await registry.isValid('test-secret-one')).toBe(true);
            expect(await registry.isValid('test-secret-unknown')).toBe(false);
        });

        it('should only accept stored keys once the store has any', async () => {
            await store.add('test-secret-stored');

            expect(await registry.isValid('test-secret-stored')).toBe(true);
            expect(await registry.isValid('test-secret-one')).toBe(false);
        });

        it('should reject an empty key', async () => {
            expect(await registry.isValid('')).toBe(false);
        });

        it('should use the configured keys when the store is unreachable', async () => {
            const broken: IApiKeyStore = {
                list: jest.fn().mockRejectedValue(new Error('connection refused')),
                add: jest.fn(),
                remove: jest.fn(),
                replaceAll: jest.fn(),
            };
            const fallback = new ApiKeyRegistry(broken, STATIC_KEYS);

            expect(await fallback.isValid('test-secret-two')).toBe(true);
        });
    });

    describe('management', () => {
        it('should add and remove keys', async () => {
            expect(await registry.add('test-secret-new')).toBe(true);
            expect(await registry.add('test-secret-new')).toBe(false);
            expect(await registry.remove('test-secret-new')).toBe(true);
            expect(await registry.remove('test-secret-new')).toBe(false);
        });

        it('should reject short keys', async () => {
            const error = await captureAsyncError(() => registry.add('short'));

            expect(error).toEqual(new Error('API keys must be at least 10 characters long'));
        });

        it('should rotate to a cleaned, de-duplicated key set', async () => {
            await registry.rotate([' test-secret-a1 ', 'test-secret-a1', '', 'test-secret-b2']);

            expect(await registry.list()).toEqual(['test-secret-a1', 'test-secret-b2']);
        });

        it('should refuse to rotate to no keys', async () => {
            const error = await captureAsyncError(() => registry.rotate(['  ']));

            expect(error).toEqual(new Error('Key rotation needs at least one key'));
        });
    });

    describe('helpers', () => {
        it('should derive a stable owner id per key', () => {
            const owner = ownerIdForKey('test-secret-one');

            expect(owner).toMatch(/^owner_[0-9a-f]{16}$/);
            expect(ownerIdForKey('test-secret-one')).toBe(owner);
            expect(ownerIdForKey('test-secret-two')).not.toBe(owner);
        });

        it('should mask keys for logs', () => {
            expect(maskKey('test-secret-one')).toBe('test-secre...');
            expect(maskKey('abc')).toBe('abc...');
        });
    });
});
