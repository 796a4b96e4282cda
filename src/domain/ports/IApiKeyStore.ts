/**
 * IApiKeyStore - Port for the shared registry of accepted API keys.
 */
export interface IApiKeyStore {
    list(): Promise<string[]>;

    /** @returns false when the key was already present */
    add(key: string): Promise<boolean>;

    /** @returns false when the key was not present */
    remove(key: string): Promise<boolean>;

    /** Atomically swaps the whole key set */
    replaceAll(keys: string[]): Promise<void>;
}
