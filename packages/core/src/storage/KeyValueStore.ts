// Key-Value Store
// Minimal async persistence contract used for credentials and recording history

export interface KeyValueStore {
    /** Stored value, or undefined when the key is absent */
    get(key: string): Promise<unknown>;
    set(key: string, value: unknown): Promise<void>;
    remove(key: string): Promise<void>;
}

/**
 * In-process store. Values are structurally cloned on the way in and out,
 * so callers never share references with the store.
 */
export class MemoryKeyValueStore implements KeyValueStore {
    private values: Map<string, unknown> = new Map();

    constructor(initial?: Record<string, unknown>) {
        if (initial) {
            for (const [key, value] of Object.entries(initial)) {
                this.values.set(key, structuredClone(value));
            }
        }
    }

    async get(key: string): Promise<unknown> {
        if (!this.values.has(key)) {
            return undefined;
        }
        return structuredClone(this.values.get(key));
    }

    async set(key: string, value: unknown): Promise<void> {
        this.values.set(key, structuredClone(value));
    }

    async remove(key: string): Promise<void> {
        this.values.delete(key);
    }
}
