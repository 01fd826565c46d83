// Key-value persistence on window.localStorage, values stored as JSON

import type { KeyValueStore } from '@earshot/core';

export interface StringStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
}

export const DEFAULT_STORAGE_PREFIX = 'earshot:';

export class LocalStorageStore implements KeyValueStore {
    constructor(
        private readonly storage: StringStorage = window.localStorage,
        private readonly prefix: string = DEFAULT_STORAGE_PREFIX
    ) {}

    async get(key: string): Promise<unknown> {
        const raw = this.storage.getItem(this.prefix + key);
        if (raw === null) {
            return undefined;
        }

        try {
            const value: unknown = JSON.parse(raw);
            return value;
        } catch (error) {
            console.warn(`[storage] Ignoring unreadable value for ${key}:`, error);
            return undefined;
        }
    }

    async set(key: string, value: unknown): Promise<void> {
        this.storage.setItem(this.prefix + key, JSON.stringify(value));
    }

    async remove(key: string): Promise<void> {
        this.storage.removeItem(this.prefix + key);
    }
}
