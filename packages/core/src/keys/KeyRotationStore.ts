// Key Rotation Store
// Ordered set of transcription API keys handed out round-robin, one per session

import { z } from 'zod';
import type { KeyRingSummary } from '@earshot/contracts';
import type { KeyValueStore } from '../storage/KeyValueStore.js';

export const API_KEYS_KEY = 'transcription_api_keys';
export const KEY_INDEX_KEY = 'transcription_key_index';

const StoredKeysSchema = z.array(z.string());
const StoredIndexSchema = z.number().int().nonnegative();

export class KeyRotationStore {
    private apiKeys: string[] = [];
    private currentIndex = 0;

    /**
     * @param defaults keys seeded on load when storage holds none. Supplied by the
     * embedding application's configuration, never compiled in.
     */
    constructor(
        private readonly store: KeyValueStore,
        private readonly defaults: readonly string[] = []
    ) {}

    get keys(): readonly string[] {
        return [...this.apiKeys];
    }

    get count(): number {
        return this.apiKeys.length;
    }

    get hasKeys(): boolean {
        return this.apiKeys.length > 0;
    }

    get cursor(): number {
        return this.currentIndex;
    }

    /** Key at the cursor, without rotating */
    get currentKey(): string | null {
        return this.apiKeys[this.currentIndex] ?? null;
    }

    summary(): KeyRingSummary {
        return { count: this.count, cursor: this.currentIndex };
    }

    /**
     * Key at the cursor; advances the cursor for the next session and persists it.
     */
    async next(): Promise<string | null> {
        if (this.apiKeys.length === 0) return null;

        const key = this.apiKeys[this.currentIndex];
        this.currentIndex = (this.currentIndex + 1) % this.apiKeys.length;
        await this.saveIndex();
        return key;
    }

    async add(key: string): Promise<void> {
        const trimmed = key.trim();
        if (!trimmed) return;
        if (this.apiKeys.includes(trimmed)) return;

        this.apiKeys.push(trimmed);
        await this.saveKeys();
    }

    async remove(index: number): Promise<void> {
        if (!Number.isInteger(index) || index < 0 || index >= this.apiKeys.length) return;

        this.apiKeys.splice(index, 1);

        if (this.currentIndex >= this.apiKeys.length) {
            this.currentIndex = this.apiKeys.length === 0 ? 0 : this.apiKeys.length - 1;
        }

        await this.saveKeys();
        await this.saveIndex();
    }

    /**
     * Restore keys and cursor. Seeds the configured defaults when storage is empty.
     */
    async load(): Promise<void> {
        const storedKeys = StoredKeysSchema.safeParse(await this.store.get(API_KEYS_KEY));
        const storedIndex = StoredIndexSchema.safeParse(await this.store.get(KEY_INDEX_KEY));

        this.apiKeys = storedKeys.success ? storedKeys.data : [];
        this.currentIndex = storedIndex.success ? storedIndex.data : 0;

        if (this.apiKeys.length === 0) {
            for (const key of this.defaults) {
                await this.add(key);
            }
        }

        if (this.currentIndex >= this.apiKeys.length) {
            this.currentIndex = 0;
        }
    }

    private async saveKeys(): Promise<void> {
        await this.store.set(API_KEYS_KEY, [...this.apiKeys]);
    }

    private async saveIndex(): Promise<void> {
        await this.store.set(KEY_INDEX_KEY, this.currentIndex);
    }
}
