import { describe, expect, it } from 'vitest';
import { API_KEYS_KEY, KEY_INDEX_KEY, KeyRotationStore } from '../KeyRotationStore.js';
import { MemoryKeyValueStore } from '../../storage/KeyValueStore.js';

async function loadedStore(keys: string[], cursor = 0) {
    const store = new MemoryKeyValueStore({ [API_KEYS_KEY]: keys, [KEY_INDEX_KEY]: cursor });
    const rotation = new KeyRotationStore(store);
    await rotation.load();
    return { store, rotation };
}

describe('KeyRotationStore', () => {
    describe('next', () => {
        it('should hand out keys round-robin', async () => {
            const { rotation } = await loadedStore(['key-a', 'key-b', 'key-c']);

            const handed = [];
            for (let i = 0; i < 4; i++) {
                handed.push(await rotation.next());
            }

            expect(handed).toEqual(['key-a', 'key-b', 'key-c', 'key-a']);
        });

        it('should return every key exactly once over count calls', async () => {
            const { rotation } = await loadedStore(['k1', 'k2', 'k3', 'k4', 'k5'], 3);

            const handed = new Set<string | null>();
            for (let i = 0; i < rotation.count; i++) {
                handed.add(await rotation.next());
            }

            expect(handed).toEqual(new Set(['k1', 'k2', 'k3', 'k4', 'k5']));
            expect(rotation.cursor).toBe(3);
        });

        it('should return null when empty', async () => {
            const { rotation } = await loadedStore([]);
            await expect(rotation.next()).resolves.toBeNull();
        });

        it('should persist the advanced cursor', async () => {
            const { store, rotation } = await loadedStore(['key-a', 'key-b']);

            await rotation.next();

            await expect(store.get(KEY_INDEX_KEY)).resolves.toBe(1);
        });
    });

    describe('add', () => {
        it('should trim and append', async () => {
            const { store, rotation } = await loadedStore(['key-a']);

            await rotation.add('  key-b  ');

            expect(rotation.keys).toEqual(['key-a', 'key-b']);
            await expect(store.get(API_KEYS_KEY)).resolves.toEqual(['key-a', 'key-b']);
        });

        it('should ignore blank and duplicate keys', async () => {
            const { rotation } = await loadedStore(['key-a']);

            await rotation.add('   ');
            await rotation.add('key-a');
            await rotation.add(' key-a ');

            expect(rotation.keys).toEqual(['key-a']);
        });
    });

    describe('remove', () => {
        it('should pull the cursor back when removing the last key at the cursor', async () => {
            const { store, rotation } = await loadedStore(['key-a', 'key-b', 'key-c'], 2);

            await rotation.remove(2);

            expect(rotation.keys).toEqual(['key-a', 'key-b']);
            expect(rotation.cursor).toBe(1);
            await expect(store.get(KEY_INDEX_KEY)).resolves.toBe(1);
            await expect(store.get(API_KEYS_KEY)).resolves.toEqual(['key-a', 'key-b']);
        });

        it('should keep the cursor when it stays in range', async () => {
            const { rotation } = await loadedStore(['key-a', 'key-b', 'key-c'], 1);

            await rotation.remove(0);

            expect(rotation.cursor).toBe(1);
            expect(rotation.currentKey).toBe('key-c');
        });

        it('should reset the cursor to 0 when the list empties', async () => {
            const { rotation } = await loadedStore(['only-key']);

            await rotation.remove(0);

            expect(rotation.hasKeys).toBe(false);
            expect(rotation.cursor).toBe(0);
            expect(rotation.currentKey).toBeNull();
        });

        it('should ignore out-of-range indexes', async () => {
            const { rotation } = await loadedStore(['key-a', 'key-b']);

            await rotation.remove(-1);
            await rotation.remove(2);
            await rotation.remove(0.5);

            expect(rotation.keys).toEqual(['key-a', 'key-b']);
        });
    });

    describe('load', () => {
        it('should seed defaults when storage is empty', async () => {
            const store = new MemoryKeyValueStore();
            const rotation = new KeyRotationStore(store, ['default-a', 'default-b', 'default-a']);

            await rotation.load();

            expect(rotation.keys).toEqual(['default-a', 'default-b']);
            await expect(store.get(API_KEYS_KEY)).resolves.toEqual(['default-a', 'default-b']);
        });

        it('should prefer stored keys over defaults', async () => {
            const store = new MemoryKeyValueStore({ [API_KEYS_KEY]: ['stored-key'] });
            const rotation = new KeyRotationStore(store, ['default-a']);

            await rotation.load();

            expect(rotation.keys).toEqual(['stored-key']);
        });

        it('should reset an out-of-range cursor', async () => {
            const { rotation } = await loadedStore(['key-a', 'key-b'], 5);
            expect(rotation.cursor).toBe(0);
        });

        it('should treat malformed stored values as absent', async () => {
            const store = new MemoryKeyValueStore({ [API_KEYS_KEY]: 'not-a-list', [KEY_INDEX_KEY]: -3 });
            const rotation = new KeyRotationStore(store);

            await rotation.load();

            expect(rotation.count).toBe(0);
            expect(rotation.cursor).toBe(0);
        });

        it('should restore a persisted cursor', async () => {
            const { rotation } = await loadedStore(['key-a', 'key-b', 'key-c'], 2);

            expect(rotation.summary()).toEqual({ count: 3, cursor: 2 });
            await expect(rotation.next()).resolves.toBe('key-c');
        });
    });
});
