// Recording Store
// Persists completed recording sessions, most recent first

import { z } from 'zod';
import type { RecordingSessionRecord } from '@earshot/contracts';
import type { KeyValueStore } from './KeyValueStore.js';

export const RECORDING_SESSIONS_KEY = 'recording_sessions';

export const RecordingSessionRecordSchema = z.object({
    id: z.string().min(1),
    dateTime: z.string().datetime({ offset: true }),
    durationMs: z.number().int().nonnegative(),
    transcript: z.string(),
    audioPath: z.string().nullable(),
});

export class RecordingStore {
    constructor(private readonly store: KeyValueStore) {}

    async saveSession(session: RecordingSessionRecord): Promise<void> {
        const sessions = await this.getSessions();
        await this.write([session, ...sessions]);
    }

    /**
     * All stored sessions. Entries that fail validation are skipped.
     */
    async getSessions(): Promise<RecordingSessionRecord[]> {
        const raw = await this.store.get(RECORDING_SESSIONS_KEY);
        if (!Array.isArray(raw)) {
            return [];
        }

        const sessions: RecordingSessionRecord[] = [];
        for (const entry of raw) {
            const parsed = RecordingSessionRecordSchema.safeParse(entry);
            if (parsed.success) {
                sessions.push(parsed.data);
            } else {
                console.warn('[recordings] Skipping invalid stored session:', parsed.error.issues[0]?.message);
            }
        }
        return sessions;
    }

    async deleteSession(id: string): Promise<void> {
        const sessions = await this.getSessions();
        await this.write(sessions.filter((session) => session.id !== id));
    }

    async clearAll(): Promise<void> {
        await this.store.remove(RECORDING_SESSIONS_KEY);
    }

    private async write(sessions: RecordingSessionRecord[]): Promise<void> {
        await this.store.set(RECORDING_SESSIONS_KEY, sessions);
    }
}
