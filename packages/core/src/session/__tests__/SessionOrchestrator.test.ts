import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TranscriberSnapshot } from '@earshot/contracts';
import { KeyRotationStore } from '../../keys/KeyRotationStore.js';
import { MemoryKeyValueStore } from '../../storage/KeyValueStore.js';
import { RecordingStore } from '../../storage/RecordingStore.js';
import { TranscriptionSession } from '../../transcription/TranscriptionSession.js';
import { SessionOrchestrator } from '../SessionOrchestrator.js';
import {
    FakeCaptureBackend,
    FakeConnector,
    FlakyStore,
    STREAMING_URL,
    TOKEN_URL,
    failingTokenFetch,
    tokenFetch,
} from '../../__tests__/fakes.js';

const START = new Date('2024-05-01T10:00:00.000Z');

interface HarnessOptions {
    keys?: string[];
    fetch?: typeof fetch;
    errorDisplayMs?: number;
    store?: MemoryKeyValueStore;
}

async function createHarness(options: HarnessOptions = {}) {
    const store = options.store ?? new MemoryKeyValueStore();
    const keys = new KeyRotationStore(store, options.keys ?? ['test-key-a']);
    const capture = new FakeCaptureBackend();
    const connector = new FakeConnector();
    const authHeaders: string[] = [];
    const transcription = new TranscriptionSession({
        tokenUrl: TOKEN_URL,
        streamingUrl: STREAMING_URL,
        connector,
        fetch: options.fetch ?? tokenFetch(authHeaders),
    });
    const recordings = new RecordingStore(store);

    let clock = START;
    const orchestrator = new SessionOrchestrator({
        keys,
        capture,
        transcription,
        recordings,
        errorDisplayMs: options.errorDisplayMs ?? 0,
        now: () => clock,
    });
    await orchestrator.initialize();

    return {
        orchestrator,
        capture,
        connector,
        transcription,
        recordings,
        authHeaders,
        advanceClock(ms: number) {
            clock = new Date(clock.getTime() + ms);
        },
        begin() {
            connector.last?.receive({ type: 'Begin', id: 'session-1' });
        },
        turn(transcript: string, endOfTurn: boolean) {
            connector.last?.receive({ type: 'Turn', transcript, end_of_turn: endOfTurn });
        },
    };
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
});

describe('SessionOrchestrator', () => {
    describe('start', () => {
        it('should refuse to start without keys', async () => {
            const { orchestrator, capture } = await createHarness({ keys: [] });

            await expect(orchestrator.start()).resolves.toBe(false);

            expect(orchestrator.snapshot().error).toBe('No API keys configured. Please add a transcription API key.');
            expect(capture.startCalls).toBe(0);
        });

        it('should refuse to start without microphone permission', async () => {
            const { orchestrator, capture, connector } = await createHarness();
            capture.permission = false;

            await expect(orchestrator.start()).resolves.toBe(false);

            expect(orchestrator.snapshot().error).toBe('Microphone permission denied');
            expect(connector.urls).toEqual([]);
        });

        it('should report a failed key rotation without connecting', async () => {
            const store = new FlakyStore();
            const { orchestrator, connector, capture } = await createHarness({ store });
            store.failWrites = true;

            await expect(orchestrator.start()).resolves.toBe(false);

            expect(orchestrator.snapshot().error).toBe('Failed to get API key');
            expect(orchestrator.isRecording).toBe(false);
            expect(connector.urls).toEqual([]);
            expect(capture.startCalls).toBe(0);
        });

        it('should report a failed connection without starting capture', async () => {
            const { orchestrator, capture } = await createHarness({ fetch: failingTokenFetch(500, 'relay down') });

            await expect(orchestrator.start()).resolves.toBe(false);

            expect(orchestrator.snapshot().error).toBe('Failed to connect to transcription service');
            expect(capture.startCalls).toBe(0);
        });

        it('should disconnect the channel when capture fails to start', async () => {
            const { orchestrator, capture, connector, transcription } = await createHarness();
            capture.startResult = false;

            await expect(orchestrator.start()).resolves.toBe(false);

            expect(orchestrator.snapshot().error).toBe('Failed to start recording');
            expect(orchestrator.isRecording).toBe(false);
            expect(transcription.phase).toBe('idle');
            expect(connector.last?.closed).toEqual({ code: 1000, reason: 'Client disconnect' });
            expect(capture.chunks.listenerCount).toBe(0);
        });

        it('should forward chunks once the session has begun', async () => {
            const { orchestrator, capture, connector, begin } = await createHarness();

            await expect(orchestrator.start()).resolves.toBe(true);
            capture.chunks.emit(new Uint8Array([1, 1]));
            begin();
            capture.chunks.emit(new Uint8Array([2, 2]));

            expect(connector.last?.sent).toEqual([new Uint8Array([2, 2])]);
            expect(orchestrator.snapshot()).toMatchObject({ isRecording: true, isConnected: true, error: null });
        });

        it('should be a no-op while already recording', async () => {
            const { orchestrator, connector } = await createHarness();
            await orchestrator.start();

            await expect(orchestrator.start()).resolves.toBe(true);

            expect(connector.urls).toHaveLength(1);
        });

        it('should reject a concurrent start', async () => {
            const { orchestrator, connector } = await createHarness();

            const first = orchestrator.start();
            const second = orchestrator.start();

            await expect(second).resolves.toBe(false);
            await expect(first).resolves.toBe(true);
            expect(connector.urls).toHaveLength(1);
        });

        it('should rotate keys across sessions', async () => {
            const { orchestrator, authHeaders } = await createHarness({ keys: ['test-key-a', 'test-key-b'] });

            for (let i = 0; i < 3; i++) {
                await orchestrator.start();
                await orchestrator.stop();
            }

            expect(authHeaders).toEqual(['test-key-a', 'test-key-b', 'test-key-a']);
        });
    });

    describe('transcript state', () => {
        it('should replace partials and append finals', async () => {
            const { orchestrator, begin, turn } = await createHarness();
            await orchestrator.start();
            begin();

            turn('hello', false);
            expect(orchestrator.snapshot().partialTranscript).toBe('hello');

            turn('hello there', true);
            turn('how are', false);

            const snapshot = orchestrator.snapshot();
            expect(snapshot.partialTranscript).toBe('how are');
            expect(snapshot.finalSegments).toEqual(['hello there']);

            turn('how are you', true);
            expect(orchestrator.fullTranscript).toBe('hello there how are you');
            expect(orchestrator.snapshot().partialTranscript).toBe('');
        });

        it('should clear the transcript on demand', async () => {
            const { orchestrator, begin, turn } = await createHarness();
            await orchestrator.start();
            begin();
            turn('something', true);

            orchestrator.clearTranscript();

            expect(orchestrator.snapshot().finalSegments).toEqual([]);
            expect(orchestrator.fullTranscript).toBe('');
        });

        it('should publish a snapshot on every change', async () => {
            const { orchestrator, capture } = await createHarness();
            const snapshots: TranscriberSnapshot[] = [];
            orchestrator.changes.subscribe((snapshot) => snapshots.push(snapshot));
            await orchestrator.start();

            capture.amplitude.emit(0.42);

            expect(snapshots[snapshots.length - 1]?.amplitude).toBe(0.42);
        });
    });

    describe('stop', () => {
        it('should persist the session with wall-clock duration', async () => {
            const { orchestrator, recordings, begin, turn, advanceClock } = await createHarness();
            await orchestrator.start();
            begin();
            turn('hello', true);
            turn('world', true);
            advanceClock(1500);

            const saved = await orchestrator.stop();

            const expected = {
                id: String(START.getTime() + 1500),
                dateTime: '2024-05-01T10:00:00.000Z',
                durationMs: 1500,
                transcript: 'hello world',
                audioPath: null,
            };
            expect(saved).toEqual(expected);
            await expect(recordings.getSessions()).resolves.toEqual([expected]);
            expect(orchestrator.snapshot().savedSessions).toEqual([expected]);
            expect(orchestrator.snapshot()).toMatchObject({ isRecording: false, isConnected: false, amplitude: 0 });
        });

        it('should do nothing on a second stop', async () => {
            const { orchestrator, recordings, capture, begin, turn } = await createHarness();
            await orchestrator.start();
            begin();
            turn('once', true);

            await orchestrator.stop();
            await expect(orchestrator.stop()).resolves.toBeNull();

            expect(capture.stopCalls).toBe(1);
            await expect(recordings.getSessions()).resolves.toHaveLength(1);
        });

        it('should not save an empty session without an artifact', async () => {
            const { orchestrator, recordings } = await createHarness();
            await orchestrator.start();

            await expect(orchestrator.stop()).resolves.toBeNull();

            await expect(recordings.getSessions()).resolves.toEqual([]);
        });

        it('should save an artifact with a placeholder transcript', async () => {
            const { orchestrator, capture } = await createHarness();
            capture.artifact = 'recording_1714557600000.wav';
            await orchestrator.start();

            const saved = await orchestrator.stop();

            expect(saved?.transcript).toBe('(No transcript)');
            expect(saved?.audioPath).toBe('recording_1714557600000.wav');
        });

        it('should send Terminate and close the channel', async () => {
            const { orchestrator, connector, begin } = await createHarness();
            await orchestrator.start();
            begin();

            await orchestrator.stop();

            expect(connector.last?.sent).toEqual(['{"type":"Terminate"}']);
            expect(connector.last?.closed).toEqual({ code: 1000, reason: 'Client disconnect' });
        });

        it('should finish teardown when capture fails to stop', async () => {
            const { orchestrator, capture, transcription, begin, turn } = await createHarness();
            await orchestrator.start();
            begin();
            turn('kept', true);
            capture.amplitude.emit(0.6);
            capture.stopError = new Error('recorder hung');

            const saved = await orchestrator.stop();

            expect(saved).toMatchObject({ transcript: 'kept', audioPath: null });
            expect(orchestrator.snapshot()).toMatchObject({ isRecording: false, isConnected: false, amplitude: 0 });
            expect(transcription.phase).toBe('idle');
        });

        it('should reset state and report the error when saving fails', async () => {
            const store = new FlakyStore();
            const { orchestrator, capture, connector, begin, turn } = await createHarness({ store });
            await orchestrator.start();
            begin();
            turn('lost', true);
            capture.amplitude.emit(0.6);
            store.failWrites = true;

            await expect(orchestrator.stop()).resolves.toBeNull();

            expect(orchestrator.snapshot()).toMatchObject({
                isRecording: false,
                amplitude: 0,
                error: 'Failed to save session: EACCES: disk write failed',
                savedSessions: [],
            });
            expect(connector.last?.closed).toEqual({ code: 1000, reason: 'Client disconnect' });
        });

        it('should stop forwarding chunks', async () => {
            const { orchestrator, capture } = await createHarness();
            await orchestrator.start();

            await orchestrator.stop();

            expect(capture.chunks.listenerCount).toBe(0);
        });
    });

    describe('errors', () => {
        it('should clear an error after the display period', async () => {
            vi.useFakeTimers();
            const { orchestrator } = await createHarness({ keys: [], errorDisplayMs: 1000 });

            await orchestrator.start();
            vi.advanceTimersByTime(999);
            expect(orchestrator.snapshot().error).not.toBeNull();

            vi.advanceTimersByTime(1);
            expect(orchestrator.snapshot().error).toBeNull();
        });

        it('should surface transcription errors while recording', async () => {
            const { orchestrator, connector, begin } = await createHarness();
            await orchestrator.start();
            begin();

            connector.last?.receive({ type: 'error', error: 'Session expired' });

            expect(orchestrator.snapshot().error).toBe('Session expired');
        });

        it('should clear a stale error on the next start', async () => {
            const { orchestrator, capture } = await createHarness();
            capture.permission = false;
            await orchestrator.start();
            capture.permission = true;

            await orchestrator.start();

            expect(orchestrator.snapshot().error).toBeNull();
        });
    });

    describe('keys and history', () => {
        it('should add and remove keys', async () => {
            const { orchestrator } = await createHarness({ keys: [] });

            await orchestrator.addKey('test-key-a');
            await orchestrator.addKey('test-key-b');
            expect(orchestrator.snapshot().keyCount).toBe(2);

            await orchestrator.removeKey(0);
            expect(orchestrator.snapshot().keyCount).toBe(1);
        });

        it('should delete a saved session', async () => {
            const { orchestrator, begin, turn } = await createHarness();
            await orchestrator.start();
            begin();
            turn('keep me', true);
            const saved = await orchestrator.stop();

            await orchestrator.deleteSession(saved?.id ?? '');

            expect(orchestrator.snapshot().savedSessions).toEqual([]);
        });
    });

    describe('dispose', () => {
        it('should stop recording and release the backend', async () => {
            const { orchestrator, capture, transcription } = await createHarness();
            await orchestrator.start();

            await orchestrator.dispose();

            expect(orchestrator.isRecording).toBe(false);
            expect(capture.disposed).toBe(true);
            expect(transcription.phase).toBe('idle');
            expect(orchestrator.changes.listenerCount).toBe(0);
        });
    });
});
