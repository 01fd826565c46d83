// Session Orchestrator
// Composes credential rotation, audio capture and the streaming session into
// start/stop semantics; accumulates transcript segments and persists finished recordings.

import type { RecordingSessionRecord, TranscriberSnapshot, TranscriptionResult } from '@earshot/contracts';
import type { AudioCaptureBackend } from '../audio/AudioCaptureBackend.js';
import type { KeyRotationStore } from '../keys/KeyRotationStore.js';
import type { RecordingStore } from '../storage/RecordingStore.js';
import type { TranscriptionSession } from '../transcription/TranscriptionSession.js';
import { Signal } from '../utils/Signal.js';
import { errorMessage, safeAsync } from '../utils/errors.js';

export interface SessionOrchestratorDeps {
    keys: KeyRotationStore;
    capture: AudioCaptureBackend;
    transcription: TranscriptionSession;
    recordings: RecordingStore;
    /** How long a surfaced error stays visible. 0 keeps it until the next start. */
    errorDisplayMs?: number;
    now?: () => Date;
}

export const EMPTY_TRANSCRIPT_PLACEHOLDER = '(No transcript)';

const DEFAULT_ERROR_DISPLAY_MS = 5000;

export class SessionOrchestrator {
    /** Fires with a fresh snapshot after every state change */
    readonly changes = new Signal<TranscriberSnapshot>('transcriber-state');

    private recording = false;
    private starting = false;
    private connected = false;
    private initialized = false;
    private error: string | null = null;
    private amplitude = 0;
    private transcriptions: TranscriptionResult[] = [];
    private partialTranscript = '';
    private savedSessions: RecordingSessionRecord[] = [];
    private sessionStartTime: Date | null = null;

    private chunkSubscription: (() => void) | null = null;
    private subscriptions: Array<() => void> = [];
    private errorTimer: ReturnType<typeof setTimeout> | null = null;

    private readonly now: () => Date;
    private readonly errorDisplayMs: number;

    constructor(private readonly deps: SessionOrchestratorDeps) {
        this.now = deps.now ?? (() => new Date());
        this.errorDisplayMs = deps.errorDisplayMs ?? DEFAULT_ERROR_DISPLAY_MS;
    }

    get isRecording(): boolean {
        return this.recording;
    }

    /** Final segments joined by single spaces, in arrival order */
    get fullTranscript(): string {
        return this.transcriptions
            .filter((result) => result.isFinal)
            .map((result) => result.text)
            .join(' ');
    }

    snapshot(): TranscriberSnapshot {
        return {
            isRecording: this.recording,
            isConnected: this.connected,
            error: this.error,
            amplitude: this.amplitude,
            partialTranscript: this.partialTranscript,
            finalSegments: this.transcriptions.map((result) => result.text),
            fullTranscript: this.fullTranscript,
            keyCount: this.deps.keys.count,
            savedSessions: [...this.savedSessions],
        };
    }

    /**
     * Load credentials and history, and subscribe to capture and transcription signals.
     */
    async initialize(): Promise<void> {
        if (this.initialized) return;
        this.initialized = true;

        await this.deps.keys.load();
        this.savedSessions = await this.deps.recordings.getSessions();

        const { capture, transcription } = this.deps;
        this.subscriptions.push(
            capture.amplitude.subscribe((amplitude) => {
                this.amplitude = amplitude;
                this.notify();
            }),
            capture.errors.subscribe((message) => this.setError(message)),
            transcription.transcripts.subscribe((result) => this.handleResult(result)),
            transcription.connection.subscribe((connected) => {
                this.connected = connected;
                this.notify();
            }),
            transcription.errors.subscribe((message) => this.setError(message))
        );

        console.log(`[orchestrator] Initialized with ${this.deps.keys.count} key(s), ${this.savedSessions.length} saved session(s)`);
        this.notify();
    }

    /**
     * Start a transcription session. Never throws; failures surface as `error`.
     * @returns true when recording (including when it already was)
     */
    async start(): Promise<boolean> {
        if (this.recording) return true;
        if (this.starting) {
            console.warn('[orchestrator] Start already in progress');
            return false;
        }

        this.starting = true;
        this.clearError();
        this.notify();

        try {
            return await this.startSession();
        } finally {
            this.starting = false;
        }
    }

    /**
     * Stop the active session and persist it when there is something to keep.
     * A no-op when not recording.
     * @returns the saved record, or null when nothing was saved
     */
    async stop(): Promise<RecordingSessionRecord | null> {
        if (!this.recording) return null;

        // Flip first so a concurrent stop() is a no-op
        this.recording = false;
        const startTime = this.sessionStartTime;
        let saved: RecordingSessionRecord | null = null;

        try {
            this.chunkSubscription?.();
            this.chunkSubscription = null;

            const audioPath = (await safeAsync(() => this.deps.capture.stop(), 'orchestrator')) ?? null;
            await this.deps.transcription.disconnect();

            if (startTime) {
                saved = await this.persist(startTime, audioPath);
            }
        } catch (error) {
            console.error('[orchestrator] Stop failed:', error);
            this.setError(`Failed to save session: ${errorMessage(error)}`);
        } finally {
            this.recording = false;
            this.sessionStartTime = null;
            this.amplitude = 0;
            this.notify();
        }

        return saved;
    }

    async deleteSession(id: string): Promise<void> {
        await this.deps.recordings.deleteSession(id);
        this.savedSessions = await this.deps.recordings.getSessions();
        this.notify();
    }

    clearTranscript(): void {
        this.transcriptions = [];
        this.partialTranscript = '';
        this.notify();
    }

    async addKey(key: string): Promise<void> {
        await this.deps.keys.add(key);
        this.notify();
    }

    async removeKey(index: number): Promise<void> {
        await this.deps.keys.remove(index);
        this.notify();
    }

    async dispose(): Promise<void> {
        await this.stop();

        for (const unsubscribe of this.subscriptions) unsubscribe();
        this.subscriptions = [];
        if (this.errorTimer) {
            clearTimeout(this.errorTimer);
            this.errorTimer = null;
        }

        await safeAsync(() => this.deps.capture.dispose(), 'orchestrator');
        await this.deps.transcription.dispose();
        this.changes.clear();
    }

    private async startSession(): Promise<boolean> {
        const { keys, capture, transcription } = this.deps;

        if (!keys.hasKeys) {
            this.setError('No API keys configured. Please add a transcription API key.');
            return false;
        }

        let apiKey: string | null;
        try {
            apiKey = await keys.next();
        } catch (error) {
            console.error('[orchestrator] Key rotation failed:', error);
            apiKey = null;
        }
        if (!apiKey) {
            this.setError('Failed to get API key');
            return false;
        }

        const permitted = await safeAsync(() => capture.hasPermission(), 'orchestrator');
        if (!permitted) {
            this.setError('Microphone permission denied');
            return false;
        }

        const connected = await transcription.connect(apiKey);
        if (!connected) {
            this.setError('Failed to connect to transcription service');
            return false;
        }

        // Subscribe before capture begins so no chunk is missed
        this.chunkSubscription = capture.chunks.subscribe((chunk) => transcription.sendAudioChunk(chunk));

        const started = await capture.start();
        if (!started) {
            this.chunkSubscription();
            this.chunkSubscription = null;
            await transcription.disconnect();
            this.setError('Failed to start recording');
            return false;
        }

        this.recording = true;
        this.sessionStartTime = this.now();
        this.transcriptions = [];
        this.partialTranscript = '';
        console.log('[orchestrator] Session started');
        this.notify();
        return true;
    }

    private async persist(startTime: Date, audioPath: string | null): Promise<RecordingSessionRecord | null> {
        const endTime = this.now();
        const fullText = this.fullTranscript;

        if (!fullText && audioPath === null) {
            console.log('[orchestrator] Nothing to save');
            return null;
        }

        const record: RecordingSessionRecord = {
            id: endTime.getTime().toString(),
            dateTime: startTime.toISOString(),
            durationMs: Math.max(0, endTime.getTime() - startTime.getTime()),
            transcript: fullText || EMPTY_TRANSCRIPT_PLACEHOLDER,
            audioPath,
        };

        await this.deps.recordings.saveSession(record);
        this.savedSessions = await this.deps.recordings.getSessions();
        console.log(`[orchestrator] Saved session ${record.id} (${record.durationMs}ms)`);
        return record;
    }

    private handleResult(result: TranscriptionResult): void {
        if (result.isFinal) {
            this.transcriptions.push(result);
            this.partialTranscript = '';
        } else {
            this.partialTranscript = result.text;
        }
        this.notify();
    }

    private setError(message: string): void {
        this.error = message;
        this.notify();

        if (this.errorTimer) clearTimeout(this.errorTimer);
        this.errorTimer = null;
        if (this.errorDisplayMs <= 0) return;

        this.errorTimer = setTimeout(() => {
            this.errorTimer = null;
            if (this.error === message) {
                this.error = null;
                this.notify();
            }
        }, this.errorDisplayMs);
    }

    private clearError(): void {
        if (this.errorTimer) clearTimeout(this.errorTimer);
        this.errorTimer = null;
        this.error = null;
    }

    private notify(): void {
        this.changes.emit(this.snapshot());
    }
}
