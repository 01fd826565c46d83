// Streaming Transcription Session
// Owns the connection to the real-time transcription endpoint: token exchange, socket
// lifecycle, readiness gating of outbound audio, and decoding of inbound messages.

import type { SessionPhase, StreamingStatus, TranscriptionResult } from '@earshot/contracts';
import { SAMPLE_RATE } from '../audio/pcm.js';
import { Signal } from '../utils/Signal.js';
import { errorMessage, withTimeout } from '../utils/errors.js';
import type { SocketConnector, StreamingSocket } from './socket.js';
import { StreamingMessageSchema, TERMINATE_MESSAGE, type StreamingMessage } from './streamingTypes.js';
import { requestTemporaryToken } from './tokenClient.js';

export interface TranscriptionSessionOptions {
    tokenUrl: string;
    streamingUrl: string;
    connector: SocketConnector;
    sampleRate?: number;
    fetch?: typeof fetch;
    /** Bound on the token exchange. 0 disables it. */
    tokenTimeoutMs?: number;
    /** Bound on the socket handshake. 0 disables it. */
    connectTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10000;
const LOG_EXCERPT_LENGTH = 200;

export class TranscriptionSession {
    readonly transcripts = new Signal<TranscriptionResult>('transcripts');
    readonly errors = new Signal<string>('transcription-errors');
    readonly connection = new Signal<boolean>('connection');
    readonly phases = new Signal<SessionPhase>('phase');

    private socket: StreamingSocket | null = null;
    private detach: (() => void) | null = null;
    private currentPhase: SessionPhase = 'idle';
    private connected = false;
    private disposed = false;

    // Bumped by every connect() and disconnect(); a connect() that sees a newer
    // value after an await has been superseded and must not touch state.
    private attempt = 0;

    private bytesSent = 0;
    private transcriptCount = 0;
    private lastEventAt?: number;

    constructor(private readonly options: TranscriptionSessionOptions) {}

    get phase(): SessionPhase {
        return this.currentPhase;
    }

    /** True between the remote Begin and Termination/disconnect */
    get isConnected(): boolean {
        return this.connected;
    }

    get isReady(): boolean {
        return this.currentPhase === 'active';
    }

    status(): StreamingStatus {
        return {
            phase: this.currentPhase,
            connected: this.connected,
            bytesSent: this.bytesSent,
            transcriptCount: this.transcriptCount,
            lastEventAt: this.lastEventAt,
        };
    }

    /**
     * Exchange the API key for a temporary token and open the streaming socket.
     * Resolves true once the socket is open; readiness for audio arrives later
     * with the remote Begin message. Never throws.
     */
    async connect(apiKey: string): Promise<boolean> {
        if (this.disposed) {
            this.errors.emit('Transcription session has been disposed');
            return false;
        }

        if (!apiKey.trim()) {
            this.errors.emit('No API key provided');
            return false;
        }

        if (this.currentPhase !== 'idle') {
            console.log('[transcription] Already connected, disconnecting first...');
            await this.disconnect();
        }

        const attempt = ++this.attempt;
        this.bytesSent = 0;
        this.transcriptCount = 0;
        this.lastEventAt = undefined;

        this.setPhase('authenticating');
        console.log('[transcription] Getting temporary token...');

        let token: string;
        try {
            token = await requestTemporaryToken(apiKey, {
                tokenUrl: this.options.tokenUrl,
                fetch: this.options.fetch,
                timeoutMs: this.options.tokenTimeoutMs ?? DEFAULT_TIMEOUT_MS,
            });
        } catch (error) {
            if (attempt !== this.attempt) return false;
            this.fail(`Failed to obtain authentication token: ${errorMessage(error)}`);
            return false;
        }

        if (attempt !== this.attempt) return false;

        this.setPhase('connecting');
        console.log(`[transcription] Connecting to ${this.options.streamingUrl}?sample_rate=${this.sampleRate}&token=[TOKEN]`);

        const opening = this.options.connector.open(this.buildWebSocketUrl(token));
        let socket: StreamingSocket;
        try {
            socket = await withTimeout(opening, this.options.connectTimeoutMs ?? DEFAULT_TIMEOUT_MS, 'WebSocket handshake');
        } catch (error) {
            // A handshake that completes after the timeout must not leave a socket behind
            void opening.then((late) => this.closeQuietly(late, 'Handshake abandoned'), () => undefined);
            if (attempt !== this.attempt) return false;
            this.fail(`Connection failed: ${errorMessage(error)}`);
            return false;
        }

        if (attempt !== this.attempt) {
            // disconnect() ran while the handshake was in flight
            this.closeQuietly(socket, 'Superseded');
            return false;
        }

        this.socket = socket;
        this.detach = socket.listen({
            message: (data) => this.handleMessage(data),
            close: (code, reason) => this.handleClose(code, reason),
            error: (error) => this.handleSocketError(error),
        });

        this.setPhase('awaiting-ready');
        console.log('[transcription] Socket open, waiting for session to begin');
        return true;
    }

    /**
     * Forward one PCM16 chunk. Dropped silently unless the remote session has begun.
     */
    sendAudioChunk(chunk: Uint8Array): void {
        if (this.currentPhase !== 'active' || !this.socket) {
            return;
        }

        try {
            this.socket.send(chunk);
            this.bytesSent += chunk.length;
        } catch (error) {
            console.error('[transcription] Failed to send audio chunk:', error);
            this.errors.emit(`Failed to send audio: ${errorMessage(error)}`);
        }
    }

    /**
     * Terminate the remote session (best effort), detach and close the socket,
     * and return to idle. Never throws; the reset always happens.
     */
    async disconnect(): Promise<void> {
        this.attempt++;

        const socket = this.socket;
        const detach = this.detach;
        const live = this.currentPhase === 'awaiting-ready' || this.currentPhase === 'active';
        this.socket = null;
        this.detach = null;

        console.log('[transcription] Disconnecting...');
        try {
            if (socket) {
                this.setPhase('closing');
                if (live && socket.isOpen) {
                    this.bestEffort('send terminate', () => socket.send(TERMINATE_MESSAGE));
                }
            }
            this.bestEffort('detach listener', () => detach?.());
            if (socket) {
                this.bestEffort('close socket', () => socket.close(1000, 'Client disconnect'));
            }
        } finally {
            this.connected = false;
            this.setPhase('idle');
            this.connection.emit(false);
        }

        console.log(`[transcription] Disconnected. Bytes sent: ${this.bytesSent}`);
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;

        await this.disconnect();
        this.disposed = true;

        this.transcripts.clear();
        this.errors.clear();
        this.connection.clear();
        this.phases.clear();
    }

    private get sampleRate(): number {
        return this.options.sampleRate ?? SAMPLE_RATE;
    }

    private buildWebSocketUrl(token: string): string {
        const params = new URLSearchParams({
            sample_rate: this.sampleRate.toString(),
            token,
        });

        return `${this.options.streamingUrl}?${params.toString()}`;
    }

    private handleMessage(data: string | Uint8Array): void {
        if (typeof data !== 'string') {
            console.warn(`[transcription] Ignoring binary frame (${data.length} bytes)`);
            return;
        }

        this.lastEventAt = Date.now();
        console.log(`[transcription] Received: ${data.slice(0, LOG_EXCERPT_LENGTH)}`);

        let message: StreamingMessage;
        try {
            const parsed = StreamingMessageSchema.safeParse(JSON.parse(data));
            if (!parsed.success) {
                throw new Error(parsed.error.issues.map((issue) => issue.message).join('; '));
            }
            message = parsed.data;
        } catch (error) {
            console.error('[transcription] Failed to parse message:', error);
            this.errors.emit(`Failed to parse message: ${errorMessage(error)}`);
            return;
        }

        switch (message.type) {
            case 'Turn':
                this.handleTurn(message);
                return;

            case 'Begin':
                console.log(`[transcription] Session began! ID: ${message.id ?? 'unknown'}`);
                this.connected = true;
                this.setPhase('active');
                this.connection.emit(true);
                return;

            case 'Termination':
                console.log(
                    `[transcription] Session terminated. Audio duration: ${message.audio_duration_seconds ?? 'unknown'} seconds`
                );
                this.connected = false;
                this.setPhase('closing');
                this.connection.emit(false);
                return;
        }

        if (message.type === 'error' || (message.error !== undefined && message.error !== null)) {
            const text = typeof message.error === 'string' ? message.error : message.message ?? 'Unknown error';
            console.error(`[transcription] Error message: ${text}`);
            this.errors.emit(text);
            return;
        }

        console.log(`[transcription] Unknown message type: ${message.type ?? '(none)'}`);
    }

    private handleTurn(message: StreamingMessage): void {
        const text = message.transcript ?? '';
        const endOfTurn = message.end_of_turn ?? false;
        if (!text) return;

        this.transcriptCount++;
        this.transcripts.emit({ text, isFinal: endOfTurn, timestamp: Date.now() });
    }

    private handleSocketError(error: Error): void {
        console.error('[transcription] WebSocket error:', error);
        this.setPhase('error');
        this.errors.emit(`WebSocket error: ${error.message}`);
        this.teardown(true);
    }

    private handleClose(code: number, reason: string): void {
        console.log(`[transcription] WebSocket closed: ${code} - ${reason}`);
        this.teardown(false);
    }

    /**
     * Failure path out of connect(): error, message, cleanup, idle
     */
    private fail(message: string): void {
        console.error(`[transcription] ${message}`);
        this.setPhase('error');
        this.errors.emit(message);
        this.teardown(true);
    }

    /**
     * Reset after anything not initiated by disconnect()
     */
    private teardown(closeSocket: boolean): void {
        this.attempt++;
        const socket = this.socket;
        const detach = this.detach;
        this.socket = null;
        this.detach = null;

        this.bestEffort('detach listener', () => detach?.());
        if (socket && closeSocket) {
            this.closeQuietly(socket, 'Session reset');
        }

        this.connected = false;
        this.setPhase('idle');
        this.connection.emit(false);
    }

    private closeQuietly(socket: StreamingSocket, reason: string): void {
        this.bestEffort('close socket', () => socket.close(1000, reason));
    }

    private bestEffort(label: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            console.warn(`[transcription] Failed to ${label}: ${errorMessage(error)}`);
        }
    }

    private setPhase(phase: SessionPhase): void {
        if (this.currentPhase === phase) return;
        this.currentPhase = phase;
        this.phases.emit(phase);
    }
}
