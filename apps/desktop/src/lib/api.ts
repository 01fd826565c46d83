// Local Agent Client
// HTTP + SSE client for the native-capture agent (apps/agent)

import { z } from 'zod';
import {
    AgentRoute,
    type HealthResponse,
    type KeyRingResponse,
    type LiveEvent,
    type RecordingListResponse,
    type SessionStartResponse,
    type SessionStatusResponse,
    type SessionStopResponse,
} from '@earshot/contracts';
import { RecordingSessionRecordSchema, errorMessage } from '@earshot/core';

export const DEFAULT_AGENT_URL = 'http://localhost:3002';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

const ErrorBodySchema = z.object({ error: z.string() });

const TranscriberSnapshotSchema = z.object({
    isRecording: z.boolean(),
    isConnected: z.boolean(),
    error: z.string().nullable(),
    amplitude: z.number(),
    partialTranscript: z.string(),
    finalSegments: z.array(z.string()),
    fullTranscript: z.string(),
    keyCount: z.number(),
    savedSessions: z.array(RecordingSessionRecordSchema),
});

export const LiveEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('snapshot'), timestamp: z.number(), payload: TranscriberSnapshotSchema }),
    z.object({ type: z.literal('connection'), timestamp: z.number(), payload: z.object({ connected: z.boolean() }) }),
    z.object({
        type: z.literal('transcript'),
        timestamp: z.number(),
        payload: z.object({ text: z.string(), isFinal: z.boolean(), timestamp: z.number() }),
    }),
    z.object({ type: z.literal('error'), timestamp: z.number(), payload: z.object({ message: z.string() }) }),
]);

/** The members of the DOM EventSource the live stream uses */
export interface EventSourceLike {
    readonly readyState: number;
    onopen: ((event: Event) => void) | null;
    onmessage: ((event: MessageEvent) => void) | null;
    onerror: ((event: Event) => void) | null;
    close(): void;
}

export type CreateEventSource = (url: string) => EventSourceLike;

export type StreamState = 'connecting' | 'connected' | 'disconnected' | 'error';

export interface LiveEventHandlers {
    onEvent: (event: LiveEvent) => void;
    onError?: (error: Error) => void;
    onConnectionStateChange?: (state: StreamState) => void;
}

const EVENT_SOURCE_CLOSED = 2;

async function failure(name: string, res: Response): Promise<Error> {
    const body: unknown = await res.json().catch(() => null);
    const parsed = ErrorBodySchema.safeParse(body);
    const detail = parsed.success ? parsed.data.error : null;
    return new Error(`${name} failed: ${res.status}${detail ? ` - ${detail}` : ''}`);
}

export function createAgentClient(baseUrl: string = DEFAULT_AGENT_URL, fetchImpl: typeof fetch = fetch) {
    const url = (path: string) => `${baseUrl}${path}`;

    async function request<T>(name: string, path: string, init?: RequestInit): Promise<T> {
        const res = await fetchImpl(url(path), init);
        if (!res.ok) throw await failure(name, res);
        return await res.json();
    }

    return {
        health(): Promise<HealthResponse> {
            return request<HealthResponse>('health', AgentRoute.HEALTH);
        },

        status(): Promise<SessionStatusResponse> {
            return request<SessionStatusResponse>('status', AgentRoute.SESSION_STATUS);
        },

        /**
         * A refused start (400) resolves with ok: false and the reason, like the agent reports it
         */
        async startSession(): Promise<SessionStartResponse> {
            const res = await fetchImpl(url(AgentRoute.SESSION_START), {
                method: 'POST',
                headers: JSON_HEADERS,
                body: '{}',
            });
            if (res.ok || res.status === 400) {
                const body: SessionStartResponse = await res.json();
                return body;
            }
            throw await failure('startSession', res);
        },

        stopSession(): Promise<SessionStopResponse> {
            return request<SessionStopResponse>('stopSession', AgentRoute.SESSION_STOP, {
                method: 'POST',
                headers: JSON_HEADERS,
                body: '{}',
            });
        },

        recordings(): Promise<RecordingListResponse> {
            return request<RecordingListResponse>('recordings', AgentRoute.RECORDINGS);
        },

        deleteRecording(id: string): Promise<RecordingListResponse> {
            const path = `${AgentRoute.RECORDINGS}/${encodeURIComponent(id)}`;
            return request<RecordingListResponse>('deleteRecording', path, { method: 'DELETE' });
        },

        keys(): Promise<KeyRingResponse> {
            return request<KeyRingResponse>('keys', AgentRoute.KEYS);
        },

        addKey(key: string): Promise<KeyRingResponse> {
            return request<KeyRingResponse>('addKey', AgentRoute.KEYS, {
                method: 'POST',
                headers: JSON_HEADERS,
                body: JSON.stringify({ key }),
            });
        },

        removeKey(index: number): Promise<KeyRingResponse> {
            return request<KeyRingResponse>('removeKey', `${AgentRoute.KEYS}/${index}`, { method: 'DELETE' });
        },

        /**
         * Subscribe to the agent's live event stream.
         * Returns unsubscribe function to close the connection
         */
        subscribeToEvents(
            handlers: LiveEventHandlers,
            createEventSource: CreateEventSource = (streamUrl) => new EventSource(streamUrl)
        ): () => void {
            const { onEvent, onError, onConnectionStateChange } = handlers;

            onConnectionStateChange?.('connecting');
            const eventSource = createEventSource(url(AgentRoute.SESSION_EVENTS));

            eventSource.onopen = () => {
                console.log('[api] Live event stream opened');
                onConnectionStateChange?.('connected');
            };

            eventSource.onmessage = (message) => {
                let data: unknown;
                try {
                    data = JSON.parse(message.data);
                } catch (err) {
                    console.error('[api] Failed to parse live event:', err);
                    onError?.(new Error(`Failed to parse live event: ${errorMessage(err)}`));
                    return;
                }

                const parsed = LiveEventSchema.safeParse(data);
                if (!parsed.success) {
                    console.warn('[api] Ignoring unrecognized live event');
                    return;
                }
                onEvent(parsed.data);
            };

            eventSource.onerror = () => {
                if (eventSource.readyState === EVENT_SOURCE_CLOSED) {
                    console.log('[api] Live event stream closed');
                    onConnectionStateChange?.('disconnected');
                } else {
                    console.error('[api] Live event stream error, readyState:', eventSource.readyState);
                    onConnectionStateChange?.('error');
                    onError?.(new Error('Live event stream error'));
                }
            };

            return () => {
                eventSource.close();
                console.log('[api] Live event stream closed by client');
                onConnectionStateChange?.('disconnected');
            };
        },
    };
}

export type AgentClient = ReturnType<typeof createAgentClient>;
