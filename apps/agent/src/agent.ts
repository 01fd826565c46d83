// Agent composition root
// Wires the native backend, ws transport and file storage into one orchestrator
// and republishes its activity as live events

import { join } from 'node:path';
import type { LiveEvent } from '@earshot/contracts';
import {
    KeyRotationStore,
    RecordingStore,
    SessionOrchestrator,
    TranscriptionSession,
    type AudioCaptureBackend,
    type KeyValueStore,
    type SocketConnector,
} from '@earshot/core';
import { NativeAudioCapture } from './audio/NativeAudioCapture.js';
import type { AgentConfig } from './config.js';
import { SSEConnectionManager } from './sse/ConnectionManager.js';
import { JsonFileStore } from './storage/JsonFileStore.js';
import { WsSocketConnector } from './transcription/wsConnector.js';

export const STORE_FILE_NAME = 'earshot.json';

export interface AgentOverrides {
    capture?: AudioCaptureBackend;
    connector?: SocketConnector;
    store?: KeyValueStore;
    fetch?: typeof fetch;
    now?: () => Date;
}

export interface Agent {
    readonly config: AgentConfig;
    readonly orchestrator: SessionOrchestrator;
    readonly transcription: TranscriptionSession;
    readonly keys: KeyRotationStore;
    readonly capture: AudioCaptureBackend;
    readonly events: SSEConnectionManager;
    dispose(): Promise<void>;
}

export async function createAgent(config: AgentConfig, overrides: AgentOverrides = {}): Promise<Agent> {
    const store = overrides.store ?? new JsonFileStore(join(config.dataDir, STORE_FILE_NAME));
    const capture =
        overrides.capture ?? new NativeAudioCapture({ recorder: config.recorder, device: config.audioDevice });
    const transcription = new TranscriptionSession({
        tokenUrl: config.tokenUrl,
        streamingUrl: config.streamingUrl,
        connector: overrides.connector ?? new WsSocketConnector(),
        fetch: overrides.fetch,
        tokenTimeoutMs: config.tokenTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
    });
    const keys = new KeyRotationStore(store, config.apiKeys);
    const orchestrator = new SessionOrchestrator({
        keys,
        capture,
        transcription,
        recordings: new RecordingStore(store),
        errorDisplayMs: config.errorDisplayMs,
        now: overrides.now,
    });
    const events = new SSEConnectionManager();

    const publish = (event: LiveEvent) => events.broadcast(event);
    const subscriptions = [
        orchestrator.changes.subscribe((snapshot) =>
            publish({ type: 'snapshot', timestamp: Date.now(), payload: snapshot })
        ),
        transcription.transcripts.subscribe((result) =>
            publish({ type: 'transcript', timestamp: result.timestamp, payload: result })
        ),
        transcription.connection.subscribe((connected) =>
            publish({ type: 'connection', timestamp: Date.now(), payload: { connected } })
        ),
        transcription.errors.subscribe((message) =>
            publish({ type: 'error', timestamp: Date.now(), payload: { message } })
        ),
        capture.errors.subscribe((message) => publish({ type: 'error', timestamp: Date.now(), payload: { message } })),
    ];

    await orchestrator.initialize();

    return {
        config,
        orchestrator,
        transcription,
        keys,
        capture,
        events,
        async dispose() {
            for (const unsubscribe of subscriptions) unsubscribe();
            await orchestrator.dispose();
            events.closeAll();
        },
    };
}
