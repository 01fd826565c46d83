// Browser Transcriber
// Wires the browser capture backend, browser socket and localStorage into one orchestrator,
// next to a client for the configured agent

import {
    KeyRotationStore,
    RecordingStore,
    SessionOrchestrator,
    TranscriptionSession,
    type SocketConnector,
} from '@earshot/core';
import { WebAudioCapture } from '../audio/WebAudioCapture.js';
import type { BrowserAudioEnvironment } from '../audio/browserEnvironment.js';
import type { DesktopConfig } from '../config.js';
import { createAgentClient, type AgentClient } from './api.js';
import { BrowserSocketConnector } from './browserSocket.js';
import { LocalStorageStore, type StringStorage } from './LocalStorageStore.js';

export interface TranscriberOverrides {
    environment?: BrowserAudioEnvironment;
    connector?: SocketConnector;
    storage?: StringStorage;
    fetch?: typeof fetch;
    now?: () => Date;
}

export interface BrowserTranscriber {
    orchestrator: SessionOrchestrator;
    capture: WebAudioCapture;
    transcription: TranscriptionSession;
    keys: KeyRotationStore;
    agent: AgentClient;
}

export async function createBrowserTranscriber(
    config: DesktopConfig,
    overrides: TranscriberOverrides = {}
): Promise<BrowserTranscriber> {
    const store = new LocalStorageStore(overrides.storage, config.storagePrefix);
    const keys = new KeyRotationStore(store, config.apiKeys);
    const now = overrides.now;

    const capture = new WebAudioCapture(overrides.environment, { now: now ? () => now().getTime() : undefined });
    const transcription = new TranscriptionSession({
        tokenUrl: config.tokenUrl,
        streamingUrl: config.streamingUrl,
        connector: overrides.connector ?? new BrowserSocketConnector(),
        fetch: overrides.fetch,
        tokenTimeoutMs: config.tokenTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
    });

    const orchestrator = new SessionOrchestrator({
        keys,
        capture,
        transcription,
        recordings: new RecordingStore(store),
        errorDisplayMs: config.errorDisplayMs,
        now,
    });
    await orchestrator.initialize();

    const agent = createAgentClient(config.agentUrl, overrides.fetch);

    return { orchestrator, capture, transcription, keys, agent };
}
