// Earshot Local Agent - HTTP Server
// Control API for the desktop shell
//
// Endpoints:
//   GET    /health           - Health check
//   GET    /session/status   - Live state and streaming counters
//   POST   /session/start    - Start a transcription session
//   POST   /session/stop     - Stop and persist the active session
//   GET    /session/events   - Live events (SSE)
//   GET    /recordings       - Saved sessions, most recent first
//   DELETE /recordings/:id   - Delete a saved session
//   GET    /keys             - Key count and cursor (never the keys themselves)
//   POST   /keys             - Add a key { key }
//   DELETE /keys/:index      - Remove the key at index

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import {
    AgentRoute,
    type ErrorResponse,
    type HealthResponse,
    type KeyRingResponse,
    type RecordingListResponse,
    type SessionStartResponse,
    type SessionStatusResponse,
    type SessionStopResponse,
} from '@earshot/contracts';
import { errorMessage } from '@earshot/core';
import type { Agent } from './agent.js';
import { formatSSEEvent } from './sse/ConnectionManager.js';

export const SERVICE_NAME = 'earshot-agent';
export const SERVICE_VERSION = '0.1.0';

export interface RouteResult {
    status: number;
    body: unknown;
}

const AddKeyRequestSchema = z.object({
    key: z.string().trim().min(1),
});

const RECORDING_PATH = /^\/recordings\/([^/]+)$/;
const KEY_PATH = /^\/keys\/([^/]+)$/;

function ok(body: unknown): RouteResult {
    return { status: 200, body };
}

function failure(status: number, error: string): RouteResult {
    const body: ErrorResponse = { ok: false, error };
    return { status, body };
}

async function handleHealth(agent: Agent): Promise<RouteResult> {
    const body: HealthResponse = {
        status: 'ok',
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        platform: process.platform,
        recorder: agent.config.recorder,
        recorderAvailable: await agent.capture.hasPermission(),
        keyCount: agent.keys.count,
        timestamp: new Date().toISOString(),
    };
    return ok(body);
}

async function handleSessionStart(agent: Agent): Promise<RouteResult> {
    const started = await agent.orchestrator.start();
    const snapshot = agent.orchestrator.snapshot();
    const body: SessionStartResponse = started
        ? { ok: true, snapshot }
        : { ok: false, snapshot, error: snapshot.error ?? 'Failed to start session' };
    return { status: started ? 200 : 400, body };
}

async function handleSessionStop(agent: Agent): Promise<RouteResult> {
    const saved = await agent.orchestrator.stop();
    const body: SessionStopResponse = { ok: true, snapshot: agent.orchestrator.snapshot(), saved };
    return ok(body);
}

function handleSessionStatus(agent: Agent): RouteResult {
    const body: SessionStatusResponse = {
        ok: true,
        snapshot: agent.orchestrator.snapshot(),
        streaming: agent.transcription.status(),
    };
    return ok(body);
}

function keyRing(agent: Agent): RouteResult {
    const body: KeyRingResponse = { ok: true, keys: agent.keys.summary() };
    return ok(body);
}

async function handleAddKey(agent: Agent, requestBody: unknown): Promise<RouteResult> {
    const parsed = AddKeyRequestSchema.safeParse(requestBody);
    if (!parsed.success) {
        return failure(400, 'Missing or invalid key');
    }

    await agent.orchestrator.addKey(parsed.data.key);
    return keyRing(agent);
}

async function handleRemoveKey(agent: Agent, rawIndex: string): Promise<RouteResult> {
    const index = /^\d+$/.test(rawIndex) ? Number(rawIndex) : NaN;
    if (!Number.isInteger(index) || index >= agent.keys.count) {
        return failure(404, `No key at index ${rawIndex}`);
    }

    await agent.orchestrator.removeKey(index);
    return keyRing(agent);
}

async function handleDeleteRecording(agent: Agent, id: string): Promise<RouteResult> {
    const exists = agent.orchestrator.snapshot().savedSessions.some((session) => session.id === id);
    if (!exists) {
        return failure(404, `No recording with id ${id}`);
    }

    await agent.orchestrator.deleteSession(id);
    const body: RecordingListResponse = { ok: true, recordings: agent.orchestrator.snapshot().savedSessions };
    return ok(body);
}

/**
 * Route a request to its handler. Pure with respect to the transport, so the
 * whole API is testable without sockets. SSE is handled by the server itself.
 */
export async function routeRequest(agent: Agent, method: string, path: string, body: unknown): Promise<RouteResult> {
    if (method === 'GET') {
        switch (path) {
            case AgentRoute.HEALTH:
                return handleHealth(agent);
            case AgentRoute.SESSION_STATUS:
                return handleSessionStatus(agent);
            case AgentRoute.RECORDINGS: {
                const list: RecordingListResponse = { ok: true, recordings: agent.orchestrator.snapshot().savedSessions };
                return ok(list);
            }
            case AgentRoute.KEYS:
                return keyRing(agent);
        }
    }

    if (method === 'POST') {
        switch (path) {
            case AgentRoute.SESSION_START:
                return handleSessionStart(agent);
            case AgentRoute.SESSION_STOP:
                return handleSessionStop(agent);
            case AgentRoute.KEYS:
                return handleAddKey(agent, body);
        }
    }

    if (method === 'DELETE') {
        const recordingMatch = path.match(RECORDING_PATH);
        if (recordingMatch) {
            return handleDeleteRecording(agent, decodeURIComponent(recordingMatch[1]));
        }

        const keyMatch = path.match(KEY_PATH);
        if (keyMatch) {
            return handleRemoveKey(agent, keyMatch[1]);
        }
    }

    return failure(404, 'Not found');
}

/**
 * Parse JSON body from request
 */
async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        let body = '';
        req.on('data', (chunk: Buffer) => {
            body += chunk.toString();
        });
        req.on('end', () => {
            try {
                resolve(body ? JSON.parse(body) : {});
            } catch {
                reject(new SyntaxError('Invalid JSON body'));
            }
        });
        req.on('error', reject);
    });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
}

/**
 * Handle GET /session/events
 * Streams live events as Server-Sent Events, starting with the current snapshot
 */
function handleEventStream(agent: Agent, req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
    });

    res.write(
        formatSSEEvent({
            type: 'snapshot',
            timestamp: Date.now(),
            payload: agent.orchestrator.snapshot(),
        })
    );
    const unsubscribe = agent.events.registerClient(res);

    req.on('error', (err) => {
        console.error('[sse] Request error:', err.message);
        unsubscribe();
    });
}

/**
 * Main request handler
 */
async function handleRequest(agent: Agent, req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    console.log(`[agent] ${method} ${path}`);

    // CORS headers for the desktop shell
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
        res.writeHead(204);
        res.end();
        return;
    }

    if (method === 'GET' && path === AgentRoute.SESSION_EVENTS) {
        handleEventStream(agent, req, res);
        return;
    }

    let body: unknown = undefined;
    if (method === 'POST') {
        try {
            body = await parseJsonBody(req);
        } catch (error) {
            sendJson(res, 400, { ok: false, error: errorMessage(error) });
            return;
        }
    }

    const result = await routeRequest(agent, method, path, body);
    sendJson(res, result.status, result.body);
}

/**
 * Start the HTTP server. SIGINT/SIGTERM stop the active session before exit.
 */
export function startServer(agent: Agent): Server {
    const server = createServer((req, res) => {
        handleRequest(agent, req, res).catch((err: unknown) => {
            console.error('[agent] Unhandled error:', err);
            if (!res.headersSent) {
                sendJson(res, 500, { ok: false, error: 'Internal server error' });
            } else {
                res.end();
            }
        });
    });

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals) => {
        if (shuttingDown) return;
        shuttingDown = true;

        console.log(`\n[agent] Received ${signal}, shutting down...`);
        try {
            await agent.dispose();
        } catch (error) {
            console.error('[agent] Failed to stop session cleanly:', error);
        }
        server.close(() => {
            console.log('[agent] Server closed');
            process.exit(0);
        });
    };

    process.on('SIGINT', (signal) => void shutdown(signal));
    process.on('SIGTERM', (signal) => void shutdown(signal));

    server.listen(agent.config.port, () => {
        console.log(`[agent] Server listening on port ${agent.config.port}`);
        console.log(`[agent] Platform: ${process.platform}`);
        console.log(`[agent] Recorder: ${agent.config.recorder}`);
        console.log(`[agent] Keys loaded: ${agent.keys.count}`);
    });

    return server;
}
