// IPC Contracts
// Request/response shapes between the Desktop shell and the Local Agent
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type {
    KeyRingSummary,
    RecordingSessionRecord,
    StreamingStatus,
    TranscriberSnapshot,
} from '../api/index.js';

// ============================================
// AGENT ROUTES
// ============================================

export enum AgentRoute {
    HEALTH = '/health',
    SESSION_STATUS = '/session/status',
    SESSION_START = '/session/start',
    SESSION_STOP = '/session/stop',
    SESSION_EVENTS = '/session/events',
    RECORDINGS = '/recordings',
    KEYS = '/keys',
}

// ============================================
// COMMON
// ============================================

export interface ErrorResponse {
    readonly ok: false;
    readonly error: string;
}

// ============================================
// SESSION
// ============================================

export interface SessionStartResponse {
    readonly ok: boolean;
    readonly snapshot: TranscriberSnapshot;
    readonly error?: string;
}

export interface SessionStopResponse {
    readonly ok: true;
    readonly snapshot: TranscriberSnapshot;
    readonly saved: RecordingSessionRecord | null;
}

export interface SessionStatusResponse {
    readonly ok: true;
    readonly snapshot: TranscriberSnapshot;
    readonly streaming: StreamingStatus;
}

// ============================================
// RECORDINGS
// ============================================

export interface RecordingListResponse {
    readonly ok: true;
    readonly recordings: readonly RecordingSessionRecord[];
}

// ============================================
// KEYS
// ============================================

export interface AddKeyRequest {
    readonly key: string;
}

export interface KeyRingResponse {
    readonly ok: true;
    readonly keys: KeyRingSummary;
}

export interface HealthResponse {
    readonly status: 'ok';
    readonly service: string;
    readonly version: string;
    readonly platform: string;
    readonly recorder: string;
    readonly recorderAvailable: boolean;
    readonly keyCount: number;
    readonly timestamp: string;
}
