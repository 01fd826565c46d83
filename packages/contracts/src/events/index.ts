// Event Contracts
// Live events streamed from the agent to the desktop shell
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { TranscriberSnapshot, TranscriptionResult } from '../api/index.js';

// ============================================
// SESSION EVENTS
// ============================================

export interface SnapshotEvent {
    readonly type: 'snapshot';
    readonly timestamp: number;
    readonly payload: TranscriberSnapshot;
}

export interface ConnectionEvent {
    readonly type: 'connection';
    readonly timestamp: number;
    readonly payload: {
        readonly connected: boolean;
    };
}

// ============================================
// TRANSCRIPTION EVENTS
// ============================================

export interface TranscriptEvent {
    readonly type: 'transcript';
    readonly timestamp: number;
    readonly payload: TranscriptionResult;
}

// ============================================
// ERROR EVENTS
// ============================================

export interface ErrorEvent {
    readonly type: 'error';
    readonly timestamp: number;
    readonly payload: {
        readonly message: string;
    };
}

// ============================================
// UNION TYPE
// ============================================

export type LiveEvent =
    | SnapshotEvent
    | ConnectionEvent
    | TranscriptEvent
    | ErrorEvent;
