// API Contracts
// Shared DTOs for transcription sessions and persisted recordings
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

// ============================================
// TRANSCRIPTION
// ============================================

export interface TranscriptionResult {
    readonly text: string;
    readonly isFinal: boolean;
    readonly timestamp: number;
}

/**
 * Lifecycle of the streaming connection.
 * `error` is transient: it always resolves back to `idle` after cleanup.
 */
export type SessionPhase =
    | 'idle'
    | 'authenticating'
    | 'connecting'
    | 'awaiting-ready'
    | 'active'
    | 'closing'
    | 'error';

export interface StreamingStatus {
    readonly phase: SessionPhase;
    readonly connected: boolean;
    readonly bytesSent: number;
    readonly transcriptCount: number;
    readonly lastEventAt?: number;
}

// ============================================
// RECORDINGS
// ============================================

// Persisted shape. `dateTime` is the ISO-8601 start time.
export interface RecordingSessionRecord {
    readonly id: string;
    readonly dateTime: string;
    readonly durationMs: number;
    readonly transcript: string;
    readonly audioPath: string | null;
}

// ============================================
// LIVE STATE
// ============================================

export interface TranscriberSnapshot {
    readonly isRecording: boolean;
    readonly isConnected: boolean;
    readonly error: string | null;
    readonly amplitude: number;
    readonly partialTranscript: string;
    readonly finalSegments: readonly string[];
    readonly fullTranscript: string;
    readonly keyCount: number;
    readonly savedSessions: readonly RecordingSessionRecord[];
}

export interface KeyRingSummary {
    readonly count: number;
    readonly cursor: number;
}
