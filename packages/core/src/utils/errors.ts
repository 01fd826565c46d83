// Error Utilities
// Typed error classes and teardown helpers shared by capture, transcription and session code

export type StreamingErrorCode =
    | 'PERMISSION'
    | 'AUTHENTICATION'
    | 'TRANSPORT'
    | 'PROTOCOL'
    | 'RESOURCE'
    | 'TIMEOUT'
    | 'CONFIG';

/**
 * Base error with a taxonomy code. These never cross a component boundary as
 * exceptions; callers translate them into boolean results or error messages.
 */
export class StreamingError extends Error {
    public readonly code: StreamingErrorCode;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: StreamingErrorCode, context?: Record<string, unknown>) {
        super(message);
        this.code = code;
        this.context = context;
        this.name = this.constructor.name;
    }
}

export class AuthenticationError extends StreamingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'AUTHENTICATION', context);
    }
}

export class TransportError extends StreamingError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'TRANSPORT', context);
    }
}

export class TimeoutError extends StreamingError {
    public readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', { operation, timeoutMs });
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}

/**
 * Race a promise against a timer. Rejects with TimeoutError when the timer wins.
 * A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    operation: string
): Promise<T> {
    if (timeoutMs <= 0) {
        return promise;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Teardown wrapper: runs fn, logs and swallows any failure.
 * Returns undefined when fn threw.
 */
export async function safeAsync<T>(
    fn: () => Promise<T> | T,
    context: string
): Promise<T | undefined> {
    try {
        return await fn();
    } catch (error) {
        console.warn(`[${context}] ${errorMessage(error)}`);
        return undefined;
    }
}
