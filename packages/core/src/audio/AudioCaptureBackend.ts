// Audio Capture Backend
// Capability contract shared by the native (recorder process) and browser (Web Audio) variants

import type { Signal } from '../utils/Signal.js';

export interface AudioCaptureBackend {
    /** Whether capture is currently running */
    readonly isRecording: boolean;

    /** PCM16 LE, 16 kHz mono chunks, in capture order */
    readonly chunks: Signal<Uint8Array>;

    /** Peak amplitude in [0, 1], once per chunk; 0 on stop */
    readonly amplitude: Signal<number>;

    /** Human-readable capture failures */
    readonly errors: Signal<string>;

    hasPermission(): Promise<boolean>;

    /**
     * Begin capture. Idempotent while recording.
     * Never throws: failures emit on `errors` and resolve false.
     */
    start(): Promise<boolean>;

    /**
     * End capture and release platform resources.
     * @returns reference to an exported audio artifact, or null when the variant produces none
     */
    stop(): Promise<string | null>;

    dispose(): Promise<void>;
}
