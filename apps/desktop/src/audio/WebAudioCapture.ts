// Web Audio Capture
// Browser backend: getUserMedia -> AudioContext -> PCM worklet -> PCM16 chunks.
// Retains every chunk of a session and offers it as a WAV download on stop.

import { z } from 'zod';
import {
    SAMPLE_RATE,
    Signal,
    buildWavFile,
    encodePcm16,
    errorMessage,
    peakAmplitude,
    safeAsync,
    type AudioCaptureBackend,
} from '@earshot/core';
import {
    createBrowserAudioEnvironment,
    type BrowserAudioEnvironment,
    type CaptureContext,
    type CaptureGraph,
    type CapturedStream,
} from './browserEnvironment.js';

export interface WebAudioCaptureOptions {
    /** Clock for the exported file name */
    now?: () => number;
}

export const CAPTURE_CONSTRAINTS: MediaStreamConstraints = {
    audio: {
        sampleRate: SAMPLE_RATE,
        channelCount: 1,
        echoCancellation: true,
        noiseSuppression: true,
        autoGainControl: true,
    },
};

const WorkletMessageSchema = z.object({
    type: z.literal('audio'),
    samples: z.instanceof(Float32Array),
});

const PERMISSION_ERROR_NAMES = new Set(['NotAllowedError', 'SecurityError', 'PermissionDeniedError']);

function isPermissionError(error: unknown): boolean {
    return error instanceof Error && PERMISSION_ERROR_NAMES.has(error.name);
}

function releaseStream(stream: CapturedStream): void {
    for (const track of stream.getTracks()) {
        track.stop();
    }
}

export class WebAudioCapture implements AudioCaptureBackend {
    readonly chunks = new Signal<Uint8Array>('chunks');
    readonly amplitude = new Signal<number>('amplitude');
    readonly errors = new Signal<string>('capture-errors');

    private recording = false;
    private disposed = false;
    private stream: CapturedStream | null = null;
    private context: CaptureContext | null = null;
    private processorLoaded = false;
    private graph: CaptureGraph | null = null;
    private captured: Uint8Array[] = [];
    private readonly now: () => number;

    constructor(
        private readonly env: BrowserAudioEnvironment = createBrowserAudioEnvironment(),
        options: WebAudioCaptureOptions = {}
    ) {
        this.now = options.now ?? Date.now;
    }

    get isRecording(): boolean {
        return this.recording;
    }

    /**
     * Asks the Permissions API without prompting. 'prompt' counts as permitted,
     * since start() will raise the browser dialog. Where the API cannot answer,
     * falls back to requesting the microphone, which may prompt.
     */
    async hasPermission(): Promise<boolean> {
        try {
            const state = await this.env.queryMicrophonePermission();
            if (state !== null) {
                return state !== 'denied';
            }

            const probe = await this.env.getUserMedia({ audio: true });
            releaseStream(probe);
            return true;
        } catch (error) {
            if (isPermissionError(error)) {
                return false;
            }
            this.errors.emit(`Permission check failed: ${errorMessage(error)}`);
            return false;
        }
    }

    async start(): Promise<boolean> {
        if (this.disposed) {
            this.errors.emit('Audio capture has been disposed');
            return false;
        }
        if (this.recording) return true;

        let stream: CapturedStream | null = null;
        try {
            stream = await this.env.getUserMedia(CAPTURE_CONSTRAINTS);
            const context = await this.prepareContext();

            const graph = context.connect(stream);
            graph.port.onmessage = (event) => this.handleWorkletMessage(event.data);

            this.stream = stream;
            this.graph = graph;
            this.captured = [];
            this.recording = true;
            console.log('[capture] Browser capture started');
            return true;
        } catch (error) {
            if (stream) releaseStream(stream);

            const message = isPermissionError(error)
                ? 'Microphone permission denied'
                : `Failed to start recording: ${errorMessage(error)}`;
            console.error(`[capture] ${message}`);
            this.errors.emit(message);
            return false;
        }
    }

    /**
     * @returns file name of the downloaded WAV, or null when nothing was captured
     */
    async stop(): Promise<string | null> {
        if (!this.recording) return null;
        this.recording = false;

        const captured = this.captured;
        this.captured = [];

        try {
            this.graph?.disconnect();
            if (this.stream) releaseStream(this.stream);
        } finally {
            this.graph = null;
            this.stream = null;
            this.amplitude.emit(0);
        }

        if (captured.length === 0) {
            return null;
        }

        const fileName = `recording_${this.now()}.wav`;
        try {
            this.env.saveFile(buildWavFile(captured), fileName, 'audio/wav');
        } catch (error) {
            console.error('[capture] Failed to export recording:', error);
            this.errors.emit(`Failed to export recording: ${errorMessage(error)}`);
            return null;
        }

        console.log(`[capture] Browser capture stopped, exported ${fileName}`);
        return fileName;
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;

        await this.stop();
        this.disposed = true;

        const context = this.context;
        this.context = null;
        if (context && context.state !== 'closed') {
            await safeAsync(() => context.close(), 'capture');
        }

        this.chunks.clear();
        this.amplitude.clear();
        this.errors.clear();
    }

    /**
     * Context is created on first start and reused; the worklet module loads once per context.
     */
    private async prepareContext(): Promise<CaptureContext> {
        let context = this.context;
        if (!context || context.state === 'closed') {
            context = this.env.createContext(SAMPLE_RATE);
            this.context = context;
            this.processorLoaded = false;
        }

        if (!this.processorLoaded) {
            await context.loadProcessor(this.env.processorModuleUrl());
            this.processorLoaded = true;
        }

        if (context.state === 'suspended') {
            await context.resume();
        }

        return context;
    }

    private handleWorkletMessage(data: unknown): void {
        const parsed = WorkletMessageSchema.safeParse(data);
        if (!parsed.success) {
            console.warn('[capture] Ignoring unexpected worklet message');
            return;
        }
        if (!this.recording) return;

        const chunk = encodePcm16(parsed.data.samples);
        this.captured.push(chunk);
        this.chunks.emit(chunk);
        this.amplitude.emit(peakAmplitude(chunk));
    }
}
