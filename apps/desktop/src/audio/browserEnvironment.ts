// Browser Audio Environment
// The slice of the Web platform the browser capture backend touches: media devices,
// permissions, the audio graph and file download. Tests substitute a fake.

import { errorMessage } from '@earshot/core';
import { PCM_WORKLET_PROCESSOR_NAME, PCM_WORKLET_SOURCE } from './pcmWorklet.js';

export interface CapturedTrack {
    stop(): void;
}

export interface CapturedStream {
    getTracks(): CapturedTrack[];
}

export interface WorkletPort {
    onmessage: ((event: MessageEvent) => void) | null;
}

/** Source -> worklet chain for one capture */
export interface CaptureGraph {
    readonly port: WorkletPort;
    disconnect(): void;
}

export interface CaptureContext {
    readonly state: AudioContextState;
    resume(): Promise<void>;
    close(): Promise<void>;
    loadProcessor(moduleUrl: string): Promise<void>;
    connect(stream: CapturedStream): CaptureGraph;
}

export interface BrowserAudioEnvironment {
    getUserMedia(constraints: MediaStreamConstraints): Promise<CapturedStream>;

    /** null when the Permissions API cannot answer for the microphone */
    queryMicrophonePermission(): Promise<PermissionState | null>;

    createContext(sampleRate: number): CaptureContext;
    processorModuleUrl(): string;
    saveFile(bytes: Uint8Array, fileName: string, mimeType: string): void;
}

// 'microphone' is not in every lib's PermissionName union
interface MicrophonePermissionQuery {
    query(descriptor: { name: string }): Promise<PermissionStatus>;
}

class WebAudioCaptureContext implements CaptureContext {
    constructor(private readonly context: AudioContext) {}

    get state(): AudioContextState {
        return this.context.state;
    }

    resume(): Promise<void> {
        return this.context.resume();
    }

    close(): Promise<void> {
        return this.context.close();
    }

    loadProcessor(moduleUrl: string): Promise<void> {
        return this.context.audioWorklet.addModule(moduleUrl);
    }

    connect(stream: CapturedStream): CaptureGraph {
        if (!(stream instanceof MediaStream)) {
            throw new TypeError('Audio graph requires a MediaStream');
        }

        const source = this.context.createMediaStreamSource(stream);
        const worklet = new AudioWorkletNode(this.context, PCM_WORKLET_PROCESSOR_NAME);
        source.connect(worklet);
        // The processor writes no output; the connection keeps it scheduled
        worklet.connect(this.context.destination);

        return {
            port: worklet.port,
            disconnect: () => {
                worklet.port.onmessage = null;
                source.disconnect();
                worklet.disconnect();
            },
        };
    }
}

export function createBrowserAudioEnvironment(): BrowserAudioEnvironment {
    let moduleUrl: string | null = null;

    return {
        getUserMedia: (constraints) => navigator.mediaDevices.getUserMedia(constraints),

        async queryMicrophonePermission() {
            if (!navigator.permissions) return null;

            const permissions: MicrophonePermissionQuery = navigator.permissions;
            try {
                const status = await permissions.query({ name: 'microphone' });
                return status.state;
            } catch (error) {
                console.warn('[capture] Permission query unavailable:', errorMessage(error));
                return null;
            }
        },

        createContext: (sampleRate) => new WebAudioCaptureContext(new AudioContext({ sampleRate })),

        processorModuleUrl() {
            if (!moduleUrl) {
                moduleUrl = URL.createObjectURL(new Blob([PCM_WORKLET_SOURCE], { type: 'application/javascript' }));
            }
            return moduleUrl;
        },

        saveFile(bytes, fileName, mimeType) {
            const buffer = new ArrayBuffer(bytes.length);
            new Uint8Array(buffer).set(bytes);

            const url = URL.createObjectURL(new Blob([buffer], { type: mimeType }));
            const anchor = document.createElement('a');
            anchor.href = url;
            anchor.download = fileName;
            anchor.style.display = 'none';
            document.body.append(anchor);
            anchor.click();
            anchor.remove();
            URL.revokeObjectURL(url);
        },
    };
}
