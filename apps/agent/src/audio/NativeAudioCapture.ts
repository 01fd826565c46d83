// Native Audio Capture
// Spawns a recorder program, reads raw PCM16 from its stdout and republishes it
// as sample-aligned chunks. The recorder writes no file; stop() returns null.

import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { Readable } from 'node:stream';
import { Signal, errorMessage, peakAmplitude, type AudioCaptureBackend } from '@earshot/core';
import { buildRecorderCommand, type RecorderCommand, type RecorderKind } from './recorders.js';

/**
 * The slice of ChildProcess the capture relies on
 */
export interface RecorderProcess {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals | number): boolean;
    on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnRecorder = (command: RecorderCommand) => RecorderProcess;

export interface NativeAudioCaptureOptions {
    recorder: RecorderKind;
    device?: string;
    spawn?: SpawnRecorder;
    /** Whether a program name resolves to an executable */
    isInstalled?: (program: string) => boolean;
    /** How long the recorder must survive before start() succeeds */
    settleMs?: number;
    /** Wait after SIGINT before SIGKILL */
    stopGraceMs?: number;
}

const DEFAULT_SETTLE_MS = 200;
const DEFAULT_STOP_GRACE_MS = 2000;
const STDERR_TAIL_LENGTH = 500;

function spawnRecorder(command: RecorderCommand): RecorderProcess {
    return spawn(command.program, command.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: command.env ? { ...process.env, ...command.env } : process.env,
    });
}

export function isOnPath(program: string, pathVariable = process.env.PATH ?? ''): boolean {
    const candidates = process.platform === 'win32' ? [program, `${program}.exe`] : [program];
    return pathVariable
        .split(delimiter)
        .filter((dir) => dir.length > 0)
        .some((dir) => candidates.some((name) => existsSync(join(dir, name))));
}

export class NativeAudioCapture implements AudioCaptureBackend {
    readonly chunks = new Signal<Uint8Array>('native-chunks');
    readonly amplitude = new Signal<number>('native-amplitude');
    readonly errors = new Signal<string>('native-errors');

    private readonly command: RecorderCommand;
    private readonly spawn: SpawnRecorder;
    private readonly isInstalled: (program: string) => boolean;
    private readonly settleMs: number;
    private readonly stopGraceMs: number;

    private process: RecorderProcess | null = null;
    private ended: Promise<string> | null = null;
    private recording = false;
    private disposed = false;
    private carry: Uint8Array | null = null;
    private stderrTail = '';

    constructor(options: NativeAudioCaptureOptions) {
        this.command = buildRecorderCommand(options.recorder, options.device);
        this.spawn = options.spawn ?? spawnRecorder;
        this.isInstalled = options.isInstalled ?? ((program) => isOnPath(program));
        this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
        this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    }

    get isRecording(): boolean {
        return this.recording;
    }

    get program(): string {
        return this.command.program;
    }

    /**
     * Query only. Recorder programs have no permission prompt of their own, so
     * availability of the program is the closest check that never blocks.
     */
    async hasPermission(): Promise<boolean> {
        const available = this.isInstalled(this.command.program);
        if (!available) {
            console.warn(`[native-capture] ${this.command.program} not found on PATH`);
        }
        return available;
    }

    async start(): Promise<boolean> {
        if (this.recording) return true;
        if (this.disposed) {
            this.errors.emit('Audio capture has been disposed');
            return false;
        }

        console.log(`[native-capture] Starting ${this.command.program} ${this.command.args.join(' ')}`);

        let child: RecorderProcess;
        try {
            child = this.spawn(this.command);
        } catch (error) {
            this.errors.emit(`Failed to start recording: ${errorMessage(error)}`);
            return false;
        }

        this.process = child;
        this.carry = null;
        this.stderrTail = '';

        const ended = this.watch(child);
        this.ended = ended;
        void ended.then((reason) => this.handleExit(child, reason));

        child.stdout?.on('data', (data: Uint8Array) => this.handleData(child, data));
        child.stderr?.on('data', (data: Uint8Array) => this.handleStderr(data));

        const earlyExit = await this.settle(ended);
        if (earlyExit !== null || this.process !== child) {
            const tail = this.stderrTail.trim();
            const reason = earlyExit ?? 'exited during startup';
            this.errors.emit(
                `Failed to start recording: ${this.command.program} ${reason}${tail ? ` (${tail})` : ''}`
            );
            return false;
        }

        this.recording = true;
        console.log('[native-capture] Recording started');
        return true;
    }

    async stop(): Promise<string | null> {
        const child = this.process;
        const ended = this.ended;
        this.process = null;
        this.ended = null;
        this.recording = false;
        this.carry = null;

        if (child && ended) {
            await this.terminate(child, ended);
            console.log('[native-capture] Recording stopped');
        }

        this.amplitude.emit(0);
        return null;
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;
        await this.stop();
        this.disposed = true;

        this.chunks.clear();
        this.amplitude.clear();
        this.errors.clear();
    }

    /**
     * Resolves once with a description of how the process ended
     */
    private watch(child: RecorderProcess): Promise<string> {
        return new Promise((resolve) => {
            child.on('error', (error) => resolve(`failed to launch: ${error.message}`));
            child.on('exit', (code, signal) =>
                resolve(signal ? `exited on signal ${signal}` : `exited with code ${code ?? 'unknown'}`)
            );
        });
    }

    /**
     * null when the recorder is still alive after the settle period
     */
    private async settle(ended: Promise<string>): Promise<string | null> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const alive = new Promise<null>((resolve) => {
            timer = setTimeout(() => resolve(null), this.settleMs);
        });

        try {
            return await Promise.race([ended, alive]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async terminate(child: RecorderProcess, ended: Promise<string>): Promise<void> {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const grace = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), this.stopGraceMs);
        });

        this.signal(child, 'SIGINT');
        const outcome = await Promise.race([ended, grace]);
        clearTimeout(timer);

        if (outcome === 'timeout') {
            console.warn(`[native-capture] ${this.command.program} didn't exit gracefully, forcing kill`);
            this.signal(child, 'SIGKILL');
        }
    }

    private signal(child: RecorderProcess, signal: NodeJS.Signals): void {
        try {
            child.kill(signal);
        } catch (error) {
            console.warn(`[native-capture] Failed to send ${signal}: ${errorMessage(error)}`);
        }
    }

    private handleData(child: RecorderProcess, data: Uint8Array): void {
        if (this.process !== child) return;

        let bytes = data;
        if (this.carry) {
            bytes = new Uint8Array(this.carry.length + data.length);
            bytes.set(this.carry, 0);
            bytes.set(data, this.carry.length);
            this.carry = null;
        }

        // Hold back an odd trailing byte so every chunk is whole samples
        const usable = bytes.length - (bytes.length % 2);
        if (usable < bytes.length) {
            this.carry = new Uint8Array(bytes.subarray(usable));
        }
        if (usable === 0) return;

        const chunk = new Uint8Array(bytes.subarray(0, usable));
        this.chunks.emit(chunk);
        this.amplitude.emit(peakAmplitude(chunk));
    }

    private handleStderr(data: Uint8Array): void {
        const text = new TextDecoder().decode(data);
        this.stderrTail = (this.stderrTail + text).slice(-STDERR_TAIL_LENGTH);

        const message = text.trim();
        if (message) {
            console.log(`[native-capture] ${this.command.program}: ${message}`);
        }
    }

    private handleExit(child: RecorderProcess, reason: string): void {
        console.log(`[native-capture] ${this.command.program} ${reason}`);
        if (this.process !== child) return;

        // Not initiated by stop()
        const wasRecording = this.recording;
        this.process = null;
        this.ended = null;
        this.recording = false;
        this.carry = null;

        if (wasRecording) {
            this.amplitude.emit(0);
            this.errors.emit(`Recorder stopped unexpectedly: ${this.command.program} ${reason}`);
        }
    }
}
