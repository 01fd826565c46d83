// Recorder presets
// Command lines for external programs that write raw s16le, 16 kHz mono PCM to stdout

import { SAMPLE_RATE } from '@earshot/core';

export type RecorderKind = 'sox' | 'arecord' | 'ffmpeg';

export interface RecorderCommand {
    program: string;
    args: string[];
    /** Extra environment for the child process */
    env?: Record<string, string>;
}

const RATE = SAMPLE_RATE.toString();

function ffmpegInput(platform: NodeJS.Platform, device?: string): string[] {
    switch (platform) {
        case 'darwin':
            return ['-f', 'avfoundation', '-i', device ?? ':0'];
        case 'win32':
            return ['-f', 'dshow', '-i', `audio=${device ?? 'default'}`];
        default:
            return ['-f', 'alsa', '-i', device ?? 'default'];
    }
}

export function buildRecorderCommand(
    kind: RecorderKind,
    device?: string,
    platform: NodeJS.Platform = process.platform
): RecorderCommand {
    switch (kind) {
        case 'sox':
            // `rec` picks its input from AUDIODEV
            return {
                program: 'rec',
                args: ['-q', '-t', 'raw', '-r', RATE, '-c', '1', '-b', '16', '-e', 'signed-integer', '-L', '-'],
                env: device ? { AUDIODEV: device } : undefined,
            };

        case 'arecord':
            return {
                program: 'arecord',
                args: [...(device ? ['-D', device] : []), '-q', '-f', 'S16_LE', '-r', RATE, '-c', '1', '-t', 'raw'],
            };

        case 'ffmpeg':
            return {
                program: 'ffmpeg',
                args: [
                    '-hide_banner',
                    '-loglevel',
                    'error',
                    ...ffmpegInput(platform, device),
                    '-ac',
                    '1',
                    '-ar',
                    RATE,
                    '-f',
                    's16le',
                    '-',
                ],
            };
    }
}
