// WAV Container
// 44-byte RIFF header for uncompressed PCM16 audio

import { BYTES_PER_SAMPLE, CHANNELS, SAMPLE_RATE } from './pcm.js';

export const WAV_HEADER_SIZE = 44;

function writeAscii(view: DataView, offset: number, value: string): void {
    for (let i = 0; i < value.length; i++) {
        view.setUint8(offset + i, value.charCodeAt(i));
    }
}

export function buildWavHeader(
    dataLength: number,
    sampleRate: number = SAMPLE_RATE,
    channels: number = CHANNELS
): Uint8Array {
    const header = new Uint8Array(WAV_HEADER_SIZE);
    const view = new DataView(header.buffer);
    const blockAlign = channels * BYTES_PER_SAMPLE;

    // RIFF descriptor
    writeAscii(view, 0, 'RIFF');
    view.setUint32(4, dataLength + 36, true);
    writeAscii(view, 8, 'WAVE');

    // fmt sub-chunk
    writeAscii(view, 12, 'fmt ');
    view.setUint32(16, 16, true);
    view.setUint16(20, 1, true); // PCM
    view.setUint16(22, channels, true);
    view.setUint32(24, sampleRate, true);
    view.setUint32(28, sampleRate * blockAlign, true);
    view.setUint16(32, blockAlign, true);
    view.setUint16(34, BYTES_PER_SAMPLE * 8, true);

    // data sub-chunk
    writeAscii(view, 36, 'data');
    view.setUint32(40, dataLength, true);

    return header;
}

/**
 * Header followed by every chunk, in order
 */
export function buildWavFile(
    chunks: readonly Uint8Array[],
    sampleRate: number = SAMPLE_RATE,
    channels: number = CHANNELS
): Uint8Array {
    const dataLength = chunks.reduce((total, chunk) => total + chunk.length, 0);
    const file = new Uint8Array(WAV_HEADER_SIZE + dataLength);
    file.set(buildWavHeader(dataLength, sampleRate, channels), 0);

    let offset = WAV_HEADER_SIZE;
    for (const chunk of chunks) {
        file.set(chunk, offset);
        offset += chunk.length;
    }

    return file;
}
