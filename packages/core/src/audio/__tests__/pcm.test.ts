import { describe, expect, it } from 'vitest';
import { encodePcm16, peakAmplitude } from '../pcm.js';
import { buildWavFile, buildWavHeader, WAV_HEADER_SIZE } from '../wav.js';

function ascii(bytes: Uint8Array, start: number, end: number): string {
    return String.fromCharCode(...bytes.subarray(start, end));
}

describe('encodePcm16', () => {
    it('should scale full-range samples asymmetrically', () => {
        expect(Array.from(encodePcm16([1, -1, 0]))).toEqual([0xff, 0x7f, 0x00, 0x80, 0x00, 0x00]);
    });

    it('should clamp out-of-range samples', () => {
        expect(Array.from(encodePcm16([2.5, -3]))).toEqual([0xff, 0x7f, 0x00, 0x80]);
    });

    it('should produce two bytes per sample', () => {
        expect(encodePcm16(new Float32Array(4096)).length).toBe(8192);
        expect(encodePcm16([]).length).toBe(0);
    });

    it('should encode little-endian', () => {
        // -0.5 * 32768 = -16384 = 0xC000
        expect(Array.from(encodePcm16([-0.5]))).toEqual([0x00, 0xc0]);
    });
});

describe('peakAmplitude', () => {
    it('should return 0 for empty input', () => {
        expect(peakAmplitude(new Uint8Array(0))).toBe(0);
    });

    it('should return 1 for the most negative sample', () => {
        expect(peakAmplitude(new Uint8Array([0x00, 0x00, 0x00, 0x80]))).toBe(1);
    });

    it('should use the peak absolute sample', () => {
        // 0x4000 = 16384, 0xE000 = -8192
        expect(peakAmplitude(new Uint8Array([0x00, 0x40, 0x00, 0xe0]))).toBe(0.5);
    });

    it('should ignore a trailing odd byte', () => {
        expect(peakAmplitude(new Uint8Array([0x00, 0x40, 0xff]))).toBe(0.5);
        expect(peakAmplitude(new Uint8Array([0xff]))).toBe(0);
    });

    it('should respect the view offset of a subarray', () => {
        const backing = new Uint8Array([0x00, 0x80, 0x00, 0x20]);
        expect(peakAmplitude(backing.subarray(2))).toBe(0.25);
    });

    it('should stay within [0, 1] for encoded audio', () => {
        const amplitude = peakAmplitude(encodePcm16([0.25, -0.75, 1]));
        expect(amplitude).toBeGreaterThanOrEqual(0);
        expect(amplitude).toBeLessThanOrEqual(1);
    });
});

describe('buildWavHeader', () => {
    it('should describe 16 kHz mono PCM16', () => {
        const header = buildWavHeader(100);
        const view = new DataView(header.buffer);

        expect(header.length).toBe(WAV_HEADER_SIZE);
        expect(ascii(header, 0, 4)).toBe('RIFF');
        expect(view.getUint32(4, true)).toBe(136);
        expect(ascii(header, 8, 12)).toBe('WAVE');
        expect(ascii(header, 12, 16)).toBe('fmt ');
        expect(view.getUint32(16, true)).toBe(16);
        expect(view.getUint16(20, true)).toBe(1);
        expect(view.getUint16(22, true)).toBe(1);
        expect(view.getUint32(24, true)).toBe(16000);
        expect(view.getUint32(28, true)).toBe(32000);
        expect(view.getUint16(32, true)).toBe(2);
        expect(view.getUint16(34, true)).toBe(16);
        expect(ascii(header, 36, 40)).toBe('data');
        expect(view.getUint32(40, true)).toBe(100);
    });

    it('should derive byte rate and block align from the channel count', () => {
        const view = new DataView(buildWavHeader(0, 8000, 2).buffer);
        expect(view.getUint32(4, true)).toBe(36);
        expect(view.getUint16(22, true)).toBe(2);
        expect(view.getUint32(28, true)).toBe(32000);
        expect(view.getUint16(32, true)).toBe(4);
    });

    it('should be reproducible', () => {
        expect(buildWavHeader(4096)).toEqual(buildWavHeader(4096));
    });
});

describe('buildWavFile', () => {
    it('should append chunks after the header in order', () => {
        const file = buildWavFile([new Uint8Array([1, 2]), new Uint8Array([3, 4, 5, 6])]);

        expect(file.length).toBe(WAV_HEADER_SIZE + 6);
        expect(new DataView(file.buffer).getUint32(40, true)).toBe(6);
        expect(Array.from(file.subarray(WAV_HEADER_SIZE))).toEqual([1, 2, 3, 4, 5, 6]);
    });
});
