// PCM Frame Codec
// Float samples -> 16-bit little-endian PCM, and amplitude from PCM16 bytes

export const SAMPLE_RATE = 16000;
export const CHANNELS = 1;
export const BYTES_PER_SAMPLE = 2;

const INT16_NEGATIVE_SCALE = 0x8000;
const INT16_POSITIVE_SCALE = 0x7fff;

/**
 * Encode float samples in [-1, 1] as PCM16 LE.
 * Out-of-range samples are clamped. Negative values scale by 32768, the rest by 32767.
 */
export function encodePcm16(samples: ArrayLike<number>): Uint8Array {
    const bytes = new Uint8Array(samples.length * BYTES_PER_SAMPLE);
    const view = new DataView(bytes.buffer);

    for (let i = 0; i < samples.length; i++) {
        const s = Math.max(-1, Math.min(1, samples[i]));
        view.setInt16(i * BYTES_PER_SAMPLE, s < 0 ? s * INT16_NEGATIVE_SCALE : s * INT16_POSITIVE_SCALE, true);
    }

    return bytes;
}

/**
 * Peak absolute sample of a PCM16 LE buffer, normalized to [0, 1].
 * A trailing odd byte is ignored.
 */
export function peakAmplitude(pcm: Uint8Array): number {
    const sampleCount = Math.floor(pcm.length / BYTES_PER_SAMPLE);
    if (sampleCount === 0) {
        return 0;
    }

    const view = new DataView(pcm.buffer, pcm.byteOffset, sampleCount * BYTES_PER_SAMPLE);
    let peak = 0;
    for (let i = 0; i < sampleCount; i++) {
        const abs = Math.abs(view.getInt16(i * BYTES_PER_SAMPLE, true));
        if (abs > peak) peak = abs;
    }

    return Math.min(1, peak / INT16_NEGATIVE_SCALE);
}
