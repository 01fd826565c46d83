// PCM Capture Worklet
// AudioWorkletProcessor source, loaded into the audio rendering thread from a Blob URL.
// Buffers raw Float32 samples into fixed-size blocks and posts each full block to the main thread.

export const PCM_WORKLET_PROCESSOR_NAME = 'pcm-capture-processor';

/** Samples per posted block (256ms at 16kHz) */
export const WORKLET_BLOCK_SIZE = 4096;

export const PCM_WORKLET_SOURCE = `
class PcmCaptureProcessor extends AudioWorkletProcessor {
    constructor() {
        super();
        this.block = new Float32Array(${WORKLET_BLOCK_SIZE});
        this.offset = 0;
    }

    process(inputs) {
        const channel = inputs[0] && inputs[0][0];
        if (!channel) return true;

        let read = 0;
        while (read < channel.length) {
            const count = Math.min(channel.length - read, this.block.length - this.offset);
            this.block.set(channel.subarray(read, read + count), this.offset);
            this.offset += count;
            read += count;

            if (this.offset === this.block.length) {
                const samples = this.block;
                this.port.postMessage({ type: 'audio', samples }, [samples.buffer]);
                this.block = new Float32Array(${WORKLET_BLOCK_SIZE});
                this.offset = 0;
            }
        }

        return true;
    }
}

registerProcessor('${PCM_WORKLET_PROCESSOR_NAME}', PcmCaptureProcessor);
`;
