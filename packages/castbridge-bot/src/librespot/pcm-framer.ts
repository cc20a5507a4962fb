import type { AudioBlock } from "@castbridge/core";

const BYTES_PER_SAMPLE = 4;

/**
 * Cuts librespot's raw little-endian float output into whole-frame blocks.
 * Bytes of a partial frame are carried into the next chunk.
 */
export class PcmFramer {
  private readonly frameBytes: number;
  private remainder: Buffer = Buffer.alloc(0);

  constructor(channels: number) {
    this.frameBytes = BYTES_PER_SAMPLE * channels;
  }

  push(chunk: Buffer): AudioBlock {
    const data = this.remainder.length > 0 ? Buffer.concat([this.remainder, chunk]) : chunk;
    const usable = data.length - (data.length % this.frameBytes);
    this.remainder = Buffer.from(data.subarray(usable));

    const block = new Float32Array(usable / BYTES_PER_SAMPLE);
    for (let i = 0; i < block.length; i += 1) {
      block[i] = data.readFloatLE(i * BYTES_PER_SAMPLE);
    }
    return block;
  }

  get pendingBytes(): number {
    return this.remainder.length;
  }
}
