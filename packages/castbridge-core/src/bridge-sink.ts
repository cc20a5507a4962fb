import type { ByteBridge } from "./byte-bridge.js";
import { BridgeClosedError, type SampleEncodeError } from "./errors.js";
import { encodeBlock, type AudioBlock, type EncoderOptions } from "./sample-encoder.js";
import type { VolumePolicy } from "./volume-policy.js";

export type WriteResult =
  | { ok: true }
  | { ok: false; error: SampleEncodeError | BridgeClosedError };

export interface AudioSink {
  write(block: AudioBlock): Promise<WriteResult>;
}

export type SinkFactory = () => AudioSink;

export class BridgeSink implements AudioSink {
  constructor(
    private readonly bridge: ByteBridge,
    private readonly encoder: EncoderOptions,
    private readonly volume?: VolumePolicy,
  ) {}

  async write(block: AudioBlock): Promise<WriteResult> {
    const encoded = encodeBlock(block, this.encoder, this.volume?.gain ?? 1);
    if (!encoded.ok) {
      return encoded;
    }

    try {
      await this.bridge.push(encoded.bytes);
    } catch (error) {
      if (error instanceof BridgeClosedError) {
        return { ok: false, error };
      }
      throw error;
    }
    return { ok: true };
  }
}
