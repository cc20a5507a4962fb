import { Readable } from "node:stream";
import type { ByteBridge } from "./byte-bridge.js";

// 20 ms of 48 kHz stereo float audio.
export const DEFAULT_READ_CHUNK_BYTES = 7680;

export function createBridgeReadable(bridge: ByteBridge, chunkSize = DEFAULT_READ_CHUNK_BYTES): Readable {
  const abort = new AbortController();

  return new Readable({
    read() {
      bridge.pull(chunkSize, abort.signal).then(
        (chunk) => {
          this.push(chunk === null ? null : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
        },
        (error: unknown) => {
          if (!abort.signal.aborted) {
            this.destroy(error instanceof Error ? error : new Error(String(error)));
          }
        },
      );
    },
    destroy(error, callback) {
      abort.abort();
      callback(error);
    },
  });
}
