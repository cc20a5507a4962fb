import { Transform, type TransformCallback } from "node:stream";

const FLOAT_BYTES = 4;
const INT16_BYTES = 2;

export function floatToInt16(sample: number): number {
  const clamped = Math.max(-1, Math.min(1, sample));
  return Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff);
}

export class FloatToInt16Transform extends Transform {
  private remainder: Buffer = Buffer.alloc(0);

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    const data = this.remainder.length > 0 ? Buffer.concat([this.remainder, chunk]) : chunk;
    const samples = Math.floor(data.length / FLOAT_BYTES);
    const out = Buffer.alloc(samples * INT16_BYTES);

    for (let i = 0; i < samples; i += 1) {
      out.writeInt16LE(floatToInt16(data.readFloatLE(i * FLOAT_BYTES)), i * INT16_BYTES);
    }

    this.remainder = Buffer.from(data.subarray(samples * FLOAT_BYTES));
    callback(null, out);
  }
}
