import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { floatToInt16, FloatToInt16Transform } from "../src/discord/float-pcm.js";
import { PcmFramer } from "../src/librespot/pcm-framer.js";

function floats(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, index) => buffer.writeFloatLE(value, index * 4));
  return buffer;
}

describe("PcmFramer", () => {
  it("emits whole stereo frames and carries partial ones", () => {
    const framer = new PcmFramer(2);
    const bytes = floats([0.5, -0.5, 0.25, -0.25]);

    const first = framer.push(bytes.subarray(0, 11));
    expect(Array.from(first)).toEqual([0.5, -0.5]);
    expect(framer.pendingBytes).toBe(3);

    const second = framer.push(bytes.subarray(11));
    expect(Array.from(second)).toEqual([0.25, -0.25]);
    expect(framer.pendingBytes).toBe(0);
  });

  it("returns an empty block while less than a frame is buffered", () => {
    const framer = new PcmFramer(2);
    expect(framer.push(Buffer.alloc(5)).length).toBe(0);
    expect(framer.pendingBytes).toBe(5);
  });
});

describe("floatToInt16", () => {
  it("scales and clamps samples", () => {
    expect(floatToInt16(0)).toBe(0);
    expect(floatToInt16(1)).toBe(32767);
    expect(floatToInt16(-1)).toBe(-32768);
    expect(floatToInt16(0.5)).toBe(16384);
    expect(floatToInt16(2)).toBe(32767);
    expect(floatToInt16(-3)).toBe(-32768);
  });
});

describe("FloatToInt16Transform", () => {
  it("converts samples split across chunk boundaries", async () => {
    const transform = new FloatToInt16Transform();
    const output: Buffer[] = [];
    transform.on("data", (chunk: Buffer) => output.push(chunk));

    const input = floats([1, -1, 0.5]);
    const source = new PassThrough();
    source.pipe(transform);
    source.write(input.subarray(0, 6));
    source.end(input.subarray(6));
    await new Promise<void>((resolve) => transform.on("end", () => resolve()));

    const joined = Buffer.concat(output);
    expect(joined.length).toBe(6);
    expect([joined.readInt16LE(0), joined.readInt16LE(2), joined.readInt16LE(4)]).toEqual([32767, -32768, 16384]);
  });
});
