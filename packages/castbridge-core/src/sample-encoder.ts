import { SampleEncodeError } from "./errors.js";

export type AudioBlock = Float32Array;

export interface EncoderOptions {
  inputRate: number;
  outputRate: number;
  channels: number;
}

export const DEFAULT_ENCODER_OPTIONS: EncoderOptions = {
  inputRate: 44_100,
  outputRate: 48_000,
  channels: 2,
};

export type EncodeResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: SampleEncodeError };

const BYTES_PER_SAMPLE = 4;

function validateOptions(options: EncoderOptions): SampleEncodeError | undefined {
  const { inputRate, outputRate, channels } = options;
  if (!Number.isFinite(inputRate) || inputRate <= 0 || !Number.isFinite(outputRate) || outputRate <= 0) {
    return new SampleEncodeError("invalid_options", `Invalid sample rates ${inputRate} -> ${outputRate}`);
  }
  if (!Number.isInteger(channels) || channels < 1) {
    return new SampleEncodeError("invalid_options", `Invalid channel count ${channels}`);
  }
  return undefined;
}

export function resampledFrameCount(inputFrames: number, options: EncoderOptions): number {
  if (inputFrames === 0) {
    return 0;
  }
  return Math.ceil((inputFrames * options.outputRate) / options.inputRate);
}

/**
 * Resamples one interleaved block by linear interpolation and encodes every
 * output sample as a little-endian 32-bit float.
 *
 * Blocks are converted independently, so phase drifts slightly at block
 * boundaries.
 */
export function encodeBlock(samples: AudioBlock, options: EncoderOptions = DEFAULT_ENCODER_OPTIONS, gain = 1): EncodeResult {
  const invalid = validateOptions(options);
  if (invalid) {
    return { ok: false, error: invalid };
  }

  const { channels } = options;
  if (samples.length % channels !== 0) {
    return {
      ok: false,
      error: new SampleEncodeError(
        "misaligned_block",
        `Block of ${samples.length} samples is not a whole number of ${channels}-channel frames`,
      ),
    };
  }

  for (let i = 0; i < samples.length; i += 1) {
    if (!Number.isFinite(samples[i])) {
      return {
        ok: false,
        error: new SampleEncodeError("non_finite_sample", `Sample ${i} is not finite`),
      };
    }
  }

  const inputFrames = samples.length / channels;
  const outputFrames = resampledFrameCount(inputFrames, options);
  const bytes = new Uint8Array(outputFrames * channels * BYTES_PER_SAMPLE);
  const view = new DataView(bytes.buffer);
  const step = options.inputRate / options.outputRate;
  const lastFrame = inputFrames - 1;

  let offset = 0;
  for (let frame = 0; frame < outputFrames; frame += 1) {
    const position = frame * step;
    const i0 = Math.min(Math.floor(position), lastFrame);
    const i1 = Math.min(i0 + 1, lastFrame);
    const fraction = i1 === i0 ? 0 : position - i0;

    for (let channel = 0; channel < channels; channel += 1) {
      const a = samples[(i0 * channels) + channel];
      const b = samples[(i1 * channels) + channel];
      view.setFloat32(offset, (a + ((b - a) * fraction)) * gain, true);
      offset += BYTES_PER_SAMPLE;
    }
  }

  return { ok: true, bytes };
}
