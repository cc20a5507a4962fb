import type { VolumePolicySpec } from "@castbridge/contracts";

export const MAX_VOLUME = 65535;

export interface VolumePolicy {
  readonly spec: VolumePolicySpec;
  /** Last known device volume, 0..65535. */
  readonly volume: number;
  readonly gain: number;
  update(volume: number): void;
}

function clampVolume(volume: number): number {
  if (!Number.isFinite(volume)) {
    return 0;
  }
  return Math.max(0, Math.min(MAX_VOLUME, Math.round(volume)));
}

class FixedVolumePolicy implements VolumePolicy {
  readonly spec: VolumePolicySpec = { kind: "fixed" };
  readonly gain = 1;

  constructor(readonly volume: number) {}

  update(): void {
    // Volume requests from the remote controller are ignored.
  }
}

class AdjustableVolumePolicy implements VolumePolicy {
  // The remote device applies its own curve; samples pass through untouched.
  readonly gain = 1;
  private current: number;

  constructor(readonly spec: Extract<VolumePolicySpec, { kind: "adjustable" }>, initialVolume: number) {
    this.current = initialVolume;
  }

  get volume(): number {
    return this.current;
  }

  update(volume: number): void {
    this.current = clampVolume(volume);
  }
}

class ExternalVolumePolicy implements VolumePolicy {
  readonly spec: VolumePolicySpec = { kind: "external" };
  private current: number;

  constructor(initialVolume: number) {
    this.current = initialVolume;
  }

  get volume(): number {
    return this.current;
  }

  get gain(): number {
    return this.current / MAX_VOLUME;
  }

  update(volume: number): void {
    this.current = clampVolume(volume);
  }
}

export function createVolumePolicy(spec: VolumePolicySpec, initialVolume: number): VolumePolicy {
  const volume = clampVolume(initialVolume);
  switch (spec.kind) {
    case "fixed":
      return new FixedVolumePolicy(volume);
    case "adjustable":
      return new AdjustableVolumePolicy(spec, volume);
    case "external":
      return new ExternalVolumePolicy(volume);
  }
}
