export type SampleEncodeFailure = "invalid_options" | "misaligned_block" | "non_finite_sample";

export class SampleEncodeError extends Error {
  readonly reason: SampleEncodeFailure;

  constructor(reason: SampleEncodeFailure, message: string) {
    super(message);
    this.name = "SampleEncodeError";
    this.reason = reason;
  }
}

export class BridgeClosedError extends Error {
  constructor() {
    super("Byte bridge is closed");
    this.name = "BridgeClosedError";
  }
}

export class BridgeRoleError extends Error {
  constructor(role: "producer" | "consumer") {
    super(`Byte bridge already has an active ${role}`);
    this.name = "BridgeRoleError";
  }
}

export class MetadataLookupError extends Error {
  readonly id: string;

  constructor(id: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MetadataLookupError";
    this.id = id;
  }
}
