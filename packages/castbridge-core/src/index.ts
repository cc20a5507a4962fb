export { createBridgeReadable, DEFAULT_READ_CHUNK_BYTES } from "./bridge-stream.js";
export { BridgeSink, type AudioSink, type SinkFactory, type WriteResult } from "./bridge-sink.js";
export { ByteBridge } from "./byte-bridge.js";
export {
  BridgeClosedError,
  BridgeRoleError,
  MetadataLookupError,
  SampleEncodeError,
  type SampleEncodeFailure,
} from "./errors.js";
export { EventChannel } from "./event-channel.js";
export {
  EventCoordinator,
  formatListeningStatus,
  type EventCoordinatorOptions,
  type PlaybackSessions,
} from "./event-coordinator.js";
export type {
  ConnectSession,
  ConnectSessionFactory,
  MemberDirectory,
  Metadata,
  MetadataRef,
  MetadataResolver,
  OnlineState,
  PlaybackEngineFactory,
  PresenceApi,
  StreamingService,
  VoiceTransport,
} from "./ports.js";
export {
  classifyMembership,
  PresenceTracker,
  type CastingSwitch,
  type MembershipUpdate,
  type PresenceAction,
  type PresenceTrackerOptions,
} from "./presence-tracker.js";
export {
  DEFAULT_ENCODER_OPTIONS,
  encodeBlock,
  resampledFrameCount,
  type AudioBlock,
  type EncodeResult,
  type EncoderOptions,
} from "./sample-encoder.js";
export { SessionController, type SessionControllerOptions } from "./session-controller.js";
export { SerialLock } from "./serial-lock.js";
export { createVolumePolicy, MAX_VOLUME, type VolumePolicy } from "./volume-policy.js";
