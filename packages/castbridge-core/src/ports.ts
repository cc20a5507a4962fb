import type { Readable } from "node:stream";
import type { ConnectDeviceConfig, PlaybackEvent, VoiceBitrate } from "@castbridge/contracts";
import type { SinkFactory } from "./bridge-sink.js";
import type { VolumePolicy } from "./volume-policy.js";

export type MetadataRef = { kind: "track"; id: string } | { kind: "artist"; id: string };

export type Metadata =
  | { kind: "track"; id: string; name: string; artistIds: string[] }
  | { kind: "artist"; id: string; name: string };

export interface StreamingService<S, C> {
  connect(credentials: C): Promise<S>;
}

/** Rejects with MetadataLookupError when the id cannot be resolved. */
export interface MetadataResolver<S> {
  resolveMetadata(session: S, ref: MetadataRef): Promise<Metadata>;
}

export interface PlaybackEngineFactory<S, E> {
  create(session: S, sinkFactory: SinkFactory): { engine: E; events: AsyncIterable<PlaybackEvent> };
}

export interface ConnectSession {
  shutdown(): void;
}

export interface ConnectSessionFactory<S, E> {
  open(
    device: ConnectDeviceConfig,
    session: S,
    engine: E,
    volume: VolumePolicy,
  ): { session: ConnectSession; task: Promise<void> };
}

export interface VoiceTransport {
  join(guildId: string, channelId: string): Promise<void>;
  leave(guildId: string): Promise<void>;
  setBitrate(bitrate: VoiceBitrate): void;
  playSource(guildId: string, source: Readable): void;
}

export type OnlineState = "online" | "idle" | "dnd" | "invisible";

export interface PresenceApi {
  setStatus(activity: string | null, state: OnlineState): void;
}

export interface MemberDirectory {
  currentChannel(userId: string): Promise<string | null>;
}
