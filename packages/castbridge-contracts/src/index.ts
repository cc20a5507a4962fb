import { z } from "zod";

export const SnowflakeSchema = z.string().regex(/^\d{17,20}$/, "expected a Discord snowflake");

export const DeviceTypeSchema = z.enum([
  "computer",
  "tablet",
  "smartphone",
  "speaker",
  "tv",
  "avr",
  "stb",
  "audiodongle",
  "gameconsole",
]);

export const VolumeCurveSchema = z.enum(["linear", "log", "cubic"]);

export const VolumeLevelSchema = z.number().int().min(0).max(65535);

export const VolumePolicySpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("fixed") }),
  z.object({ kind: z.literal("adjustable"), curve: VolumeCurveSchema }),
  z.object({ kind: z.literal("external") }),
]);

export const StreamingBitrateSchema = z.union([z.literal(96), z.literal(160), z.literal(320)]);

export const VoiceBitrateSchema = z.union([
  z.literal("auto"),
  z.number().int().min(8_000).max(512_000),
]);

export const ConnectDeviceConfigSchema = z.object({
  deviceName: z.string().min(1).max(64),
  deviceType: DeviceTypeSchema,
  initialVolume: VolumeLevelSchema,
  volumePolicy: VolumePolicySpecSchema,
  bitrate: StreamingBitrateSchema,
});

export const SpotifyIdSchema = z.string().regex(/^[0-9A-Za-z]{22}$/, "expected a base62 Spotify id");

export const StoppedEventSchema = z.object({ type: z.literal("stopped") });
export const StartedEventSchema = z.object({ type: z.literal("started") });
export const PausedEventSchema = z.object({ type: z.literal("paused") });
export const PlayingEventSchema = z.object({
  type: z.literal("playing"),
  trackId: SpotifyIdSchema,
});
export const VolumeChangedEventSchema = z.object({
  type: z.literal("volume_changed"),
  volume: VolumeLevelSchema,
});
export const OtherEventSchema = z.object({
  type: z.literal("other"),
  name: z.string(),
});

export const PlaybackEventSchema = z.discriminatedUnion("type", [
  StoppedEventSchema,
  StartedEventSchema,
  PausedEventSchema,
  PlayingEventSchema,
  VolumeChangedEventSchema,
  OtherEventSchema,
]);

export const PlayerEventHookSchema = z.object({
  sessionKey: z.string().min(1),
  event: z.string().min(1),
  trackId: z.string().optional(),
  volume: z.string().optional(),
});

export type Snowflake = z.infer<typeof SnowflakeSchema>;
export type DeviceType = z.infer<typeof DeviceTypeSchema>;
export type VolumeCurve = z.infer<typeof VolumeCurveSchema>;
export type VolumePolicySpec = z.infer<typeof VolumePolicySpecSchema>;
export type StreamingBitrate = z.infer<typeof StreamingBitrateSchema>;
export type VoiceBitrate = z.infer<typeof VoiceBitrateSchema>;
export type ConnectDeviceConfig = z.infer<typeof ConnectDeviceConfigSchema>;
export type PlaybackEvent = z.infer<typeof PlaybackEventSchema>;
export type PlayerEventHook = z.infer<typeof PlayerEventHookSchema>;
