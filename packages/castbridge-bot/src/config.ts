import { randomBytes } from "node:crypto";
import {
  ConnectDeviceConfigSchema,
  DeviceTypeSchema,
  SnowflakeSchema,
  StreamingBitrateSchema,
  VoiceBitrateSchema,
  VolumeCurveSchema,
  VolumeLevelSchema,
  type ConnectDeviceConfig,
  type DeviceType,
  type StreamingBitrate,
  type VoiceBitrate,
  type VolumePolicySpec,
} from "@castbridge/contracts";
import { z } from "zod";

const PositiveIntSchema = z.number().int().positive();

export interface AppConfig {
  discordToken: string;
  discordUserId: string;
  discordGuildId?: string;
  spotifyUsername: string;
  spotifyPassword?: string;
  spotifyClientId: string;
  spotifyClientSecret: string;
  cacheDir?: string;
  librespotPath: string;
  deviceName: string;
  deviceType: DeviceType;
  initialVolume: number;
  volumePolicy: VolumePolicySpec;
  spotifyBitrate: StreamingBitrate;
  voiceBitrate: VoiceBitrate;
  bridgeCapacity: number;
  inputSampleRate: number;
  outputSampleRate: number;
  hookHost: string;
  hookPort: number;
  hookToken: string;
  hookCommand?: string;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

function numberEnv(env: Env, name: string, fallback: number): number {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function parsedEnv<T extends z.ZodTypeAny>(name: string, schema: T, value: unknown): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid env var ${name}: ${String(value)}`);
  }
  return parsed.data;
}

function volumePolicyEnv(env: Env): VolumePolicySpec {
  const kind = env.VOLUME_POLICY ?? "fixed";
  switch (kind) {
    case "fixed":
      return { kind: "fixed" };
    case "external":
      return { kind: "external" };
    case "adjustable":
      return { kind: "adjustable", curve: parsedEnv("VOLUME_CURVE", VolumeCurveSchema, env.VOLUME_CURVE ?? "log") };
    default:
      throw new Error(`Invalid env var VOLUME_POLICY: ${kind}`);
  }
}

function voiceBitrateEnv(env: Env): VoiceBitrate {
  const value = env.VOICE_BITRATE;
  if (!value || value === "auto") {
    return "auto";
  }
  return parsedEnv("VOICE_BITRATE", VoiceBitrateSchema, numberEnv(env, "VOICE_BITRATE", 0));
}

export function loadConfig(env: Env = process.env): AppConfig {
  const discordGuildId = optional(env, "DISCORD_GUILD_ID");

  return {
    discordToken: required(env, "DISCORD_TOKEN"),
    discordUserId: parsedEnv("DISCORD_USER_ID", SnowflakeSchema, required(env, "DISCORD_USER_ID")),
    discordGuildId: discordGuildId === undefined
      ? undefined
      : parsedEnv("DISCORD_GUILD_ID", SnowflakeSchema, discordGuildId),
    spotifyUsername: required(env, "SPOTIFY_USERNAME"),
    spotifyPassword: optional(env, "SPOTIFY_PASSWORD"),
    spotifyClientId: required(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: required(env, "SPOTIFY_CLIENT_SECRET"),
    cacheDir: optional(env, "CACHE_DIR"),
    librespotPath: env.LIBRESPOT_PATH ?? "librespot",
    deviceName: env.DEVICE_NAME ?? "Discord",
    deviceType: parsedEnv("DEVICE_TYPE", DeviceTypeSchema, env.DEVICE_TYPE ?? "computer"),
    initialVolume: parsedEnv("INITIAL_VOLUME", VolumeLevelSchema, numberEnv(env, "INITIAL_VOLUME", 65535)),
    volumePolicy: volumePolicyEnv(env),
    spotifyBitrate: parsedEnv("SPOTIFY_BITRATE", StreamingBitrateSchema, numberEnv(env, "SPOTIFY_BITRATE", 320)),
    voiceBitrate: voiceBitrateEnv(env),
    bridgeCapacity: parsedEnv("BRIDGE_CAPACITY", PositiveIntSchema, numberEnv(env, "BRIDGE_CAPACITY", 7680)),
    inputSampleRate: parsedEnv("INPUT_SAMPLE_RATE", PositiveIntSchema, numberEnv(env, "INPUT_SAMPLE_RATE", 44_100)),
    outputSampleRate: parsedEnv("OUTPUT_SAMPLE_RATE", PositiveIntSchema, numberEnv(env, "OUTPUT_SAMPLE_RATE", 48_000)),
    hookHost: env.HOOK_HOST ?? "127.0.0.1",
    hookPort: numberEnv(env, "HOOK_PORT", 8477),
    hookToken: env.HOOK_TOKEN ?? randomBytes(24).toString("hex"),
    hookCommand: optional(env, "HOOK_COMMAND"),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}

export function deviceConfig(config: AppConfig): ConnectDeviceConfig {
  return ConnectDeviceConfigSchema.parse({
    deviceName: config.deviceName,
    deviceType: config.deviceType,
    initialVolume: config.initialVolume,
    volumePolicy: config.volumePolicy,
    bitrate: config.spotifyBitrate,
  });
}
