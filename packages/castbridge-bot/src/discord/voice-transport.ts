import { pipeline, type Readable } from "node:stream";
import type { VoiceBitrate } from "@castbridge/contracts";
import type { VoiceTransport } from "@castbridge/core";
import {
  AudioPlayer,
  createAudioPlayer,
  createAudioResource,
  entersState,
  getVoiceConnection,
  joinVoiceChannel,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnectionStatus,
} from "@discordjs/voice";
import type { Client } from "discord.js";
import type { Logger } from "pino";
import prism from "prism-media";
import { FloatToInt16Transform } from "./float-pcm.js";

const SAMPLE_RATE = 48_000;
const CHANNELS = 2;
const FRAME_SIZE = 960;
const FALLBACK_BITRATE = 64_000;
const READY_TIMEOUT_MS = 15_000;

type OpusEncoder = InstanceType<typeof prism.opus.Encoder>;

interface Playback {
  source: Readable;
  encoder: OpusEncoder;
}

export class DiscordVoiceTransport implements VoiceTransport {
  private readonly players = new Map<string, AudioPlayer>();
  private readonly playbacks = new Map<string, Playback>();
  private readonly channels = new Map<string, string>();
  private bitrate: VoiceBitrate = "auto";

  constructor(
    private readonly client: Client,
    private readonly logger: Logger,
  ) {}

  async join(guildId: string, channelId: string): Promise<void> {
    const existing = getVoiceConnection(guildId);
    if (existing && existing.joinConfig.channelId === channelId) {
      return;
    }

    const guild = await this.client.guilds.fetch(guildId);
    const connection = joinVoiceChannel({
      guildId,
      channelId,
      adapterCreator: guild.voiceAdapterCreator,
      selfDeaf: true,
      selfMute: false,
    });

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT_MS);
    } catch (error) {
      connection.destroy();
      throw error;
    }

    connection.subscribe(this.player(guildId));
    this.channels.set(guildId, channelId);
    this.applyBitrate(guildId);
    this.logger.info({ guildId, channelId }, "joined voice channel");
  }

  async leave(guildId: string): Promise<void> {
    this.stopPlayback(guildId);
    this.players.get(guildId)?.stop(true);
    this.channels.delete(guildId);

    const connection = getVoiceConnection(guildId);
    if (connection) {
      connection.destroy();
      this.logger.info({ guildId }, "left voice channel");
    }
  }

  setBitrate(bitrate: VoiceBitrate): void {
    this.bitrate = bitrate;
    for (const guildId of this.playbacks.keys()) {
      this.applyBitrate(guildId);
    }
  }

  playSource(guildId: string, source: Readable): void {
    this.stopPlayback(guildId);

    const encoder = new prism.opus.Encoder({ rate: SAMPLE_RATE, channels: CHANNELS, frameSize: FRAME_SIZE });
    pipeline(source, new FloatToInt16Transform(), encoder, (error) => {
      if (error && error.code !== "ERR_STREAM_PREMATURE_CLOSE") {
        this.logger.warn({ err: error, guildId }, "voice audio pipeline failed");
      }
    });

    this.playbacks.set(guildId, { source, encoder });
    this.applyBitrate(guildId);
    this.player(guildId).play(createAudioResource(encoder, { inputType: StreamType.Opus }));
  }

  resolveBitrate(guildId: string): number {
    if (this.bitrate !== "auto") {
      return this.bitrate;
    }
    const channelId = this.channels.get(guildId);
    const channel = channelId === undefined ? undefined : this.client.channels.cache.get(channelId);
    return channel?.isVoiceBased() ? channel.bitrate : FALLBACK_BITRATE;
  }

  private applyBitrate(guildId: string): void {
    this.playbacks.get(guildId)?.encoder.setBitrate(this.resolveBitrate(guildId));
  }

  private stopPlayback(guildId: string): void {
    const playback = this.playbacks.get(guildId);
    if (playback) {
      playback.source.destroy();
      this.playbacks.delete(guildId);
    }
  }

  private player(guildId: string): AudioPlayer {
    let player = this.players.get(guildId);
    if (!player) {
      player = createAudioPlayer({ behaviors: { noSubscriber: NoSubscriberBehavior.Play } });
      player.on("error", (error) => {
        this.logger.warn({ err: error, guildId }, "audio player error");
      });
      this.players.set(guildId, player);
    }
    return player;
  }
}
