import type { Readable } from "node:stream";
import type { PlaybackEvent, VoiceBitrate } from "@castbridge/contracts";
import type { Logger } from "pino";
import type { MemberDirectory, MetadataResolver, PresenceApi, VoiceTransport } from "./ports.js";
import type { VolumePolicy } from "./volume-policy.js";

export interface PlaybackSessions<S> {
  readonly streamingSession: S;
  readonly volume: VolumePolicy | undefined;
  events(): AsyncIterable<PlaybackEvent>;
  currentSource(): Readable | undefined;
}

export interface EventCoordinatorOptions<S> {
  controller: PlaybackSessions<S>;
  metadata: MetadataResolver<S>;
  voice: VoiceTransport;
  presence: PresenceApi;
  members: MemberDirectory;
  guildId: string;
  watchedUserId: string;
  voiceBitrate: VoiceBitrate;
  logger: Logger;
}

export function formatListeningStatus(artist: string, track: string): string {
  return `${artist}: ${track}`;
}

export class EventCoordinator<S> {
  constructor(private readonly options: EventCoordinatorOptions<S>) {}

  async run(): Promise<void> {
    const { controller, logger } = this.options;
    for await (const event of controller.events()) {
      try {
        await this.handle(event);
      } catch (error) {
        logger.error({ err: error, event: event.type }, "failed to apply playback event");
      }
    }
    logger.info("playback event stream ended");
  }

  async handle(event: PlaybackEvent): Promise<void> {
    switch (event.type) {
      case "stopped":
        await this.onStopped();
        return;
      case "started":
        await this.onStarted();
        return;
      case "paused":
        this.options.presence.setStatus(null, "online");
        return;
      case "playing":
        await this.onPlaying(event.trackId);
        return;
      case "volume_changed":
        this.options.controller.volume?.update(event.volume);
        return;
      case "other":
        return;
    }
  }

  private async onStopped(): Promise<void> {
    const { presence, voice, guildId } = this.options;
    presence.setStatus(null, "online");
    await voice.leave(guildId);
  }

  private async onStarted(): Promise<void> {
    const { controller, members, voice, guildId, watchedUserId, voiceBitrate, logger } = this.options;

    const channelId = await members.currentChannel(watchedUserId);
    if (channelId === null) {
      logger.debug({ watchedUserId }, "watched user is not in a voice channel, not joining");
      return;
    }

    await voice.join(guildId, channelId);
    voice.setBitrate(voiceBitrate);

    const source = controller.currentSource();
    if (!source) {
      logger.warn("playback started without a live connect session");
      return;
    }
    voice.playSource(guildId, source);
  }

  private async onPlaying(trackId: string): Promise<void> {
    const { controller, metadata, presence, logger } = this.options;
    const session = controller.streamingSession;

    try {
      const track = await metadata.resolveMetadata(session, { kind: "track", id: trackId });
      if (track.kind !== "track") {
        return;
      }
      const [artistId] = track.artistIds;
      if (artistId === undefined) {
        return;
      }
      const artist = await metadata.resolveMetadata(session, { kind: "artist", id: artistId });
      if (artist.kind !== "artist") {
        return;
      }
      presence.setStatus(formatListeningStatus(artist.name, track.name), "online");
    } catch (error) {
      logger.debug({ err: error, trackId }, "track metadata unavailable, keeping status");
    }
  }
}
