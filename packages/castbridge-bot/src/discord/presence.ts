import type { MemberDirectory, OnlineState, PresenceApi } from "@castbridge/core";
import { ActivityType, type Client } from "discord.js";

export class DiscordPresence implements PresenceApi {
  constructor(private readonly client: Client) {}

  setStatus(activity: string | null, state: OnlineState): void {
    this.client.user?.setPresence({
      activities: activity === null ? [] : [{ name: activity, type: ActivityType.Listening }],
      status: state,
    });
  }
}

export class DiscordMemberDirectory implements MemberDirectory {
  constructor(
    private readonly client: Client,
    private readonly guildId: string,
  ) {}

  async currentChannel(userId: string): Promise<string | null> {
    const guild = this.client.guilds.cache.get(this.guildId);
    return guild?.voiceStates.cache.get(userId)?.channelId ?? null;
  }
}
