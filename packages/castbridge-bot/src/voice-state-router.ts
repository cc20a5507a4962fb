import type { MembershipUpdate, PresenceTracker } from "@castbridge/core";
import type { Logger } from "pino";

export interface GuildMembershipUpdate extends MembershipUpdate {
  guildId: string;
}

export type MembershipHandler = Pick<PresenceTracker, "handle" | "reconcile">;

export class VoiceStateRouter {
  private target: { guildId: string; tracker: MembershipHandler } | undefined;

  constructor(private readonly logger: Logger) {}

  // Routing starts before reconcile so updates that arrive meanwhile are applied.
  async attach(guildId: string, tracker: MembershipHandler, currentChannel: () => Promise<string | null>): Promise<void> {
    this.target = { guildId, tracker };
    await tracker.reconcile(await currentChannel());
  }

  route(update: GuildMembershipUpdate): void {
    const { target } = this;
    if (!target || update.guildId !== target.guildId) {
      return;
    }
    const { userId, oldChannelId, newChannelId } = update;
    target.tracker.handle({ userId, oldChannelId, newChannelId }).catch((error: unknown) => {
      this.logger.error({ err: error, userId }, "failed to apply voice state update");
    });
  }
}
