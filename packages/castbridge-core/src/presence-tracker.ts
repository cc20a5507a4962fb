import type { ConnectDeviceConfig } from "@castbridge/contracts";
import type { Logger } from "pino";
import type { VoiceTransport } from "./ports.js";

export interface MembershipUpdate {
  userId: string;
  oldChannelId: string | null;
  newChannelId: string | null;
}

export type PresenceAction = "enable" | "disable" | "move" | "none";

export interface CastingSwitch {
  enable(device: ConnectDeviceConfig): Promise<void>;
  disable(): Promise<void>;
}

export interface PresenceTrackerOptions {
  controller: CastingSwitch;
  voice: VoiceTransport;
  guildId: string;
  watchedUserId: string;
  device: ConnectDeviceConfig;
  logger: Logger;
}

export function classifyMembership(oldChannelId: string | null, newChannelId: string | null): PresenceAction {
  if (oldChannelId === null) {
    return "enable";
  }
  if (newChannelId === null) {
    return "disable";
  }
  if (oldChannelId !== newChannelId) {
    return "move";
  }
  return "none";
}

export class PresenceTracker {
  constructor(private readonly options: PresenceTrackerOptions) {}

  async handle(update: MembershipUpdate): Promise<PresenceAction> {
    const { controller, voice, guildId, watchedUserId, device, logger } = this.options;
    if (update.userId !== watchedUserId) {
      return "none";
    }

    const action = classifyMembership(update.oldChannelId, update.newChannelId);
    logger.debug({ ...update, action }, "watched user voice membership changed");

    switch (action) {
      case "enable":
        await controller.enable(device);
        break;
      case "disable":
        await controller.disable();
        break;
      case "move":
        if (update.newChannelId !== null) {
          await voice.join(guildId, update.newChannelId);
        }
        break;
      case "none":
        break;
    }
    return action;
  }

  async reconcile(currentChannelId: string | null): Promise<void> {
    if (currentChannelId === null) {
      return;
    }
    this.options.logger.info({ channelId: currentChannelId }, "watched user already in voice, enabling casting");
    await this.options.controller.enable(this.options.device);
  }
}
