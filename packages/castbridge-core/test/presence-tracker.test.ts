import type { ConnectDeviceConfig } from "@castbridge/contracts";
import { describe, expect, it } from "vitest";
import { classifyMembership, PresenceTracker, type CastingSwitch } from "../src/presence-tracker.js";
import { device, FakeVoice, silentLogger } from "./fakes.js";

const WATCHED = "333333333333333333";
const GUILD = "111111111111111111";
const CHANNEL_A = "444444444444444444";
const CHANNEL_B = "555555555555555555";

class CountingSwitch implements CastingSwitch {
  enabled: ConnectDeviceConfig[] = [];
  disabled = 0;

  async enable(config: ConnectDeviceConfig): Promise<void> {
    this.enabled.push(config);
  }

  async disable(): Promise<void> {
    this.disabled += 1;
  }
}

function makeTracker() {
  const controller = new CountingSwitch();
  const voice = new FakeVoice();
  const tracker = new PresenceTracker({
    controller,
    voice,
    guildId: GUILD,
    watchedUserId: WATCHED,
    device,
    logger: silentLogger,
  });
  return { tracker, controller, voice };
}

describe("classifyMembership", () => {
  it("maps channel transitions to actions", () => {
    expect(classifyMembership(null, CHANNEL_A)).toBe("enable");
    expect(classifyMembership(null, null)).toBe("enable");
    expect(classifyMembership(CHANNEL_A, null)).toBe("disable");
    expect(classifyMembership(CHANNEL_A, CHANNEL_B)).toBe("move");
    expect(classifyMembership(CHANNEL_A, CHANNEL_A)).toBe("none");
  });
});

describe("PresenceTracker", () => {
  it("enables exactly once when the watched user connects", async () => {
    const { tracker, controller, voice } = makeTracker();

    const action = await tracker.handle({ userId: WATCHED, oldChannelId: null, newChannelId: CHANNEL_A });

    expect(action).toBe("enable");
    expect(controller.enabled).toEqual([device]);
    expect(controller.disabled).toBe(0);
    expect(voice.calls).toEqual([]);
  });

  it("disables exactly once when the watched user disconnects", async () => {
    const { tracker, controller, voice } = makeTracker();

    await tracker.handle({ userId: WATCHED, oldChannelId: CHANNEL_A, newChannelId: null });

    expect(controller.disabled).toBe(1);
    expect(controller.enabled).toEqual([]);
    expect(voice.calls).toEqual([]);
  });

  it("only joins the new channel when the watched user moves", async () => {
    const { tracker, controller, voice } = makeTracker();

    await tracker.handle({ userId: WATCHED, oldChannelId: CHANNEL_A, newChannelId: CHANNEL_B });

    expect(voice.calls).toEqual([{ op: "join", guildId: GUILD, channelId: CHANNEL_B }]);
    expect(controller.enabled).toEqual([]);
    expect(controller.disabled).toBe(0);
  });

  it("does nothing when the channel is unchanged", async () => {
    const { tracker, controller, voice } = makeTracker();

    const action = await tracker.handle({ userId: WATCHED, oldChannelId: CHANNEL_A, newChannelId: CHANNEL_A });

    expect(action).toBe("none");
    expect(controller.enabled).toEqual([]);
    expect(controller.disabled).toBe(0);
    expect(voice.calls).toEqual([]);
  });

  it("ignores other participants", async () => {
    const { tracker, controller, voice } = makeTracker();

    const action = await tracker.handle({ userId: "999999999999999999", oldChannelId: null, newChannelId: CHANNEL_A });

    expect(action).toBe("none");
    expect(controller.enabled).toEqual([]);
    expect(voice.calls).toEqual([]);
  });

  it("enables on startup only when the watched user is already in voice", async () => {
    const { tracker, controller } = makeTracker();

    await tracker.reconcile(null);
    expect(controller.enabled).toEqual([]);

    await tracker.reconcile(CHANNEL_A);
    expect(controller.enabled).toEqual([device]);
  });
});
