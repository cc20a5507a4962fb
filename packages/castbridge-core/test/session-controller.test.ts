import type { PlaybackEvent } from "@castbridge/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BridgeClosedError } from "../src/errors.js";
import { EventCoordinator } from "../src/event-coordinator.js";
import { encodeBlock } from "../src/sample-encoder.js";
import { SessionController } from "../src/session-controller.js";
import {
  device,
  FakeConnectFactory,
  FakeEngineFactory,
  FakeMembers,
  FakeMetadata,
  FakePresence,
  FakeVoice,
  silentLogger,
  tick,
  type FakeEngine,
  type FakeSession,
} from "./fakes.js";

function makeController(overrides: { bridgeCapacity?: number; readChunkBytes?: number } = {}) {
  const engines = new FakeEngineFactory();
  const connects = new FakeConnectFactory();
  const controller = new SessionController<FakeSession, FakeEngine>({
    session: { user: "listener" },
    engines,
    connects,
    encoder: { inputRate: 44_100, outputRate: 48_000, channels: 2 },
    bridgeCapacity: overrides.bridgeCapacity ?? 24,
    readChunkBytes: overrides.readChunkBytes ?? 8,
    logger: silentLogger,
  });
  return { controller, engines, connects };
}

const controllers: Array<SessionController<FakeSession, FakeEngine>> = [];

afterEach(async () => {
  while (controllers.length > 0) {
    const controller = controllers.pop();
    if (controller) {
      await controller.close();
    }
  }
});

describe("SessionController", () => {
  it("treats disable without a live session as a no-op", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);

    await expect(controller.disable()).resolves.toBeUndefined();
    expect(controller.isEnabled).toBe(false);
    expect(connects.opened).toHaveLength(0);
  });

  it("opens a connect session with the device config and its volume policy", async () => {
    const { controller, connects, engines } = makeController();
    controllers.push(controller);

    await controller.enable({ ...device, volumePolicy: { kind: "external" }, initialVolume: 32768 });

    expect(controller.isEnabled).toBe(true);
    expect(engines.engines).toHaveLength(1);
    const [connect] = connects.opened;
    expect(connect?.device.deviceName).toBe("Test Speaker");
    expect(connect?.volume.spec).toEqual({ kind: "external" });
    expect(connect?.volume.volume).toBe(32768);
    expect(controller.volume).toBe(connect?.volume);
  });

  it("terminates the background task when disabled right after enable", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);

    await controller.enable(device);
    await controller.disable();

    expect(connects.opened[0]?.shutdownCalls).toBe(1);
    expect(controller.isEnabled).toBe(false);
    expect(controller.currentSource()).toBeUndefined();
  });

  it("shuts the previous session down before opening the next one", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);

    await Promise.all([controller.enable(device), controller.enable(device)]);

    expect(connects.log).toEqual(["open:1", "shutdown:1", "open:2"]);
    expect(controller.isEnabled).toBe(true);
  });

  it("clears the session when its task ends on its own", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);

    await controller.enable(device);
    connects.opened[0]?.finish();
    await tick();

    expect(controller.isEnabled).toBe(false);
  });

  it("announces stopped when the task ends on its own", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);
    const events = controller.events()[Symbol.asyncIterator]();

    await controller.enable(device);
    connects.opened[0]?.finish();

    expect(await events.next()).toEqual({ done: false, value: { type: "stopped" } });
  });

  it("clears the session when its task fails", async () => {
    const { controller, connects } = makeController();
    controllers.push(controller);

    await controller.enable(device);
    connects.opened[0]?.fail(new Error("librespot exited with code 1"));
    await tick();

    expect(controller.isEnabled).toBe(false);
  });

  it("forwards events of the live session and drops those of a superseded one", async () => {
    const { controller, engines } = makeController();
    controllers.push(controller);
    const events = controller.events()[Symbol.asyncIterator]();

    await controller.enable(device);
    engines.engines[0]?.events.send({ type: "started" });
    expect(await events.next()).toEqual({ done: false, value: { type: "started" } });

    await controller.enable(device);
    const first = engines.engines[0];
    const second = engines.engines[1];
    expect(first?.events.send({ type: "paused" })).toBe(false);

    const next: PlaybackEvent = { type: "playing", trackId: "4uLU6hMCjMI75M1A2tKUQC" };
    second?.events.send(next);
    expect(await events.next()).toEqual({ done: false, value: next });
  });

  it("leaves voice when casting is disabled after playback started", async () => {
    const { controller, engines } = makeController();
    controllers.push(controller);
    const voice = new FakeVoice();
    const presence = new FakePresence();
    const coordinator = new EventCoordinator<FakeSession>({
      controller,
      metadata: new FakeMetadata(new Map()),
      voice,
      presence,
      members: new FakeMembers("222222222222222222"),
      guildId: "111111111111111111",
      watchedUserId: "333333333333333333",
      voiceBitrate: "auto",
      logger: silentLogger,
    });
    const running = coordinator.run();

    await controller.enable(device);
    engines.engines[0]?.events.send({ type: "started" });
    await vi.waitFor(() => expect(voice.calls.map((call) => call.op)).toEqual(["join", "bitrate", "play"]));

    await controller.disable();
    await vi.waitFor(() => expect(voice.calls.map((call) => call.op)).toEqual(["join", "bitrate", "play", "leave"]));
    expect(presence.statuses).toEqual([{ activity: null, state: "online" }]);

    await controller.close();
    await running;
  });

  it("ends the event stream when closed", async () => {
    const { controller } = makeController();
    const received: PlaybackEvent[] = [];
    const consuming = (async () => {
      for await (const event of controller.events()) {
        received.push(event);
      }
    })();

    await controller.enable(device);
    await controller.close();
    await consuming;

    expect(received).toEqual([{ type: "stopped" }]);
    await expect(controller.enable(device)).rejects.toThrow("Session controller is closed");
  });

  it("carries encoded sink writes to the current source in order", async () => {
    const { controller, engines } = makeController();
    controllers.push(controller);
    await controller.enable(device);

    const samples = new Float32Array(20).map((_, i) => i / 20);
    const expected = encodeBlock(samples);
    if (!expected.ok) {
      throw expected.error;
    }

    const source = controller.currentSource();
    if (!source) {
      throw new Error("expected a live source");
    }
    const sink = engines.engines[0]?.sink;
    const write = sink?.write(samples);

    const received: Buffer[] = [];
    let total = 0;
    for await (const chunk of source) {
      if (Buffer.isBuffer(chunk)) {
        received.push(chunk);
        total += chunk.length;
      }
      if (total >= expected.bytes.byteLength) {
        break;
      }
    }

    expect(await write).toEqual({ ok: true });
    expect(Buffer.concat(received)).toEqual(Buffer.from(expected.bytes));
  });

  it("returns encode failures to the writer without pushing anything", async () => {
    const { controller, engines } = makeController();
    controllers.push(controller);
    await controller.enable(device);

    const result = await engines.engines[0]?.sink.write(new Float32Array(3));

    expect(result?.ok).toBe(false);
    if (result && !result.ok) {
      expect(result.error.name).toBe("SampleEncodeError");
    }
  });

  it("reports a closed bridge to writers of a disabled session", async () => {
    const { controller, engines } = makeController();
    controllers.push(controller);
    await controller.enable(device);
    const sink = engines.engines[0]?.sink;
    await controller.disable();

    const result = await sink?.write(new Float32Array([0.1, 0.2]));

    expect(result?.ok).toBe(false);
    if (result && !result.ok) {
      expect(result.error).toBeInstanceOf(BridgeClosedError);
    }
  });
});
