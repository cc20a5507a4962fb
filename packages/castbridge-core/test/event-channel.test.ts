import { describe, expect, it } from "vitest";
import { EventChannel } from "../src/event-channel.js";
import { SerialLock } from "../src/serial-lock.js";
import { createVolumePolicy } from "../src/volume-policy.js";
import { tick } from "./fakes.js";

describe("EventChannel", () => {
  it("delivers queued and later items in order, then ends on close", async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);

    const received: number[] = [];
    const consuming = (async () => {
      for await (const item of channel) {
        received.push(item);
      }
    })();

    await tick();
    channel.send(3);
    channel.close();
    await consuming;

    expect(received).toEqual([1, 2, 3]);
    expect(channel.send(4)).toBe(false);
  });

  it("suspends the reader until an item arrives", async () => {
    const channel = new EventChannel<string>();
    let resolved = false;
    const next = channel.next().then((result) => {
      resolved = true;
      return result;
    });

    await tick();
    expect(resolved).toBe(false);

    channel.send("started");
    expect(await next).toEqual({ done: false, value: "started" });
  });

  it("rejects a second concurrent reader", async () => {
    const channel = new EventChannel<string>();
    const first = channel.next();

    await expect(channel.next()).rejects.toThrow("EventChannel supports a single reader");
    channel.close();
    expect(await first).toEqual({ done: true, value: undefined });
  });
});

describe("SerialLock", () => {
  it("runs sections one at a time in call order", async () => {
    const lock = new SerialLock();
    const log: string[] = [];

    await Promise.all([
      lock.run(async () => {
        log.push("a:start");
        await tick();
        log.push("a:end");
      }),
      lock.run(async () => {
        log.push("b:start");
        log.push("b:end");
      }),
    ]);

    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps going after a failed section", async () => {
    const lock = new SerialLock();

    await expect(lock.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(lock.run(async () => 42)).resolves.toBe(42);
  });
});

describe("createVolumePolicy", () => {
  it("ignores updates under the fixed policy", () => {
    const policy = createVolumePolicy({ kind: "fixed" }, 40000);
    policy.update(100);

    expect(policy.volume).toBe(40000);
    expect(policy.gain).toBe(1);
  });

  it("tracks volume without applying gain under the adjustable policy", () => {
    const policy = createVolumePolicy({ kind: "adjustable", curve: "log" }, 65535);
    policy.update(1000);

    expect(policy.volume).toBe(1000);
    expect(policy.gain).toBe(1);
    expect(policy.spec).toEqual({ kind: "adjustable", curve: "log" });
  });

  it("applies volume as gain under the external policy and clamps it", () => {
    const policy = createVolumePolicy({ kind: "external" }, 65535);
    expect(policy.gain).toBe(1);

    policy.update(0);
    expect(policy.gain).toBe(0);

    policy.update(70000);
    expect(policy.volume).toBe(65535);
  });
});
