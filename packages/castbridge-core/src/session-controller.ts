import type { Readable } from "node:stream";
import type { ConnectDeviceConfig, PlaybackEvent } from "@castbridge/contracts";
import type { Logger } from "pino";
import { createBridgeReadable, DEFAULT_READ_CHUNK_BYTES } from "./bridge-stream.js";
import { BridgeSink } from "./bridge-sink.js";
import { ByteBridge } from "./byte-bridge.js";
import { EventChannel } from "./event-channel.js";
import type { ConnectSession, ConnectSessionFactory, PlaybackEngineFactory } from "./ports.js";
import type { EncoderOptions } from "./sample-encoder.js";
import { SerialLock } from "./serial-lock.js";
import { createVolumePolicy, type VolumePolicy } from "./volume-policy.js";

export interface SessionControllerOptions<S, E> {
  session: S;
  engines: PlaybackEngineFactory<S, E>;
  connects: ConnectSessionFactory<S, E>;
  encoder: EncoderOptions;
  bridgeCapacity: number;
  readChunkBytes?: number;
  logger: Logger;
}

interface LiveSession {
  generation: number;
  device: ConnectDeviceConfig;
  connect: ConnectSession;
  bridge: ByteBridge;
  volume: VolumePolicy;
  events: AsyncIterator<PlaybackEvent>;
  finished: Promise<void>;
  ended: boolean;
}

/** Two sessions never overlap; events of a superseded session are dropped. */
export class SessionController<S, E> {
  private readonly lock = new SerialLock();
  private readonly hub = new EventChannel<PlaybackEvent>();
  private live: LiveSession | undefined;
  private generation = 0;

  constructor(private readonly options: SessionControllerOptions<S, E>) {}

  get isEnabled(): boolean {
    return this.live !== undefined;
  }

  get device(): ConnectDeviceConfig | undefined {
    return this.live?.device;
  }

  get volume(): VolumePolicy | undefined {
    return this.live?.volume;
  }

  get streamingSession(): S {
    return this.options.session;
  }

  enable(device: ConnectDeviceConfig): Promise<void> {
    return this.lock.run(async () => {
      if (this.hub.isClosed) {
        throw new Error("Session controller is closed");
      }
      if (this.live) {
        this.options.logger.info({ generation: this.live.generation }, "replacing live connect session");
        await this.stop(this.live, false);
      }
      this.start(device);
    });
  }

  disable(): Promise<void> {
    return this.lock.run(async () => {
      if (this.live) {
        await this.stop(this.live, true);
      }
    });
  }

  events(): AsyncIterable<PlaybackEvent> {
    return this.hub;
  }

  currentSource(): Readable | undefined {
    if (!this.live) {
      return undefined;
    }
    return createBridgeReadable(this.live.bridge, this.options.readChunkBytes ?? DEFAULT_READ_CHUNK_BYTES);
  }

  async close(): Promise<void> {
    await this.disable();
    this.hub.close();
  }

  private start(device: ConnectDeviceConfig): void {
    const { logger } = this.options;
    this.generation += 1;
    const generation = this.generation;

    const volume = createVolumePolicy(device.volumePolicy, device.initialVolume);
    const bridge = new ByteBridge(this.options.bridgeCapacity);
    const sink = new BridgeSink(bridge, this.options.encoder, volume);
    const { engine, events } = this.options.engines.create(this.options.session, () => sink);
    const { session: connect, task } = this.options.connects.open(device, this.options.session, engine, volume);

    const live: LiveSession = {
      generation,
      device,
      connect,
      bridge,
      volume,
      events: events[Symbol.asyncIterator](),
      finished: Promise.resolve(),
      ended: false,
    };

    live.finished = task
      .then(
        () => {
          logger.info({ generation }, "connect session task exited");
        },
        (error: unknown) => {
          logger.error({ err: error, generation }, "connect session task failed");
        },
      )
      .finally(() => {
        bridge.close();
        if (!live.ended) {
          live.ended = true;
          if (this.live === live) {
            this.live = undefined;
          }
          this.announceStopped(generation);
        }
      });

    this.live = live;
    this.forward(live).catch((error: unknown) => {
      logger.error({ err: error, generation }, "playback event stream failed");
    });

    logger.info({ generation, deviceName: device.deviceName }, "connect session enabled");
  }

  // A replaced session is not announced; the next one's events follow directly.
  private async stop(live: LiveSession, announce: boolean): Promise<void> {
    const { logger } = this.options;
    logger.info({ generation: live.generation }, "shutting down connect session");
    live.ended = true;
    live.connect.shutdown();
    live.bridge.close();
    await live.finished;
    live.events.return?.().catch((error: unknown) => {
      logger.warn({ err: error, generation: live.generation }, "failed to release playback event stream");
    });
    if (this.live === live) {
      this.live = undefined;
    }
    if (announce) {
      this.announceStopped(live.generation);
    }
  }

  private announceStopped(generation: number): void {
    if (generation === this.generation) {
      this.hub.send({ type: "stopped" });
    }
  }

  private async forward(live: LiveSession): Promise<void> {
    for (;;) {
      const result = await live.events.next();
      if (result.done || live.ended || live.generation !== this.generation) {
        return;
      }
      this.hub.send(result.value);
    }
  }
}
