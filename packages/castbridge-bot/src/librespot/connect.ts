import { spawn, type SpawnOptions } from "node:child_process";
import type { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { ConnectDeviceConfig, VolumePolicySpec } from "@castbridge/contracts";
import {
  BridgeClosedError,
  MAX_VOLUME,
  type AudioSink,
  type ConnectSession,
  type ConnectSessionFactory,
  type VolumePolicy,
} from "@castbridge/core";
import type { Logger } from "pino";
import type { SpotifySession } from "../spotify/session.js";
import type { LibrespotEngine } from "./engine.js";
import { HOOK_TOKEN_ENV, HOOK_URL_ENV, SESSION_KEY_ENV } from "./hook-request.js";
import { PcmFramer } from "./pcm-framer.js";

const CHANNELS = 2;

export interface LibrespotProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => LibrespotProcess;

export interface LibrespotConnectOptions {
  binaryPath: string;
  hookCommand: string;
  hookUrl: string;
  hookToken: string;
  logger: Logger;
  spawnFn?: SpawnFn;
}

type ExitResult =
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "error"; error: Error };

function volumeCtrl(spec: VolumePolicySpec): string {
  // External volume is applied by the bridge, so librespot must pass samples through untouched.
  return spec.kind === "adjustable" ? spec.curve : "fixed";
}

export function buildLibrespotArgs(
  device: ConnectDeviceConfig,
  session: SpotifySession,
  hookCommand: string,
): string[] {
  const args = [
    "--backend", "pipe",
    "--format", "F32",
    "--name", device.deviceName,
    "--device-type", device.deviceType,
    "--bitrate", String(device.bitrate),
    "--initial-volume", String(Math.round((device.initialVolume / MAX_VOLUME) * 100)),
    "--volume-ctrl", volumeCtrl(device.volumePolicy),
    "--onevent", hookCommand,
  ];

  if (session.cacheDir) {
    args.push("--cache", session.cacheDir);
  }
  args.push("--username", session.username);
  if (session.password) {
    args.push("--password", session.password);
  }
  return args;
}

export class LibrespotConnectFactory implements ConnectSessionFactory<SpotifySession, LibrespotEngine> {
  private readonly spawnFn: SpawnFn;

  constructor(private readonly options: LibrespotConnectOptions) {
    this.spawnFn = options.spawnFn ?? spawn;
  }

  open(
    device: ConnectDeviceConfig,
    session: SpotifySession,
    engine: LibrespotEngine,
    _volume: VolumePolicy,
  ): { session: ConnectSession; task: Promise<void> } {
    const logger = this.options.logger.child({ sessionKey: engine.sessionKey, device: device.deviceName });
    const child = this.spawnFn(this.options.binaryPath, buildLibrespotArgs(device, session, this.options.hookCommand), {
      stdio: ["ignore", "pipe", "pipe"],
      env: {
        ...process.env,
        [HOOK_URL_ENV]: this.options.hookUrl,
        [HOOK_TOKEN_ENV]: this.options.hookToken,
        [SESSION_KEY_ENV]: engine.sessionKey,
      },
    });

    let stopping = false;
    const stop = () => {
      if (!stopping) {
        stopping = true;
        child.kill("SIGTERM");
      }
    };

    const task = this.supervise(child, engine.sink, logger, stop, () => stopping)
      .finally(() => engine.release());

    return { session: { shutdown: stop }, task };
  }

  private async supervise(
    child: LibrespotProcess,
    sink: AudioSink,
    logger: Logger,
    stop: () => void,
    isStopping: () => boolean,
  ): Promise<void> {
    const exited = new Promise<ExitResult>((resolve) => {
      child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => resolve({ kind: "exit", code, signal }));
      child.once("error", (error: Error) => resolve({ kind: "error", error }));
    });

    if (child.stderr) {
      createInterface({ input: child.stderr }).on("line", (line) => logger.debug({ source: "librespot" }, line));
    }

    logger.info("librespot started");
    try {
      if (await this.pump(child.stdout, sink) === "bridge_closed") {
        stop();
      }
    } catch (error) {
      logger.error({ err: error }, "audio pipeline failed; terminating librespot");
      stop();
      await exited;
      throw error;
    }

    const result = await exited;
    if (result.kind === "error") {
      throw result.error;
    }
    logger.info({ code: result.code, signal: result.signal }, "librespot exited");
    if (!isStopping() && result.code !== 0) {
      throw new Error(`librespot exited with code ${String(result.code)}`);
    }
  }

  private async pump(stdout: Readable | null, sink: AudioSink): Promise<"ended" | "bridge_closed"> {
    if (!stdout) {
      return "ended";
    }

    const framer = new PcmFramer(CHANNELS);
    for await (const chunk of stdout) {
      if (!Buffer.isBuffer(chunk)) {
        continue;
      }
      const block = framer.push(chunk);
      if (block.length === 0) {
        continue;
      }
      const written = await sink.write(block);
      if (!written.ok) {
        if (written.error instanceof BridgeClosedError) {
          return "bridge_closed";
        }
        throw written.error;
      }
    }
    return "ended";
  }
}
