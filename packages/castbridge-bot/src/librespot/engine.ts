import type { PlaybackEvent } from "@castbridge/contracts";
import type { AudioSink, PlaybackEngineFactory, SinkFactory } from "@castbridge/core";
import type { SpotifySession } from "../spotify/session.js";
import type { PlayerEventIngress } from "./ingress.js";

export interface LibrespotEngine {
  sessionKey: string;
  sink: AudioSink;
  release(): void;
}

export class LibrespotEngineFactory implements PlaybackEngineFactory<SpotifySession, LibrespotEngine> {
  constructor(private readonly ingress: PlayerEventIngress) {}

  create(_session: SpotifySession, sinkFactory: SinkFactory): { engine: LibrespotEngine; events: AsyncIterable<PlaybackEvent> } {
    const { key, events } = this.ingress.open();
    const engine: LibrespotEngine = {
      sessionKey: key,
      sink: sinkFactory(),
      release: () => this.ingress.release(key),
    };
    return { engine, events };
  }
}
