import { randomUUID } from "node:crypto";
import type { PlaybackEvent } from "@castbridge/contracts";
import { EventChannel } from "@castbridge/core";

export class PlayerEventIngress {
  private readonly channels = new Map<string, EventChannel<PlaybackEvent>>();

  open(): { key: string; events: EventChannel<PlaybackEvent> } {
    const key = randomUUID();
    const events = new EventChannel<PlaybackEvent>();
    this.channels.set(key, events);
    return { key, events };
  }

  deliver(key: string, event: PlaybackEvent): boolean {
    const events = this.channels.get(key);
    if (!events) {
      return false;
    }
    return events.send(event);
  }

  release(key: string): void {
    this.channels.get(key)?.close();
    this.channels.delete(key);
  }

  get size(): number {
    return this.channels.size;
  }
}
