import {
  SpotifyIdSchema,
  VolumeLevelSchema,
  type PlaybackEvent,
  type PlayerEventHook,
} from "@castbridge/contracts";

/**
 * Translates a librespot onevent invocation into a playback event. Event
 * names differ between librespot releases, so both spellings are accepted.
 */
export function toPlaybackEvent(hook: Omit<PlayerEventHook, "sessionKey">): PlaybackEvent {
  switch (hook.event) {
    case "started":
    case "loading":
      return { type: "started" };
    case "stopped":
      return { type: "stopped" };
    case "paused":
      return { type: "paused" };
    case "playing": {
      const trackId = SpotifyIdSchema.safeParse(hook.trackId);
      return trackId.success ? { type: "playing", trackId: trackId.data } : { type: "other", name: hook.event };
    }
    case "volume_set":
    case "volume_changed": {
      const volume = VolumeLevelSchema.safeParse(Number(hook.volume));
      return volume.success ? { type: "volume_changed", volume: volume.data } : { type: "other", name: hook.event };
    }
    default:
      return { type: "other", name: hook.event };
  }
}
