import { fileURLToPath } from "node:url";
import type { PlayerEventHook } from "@castbridge/contracts";

export const HOOK_URL_ENV = "CASTBRIDGE_HOOK_URL";
export const HOOK_TOKEN_ENV = "CASTBRIDGE_HOOK_TOKEN";
export const SESSION_KEY_ENV = "CASTBRIDGE_SESSION_KEY";

export interface HookRequest {
  url: string;
  init: {
    method: "POST";
    headers: Record<string, string>;
    body: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Builds the request the hook program sends for one librespot player event.
 * Returns null when librespot did not name an event.
 */
export function buildHookRequest(env: Env): HookRequest | null {
  const url = env[HOOK_URL_ENV];
  const token = env[HOOK_TOKEN_ENV];
  const sessionKey = env[SESSION_KEY_ENV];
  if (!url || !token || !sessionKey) {
    throw new Error(`${HOOK_URL_ENV}, ${HOOK_TOKEN_ENV} and ${SESSION_KEY_ENV} must be set`);
  }

  const event = env.PLAYER_EVENT;
  if (!event) {
    return null;
  }

  const payload: PlayerEventHook = { sessionKey, event };
  if (env.TRACK_ID) {
    payload.trackId = env.TRACK_ID;
  }
  if (env.VOLUME) {
    payload.volume = env.VOLUME;
  }

  return {
    url,
    init: {
      method: "POST",
      headers: {
        authorization: `Bearer ${token}`,
        "content-type": "application/json",
      },
      body: JSON.stringify(payload),
    },
  };
}

export function hookScriptPath(): string {
  const extension = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
  return fileURLToPath(new URL(`./player-event-hook${extension}`, import.meta.url));
}
