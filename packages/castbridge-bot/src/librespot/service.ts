import { access } from "node:fs/promises";
import { join } from "node:path";
import type { Metadata, MetadataRef, MetadataResolver, StreamingService } from "@castbridge/core";
import type { Logger } from "pino";
import type { SpotifyCredentials, SpotifySession } from "../spotify/session.js";
import { SpotifyWebApi, type FetchFn } from "../spotify/web-api.js";

// Written by librespot into its --cache directory after the first successful login.
export const CACHED_CREDENTIALS_FILE = "credentials.json";

export async function hasCachedCredentials(cacheDir: string | undefined): Promise<boolean> {
  if (!cacheDir) {
    return false;
  }
  try {
    await access(join(cacheDir, CACHED_CREDENTIALS_FILE));
    return true;
  } catch {
    return false;
  }
}

export interface LibrespotServiceOptions {
  logger: Logger;
  fetchFn?: FetchFn;
}

export class LibrespotService implements StreamingService<SpotifySession, SpotifyCredentials>, MetadataResolver<SpotifySession> {
  constructor(private readonly options: LibrespotServiceOptions) {}

  async connect(credentials: SpotifyCredentials): Promise<SpotifySession> {
    const webApi = new SpotifyWebApi({
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      fetchFn: this.options.fetchFn,
    });
    await webApi.authenticate();
    const { logger } = this.options;
    logger.info({ username: credentials.username }, "spotify session established");

    let password = credentials.password;
    if (await hasCachedCredentials(credentials.cacheDir)) {
      logger.info({ cacheDir: credentials.cacheDir }, "using cached librespot credentials");
      password = undefined;
    } else if (password && !credentials.cacheDir) {
      logger.warn("no credentials cache configured; the password is passed to every librespot launch");
    }

    return {
      username: credentials.username,
      password,
      cacheDir: credentials.cacheDir,
      webApi,
    };
  }

  resolveMetadata(session: SpotifySession, ref: MetadataRef): Promise<Metadata> {
    return session.webApi.resolve(ref);
  }
}
