import type { SpotifyWebApi } from "./web-api.js";

export interface SpotifyCredentials {
  username: string;
  password?: string;
  clientId: string;
  clientSecret: string;
  cacheDir?: string;
}

export interface SpotifySession {
  username: string;
  password?: string;
  cacheDir?: string;
  webApi: SpotifyWebApi;
}
