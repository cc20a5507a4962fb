import { MetadataLookupError, type Metadata, type MetadataRef } from "@castbridge/core";
import { z } from "zod";

const TOKEN_URL = "https://accounts.spotify.com/api/token";
const API_BASE_URL = "https://api.spotify.com/v1";
const TOKEN_REFRESH_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().int().positive(),
});

const TrackResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  artists: z.array(z.object({ id: z.string(), name: z.string() })),
});

const ArtistResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface SpotifyWebApiOptions {
  clientId: string;
  clientSecret: string;
  fetchFn?: FetchFn;
  now?: () => number;
}

export class SpotifyWebApi {
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private token: { value: string; expiresAtMs: number } | undefined;

  constructor(private readonly options: SpotifyWebApiOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async authenticate(): Promise<string> {
    if (this.token && this.token.expiresAtMs > this.now()) {
      return this.token.value;
    }

    const basic = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString("base64");
    const response = await this.fetchFn(TOKEN_URL, {
      method: "POST",
      headers: {
        authorization: `Basic ${basic}`,
        "content-type": "application/x-www-form-urlencoded",
      },
      body: "grant_type=client_credentials",
    });
    if (!response.ok) {
      throw new Error(`Spotify token request failed with status ${response.status}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Spotify token response failed validation");
    }

    this.token = {
      value: parsed.data.access_token,
      expiresAtMs: this.now() + (parsed.data.expires_in * 1000) - TOKEN_REFRESH_MARGIN_MS,
    };
    return this.token.value;
  }

  async resolve(ref: MetadataRef): Promise<Metadata> {
    if (ref.kind === "track") {
      const track = await this.getJson(`/tracks/${encodeURIComponent(ref.id)}`, ref.id, TrackResponseSchema);
      return {
        kind: "track",
        id: track.id,
        name: track.name,
        artistIds: track.artists.map((artist) => artist.id),
      };
    }

    const artist = await this.getJson(`/artists/${encodeURIComponent(ref.id)}`, ref.id, ArtistResponseSchema);
    return { kind: "artist", id: artist.id, name: artist.name };
  }

  private async getJson<T extends z.ZodTypeAny>(path: string, id: string, schema: T): Promise<z.infer<T>> {
    let response: Response;
    try {
      const token = await this.authenticate();
      response = await this.fetchFn(`${API_BASE_URL}${path}`, {
        headers: { authorization: `Bearer ${token}` },
      });
    } catch (error) {
      throw new MetadataLookupError(id, `Request for ${path} failed`, { cause: error });
    }

    if (!response.ok) {
      throw new MetadataLookupError(id, `Request for ${path} failed with status ${response.status}`);
    }

    const parsed = schema.safeParse(await response.json().catch(() => undefined));
    if (!parsed.success) {
      throw new MetadataLookupError(id, `Response for ${path} failed validation`);
    }
    return parsed.data;
  }
}
