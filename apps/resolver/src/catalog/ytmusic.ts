import { fetchJsonWithTimeout, type FetchFn } from "./http";
import { readEnvVar } from "../lib/env";
import { NetworkError, NotFoundError } from "../lib/errors";

type YTMusicArtistRef = {
  name?: string;
  id?: string | null;
};

export type YTMusicSong = {
  videoDetails?: {
    videoId?: string;
    title?: string;
    author?: string;
    lengthSeconds?: string | number;
  };
};

export type YTMusicAlbumTrack = {
  videoId?: string | null;
  title?: string;
  artists?: YTMusicArtistRef[] | null;
  duration_seconds?: number | null;
  isExplicit?: boolean;
};

export type YTMusicAlbum = {
  title?: string;
  artists?: YTMusicArtistRef[];
  thumbnails?: Array<{ url?: string }> | null;
  tracks?: YTMusicAlbumTrack[];
};

export type YTMusicPlaylistTrack = YTMusicAlbumTrack & {
  album?: { name?: string; id?: string | null } | null;
  isAvailable?: boolean;
};

export type YTMusicPlaylist = {
  id?: string;
  title?: string;
  description?: string | null;
  author?: YTMusicArtistRef | null;
  thumbnails?: Array<{ url?: string }> | null;
  tracks?: YTMusicPlaylistTrack[];
};

/** Secondary catalog. Mirrors the shapes returned by the ytmusicapi JSON proxy. */
export interface YouTubeMusicApi {
  getSong(videoId: string): Promise<YTMusicSong>;
  getAlbumBrowseId(listId: string): Promise<string | null>;
  getAlbum(browseId: string): Promise<YTMusicAlbum>;
  getPlaylist(playlistId: string): Promise<YTMusicPlaylist>;
}

export type YouTubeMusicClientOptions = {
  baseUrl?: string | null;
  timeoutMs?: number;
  retries?: number;
  fetchImpl?: FetchFn;
};

export class YouTubeMusicClient implements YouTubeMusicApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly fetchImpl: FetchFn | undefined;

  constructor(options: YouTubeMusicClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "").trim().replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 8_000;
    this.retries = options.retries ?? 1;
    this.fetchImpl = options.fetchImpl;
  }

  static fromEnv(overrides: YouTubeMusicClientOptions = {}) {
    return new YouTubeMusicClient({
      baseUrl: readEnvVar("YTMUSIC_API_URL"),
      ...overrides,
    });
  }

  private async get(path: string, params: Record<string, string> = {}, route = "get") {
    if (!this.baseUrl) {
      throw new NetworkError("YTMUSIC_API_URL is not configured");
    }
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return fetchJsonWithTimeout(
      url,
      {},
      {
        timeoutMs: this.timeoutMs,
        retries: this.retries,
        fetchImpl: this.fetchImpl,
        context: {
          catalog: "ytmusic",
          route,
        },
      },
    );
  }

  async getSong(videoId: string) {
    const payload = (await this.get(`/songs/${encodeURIComponent(videoId)}`, {}, "song")) as YTMusicSong | null;
    if (!payload?.videoDetails) {
      throw new NotFoundError(`YouTube Music has no song ${videoId}`);
    }
    return payload;
  }

  async getAlbumBrowseId(listId: string) {
    const payload = (await this.get("/albums/browse-id", { list: listId }, "album_browse_id")) as {
      browseId?: string | null;
    } | null;
    const browseId = payload?.browseId?.trim();
    return browseId ? browseId : null;
  }

  async getAlbum(browseId: string) {
    const payload = (await this.get(`/albums/${encodeURIComponent(browseId)}`, {}, "album")) as YTMusicAlbum | null;
    if (!payload) {
      throw new NotFoundError(`YouTube Music has no album ${browseId}`);
    }
    return payload;
  }

  async getPlaylist(playlistId: string) {
    const payload = (await this.get(
      `/playlists/${encodeURIComponent(playlistId)}`,
      {},
      "playlist",
    )) as YTMusicPlaylist | null;
    if (!payload) {
      throw new NotFoundError(`YouTube Music has no playlist ${playlistId}`);
    }
    return payload;
  }
}
