import { fetchJsonWithTimeout, type FetchFn } from "./http";
import type {
  SpotifyAlbum,
  SpotifyArtist,
  SpotifyPage,
  SpotifyPlaylist,
  SpotifyPlaylistItem,
  SpotifySavedAlbum,
  SpotifySavedTrack,
  SpotifySearchPayload,
  SpotifySearchType,
  SpotifySimpleAlbum,
  SpotifySimplePlaylist,
  SpotifySimpleTrack,
  SpotifyTrack,
  SpotifyUser,
} from "./spotify-types";
import { readEnvVar } from "../lib/env";
import { AuthError, NetworkError } from "../lib/errors";
import { logEvent, readErrorMessage } from "../lib/logger";

const SPOTIFY_API_BASE_URL = "https://api.spotify.com/v1";
const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";
const PAGE_LIMIT = 50;
const PLAYLIST_PAGE_LIMIT = 100;

/**
 * What the value objects need from the primary catalog. `SpotifyClient` is
 * the HTTP implementation; tests provide in-process ones.
 */
export interface SpotifyApi {
  /** True when a signed-in user session is available. */
  readonly userAuth: boolean;
  getTrack(id: string): Promise<SpotifyTrack>;
  getAlbum(id: string): Promise<SpotifyAlbum>;
  getAlbumTracks(id: string): Promise<SpotifyPage<SpotifySimpleTrack | null>>;
  getArtist(id: string): Promise<SpotifyArtist>;
  getArtistAlbums(id: string): Promise<SpotifyPage<SpotifySimpleAlbum>>;
  getPlaylist(id: string): Promise<SpotifyPlaylist>;
  getPlaylistItems(id: string): Promise<SpotifyPage<SpotifyPlaylistItem | null>>;
  search(term: string, type: SpotifySearchType, limit?: number): Promise<SpotifySearchPayload>;
  currentUser(): Promise<SpotifyUser>;
  currentUserPlaylists(): Promise<SpotifyPage<SpotifySimplePlaylist>>;
  userPlaylists(userId: string): Promise<SpotifyPage<SpotifySimplePlaylist>>;
  currentUserSavedTracks(): Promise<SpotifyPage<SpotifySavedTrack>>;
  currentUserSavedAlbums(): Promise<SpotifyPage<SpotifySavedAlbum>>;
  currentUserFollowedArtists(): Promise<SpotifyPage<SpotifyArtist>>;
  /** Next page of a collection, or null on the last one. */
  next<T>(page: SpotifyPage<T>): Promise<SpotifyPage<T> | null>;
}

export type SpotifyClientOptions = {
  clientId?: string | null;
  clientSecret?: string | null;
  /** App token used when no client credentials are configured. */
  accessToken?: string | null;
  /** Token of a signed-in user; enables the "current user" endpoints. */
  userToken?: string | null;
  market?: string | null;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: FetchFn;
};

type SpotifyTokenPayload = {
  access_token?: string;
  token_type?: string;
  expires_in?: number;
};

type SpotifyTokenCache = {
  token: string;
  expiresAtMs: number;
};

function normalizeAccessToken(raw: string | null | undefined) {
  const trimmed = raw?.trim() ?? "";
  if (trimmed.length === 0) return "";
  return trimmed.replace(/^bearer\s+/i, "").trim();
}

function normalizeMarket(raw: string | null | undefined) {
  const normalized = (raw ?? "US").trim().toUpperCase();
  if (/^[A-Z]{2}$/.test(normalized)) return normalized;
  return "US";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Followed-artist pages arrive wrapped as `{ artists: page }`. */
function readPage<T>(payload: unknown): SpotifyPage<T> | null {
  if (!isRecord(payload)) return null;
  if (Array.isArray(payload.items)) return payload as SpotifyPage<T>;
  const wrapped = payload.artists;
  if (isRecord(wrapped) && Array.isArray(wrapped.items)) return wrapped as SpotifyPage<T>;
  return null;
}

export class SpotifyClient implements SpotifyApi {
  readonly userAuth: boolean;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly staticToken: string;
  private readonly userToken: string;
  private readonly market: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchFn | undefined;
  private cachedToken: SpotifyTokenCache | null = null;

  constructor(options: SpotifyClientOptions = {}) {
    this.clientId = options.clientId?.trim() ?? "";
    this.clientSecret = options.clientSecret?.trim() ?? "";
    this.staticToken = normalizeAccessToken(options.accessToken);
    this.userToken = normalizeAccessToken(options.userToken);
    this.userAuth = this.userToken.length > 0;
    this.market = normalizeMarket(options.market);
    this.timeoutMs = options.timeoutMs ?? 8_000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.fetchImpl = options.fetchImpl;
  }

  static fromEnv(overrides: SpotifyClientOptions = {}) {
    return new SpotifyClient({
      clientId: readEnvVar("SPOTIFY_CLIENT_ID"),
      clientSecret: readEnvVar("SPOTIFY_CLIENT_SECRET"),
      accessToken: readEnvVar("SPOTIFY_ACCESS_TOKEN"),
      userToken: readEnvVar("SPOTIFY_USER_TOKEN"),
      market: readEnvVar("SPOTIFY_MARKET"),
      ...overrides,
    });
  }

  authDiagnostics() {
    const hasClientCredentials = this.clientId.length > 0 && this.clientSecret.length > 0;
    return {
      userAuth: this.userAuth,
      hasClientCredentials,
      hasStaticAccessToken: this.staticToken.length > 0,
      authMode: this.userAuth
        ? "user_token"
        : hasClientCredentials
          ? "client_credentials"
          : this.staticToken
            ? "static_token"
            : "missing",
      cachedTokenValid: Boolean(this.cachedToken && this.cachedToken.expiresAtMs > Date.now()),
    };
  }

  private async fetchClientCredentialsToken(): Promise<SpotifyTokenCache | null> {
    const body = new URLSearchParams();
    body.set("grant_type", "client_credentials");

    const basicAuth = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64");
    const payload = (await fetchJsonWithTimeout(
      SPOTIFY_TOKEN_URL,
      {
        method: "POST",
        headers: {
          authorization: `Basic ${basicAuth}`,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: body.toString(),
      },
      {
        timeoutMs: 6_000,
        retries: 1,
        retryDelayMs: this.retryDelayMs,
        fetchImpl: this.fetchImpl,
        context: {
          catalog: "spotify",
          route: "oauth_token",
        },
      },
    )) as SpotifyTokenPayload | null;

    const token = payload?.access_token?.trim();
    if (!token) return null;

    const expiresInSec = Math.max(60, payload?.expires_in ?? 3600);
    return {
      token,
      expiresAtMs: Date.now() + (expiresInSec - 30) * 1_000,
    } satisfies SpotifyTokenCache;
  }

  async getAccessToken(): Promise<string> {
    if (this.userAuth) return this.userToken;

    if (this.clientId && this.clientSecret) {
      if (this.cachedToken && this.cachedToken.expiresAtMs > Date.now()) {
        return this.cachedToken.token;
      }

      let fresh: SpotifyTokenCache | null = null;
      try {
        fresh = await this.fetchClientCredentialsToken();
      } catch (error) {
        if (!this.staticToken) throw error;
        logEvent("warn", "spotify_token_refresh_error", { error: readErrorMessage(error) });
      }
      if (fresh) {
        this.cachedToken = fresh;
        return fresh.token;
      }

      if (this.staticToken) {
        logEvent("warn", "spotify_token_refresh_failed_using_static_token_fallback");
        return this.staticToken;
      }

      throw new AuthError("Spotify token refresh returned no access token");
    }

    if (this.staticToken) return this.staticToken;

    logEvent("warn", "spotify_credentials_missing", this.authDiagnostics());
    throw new AuthError("Spotify credentials are missing");
  }

  private requireUserAuth() {
    if (!this.userAuth) {
      throw new AuthError();
    }
  }

  private async get(pathOrUrl: string, params: Record<string, string | number> = {}, route = "get") {
    const url = new URL(pathOrUrl.startsWith("https://") ? pathOrUrl : `${SPOTIFY_API_BASE_URL}${pathOrUrl}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const token = await this.getAccessToken();
    return fetchJsonWithTimeout(
      url,
      { headers: { authorization: `Bearer ${token}` } },
      {
        timeoutMs: this.timeoutMs,
        retries: this.retries,
        retryDelayMs: this.retryDelayMs,
        fetchImpl: this.fetchImpl,
        context: {
          catalog: "spotify",
          route,
        },
      },
    );
  }

  private async getPage<T>(pathOrUrl: string, params: Record<string, string | number>, route: string) {
    const page = readPage<T>(await this.get(pathOrUrl, params, route));
    if (!page) {
      throw new NetworkError(`Spotify returned no page for ${route}`);
    }
    return page;
  }

  async getTrack(id: string) {
    return (await this.get(`/tracks/${encodeURIComponent(id)}`, {}, "track")) as SpotifyTrack;
  }

  async getAlbum(id: string) {
    return (await this.get(`/albums/${encodeURIComponent(id)}`, {}, "album")) as SpotifyAlbum;
  }

  async getAlbumTracks(id: string) {
    return this.getPage<SpotifySimpleTrack | null>(
      `/albums/${encodeURIComponent(id)}/tracks`,
      { limit: PAGE_LIMIT, offset: 0 },
      "album_tracks",
    );
  }

  async getArtist(id: string) {
    return (await this.get(`/artists/${encodeURIComponent(id)}`, {}, "artist")) as SpotifyArtist;
  }

  async getArtistAlbums(id: string) {
    return this.getPage<SpotifySimpleAlbum>(
      `/artists/${encodeURIComponent(id)}/albums`,
      { include_groups: "album,single", limit: PAGE_LIMIT, offset: 0 },
      "artist_albums",
    );
  }

  async getPlaylist(id: string) {
    return (await this.get(`/playlists/${encodeURIComponent(id)}`, {}, "playlist")) as SpotifyPlaylist;
  }

  async getPlaylistItems(id: string) {
    return this.getPage<SpotifyPlaylistItem | null>(
      `/playlists/${encodeURIComponent(id)}/tracks`,
      { limit: PLAYLIST_PAGE_LIMIT, offset: 0 },
      "playlist_items",
    );
  }

  async search(term: string, type: SpotifySearchType, limit = 10) {
    return (await this.get(
      "/search",
      { q: term, type, limit: Math.max(1, Math.min(limit, PAGE_LIMIT)), market: this.market },
      `search_${type}`,
    )) as SpotifySearchPayload;
  }

  async currentUser() {
    this.requireUserAuth();
    return (await this.get("/me", {}, "current_user")) as SpotifyUser;
  }

  async currentUserPlaylists() {
    this.requireUserAuth();
    return this.getPage<SpotifySimplePlaylist>("/me/playlists", { limit: PAGE_LIMIT }, "current_user_playlists");
  }

  async userPlaylists(userId: string) {
    return this.getPage<SpotifySimplePlaylist>(
      `/users/${encodeURIComponent(userId)}/playlists`,
      { limit: PAGE_LIMIT },
      "user_playlists",
    );
  }

  async currentUserSavedTracks() {
    this.requireUserAuth();
    return this.getPage<SpotifySavedTrack>("/me/tracks", { limit: PAGE_LIMIT }, "current_user_saved_tracks");
  }

  async currentUserSavedAlbums() {
    this.requireUserAuth();
    return this.getPage<SpotifySavedAlbum>("/me/albums", { limit: PAGE_LIMIT }, "current_user_saved_albums");
  }

  async currentUserFollowedArtists() {
    this.requireUserAuth();
    return this.getPage<SpotifyArtist>(
      "/me/following",
      { type: "artist", limit: PAGE_LIMIT },
      "current_user_followed_artists",
    );
  }

  async next<T>(page: SpotifyPage<T>) {
    if (!page.next) return null;
    return this.getPage<T>(page.next, {}, "next_page");
  }
}

/** Lazily walks a paginated collection, first page included. */
export async function* paginate<T>(api: Pick<SpotifyApi, "next">, first: SpotifyPage<T>) {
  let page: SpotifyPage<T> | null = first;
  while (page) {
    yield page;
    page = page.next ? await api.next(page) : null;
  }
}

export async function collectAllItems<T>(api: Pick<SpotifyApi, "next">, first: SpotifyPage<T>) {
  const items: T[] = [];
  for await (const page of paginate(api, first)) {
    items.push(...page.items);
  }
  return items;
}
