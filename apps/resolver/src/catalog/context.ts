import { readFile } from "node:fs/promises";
import { resolveRedirect, type FetchFn } from "./http";
import { SpotifyClient, type SpotifyApi, type SpotifyClientOptions } from "./spotify";
import { YouTubeMusicClient, type YouTubeMusicApi, type YouTubeMusicClientOptions } from "./ytmusic";

export const SHORT_LINK_TIMEOUT_MS = 10_000;

/**
 * Everything the matchers and value objects reach outside the process with.
 * Built once by the caller and passed down explicitly.
 */
export type CatalogContext = {
  spotify: SpotifyApi;
  ytmusic: YouTubeMusicApi;
  /** Canonical url behind a shortener link. */
  resolveShortLink(url: string): Promise<string>;
  readTextFile(path: string): Promise<string>;
};

export function shortLinkResolver(fetchImpl?: FetchFn) {
  return (url: string) => resolveRedirect(url, SHORT_LINK_TIMEOUT_MS, fetchImpl);
}

export function createCatalogContextFromEnv(
  overrides: {
    spotify?: SpotifyClientOptions;
    ytmusic?: YouTubeMusicClientOptions;
    fetchImpl?: FetchFn;
  } = {},
): CatalogContext {
  return {
    spotify: SpotifyClient.fromEnv({ fetchImpl: overrides.fetchImpl, ...overrides.spotify }),
    ytmusic: YouTubeMusicClient.fromEnv({ fetchImpl: overrides.fetchImpl, ...overrides.ytmusic }),
    resolveShortLink: shortLinkResolver(overrides.fetchImpl),
    readTextFile: (path) => readFile(path, "utf8"),
  };
}
