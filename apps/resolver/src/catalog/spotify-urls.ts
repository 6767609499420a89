import { SPOTIFY_TRACK_URL_PREFIX } from "@songbridge/shared";
import type { SpotifyImage } from "./spotify-types";

export type SpotifyEntityKind = "track" | "album" | "playlist" | "artist" | "user";

function safeDecodeURIComponent(value: string) {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Id of a Spotify entity from an open.spotify.com url or a `spotify:kind:id`
 * uri. Locale segments such as `/intl-de/` are tolerated.
 */
export function spotifyIdFromUrl(raw: string, kind: SpotifyEntityKind): string | null {
  const decoded = safeDecodeURIComponent(raw.trim());
  const idPattern = kind === "user" ? "([^/?#&|]+)" : "([a-zA-Z0-9]+)";
  const fromUrl = decoded.match(
    new RegExp(`open\\.spotify\\.com/(?:intl-[\\w-]+/)?(?:embed/)?${kind}/${idPattern}`, "i"),
  )?.[1];
  if (fromUrl) return fromUrl;
  const fromUri = decoded.match(new RegExp(`spotify:${kind}:${idPattern}`, "i"))?.[1];
  return fromUri ?? null;
}

export function spotifyTrackUrl(id: string) {
  return `${SPOTIFY_TRACK_URL_PREFIX}${id}`;
}

export function spotifyEntityUrl(kind: SpotifyEntityKind, id: string, externalUrl?: string | null) {
  return externalUrl ?? `https://open.spotify.com/${kind}/${id}`;
}

/** Widest image, or the first one when widths are unknown. */
export function pickCoverUrl(images: SpotifyImage[] | null | undefined) {
  const candidates = (images ?? []).filter((image) => typeof image.url === "string" && image.url.length > 0);
  if (candidates.length === 0) return null;
  const best = [...candidates].sort((a, b) => (b.width ?? 0) - (a.width ?? 0))[0];
  return best?.url ?? null;
}

export function yearFromReleaseDate(date: string | null | undefined) {
  if (!date) return null;
  const year = Number.parseInt(date.slice(0, 4), 10);
  return Number.isFinite(year) ? year : null;
}
