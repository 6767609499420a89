import PQueue from "p-queue";
import { SPOTIFY_SHORT_LINK_PREFIX, type AlbumType } from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import { readIntEnvVar } from "../lib/env";
import { NetworkError } from "../lib/errors";
import { logEvent, readErrorMessage } from "../lib/logger";
import { reinitTrack } from "../models/reinit";
import { trackDisplayName, trackFromRecord, trackToRecord, type Track } from "../models/track";
import { albumFromUrl, type TrackList } from "../models/track-list";
import { MAX_SHORT_LINK_HOPS, matchQuery } from "./QueryMatchers";

export type ResolveOptions = {
  /** Re-resolution workers. Defaults to RESOLVER_THREADS, then 1. */
  threads?: number;
  /** Prefer YouTube Music per-track data on dual list references. */
  useVideoData?: boolean;
  playlistNumbering?: boolean;
  playlistRetainTrackCover?: boolean;
  albumType?: AlbumType | null;
  /** Album-name keywords; matching tracks are dropped. */
  ignoreAlbums?: string[];
};

const INTL_SEGMENT_PATTERN = /\/intl-\w+\//g;

/** Follows shortener redirects until the url is canonical. */
export async function normalizeShortLink(ctx: CatalogContext, request: string) {
  let current = request;
  for (let hop = 0; current.startsWith(SPOTIFY_SHORT_LINK_PREFIX); hop += 1) {
    if (hop >= MAX_SHORT_LINK_HOPS) {
      throw new NetworkError(`Short link ${request} redirects more than ${MAX_SHORT_LINK_HOPS} times`);
    }
    current = await ctx.resolveShortLink(current);
  }
  return current;
}

/** Locale segments are collapsed in urls; free text is searched as typed. */
export function stripIntlSegment(request: string) {
  if (!request.includes("://")) return request;
  return request.replace(INTL_SEGMENT_PATTERN, "/");
}

/** Member of `list` as a standalone track, with the list fields and the requested album rewrites. */
export function expandListMember(track: Track, list: TrackList, options: ResolveOptions = {}): Track {
  const data = trackToRecord(track);
  data.list_name = list.name;
  data.list_url = list.url;
  data.list_position = track.list_position;
  data.list_length = list.length;

  const isPlaylist = list.kind === "playlist";
  if (options.playlistNumbering || options.playlistRetainTrackCover) {
    data.track_number = data.list_position;
    data.tracks_count = data.list_length;
    data.album_name = data.list_name;
    data.disc_number = 1;
    data.disc_count = 1;
    if (isPlaylist) {
      data.album_artist = list.author_name;
    }
  }
  if (options.playlistNumbering && isPlaylist) {
    data.cover_url = list.cover_url;
  }

  return trackFromRecord(data);
}

function filterIgnoredAlbums(tracks: Track[], keywords: string[]) {
  const lowered = keywords.map((keyword) => keyword.toLowerCase()).filter((keyword) => keyword.length > 0);
  if (lowered.length === 0) return tracks;

  const kept = tracks.filter((track) => {
    const albumName = (track.album_name ?? "").toLowerCase();
    return lowered.every((keyword) => !albumName.includes(keyword));
  });
  logEvent("info", "tracks_skipped_ignored_albums", {
    skipped: tracks.length - kept.length,
  });
  return kept;
}

function filterAlbumType(tracks: Track[], albumType: AlbumType) {
  const kept = tracks.filter((track) => track.album_type === albumType);
  logEvent("info", "tracks_skipped_album_type", {
    albumType,
    skipped: tracks.length - kept.length,
  });
  return kept;
}

/**
 * Matches every input, expands the lists it produced and applies the album
 * filters. Nothing is re-fetched; list members stay partial.
 */
export async function simpleResolve(ctx: CatalogContext, inputs: string[], options: ResolveOptions = {}) {
  const tracks: Track[] = [];
  const lists: TrackList[] = [];

  for (const input of inputs) {
    logEvent("info", "query_processing", { query: input });
    const request = stripIntlSegment(await normalizeShortLink(ctx, input));
    const matcher = matchQuery(request);
    const result = await matcher.parse(request, ctx, { useVideoData: options.useVideoData ?? false });
    if (result.track) tracks.push(result.track);
    if (result.list) lists.push(result.list);
  }

  for (const list of lists) {
    logEvent("info", "track_list_expanded", {
      kind: list.kind,
      name: list.name,
      count: list.urls.length,
    });
    for (const member of list.tracks) {
      tracks.push(expandListMember(member, list, options));
    }
  }

  let filtered = tracks;
  if (options.ignoreAlbums && options.ignoreAlbums.length > 0) {
    filtered = filterIgnoredAlbums(filtered, options.ignoreAlbums);
  }
  if (options.albumType) {
    filtered = filterAlbumType(filtered, options.albumType);
  }

  logEvent("debug", "simple_resolve_done", {
    tracks: filtered.length,
    lists: lists.length,
  });
  return filtered;
}

/**
 * `simpleResolve`, then every track re-fetched on a bounded pool. A track that
 * fails to re-resolve is logged and left out; results arrive in completion order.
 */
export async function resolve(ctx: CatalogContext, inputs: string[], options: ResolveOptions = {}) {
  const tracks = await simpleResolve(ctx, inputs, options);
  const concurrency = Math.max(1, Math.floor(options.threads ?? readIntEnvVar("RESOLVER_THREADS", 1)));
  const queue = new PQueue({ concurrency });
  const results: Track[] = [];

  const tasks = tracks.map((track) =>
    queue.add(async () => {
      try {
        results.push(await reinitTrack(ctx, track));
      } catch (error) {
        logEvent("error", "track_reresolve_failed", {
          track: trackDisplayName(track),
          error: readErrorMessage(error),
        });
      }
    }),
  );
  await Promise.all(tasks);

  return results;
}

/** Partial members of several albums, in album order. */
export async function tracksFromAlbums(ctx: CatalogContext, albumUrls: string[]) {
  const tracks: Track[] = [];
  for (const url of albumUrls) {
    const album = await albumFromUrl(ctx, url, false);
    tracks.push(...album.tracks);
  }
  return tracks;
}
