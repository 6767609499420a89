import {
  type KeywordCommand,
  SAVED_FILE_SUFFIX,
  SEARCH_PREFIXES,
  SPOTIFY_HOST,
  SPOTIFY_SHORT_LINK_PREFIX,
  VIDEO_HOST_MARKERS,
} from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import {
  DataError,
  FormatError,
  LengthMismatchError,
  NetworkError,
  TypeMismatchError,
} from "../lib/errors";
import { logEvent, readErrorMessage } from "../lib/logger";
import { trackFromPartialData, trackFromRecord, trackFromSearchTerm, trackFromUrl, type Track } from "../models/track";
import {
  albumFromUrl,
  artistFromUrl,
  playlistFromUrl,
  savedTracksList,
  trackListFromSearchTerm,
  type SearchableListKind,
  type TrackList,
} from "../models/track-list";
import { createYtmAlbum, createYtmPlaylist, toYouTubeMusicUrl } from "../models/ytmusic-lists";
import { firstOfUserCollection } from "./UserLibrary";

export const MAX_SHORT_LINK_HOPS = 3;

export type MatchOptions = {
  useVideoData: boolean;
  /** Short-link redirects already followed for this request. */
  shortLinkHops?: number;
};

export type MatchResult = {
  track: Track | null;
  list: TrackList | null;
};

export type QueryMatcher = {
  id: string;
  canHandle: (request: string) => boolean;
  parse: (request: string, ctx: CatalogContext, options: MatchOptions) => Promise<MatchResult>;
};

const YTM_ALBUM_MARKER = "?list=OLAK5uy_";
const YTM_PLAYLIST_MARKERS = ["?list=PL", "browse/VLPL"] as const;

function hasVideoHostMarker(value: string) {
  return VIDEO_HOST_MARKERS.some((marker) => value.includes(marker));
}

function onlyTrack(track: Track | null): MatchResult {
  return { track, list: null };
}

function onlyList(list: TrackList | null): MatchResult {
  return { track: null, list };
}

function readVideoId(request: string) {
  const raw = request.split("?v=")[1] ?? "";
  return raw.split("&")[0] ?? "";
}

function parseLengthSeconds(value: string | number | undefined) {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

function isYtmPlaylistUrl(url: string) {
  return YTM_PLAYLIST_MARKERS.some((marker) => url.includes(marker));
}

async function parseDualTrack(request: string): Promise<MatchResult> {
  const [videoSide, spotifySide] = request.split("|");
  if (
    !videoSide ||
    !spotifySide ||
    !hasVideoHostMarker(videoSide) ||
    !spotifySide.includes(SPOTIFY_HOST) ||
    !spotifySide.includes("track")
  ) {
    throw new FormatError('Incorrect format used, please use "VideoURL|SpotifyURL"');
  }
  return onlyTrack(trackFromPartialData({ url: spotifySide, download_url: videoSide }));
}

async function parseYtmTrack(request: string, ctx: CatalogContext, options: MatchOptions): Promise<MatchResult> {
  const song = await ctx.ytmusic.getSong(readVideoId(request));
  const details = song.videoDetails ?? {};
  const track = await trackFromSearchTerm(ctx, `${details.author ?? ""} - ${details.title ?? ""}`);

  if (options.useVideoData) {
    const author = details.author ?? null;
    return onlyTrack({
      ...track,
      name: details.title ?? track.name,
      artist: author ?? track.artist,
      artists: author ? [author] : track.artists,
      duration: parseLengthSeconds(details.lengthSeconds) ?? track.duration,
      download_url: request,
    });
  }
  return onlyTrack({ ...track, download_url: request });
}

async function parseYtmList(raw: string, ctx: CatalogContext, options: MatchOptions): Promise<MatchResult> {
  const request = toYouTubeMusicUrl(raw);
  const [videoSide = "", spotifySide] = request.split("|");

  if (spotifySide === undefined) {
    if (request.includes(YTM_ALBUM_MARKER)) {
      return onlyList(await createYtmAlbum(ctx, request, false));
    }
    if (isYtmPlaylistUrl(request)) {
      return onlyList(await createYtmPlaylist(ctx, request, false));
    }
    return onlyList(null);
  }

  if (!spotifySide.includes("spotify") || !(videoSide.includes(YTM_ALBUM_MARKER) || isYtmPlaylistUrl(videoSide))) {
    throw new FormatError(
      'Incorrect format used, please use "YouTubeMusicURL|SpotifyURL". Only YouTube Music playlists and albums are supported.',
    );
  }

  // Kinds are read per side: a video list url always contains "playlist".
  const onSpotify = spotifySide.includes(SPOTIFY_HOST);
  let videoList: TrackList;
  let spotifyList: TrackList;
  if (onSpotify && spotifySide.includes("album") && videoSide.includes(YTM_ALBUM_MARKER)) {
    videoList = await createYtmAlbum(ctx, videoSide, false);
    spotifyList = await albumFromUrl(ctx, spotifySide, false);
  } else if (onSpotify && spotifySide.includes("playlist") && isYtmPlaylistUrl(videoSide)) {
    videoList = await createYtmPlaylist(ctx, videoSide, false);
    spotifyList = await playlistFromUrl(ctx, spotifySide, false);
  } else {
    throw new TypeMismatchError(videoSide, spotifySide);
  }

  if (videoList.length !== spotifyList.length) {
    throw new LengthMismatchError(videoList.length, spotifyList.length);
  }

  if (options.useVideoData) {
    const tracks = videoList.tracks.map((track, index) => ({ ...track, url: spotifyList.tracks[index]?.url ?? null }));
    return onlyList({ ...videoList, tracks, urls: tracks.map((track) => track.url) });
  }

  const tracks = spotifyList.tracks.map((track, index) => ({
    ...track,
    download_url: videoList.tracks[index]?.download_url ?? null,
  }));
  return onlyList({ ...spotifyList, tracks });
}

async function parseShortLink(request: string, ctx: CatalogContext, options: MatchOptions): Promise<MatchResult> {
  const hops = (options.shortLinkHops ?? 0) + 1;
  if (hops > MAX_SHORT_LINK_HOPS) {
    throw new NetworkError(`Short link ${request} redirects more than ${MAX_SHORT_LINK_HOPS} times`);
  }
  const resolved = await ctx.resolveShortLink(request);
  logEvent("debug", "short_link_followed", { from: request, to: resolved, hops });
  return matchQuery(resolved).parse(resolved, ctx, { ...options, shortLinkHops: hops });
}

function searchMatcher(kind: SearchableListKind, prefix: (typeof SEARCH_PREFIXES)[number]): QueryMatcher {
  return {
    id: `${kind}-search`,
    canHandle: (request) => request.includes(prefix),
    parse: async (request, ctx) => {
      const term = request.slice(request.indexOf(prefix) + prefix.length).trim();
      return onlyList(await trackListFromSearchTerm(ctx, kind, term, false));
    },
  };
}

function spotifyPathMatcher(
  id: string,
  marker: string,
  parse: (request: string, ctx: CatalogContext) => Promise<TrackList | null>,
): QueryMatcher {
  return {
    id,
    canHandle: (request) => request.includes(SPOTIFY_HOST) && request.includes(marker),
    parse: async (request, ctx) => onlyList(await parse(request, ctx)),
  };
}

function keywordMatcher(
  keyword: KeywordCommand,
  parse: (ctx: CatalogContext) => Promise<TrackList | null>,
): QueryMatcher {
  return {
    id: keyword,
    canHandle: (request) => request === keyword,
    parse: async (_request, ctx) => onlyList(await parse(ctx)),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function parseSavedFile(request: string, ctx: CatalogContext): Promise<MatchResult> {
  let records: unknown;
  try {
    records = JSON.parse(await ctx.readTextFile(request));
  } catch (error) {
    throw new DataError(`Could not read saved query file ${request}: ${readErrorMessage(error)}`);
  }
  if (!Array.isArray(records)) {
    throw new DataError(`Saved query file ${request} does not hold a list of tracks`);
  }

  const first: unknown = records[0];
  if (first === undefined) return onlyTrack(null);
  if (!isRecord(first)) {
    throw new DataError(`Saved query file ${request} starts with an invalid track record`);
  }
  return onlyTrack(trackFromRecord(first));
}

const SPOTIFY_SEARCH_PREFIXES = {
  album: "album:",
  playlist: "playlist:",
  artist: "artist:",
} as const satisfies Record<SearchableListKind, (typeof SEARCH_PREFIXES)[number]>;

/** Evaluated in order; the first matcher that claims a request parses it. */
export const QUERY_MATCHERS: readonly QueryMatcher[] = [
  {
    id: "dual-track",
    canHandle: (request) =>
      hasVideoHostMarker(request) && request.includes(SPOTIFY_HOST) && request.includes("track") && request.includes("|"),
    parse: (request) => parseDualTrack(request),
  },
  {
    id: "ytmusic-track",
    canHandle: (request) => request.includes("music.youtube.com/watch?v"),
    parse: parseYtmTrack,
  },
  {
    id: "ytmusic-list",
    canHandle: (request) => request.includes("youtube.com/playlist?list=") || request.includes("youtube.com/browse/VLPL"),
    parse: parseYtmList,
  },
  {
    id: "spotify-track",
    canHandle: (request) => request.includes(SPOTIFY_HOST) && request.includes("track"),
    parse: async (request, ctx) => onlyTrack(await trackFromUrl(ctx, request)),
  },
  {
    id: "spotify-short-link",
    canHandle: (request) => request.includes(SPOTIFY_SHORT_LINK_PREFIX),
    parse: parseShortLink,
  },
  spotifyPathMatcher("spotify-playlist", "playlist", (request, ctx) => playlistFromUrl(ctx, request, false)),
  spotifyPathMatcher("spotify-album", "album", (request, ctx) => albumFromUrl(ctx, request, false)),
  spotifyPathMatcher("spotify-artist", "artist", (request, ctx) => artistFromUrl(ctx, request, false)),
  spotifyPathMatcher("spotify-user", "user", (request, ctx) =>
    firstOfUserCollection(ctx, "user-playlists", { userUrl: request }),
  ),
  searchMatcher("album", SPOTIFY_SEARCH_PREFIXES.album),
  searchMatcher("playlist", SPOTIFY_SEARCH_PREFIXES.playlist),
  searchMatcher("artist", SPOTIFY_SEARCH_PREFIXES.artist),
  keywordMatcher("saved", (ctx) => savedTracksList(ctx, false)),
  keywordMatcher("all-user-playlists", (ctx) => firstOfUserCollection(ctx, "user-playlists")),
  keywordMatcher("all-user-followed-artists", (ctx) => firstOfUserCollection(ctx, "followed-artists")),
  keywordMatcher("all-user-saved-albums", (ctx) => firstOfUserCollection(ctx, "saved-albums")),
  keywordMatcher("all-saved-playlists", (ctx) => firstOfUserCollection(ctx, "saved-playlists")),
  {
    id: "saved-file",
    canHandle: (request) => request.endsWith(SAVED_FILE_SUFFIX),
    parse: (request, ctx) => parseSavedFile(request, ctx),
  },
  {
    id: "default",
    canHandle: () => true,
    parse: async (request, ctx) => onlyTrack(await trackFromSearchTerm(ctx, request)),
  },
];

export function matchQuery(request: string): QueryMatcher {
  const matcher = QUERY_MATCHERS.find((candidate) => candidate.canHandle(request));
  if (!matcher) {
    throw new FormatError(`No matcher accepts ${request}`);
  }
  return matcher;
}
