import { ALBUM_TYPES, type AlbumType, type TrackRecord } from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import type { SpotifyAlbum, SpotifyArtist, SpotifySimpleTrack, SpotifyTrack } from "../catalog/spotify-types";
import {
  pickCoverUrl,
  spotifyIdFromUrl,
  spotifyTrackUrl,
  yearFromReleaseDate,
} from "../catalog/spotify-urls";
import { NotFoundError } from "../lib/errors";

/**
 * A song. Complete tracks come from the catalog and carry `url`; partial ones
 * are built from list payloads, files or user input and must keep at least
 * one of `url`, `song_id` or `name` + `artist` to be re-resolved later.
 */
export type Track = TrackRecord;

/** Album level data stamped onto tracks read from an album or playlist payload. */
export type TrackAlbumContext = {
  id: string | null;
  name: string | null;
  artist: string | null;
  type: AlbumType | null;
  date: string | null;
  tracksCount: number | null;
  coverUrl: string | null;
};

export type FileMetadataReader = (path: string) => Promise<Record<string, unknown> | null>;

function readString(value: unknown) {
  return typeof value === "string" ? value : null;
}

function readNumber(value: unknown) {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readBoolean(value: unknown) {
  return typeof value === "boolean" ? value : null;
}

function readStringList(value: unknown) {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

export function normalizeAlbumType(value: unknown): AlbumType | null {
  if (typeof value !== "string") return null;
  const lower = value.trim().toLowerCase();
  const match = ALBUM_TYPES.find((type) => type === lower);
  return match ?? null;
}

/** Rebuilds a track from a flat mapping. Unknown keys are ignored, bad values default. */
export function trackFromRecord(record: Record<string, unknown>): Track {
  return {
    name: readString(record.name),
    artists: readStringList(record.artists),
    artist: readString(record.artist),
    artist_id: readString(record.artist_id),
    genres: readStringList(record.genres),
    disc_number: readNumber(record.disc_number),
    disc_count: readNumber(record.disc_count),
    album_name: readString(record.album_name),
    album_artist: readString(record.album_artist),
    album_id: readString(record.album_id),
    album_type: normalizeAlbumType(record.album_type),
    duration: readNumber(record.duration),
    year: readNumber(record.year),
    date: readString(record.date),
    track_number: readNumber(record.track_number),
    tracks_count: readNumber(record.tracks_count),
    song_id: readString(record.song_id),
    explicit: readBoolean(record.explicit),
    publisher: readString(record.publisher),
    url: readString(record.url),
    isrc: readString(record.isrc),
    cover_url: readString(record.cover_url),
    copyright_text: readString(record.copyright_text),
    download_url: readString(record.download_url),
    popularity: readNumber(record.popularity),
    list_name: readString(record.list_name),
    list_url: readString(record.list_url),
    list_position: readNumber(record.list_position),
    list_length: readNumber(record.list_length),
  };
}

export function trackFromPartialData(fields: Partial<Track> = {}): Track {
  return trackFromRecord(fields);
}

export function trackToRecord(track: Track): TrackRecord {
  return {
    ...track,
    artists: [...track.artists],
    genres: [...track.genres],
  };
}

export function trackDisplayName(track: Pick<Track, "name" | "artist">) {
  return `${track.artist ?? "Unknown artist"} - ${track.name ?? "Unknown title"}`;
}

function durationSeconds(durationMs: number | null | undefined) {
  if (typeof durationMs !== "number" || !Number.isFinite(durationMs)) return null;
  return Math.round(durationMs / 1000);
}

function artistNames(item: Pick<SpotifySimpleTrack, "artists">) {
  return (item.artists ?? [])
    .map((artist) => artist.name?.trim())
    .filter((name): name is string => typeof name === "string" && name.length > 0);
}

export function albumContextFromSpotify(album: SpotifyAlbum | null | undefined): TrackAlbumContext {
  return {
    id: album?.id ?? null,
    name: album?.name ?? null,
    artist: album?.artists?.[0]?.name ?? null,
    type: normalizeAlbumType(album?.album_type),
    date: album?.release_date ?? null,
    tracksCount: readNumber(album?.total_tracks),
    coverUrl: pickCoverUrl(album?.images),
  };
}

/** Member of a list, built without fetching the track itself. */
export function partialTrackFromSpotify(
  item: SpotifyTrack,
  album: TrackAlbumContext,
  listPosition: number | null = null,
): Track {
  const artists = artistNames(item);
  const id = item.id ?? null;
  return trackFromPartialData({
    name: item.name ?? null,
    artists,
    artist: artists[0] ?? null,
    artist_id: item.artists?.[0]?.id ?? null,
    disc_number: readNumber(item.disc_number),
    album_name: album.name,
    album_artist: album.artist,
    album_id: album.id,
    album_type: album.type,
    duration: durationSeconds(item.duration_ms),
    year: yearFromReleaseDate(album.date),
    date: album.date,
    track_number: readNumber(item.track_number),
    tracks_count: album.tracksCount,
    song_id: id,
    explicit: readBoolean(item.explicit),
    url: id ? (item.external_urls?.spotify ?? spotifyTrackUrl(id)) : null,
    isrc: item.external_ids?.isrc ?? null,
    cover_url: album.coverUrl,
    popularity: readNumber(item.popularity),
    list_position: listPosition,
  });
}

/** Full record from a track, its album and its primary artist. */
export function trackFromSpotifyPayloads(
  track: SpotifyTrack,
  album: SpotifyAlbum | null,
  primaryArtist: SpotifyArtist | null,
): Track {
  const albumContext = albumContextFromSpotify(album ?? track.album);
  const base = partialTrackFromSpotify(track, albumContext);
  const albumGenres = album?.genres ?? [];
  const discNumbers = (album?.tracks?.items ?? [])
    .map((item) => item?.disc_number)
    .filter((value): value is number => typeof value === "number");

  return {
    ...base,
    genres: albumGenres.length > 0 ? [...albumGenres] : [...(primaryArtist?.genres ?? [])],
    disc_count: discNumbers.length > 0 ? Math.max(...discNumbers) : base.disc_number,
    publisher: album?.label ?? null,
    copyright_text: album?.copyrights?.[0]?.text ?? null,
  };
}

export async function trackFromUrl(ctx: CatalogContext, url: string): Promise<Track> {
  const id = spotifyIdFromUrl(url, "track");
  if (!id) {
    throw new NotFoundError(`Not a Spotify track url: ${url}`);
  }

  const track = await ctx.spotify.getTrack(id);
  if (!track.id || !track.name || track.is_local) {
    throw new NotFoundError(`Spotify has no track ${id}`);
  }

  const albumId = track.album?.id;
  const artistId = track.artists?.[0]?.id;
  const [album, primaryArtist] = await Promise.all([
    albumId ? ctx.spotify.getAlbum(albumId) : Promise.resolve(null),
    artistId ? ctx.spotify.getArtist(artistId) : Promise.resolve(null),
  ]);

  return trackFromSpotifyPayloads(track, album, primaryArtist);
}

async function searchTrackUrls(ctx: CatalogContext, term: string, limit: number) {
  const payload = await ctx.spotify.search(term, "track", limit);
  return (payload.tracks?.items ?? [])
    .filter((item): item is SpotifyTrack => Boolean(item?.id))
    .map((item) => item.external_urls?.spotify ?? spotifyTrackUrl(item.id ?? ""));
}

/** Best search hit, fully fetched. */
export async function trackFromSearchTerm(ctx: CatalogContext, term: string): Promise<Track> {
  const [first] = await searchTrackUrls(ctx, term, 1);
  if (!first) {
    throw new NotFoundError(`No results found for: ${term}`);
  }
  return trackFromUrl(ctx, first);
}

/** Every search hit, best first. */
export async function tracksFromSearchTerm(ctx: CatalogContext, term: string, limit = 10): Promise<Track[]> {
  const urls = await searchTrackUrls(ctx, term, limit);
  const tracks: Track[] = [];
  for (const url of urls) {
    tracks.push(await trackFromUrl(ctx, url));
  }
  return tracks;
}

export async function trackFromFileMetadata(reader: FileMetadataReader, path: string): Promise<Track | null> {
  const metadata = await reader(path);
  if (!metadata) return null;
  return trackFromRecord(metadata);
}
