import { YTMUSIC_WATCH_URL_PREFIX } from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import type { YTMusicAlbumTrack } from "../catalog/ytmusic";
import { FormatError, NotFoundError } from "../lib/errors";
import { reinitTrack } from "./reinit";
import { trackFromPartialData, trackFromSearchTerm, type Track } from "./track";
import { buildTrackList, type TrackList } from "./track-list";

const YTMUSIC_ORIGIN = "https://music.youtube.com/";

export function toYouTubeMusicUrl(url: string) {
  return url.replace("https://www.youtube.com/", YTMUSIC_ORIGIN).replace("https://youtube.com/", YTMUSIC_ORIGIN);
}

function readListParam(url: string) {
  const raw = url.split("?list=")[1] ?? "";
  return raw.split("&")[0] ?? "";
}

function artistNames(track: Pick<YTMusicAlbumTrack, "artists">) {
  return (track.artists ?? [])
    .map((artist) => artist.name?.trim())
    .filter((name): name is string => typeof name === "string" && name.length > 0);
}

function watchUrl(videoId: string) {
  return `${YTMUSIC_WATCH_URL_PREFIX}${videoId}`;
}

export async function createYtmAlbum(ctx: CatalogContext, url: string, fetchMembers = true): Promise<TrackList> {
  if (!url.includes("?list=") || !url.startsWith(YTMUSIC_ORIGIN)) {
    throw new FormatError(`Invalid album url: ${url}`);
  }

  const browseId = await ctx.ytmusic.getAlbumBrowseId(readListParam(url));
  if (!browseId) {
    throw new NotFoundError(`Invalid album url: ${url}`);
  }

  const album = await ctx.ytmusic.getAlbum(browseId);
  const albumName = album.title ?? null;
  const albumArtist = album.artists?.[0]?.name ?? null;

  const tracks: Track[] = [];
  for (const entry of album.tracks ?? []) {
    if (!entry.videoId) continue;
    const artists = artistNames(entry);
    const downloadUrl = watchUrl(entry.videoId);
    const partial = trackFromPartialData({
      name: entry.title ?? null,
      artists,
      artist: artists[0] ?? null,
      album_name: albumName,
      album_artist: albumArtist,
      duration: entry.duration_seconds ?? null,
      explicit: entry.isExplicit ?? null,
      download_url: downloadUrl,
    });

    if (fetchMembers) {
      const fetched = await trackFromSearchTerm(ctx, `${partial.artist ?? ""} - ${partial.name ?? ""}`);
      tracks.push({ ...fetched, download_url: downloadUrl });
    } else {
      tracks.push(partial);
    }
  }

  return buildTrackList(
    {
      kind: "album",
      url,
      name: albumName ?? "",
      description: "",
      author_name: albumArtist,
      author_url: null,
      cover_url: album.thumbnails?.[0]?.url ?? null,
    },
    tracks,
  );
}

export async function createYtmPlaylist(ctx: CatalogContext, url: string, fetchMembers = true): Promise<TrackList> {
  if (!(url.includes("?list=") || url.includes("/browse/VLPL")) || !url.startsWith(YTMUSIC_ORIGIN)) {
    throw new FormatError(`Invalid playlist url: ${url}`);
  }

  const playlistId = url.includes("/browse/VLPL") ? (url.split("/browse/")[1] ?? "") : readListParam(url);
  const playlist = await ctx.ytmusic.getPlaylist(playlistId);
  const author = playlist.author ?? null;

  const tracks: Track[] = [];
  for (const entry of playlist.tracks ?? []) {
    if (!entry.videoId || entry.isAvailable === false) continue;
    const artists = artistNames(entry);
    const partial = trackFromPartialData({
      name: entry.title ?? null,
      artists,
      artist: artists[0] ?? null,
      album_name: entry.album?.name ?? null,
      duration: entry.duration_seconds ?? null,
      explicit: entry.isExplicit ?? null,
      download_url: watchUrl(entry.videoId),
    });

    tracks.push(fetchMembers ? await reinitTrack(ctx, partial) : partial);
  }

  return buildTrackList(
    {
      kind: "playlist",
      url,
      name: playlist.title ?? "",
      description: playlist.description ?? "",
      author_name: author?.name ?? null,
      author_url: author?.id ? `${YTMUSIC_ORIGIN}channel/${author.id}` : null,
      cover_url: playlist.thumbnails?.[0]?.url ?? null,
    },
    tracks,
  );
}
