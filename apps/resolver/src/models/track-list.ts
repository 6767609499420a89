import type { TrackListKind } from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import { collectAllItems } from "../catalog/spotify";
import type {
  SpotifyPlaylistItem,
  SpotifySearchPayload,
  SpotifySearchType,
  SpotifySimpleTrack,
  SpotifyTrack,
} from "../catalog/spotify-types";
import { pickCoverUrl, spotifyEntityUrl, spotifyIdFromUrl } from "../catalog/spotify-urls";
import { AuthError, NotFoundError } from "../lib/errors";
import { logEvent } from "../lib/logger";
import { albumContextFromSpotify, partialTrackFromSpotify, trackFromUrl, type Track } from "./track";

export type TrackList = {
  kind: TrackListKind;
  url: string;
  name: string;
  description: string;
  author_name: string | null;
  author_url: string | null;
  cover_url: string | null;
  tracks: Track[];
  /** Member urls, parallel to `tracks`. */
  urls: Array<string | null>;
  /** Retained members only. */
  length: number;
};

export type TrackListMetadata = Omit<TrackList, "tracks" | "urls" | "length">;

export type SearchableListKind = Extract<TrackListKind, SpotifySearchType>;

export const SAVED_TRACKS_URL = "saved";
export const FOLLOWED_ARTISTS_URL = "all-user-followed-artists";

/** Stamps 1-based positions and derives `urls` and `length` from the retained members. */
export function buildTrackList(metadata: TrackListMetadata, members: Track[]): TrackList {
  const tracks = members.map((track, index) => ({ ...track, list_position: index + 1 }));
  return {
    ...metadata,
    tracks,
    urls: tracks.map((track) => track.url),
    length: tracks.length,
  };
}

function requireId(url: string, kind: "album" | "playlist" | "artist") {
  const id = spotifyIdFromUrl(url, kind);
  if (!id) {
    throw new NotFoundError(`Not a Spotify ${kind} url: ${url}`);
  }
  return id;
}

function requireSession(ctx: CatalogContext) {
  if (!ctx.spotify.userAuth) {
    throw new AuthError();
  }
}

function isPlayableItem(item: SpotifySimpleTrack | null | undefined): item is SpotifyTrack {
  return Boolean(item && item.id && !item.is_local && (item.type === undefined || item.type === "track"));
}

function readPlaylistTrackEntry(entry: SpotifyPlaylistItem | null | undefined) {
  if (!entry) return null;
  if (entry.is_local === true) return null;
  const track = entry.track ?? entry.item ?? null;
  return isPlayableItem(track) ? track : null;
}

async function fetchMembersFully(ctx: CatalogContext, partials: Track[]) {
  const tracks: Track[] = [];
  for (const partial of partials) {
    if (!partial.url) continue;
    tracks.push(await trackFromUrl(ctx, partial.url));
  }
  return tracks;
}

export async function albumFromUrl(ctx: CatalogContext, url: string, fetchMembers = false): Promise<TrackList> {
  const id = requireId(url, "album");
  const album = await ctx.spotify.getAlbum(id);
  if (!album.id || !album.name) {
    throw new NotFoundError(`Spotify has no album ${id}`);
  }

  const firstPage = album.tracks ?? (await ctx.spotify.getAlbumTracks(id));
  const items = await collectAllItems(ctx.spotify, firstPage);
  const context = albumContextFromSpotify(album);
  const playable = items.filter(isPlayableItem);
  const partials = playable.map((item) => partialTrackFromSpotify(item, context));
  const tracks = fetchMembers ? await fetchMembersFully(ctx, partials) : partials;

  const primaryArtist = album.artists?.[0];
  return buildTrackList(
    {
      kind: "album",
      url: spotifyEntityUrl("album", album.id, album.external_urls?.spotify),
      name: album.name,
      description: "",
      author_name: primaryArtist?.name ?? null,
      author_url: primaryArtist?.id
        ? spotifyEntityUrl("artist", primaryArtist.id, primaryArtist.external_urls?.spotify)
        : null,
      cover_url: context.coverUrl,
    },
    tracks,
  );
}

export async function playlistFromUrl(ctx: CatalogContext, url: string, fetchMembers = false): Promise<TrackList> {
  const id = requireId(url, "playlist");
  const playlist = await ctx.spotify.getPlaylist(id);
  if (!playlist.id || !playlist.name) {
    throw new NotFoundError(`Spotify has no playlist ${id}`);
  }

  const firstPage = playlist.tracks ?? (await ctx.spotify.getPlaylistItems(id));
  const entries = await collectAllItems(ctx.spotify, firstPage);
  const partials: Track[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const track = readPlaylistTrackEntry(entry);
    if (!track) {
      skipped += 1;
      continue;
    }
    partials.push(partialTrackFromSpotify(track, albumContextFromSpotify(track.album)));
  }

  if (skipped > 0) {
    logEvent("debug", "playlist_entries_skipped", {
      playlistId: id,
      skipped,
      retained: partials.length,
    });
  }

  const tracks = fetchMembers ? await fetchMembersFully(ctx, partials) : partials;
  const owner = playlist.owner;
  return buildTrackList(
    {
      kind: "playlist",
      url: spotifyEntityUrl("playlist", playlist.id, playlist.external_urls?.spotify),
      name: playlist.name,
      description: playlist.description ?? "",
      author_name: owner?.display_name ?? owner?.id ?? null,
      author_url: owner?.id ? spotifyEntityUrl("user", owner.id, owner.external_urls?.spotify) : null,
      cover_url: pickCoverUrl(playlist.images),
    },
    tracks,
  );
}

/**
 * Albums and singles of an artist. Releases repeated under the same name are
 * read once, and only songs crediting the artist are kept, one per title.
 */
export async function artistFromUrl(ctx: CatalogContext, url: string, fetchMembers = false): Promise<TrackList> {
  const id = requireId(url, "artist");
  const artist = await ctx.spotify.getArtist(id);
  if (!artist.id || !artist.name) {
    throw new NotFoundError(`Spotify has no artist ${id}`);
  }

  const albums = await collectAllItems(ctx.spotify, await ctx.spotify.getArtistAlbums(id));
  const seenAlbums = new Set<string>();
  const seenTitles = new Set<string>();
  const partials: Track[] = [];

  for (const album of albums) {
    if (!album.id || !album.name) continue;
    const albumKey = album.name.trim().toLowerCase();
    if (seenAlbums.has(albumKey)) continue;
    seenAlbums.add(albumKey);

    const albumList = await albumFromUrl(ctx, spotifyEntityUrl("album", album.id, album.external_urls?.spotify));
    for (const track of albumList.tracks) {
      if (!track.artists.includes(artist.name)) continue;
      const titleKey = (track.name ?? "").trim().toLowerCase();
      if (seenTitles.has(titleKey)) continue;
      seenTitles.add(titleKey);
      partials.push({ ...track, list_position: null });
    }
  }

  const tracks = fetchMembers ? await fetchMembersFully(ctx, partials) : partials;
  const artistUrl = spotifyEntityUrl("artist", artist.id, artist.external_urls?.spotify);
  return buildTrackList(
    {
      kind: "artist",
      url: artistUrl,
      name: artist.name,
      description: "",
      author_name: artist.name,
      author_url: artistUrl,
      cover_url: pickCoverUrl(artist.images),
    },
    tracks,
  );
}

/** Liked songs of the signed-in user. */
export async function savedTracksList(ctx: CatalogContext, fetchMembers = false): Promise<TrackList> {
  requireSession(ctx);
  const saved = await collectAllItems(ctx.spotify, await ctx.spotify.currentUserSavedTracks());
  const partials = saved
    .map((entry) => entry.track)
    .filter(isPlayableItem)
    .map((track) => partialTrackFromSpotify(track, albumContextFromSpotify(track.album)));
  const tracks = fetchMembers ? await fetchMembersFully(ctx, partials) : partials;

  return buildTrackList(
    {
      kind: "saved",
      url: SAVED_TRACKS_URL,
      name: "Saved tracks",
      description: "",
      author_name: null,
      author_url: null,
      cover_url: null,
    },
    tracks,
  );
}

/** Discographies of every artist the signed-in user follows, in follow order. */
export async function followedArtistsList(ctx: CatalogContext, fetchMembers = false): Promise<TrackList> {
  requireSession(ctx);
  const artists = await collectAllItems(ctx.spotify, await ctx.spotify.currentUserFollowedArtists());
  const tracks: Track[] = [];
  for (const artist of artists) {
    if (!artist.id) continue;
    const discography = await artistFromUrl(
      ctx,
      spotifyEntityUrl("artist", artist.id, artist.external_urls?.spotify),
      fetchMembers,
    );
    tracks.push(...discography.tracks);
  }

  return buildTrackList(
    {
      kind: "followed",
      url: FOLLOWED_ARTISTS_URL,
      name: "Followed artists",
      description: "",
      author_name: null,
      author_url: null,
      cover_url: null,
    },
    tracks,
  );
}

export async function trackListFromUrl(
  ctx: CatalogContext,
  kind: TrackListKind,
  url: string,
  fetchMembers = false,
): Promise<TrackList> {
  switch (kind) {
    case "album":
      return albumFromUrl(ctx, url, fetchMembers);
    case "playlist":
      return playlistFromUrl(ctx, url, fetchMembers);
    case "artist":
      return artistFromUrl(ctx, url, fetchMembers);
    case "saved":
      return savedTracksList(ctx, fetchMembers);
    case "followed":
      return followedArtistsList(ctx, fetchMembers);
  }
}

function firstSearchHitUrl(
  kind: SearchableListKind,
  payload: SpotifySearchPayload,
) {
  const items: Array<{ id?: string; external_urls?: { spotify?: string } } | null> | undefined =
    kind === "album"
      ? payload.albums?.items
      : kind === "playlist"
        ? payload.playlists?.items
        : payload.artists?.items;
  const hit = (items ?? []).find((item) => Boolean(item?.id));
  if (!hit?.id) return null;
  return spotifyEntityUrl(kind, hit.id, hit.external_urls?.spotify);
}

export async function trackListFromSearchTerm(
  ctx: CatalogContext,
  kind: SearchableListKind,
  term: string,
  fetchMembers = false,
): Promise<TrackList> {
  const payload = await ctx.spotify.search(term, kind, 1);
  const url = firstSearchHitUrl(kind, payload);
  if (!url) {
    throw new NotFoundError(`No ${kind} results found for: ${term}`);
  }
  return trackListFromUrl(ctx, kind, url, fetchMembers);
}
