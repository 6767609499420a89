import type { CatalogContext } from "../catalog/context";
import { collectAllItems } from "../catalog/spotify";
import { spotifyEntityUrl } from "../catalog/spotify-urls";
import { AuthError, FormatError, NetworkError } from "../lib/errors";
import { logEvent } from "../lib/logger";
import { trackListFromUrl, type TrackList } from "../models/track-list";

const USER_PROFILE_URL_PREFIX = "https://open.spotify.com/user/";

export type UserCollection = "user-playlists" | "saved-playlists" | "saved-albums" | "followed-artists";

function requireSession(ctx: CatalogContext) {
  if (!ctx.spotify.userAuth) {
    throw new AuthError();
  }
}

function userIdFromProfileUrl(userUrl: string) {
  if (!userUrl) return "";
  if (!userUrl.startsWith(USER_PROFILE_URL_PREFIX)) {
    throw new FormatError(`Invalid user profile url: ${userUrl}`);
  }
  const rest = userUrl.slice(USER_PROFILE_URL_PREFIX.length);
  return (rest.split(/[?#]/)[0] ?? "").replace(/\//g, "");
}

async function currentUserId(ctx: CatalogContext) {
  const user = await ctx.spotify.currentUser();
  if (!user.id) {
    throw new NetworkError("Couldn't get user info");
  }
  return user.id;
}

/**
 * Playlists owned by a user: the signed-in one, or the owner of `userUrl`.
 * Playlists the user only follows are left out.
 */
export async function userPlaylistUrls(ctx: CatalogContext, userUrl = "") {
  requireSession(ctx);
  let userId = userIdFromProfileUrl(userUrl);
  let firstPage;
  if (userId) {
    firstPage = await ctx.spotify.userPlaylists(userId);
  } else {
    firstPage = await ctx.spotify.currentUserPlaylists();
    userId = await currentUserId(ctx);
  }

  const playlists = await collectAllItems(ctx.spotify, firstPage);
  return playlists
    .filter((playlist) => playlist.owner?.id === userId && Boolean(playlist.id))
    .map((playlist) => spotifyEntityUrl("playlist", playlist.id ?? "", playlist.external_urls?.spotify));
}

function userIdFromHref(href: string | undefined) {
  const match = href?.match(/users\/([^/?#]+)/)?.[1];
  return match ?? null;
}

/** Playlists the signed-in user follows but does not own. */
export async function savedPlaylistUrls(ctx: CatalogContext) {
  requireSession(ctx);
  const firstPage = await ctx.spotify.currentUserPlaylists();
  const userId = userIdFromHref(firstPage.href) ?? (await currentUserId(ctx));
  const playlists = await collectAllItems(ctx.spotify, firstPage);
  return playlists
    .filter((playlist) => playlist.owner?.id !== userId && Boolean(playlist.id))
    .map((playlist) => spotifyEntityUrl("playlist", playlist.id ?? "", playlist.external_urls?.spotify));
}

export async function savedAlbumUrls(ctx: CatalogContext) {
  requireSession(ctx);
  const saved = await collectAllItems(ctx.spotify, await ctx.spotify.currentUserSavedAlbums());
  return saved
    .map((entry) => entry.album)
    .filter((album) => Boolean(album?.id))
    .map((album) => spotifyEntityUrl("album", album?.id ?? "", album?.external_urls?.spotify));
}

export async function followedArtistUrls(ctx: CatalogContext) {
  requireSession(ctx);
  const artists = await collectAllItems(ctx.spotify, await ctx.spotify.currentUserFollowedArtists());
  return artists
    .filter((artist) => Boolean(artist.id))
    .map((artist) => spotifyEntityUrl("artist", artist.id ?? "", artist.external_urls?.spotify));
}

const COLLECTION_LISTS = {
  "user-playlists": { kind: "playlist", urls: (ctx: CatalogContext) => userPlaylistUrls(ctx) },
  "saved-playlists": { kind: "playlist", urls: savedPlaylistUrls },
  "saved-albums": { kind: "album", urls: savedAlbumUrls },
  "followed-artists": { kind: "artist", urls: followedArtistUrls },
} as const;

/** First list of a user collection without loading the others, or null when the collection is empty. */
export async function firstOfUserCollection(
  ctx: CatalogContext,
  collection: UserCollection,
  options: { userUrl?: string; fetchMembers?: boolean } = {},
): Promise<TrackList | null> {
  const { kind } = COLLECTION_LISTS[collection];
  const urls =
    collection === "user-playlists"
      ? await userPlaylistUrls(ctx, options.userUrl ?? "")
      : await COLLECTION_LISTS[collection].urls(ctx);
  const first = urls[0];
  logEvent("debug", "user_collection_listed", {
    collection,
    count: urls.length,
  });
  if (!first) return null;
  return trackListFromUrl(ctx, kind, first, options.fetchMembers ?? false);
}

async function loadLists(ctx: CatalogContext, kind: "playlist" | "album" | "artist", urls: string[]) {
  const lists: TrackList[] = [];
  for (const url of urls) {
    lists.push(await trackListFromUrl(ctx, kind, url, false));
  }
  return lists;
}

export async function getAllUserPlaylists(ctx: CatalogContext, userUrl = "") {
  return loadLists(ctx, "playlist", await userPlaylistUrls(ctx, userUrl));
}

export async function getAllSavedPlaylists(ctx: CatalogContext) {
  return loadLists(ctx, "playlist", await savedPlaylistUrls(ctx));
}

export async function getUserSavedAlbums(ctx: CatalogContext) {
  return loadLists(ctx, "album", await savedAlbumUrls(ctx));
}

export async function getUserFollowedArtists(ctx: CatalogContext) {
  return loadLists(ctx, "artist", await followedArtistUrls(ctx));
}
