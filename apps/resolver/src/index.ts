export { createCatalogContextFromEnv, shortLinkResolver, SHORT_LINK_TIMEOUT_MS, type CatalogContext } from "./catalog/context";
export { fetchJsonWithTimeout, resolveRedirect, sanitizeUrlForLogs } from "./catalog/http";
export { collectAllItems, paginate, SpotifyClient, type SpotifyApi, type SpotifyClientOptions } from "./catalog/spotify";
export { YouTubeMusicClient, type YouTubeMusicApi, type YouTubeMusicClientOptions } from "./catalog/ytmusic";
export {
  AuthError,
  DataError,
  FormatError,
  LengthMismatchError,
  NetworkError,
  NotFoundError,
  ResolverError,
  TypeMismatchError,
  type ResolverErrorCode,
} from "./lib/errors";
export { mergeTrackData, reinitTrack } from "./models/reinit";
export {
  trackDisplayName,
  trackFromFileMetadata,
  trackFromPartialData,
  trackFromRecord,
  trackFromSearchTerm,
  trackFromUrl,
  tracksFromSearchTerm,
  trackToRecord,
  type FileMetadataReader,
  type Track,
} from "./models/track";
export {
  albumFromUrl,
  artistFromUrl,
  followedArtistsList,
  playlistFromUrl,
  savedTracksList,
  trackListFromSearchTerm,
  trackListFromUrl,
  type TrackList,
} from "./models/track-list";
export { createYtmAlbum, createYtmPlaylist } from "./models/ytmusic-lists";
export { matchQuery, QUERY_MATCHERS, type MatchOptions, type MatchResult, type QueryMatcher } from "./services/QueryMatchers";
export { resolve, simpleResolve, tracksFromAlbums, type ResolveOptions } from "./services/TrackResolver";
export {
  getAllSavedPlaylists,
  getAllUserPlaylists,
  getUserFollowedArtists,
  getUserSavedAlbums,
} from "./services/UserLibrary";
