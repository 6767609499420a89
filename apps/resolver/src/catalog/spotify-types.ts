type SpotifyExternalUrls = {
  spotify?: string;
};

export type SpotifyImage = {
  url?: string;
  width?: number | null;
  height?: number | null;
};

export type SpotifySimpleArtist = {
  id?: string;
  name?: string;
  external_urls?: SpotifyExternalUrls;
};

export type SpotifyArtist = SpotifySimpleArtist & {
  genres?: string[];
  images?: SpotifyImage[];
};

export type SpotifySimpleAlbum = {
  id?: string;
  name?: string;
  album_type?: string;
  album_group?: string;
  release_date?: string;
  total_tracks?: number;
  images?: SpotifyImage[];
  artists?: SpotifySimpleArtist[];
  external_urls?: SpotifyExternalUrls;
};

export type SpotifySimpleTrack = {
  id?: string | null;
  name?: string;
  type?: string;
  is_local?: boolean;
  disc_number?: number;
  track_number?: number;
  duration_ms?: number | null;
  explicit?: boolean;
  artists?: SpotifySimpleArtist[];
  external_urls?: SpotifyExternalUrls;
};

export type SpotifyTrack = SpotifySimpleTrack & {
  album?: SpotifySimpleAlbum;
  popularity?: number;
  external_ids?: {
    isrc?: string;
  };
};

export type SpotifyPage<T> = {
  href?: string;
  items: T[];
  next?: string | null;
  total?: number;
  offset?: number;
  limit?: number;
};

export type SpotifyAlbum = SpotifySimpleAlbum & {
  genres?: string[];
  label?: string;
  copyrights?: Array<{ text?: string; type?: string }>;
  tracks?: SpotifyPage<SpotifySimpleTrack | null>;
};

export type SpotifyUser = {
  id?: string;
  display_name?: string | null;
  external_urls?: SpotifyExternalUrls;
};

// Playlist entries carry the song under `track`; newer responses use `item`.
export type SpotifyPlaylistItem = {
  track?: SpotifyTrack | null;
  item?: SpotifyTrack | null;
  is_local?: boolean;
};

export type SpotifySimplePlaylist = {
  id?: string;
  name?: string;
  description?: string | null;
  owner?: SpotifyUser;
  images?: SpotifyImage[] | null;
  external_urls?: SpotifyExternalUrls;
};

export type SpotifyPlaylist = SpotifySimplePlaylist & {
  tracks?: SpotifyPage<SpotifyPlaylistItem | null>;
};

export type SpotifySavedTrack = {
  added_at?: string;
  track?: SpotifyTrack | null;
};

export type SpotifySavedAlbum = {
  added_at?: string;
  album?: SpotifyAlbum | null;
};

export type SpotifySearchType = "track" | "album" | "playlist" | "artist";

export type SpotifySearchPayload = {
  tracks?: SpotifyPage<SpotifyTrack | null>;
  albums?: SpotifyPage<SpotifySimpleAlbum | null>;
  playlists?: SpotifyPage<SpotifySimplePlaylist | null>;
  artists?: SpotifyPage<SpotifyArtist | null>;
};
