export const ALBUM_TYPES = ["album", "single", "compilation", "unknown"] as const;

export const TRACK_LIST_KINDS = ["album", "playlist", "artist", "saved", "followed"] as const;

export const KEYWORD_COMMANDS = [
  "saved",
  "all-user-playlists",
  "all-user-followed-artists",
  "all-user-saved-albums",
  "all-saved-playlists",
] as const;

export const SEARCH_PREFIXES = ["album:", "playlist:", "artist:"] as const;

// Hosts accepted on the video side of a "VideoURL|SpotifyURL" reference.
export const VIDEO_HOST_MARKERS = ["watch?v=", "youtu.be/", "soundcloud.com/", "bandcamp.com/"] as const;

export const SPOTIFY_HOST = "open.spotify.com";
export const SPOTIFY_SHORT_LINK_PREFIX = "https://spotify.link/";
export const SPOTIFY_TRACK_URL_PREFIX = "https://open.spotify.com/track/";
export const YTMUSIC_WATCH_URL_PREFIX = "https://music.youtube.com/watch?v=";

export const SAVED_FILE_SUFFIX = ".spotdl";

// Key order of a saved track record.
export const TRACK_RECORD_FIELDS = [
  "name",
  "artists",
  "artist",
  "artist_id",
  "genres",
  "disc_number",
  "disc_count",
  "album_name",
  "album_artist",
  "album_id",
  "album_type",
  "duration",
  "year",
  "date",
  "track_number",
  "tracks_count",
  "song_id",
  "explicit",
  "publisher",
  "url",
  "isrc",
  "cover_url",
  "copyright_text",
  "download_url",
  "popularity",
  "list_name",
  "list_url",
  "list_position",
  "list_length",
] as const;
