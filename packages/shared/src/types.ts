export type AlbumType = (typeof import("./constants").ALBUM_TYPES)[number];
export type TrackListKind = (typeof import("./constants").TRACK_LIST_KINDS)[number];
export type KeywordCommand = (typeof import("./constants").KEYWORD_COMMANDS)[number];
export type TrackRecordField = (typeof import("./constants").TRACK_RECORD_FIELDS)[number];

/**
 * One song as written to a `.spotdl` save file and handed to the tagging and
 * download stages. Key names are part of the file format.
 */
export type TrackRecord = {
  name: string | null;
  artists: string[];
  artist: string | null;
  artist_id: string | null;
  genres: string[];
  disc_number: number | null;
  disc_count: number | null;
  album_name: string | null;
  album_artist: string | null;
  album_id: string | null;
  album_type: AlbumType | null;
  /** Seconds. */
  duration: number | null;
  year: number | null;
  date: string | null;
  track_number: number | null;
  tracks_count: number | null;
  song_id: string | null;
  explicit: boolean | null;
  publisher: string | null;
  url: string | null;
  isrc: string | null;
  cover_url: string | null;
  copyright_text: string | null;
  /** Alternate source on another catalog, usually a video url. */
  download_url: string | null;
  popularity: number | null;
  list_name: string | null;
  list_url: string | null;
  /** 1-based. */
  list_position: number | null;
  list_length: number | null;
};
