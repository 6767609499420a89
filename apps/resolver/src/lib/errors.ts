export type ResolverErrorCode =
  | "QUERY_FORMAT"
  | "LIST_TYPE_MISMATCH"
  | "LIST_LENGTH_MISMATCH"
  | "AUTH_REQUIRED"
  | "NOT_FOUND"
  | "NETWORK"
  | "TRACK_DATA";

export class ResolverError extends Error {
  readonly code: ResolverErrorCode;

  constructor(code: ResolverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A dual reference that is not `VideoURL|SpotifyURL` shaped. */
export class FormatError extends ResolverError {
  constructor(message: string) {
    super("QUERY_FORMAT", message);
  }
}

export class TypeMismatchError extends ResolverError {
  constructor(videoUrl: string, spotifyUrl: string) {
    super("LIST_TYPE_MISMATCH", `URLs are not of the same type, ${videoUrl} is not the same type as ${spotifyUrl}.`);
  }
}

export class LengthMismatchError extends ResolverError {
  readonly videoLength: number;
  readonly spotifyLength: number;

  constructor(videoLength: number, spotifyLength: number) {
    super(
      "LIST_LENGTH_MISMATCH",
      `The YouTube Music (${videoLength}) and Spotify (${spotifyLength}) lists have different lengths.`,
    );
    this.videoLength = videoLength;
    this.spotifyLength = spotifyLength;
  }
}

export class AuthError extends ResolverError {
  constructor(message = "You must be logged in to use this function") {
    super("AUTH_REQUIRED", message);
  }
}

export class NotFoundError extends ResolverError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class NetworkError extends ResolverError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("NETWORK", message, options);
    this.status = status;
  }
}

export class DataError extends ResolverError {
  constructor(message: string) {
    super("TRACK_DATA", message);
  }
}
