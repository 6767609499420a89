import { TRACK_RECORD_FIELDS } from "@songbridge/shared";
import type { CatalogContext } from "../catalog/context";
import { spotifyTrackUrl } from "../catalog/spotify-urls";
import { DataError } from "../lib/errors";
import { trackFromSearchTerm, trackFromUrl, trackToRecord, type Track } from "./track";

function adoptField<K extends keyof Track>(target: Track, source: Track, key: K) {
  target[key] = source[key];
}

// List fields default to [] rather than null, so an empty list counts as missing.
function isMissing(value: Track[keyof Track]) {
  return value === null || (Array.isArray(value) && value.length === 0);
}

/**
 * Fills the gaps of `existing` from `fresh`. A value already present on
 * `existing` is kept even when `fresh` disagrees.
 */
export function mergeTrackData(existing: Track, fresh: Track): Track {
  const merged = trackToRecord(existing);
  for (const key of TRACK_RECORD_FIELDS) {
    if (isMissing(existing[key]) && !isMissing(fresh[key])) {
      adoptField(merged, fresh, key);
    }
  }
  return merged;
}

/** Fetches the catalog version of a track and merges it into what we already have. */
export async function reinitTrack(ctx: CatalogContext, track: Track): Promise<Track> {
  let fresh: Track;
  if (track.url) {
    fresh = await trackFromUrl(ctx, track.url);
  } else if (track.song_id) {
    fresh = await trackFromUrl(ctx, spotifyTrackUrl(track.song_id));
  } else if (track.name && track.artist) {
    fresh = await trackFromSearchTerm(ctx, `${track.artist} - ${track.name}`);
  } else {
    throw new DataError("Track is missing required data to be reinitialized");
  }

  return mergeTrackData(track, fresh);
}
