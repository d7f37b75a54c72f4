import { stat } from "node:fs/promises";
import { listFilesByExtension } from "@opusbook/common";

import type { DescriptiveField, FolderFields, TrackRecord } from "./types.js";

export const UNKNOWN = "Unknown";
export const ALBUM_SUFFIX = " - Overdrive";
export const COVER_EXTENSIONS = [".jpg", ".jpeg", ".png"] as const;

const PART_SUFFIX_PATTERN = /\s*-?\s*Part\s*\d+\s*$/i;

/** First value that is non-empty after trimming, in track order. */
export function firstNonEmpty(values: Iterable<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== "") {
      return value;
    }
  }
  return undefined;
}

function resolveField(tracks: readonly TrackRecord[], field: Exclude<DescriptiveField, "title">): string {
  return firstNonEmpty(tracks.map((track) => track[field])) ?? UNKNOWN;
}

/** "My Book - Part 03" => "My Book" */
export function stripPartSuffix(title: string): string {
  return title.replace(PART_SUFFIX_PATTERN, "");
}

/**
 * Book-level descriptive fields from tracks already sorted by track number.
 * The book title comes from the album tag, falling back to the first track
 * title without its part suffix.
 */
export function resolveFields(sortedTracks: readonly TrackRecord[]): FolderFields {
  let title = resolveField(sortedTracks, "album");
  if (title === UNKNOWN) {
    const trackTitle = firstNonEmpty(sortedTracks.map((track) => track.title));
    if (trackTitle !== undefined) {
      title = stripPartSuffix(trackTitle);
    }
  }

  return {
    title,
    album: `${title}${ALBUM_SUFFIX}`,
    artist: resolveField(sortedTracks, "artist"),
    genre: resolveField(sortedTracks, "genre"),
    comment: resolveField(sortedTracks, "comment"),
    publisher: resolveField(sortedTracks, "publisher"),
    copyright: resolveField(sortedTracks, "copyright"),
  };
}

/** Largest image in `folder` by byte size; the first in name order wins ties. */
export async function selectCoverImage(folder: string): Promise<string | undefined> {
  const candidates = await listFilesByExtension(folder, COVER_EXTENSIONS);

  let best: { file: string; size: number } | undefined;
  for (const file of candidates) {
    const { size } = await stat(file);
    if (!best || size > best.size) {
      best = { file, size };
    }
  }
  return best?.file;
}
