import { createLogger, type OpusbookLogger } from "@opusbook/common";

import type { ChapterMarker, NumberedChapter, TrackRecord } from "./types.js";

const defaultLogger = createLogger("timeline");

const TIMESTAMP_SUFFIX_PATTERN = /\s+\([0-9:]+\)\s*$/;

export interface AggregateOptions {
  /** Keep chapters the subchapter heuristics would drop */
  subchapters?: boolean;
  speedFactor?: number;
  logger?: OpusbookLogger;
}

export interface Timeline {
  files: TrackRecord[];
  chapters: NumberedChapter[];
  duration: number;
}

/** Stable sort by track number. */
export function sortTracks(tracks: readonly TrackRecord[]): TrackRecord[] {
  return [...tracks].sort((a, b) => a.track - b.track);
}

/**
 * Shifts each track's markers by the summed duration of the tracks before it,
 * producing one list on the timeline of the concatenated audio.
 */
export function mergeChapters(sortedTracks: readonly TrackRecord[]): { chapters: ChapterMarker[]; duration: number } {
  const chapters: ChapterMarker[] = [];
  let offset = 0;

  for (const track of sortedTracks) {
    for (const marker of track.chapters) {
      chapters.push({ name: marker.name, time: marker.time + offset });
    }
    offset += track.duration;
  }

  return { chapters, duration: offset };
}

export type SubchapterReason = "indent" | "timestamp" | "repeated";

/** Why `name` would be dropped, given the name of the last kept chapter. */
export function subchapterReason(name: string, previousKept: string | undefined): SubchapterReason | undefined {
  if (/^\s/.test(name)) {
    return "indent";
  }
  if (TIMESTAMP_SUFFIX_PATTERN.test(name)) {
    return "timestamp";
  }
  if (previousKept !== undefined && previousKept === name) {
    return "repeated";
  }
  return undefined;
}

export function filterSubchapters(
  chapters: readonly ChapterMarker[],
  logger: OpusbookLogger = defaultLogger
): ChapterMarker[] {
  const { kept } = chapters.reduce<{ kept: ChapterMarker[]; previous?: string }>(
    (state, chapter) => {
      const reason = subchapterReason(chapter.name, state.previous);
      if (reason) {
        logger.info(`Ignoring subchapter ${JSON.stringify(chapter.name)} (${reason})`);
        return state;
      }
      state.kept.push(chapter);
      return { kept: state.kept, previous: chapter.name };
    },
    { kept: [] }
  );
  return kept;
}

/** CHAPTER keys use at least two digits; past 99 the label simply grows. */
export function formatChapterLabel(index: number): string {
  return String(index).padStart(2, "0");
}

export function numberChapters(chapters: readonly ChapterMarker[]): NumberedChapter[] {
  return chapters.map((chapter, position) => ({
    label: formatChapterLabel(position + 1),
    name: chapter.name,
    time: chapter.time,
  }));
}

export function scaleTime(time: number, speedFactor: number): number {
  return time / speedFactor;
}

export function scaleChapters<T extends ChapterMarker>(chapters: readonly T[], speedFactor: number): T[] {
  return chapters.map((chapter) => ({ ...chapter, time: scaleTime(chapter.time, speedFactor) }));
}

export function aggregate(tracks: readonly TrackRecord[], options: AggregateOptions = {}): Timeline {
  const logger = options.logger ?? defaultLogger;
  const speedFactor = options.speedFactor ?? 1;

  const files = sortTracks(tracks);
  const merged = mergeChapters(files);
  const kept = options.subchapters ? merged.chapters : filterSubchapters(merged.chapters, logger);
  const chapters = scaleChapters(numberChapters(kept), speedFactor);

  logger.debug(`Aggregated ${files.length} tracks into ${chapters.length} chapters`);
  return { files, chapters, duration: merged.duration };
}
