import { decodeHTML } from "entities";
import { z } from "zod";
import {
  MissingTrackError,
  NoTitleError,
  ProbeError,
  createLogger,
  runTool,
  type OpusbookLogger,
} from "@opusbook/common";

import { EMPTY_MEDIA_MARKERS, MEDIA_MARKERS_TAG, MarkerDocumentError, parseMediaMarkers } from "./markers.js";
import type { ChapterMarker, TrackRecord } from "./types.js";

const TEXT_FIELDS = ["title", "artist", "genre", "publisher", "comment", "album", "copyright"] as const;

const TITLE_PART_PATTERN = /-\s*Part\s*(\d+)/i;
const TRACK_TAG_PATTERN = /^\s*(\d+)\s*(?:\/\s*\d+\s*)?$/;

const ProbeOutputSchema = z.object({
  format: z.object({
    duration: z
      .union([z.string(), z.number()])
      .transform((value) => Number(value))
      .refine((value) => Number.isFinite(value) && value > 0, "duration must be a positive number"),
    tags: z.record(z.string(), z.union([z.string(), z.number()]).transform(String)).default({}),
  }),
});

export type ProbeOutput = z.infer<typeof ProbeOutputSchema>;

/** Returns the raw JSON text the probe tool prints for `file`. */
export type RunProbe = (file: string) => Promise<string>;

export interface ProbeDependencies {
  runProbe?: RunProbe;
  logger?: OpusbookLogger;
}

const defaultLogger = createLogger("probe");

export function buildProbeArgs(file: string): string[] {
  return ["-v", "quiet", "-print_format", "json", "-show_format", file];
}

export function createFfprobeRunner(ffprobePath = "ffprobe"): RunProbe {
  return async (file) => {
    const { stdout } = await runTool(ffprobePath, buildProbeArgs(file));
    return stdout;
  };
}

function readTag(tags: Record<string, string>, key: string): string | undefined {
  if (key in tags) {
    return tags[key];
  }
  const lower = key.toLowerCase();
  const match = Object.keys(tags).find((candidate) => candidate.toLowerCase() === lower);
  return match === undefined ? undefined : tags[match];
}

/** Explicit track tag ("3" or "3/12"); zero or garbage counts as absent. */
export function parseTrackTag(value: string | undefined): number | undefined {
  const match = value === undefined ? null : TRACK_TAG_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const track = Number.parseInt(match[1], 10);
  return track >= 1 ? track : undefined;
}

/** "My Book - Part 3" => 3 */
export function trackFromTitle(title: string): number | undefined {
  const match = TITLE_PART_PATTERN.exec(title);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function parseProbeOutput(file: string, raw: string): ProbeOutput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ProbeError(file, "probe output is not valid JSON", { cause: error });
  }

  const result = ProbeOutputSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "output";
    throw new ProbeError(file, `unexpected probe output at ${where}: ${issue.message}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Builds the TrackRecord for `file` from what the probe tool reports about it.
 */
export function toTrackRecord(file: string, output: ProbeOutput, logger: OpusbookLogger = defaultLogger): TrackRecord {
  const { tags, duration } = output.format;

  const text: Partial<Record<(typeof TEXT_FIELDS)[number], string>> = {};
  for (const field of TEXT_FIELDS) {
    const value = readTag(tags, field);
    if (value !== undefined) {
      // Publisher blurbs usually arrive full of HTML entities.
      text[field] = decodeHTML(value);
    }
  }

  let track = parseTrackTag(readTag(tags, "track"));
  if (track === undefined) {
    const { title } = text;
    logger.debug(`No track information for ${file}; guessing from title ${JSON.stringify(title)}`);
    if (title === undefined) {
      throw new NoTitleError(file);
    }
    track = trackFromTitle(title);
    if (track === undefined) {
      throw new MissingTrackError(file, title);
    }
  }

  let chapters: ChapterMarker[];
  try {
    chapters = parseMediaMarkers(readTag(tags, MEDIA_MARKERS_TAG) ?? EMPTY_MEDIA_MARKERS, logger);
  } catch (error) {
    if (error instanceof MarkerDocumentError) {
      throw new ProbeError(file, error.message, { cause: error });
    }
    throw error;
  }

  return { file, ...text, track, duration, chapters };
}

export async function probeTrack(file: string, dependencies: ProbeDependencies = {}): Promise<TrackRecord> {
  const logger = dependencies.logger ?? defaultLogger;
  const runProbe = dependencies.runProbe ?? createFfprobeRunner();

  let raw: string;
  try {
    raw = await runProbe(file);
  } catch (error) {
    throw new ProbeError(file, (error as Error).message, { cause: error });
  }
  logger.debug(`Raw probe output for ${file}`, raw);

  return toTrackRecord(file, parseProbeOutput(file, raw), logger);
}
