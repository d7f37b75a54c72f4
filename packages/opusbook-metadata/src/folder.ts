import path from "node:path";
import { NoInputError, createLogger, listFilesByExtension, type OpusbookLogger } from "@opusbook/common";

import { resolveFields, selectCoverImage } from "./fields.js";
import { probeTrack, type RunProbe } from "./probe.js";
import { aggregate } from "./timeline.js";
import type { FolderMetadata, TrackRecord } from "./types.js";

export const TRACK_EXTENSIONS = [".mp3"] as const;

export interface FolderMetadataOptions {
  subchapters?: boolean;
  speedFactor?: number;
  runProbe?: RunProbe;
  logger?: OpusbookLogger;
}

const defaultLogger = createLogger("folder");

export async function listTrackFiles(folder: string): Promise<string[]> {
  return await listFilesByExtension(folder, TRACK_EXTENSIONS);
}

/**
 * Probes every track in `folder` and assembles the book: sorted tracks, the
 * merged chapter timeline and the resolved descriptive fields.
 */
export async function readFolderMetadata(folder: string, options: FolderMetadataOptions = {}): Promise<FolderMetadata> {
  const logger = options.logger ?? defaultLogger;
  const root = path.resolve(folder);

  const files = await listTrackFiles(root);
  if (files.length === 0) {
    throw new NoInputError(root);
  }
  logger.info(`Probing ${files.length} track files in ${root}`);

  const tracks: TrackRecord[] = [];
  for (const file of files) {
    tracks.push(await probeTrack(file, { runProbe: options.runProbe, logger }));
  }

  const timeline = aggregate(tracks, {
    subchapters: options.subchapters,
    speedFactor: options.speedFactor,
    logger,
  });
  const fields = resolveFields(timeline.files);
  const image = await selectCoverImage(root);
  if (image) {
    logger.debug(`Using cover image ${image}`);
  }

  return {
    ...fields,
    image,
    files: timeline.files,
    chapters: timeline.chapters,
    duration: timeline.duration,
  };
}
