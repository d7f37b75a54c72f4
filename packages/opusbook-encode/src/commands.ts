import { formatTimestamp } from "@opusbook/common";
import type { FolderMetadata } from "@opusbook/metadata";

import { buildFilterGraph, type FilterGraphOptions } from "./filter-graph.js";

/** Writes the encoded stream to this process's stdout. */
export const STDOUT_OUTPUT = "-";

const DECODER_PREFIX = ["-loglevel", "quiet", "-hide_banner", "-stats", "-stats_period", "1"] as const;

const ENCODER_PREFIX = [
  "--quiet",
  "--ignorelength",
  "--framesize",
  "60",
  "--downmix-mono",
  "--comp",
  "10",
  "--vbr",
] as const;

export type EncoderMetadata = Pick<
  FolderMetadata,
  "title" | "artist" | "album" | "genre" | "comment" | "publisher" | "copyright" | "image" | "chapters"
>;

export interface EncoderOptions {
  /** kbps */
  bitrate: number;
  output: string;
}

export interface PipelineSpec {
  filterGraph: string;
  decoderArgs: string[];
  encoderArgs: string[];
  output: string;
}

export interface PipelineSpecOptions extends FilterGraphOptions, EncoderOptions {}

/** Decoder invocation: every file as an input, one mono-mixable WAV stream on stdout. */
export function buildDecoderArgs(files: readonly string[], filterGraph: string): string[] {
  return [
    ...DECODER_PREFIX,
    ...files.flatMap((file) => ["-i", file]),
    "-filter_complex",
    filterGraph,
    "-f",
    "wav",
    "-acodec",
    "pcm_s16le",
    "-",
  ];
}

export function buildEncoderArgs(metadata: EncoderMetadata, options: EncoderOptions): string[] {
  const args: string[] = [
    ...ENCODER_PREFIX,
    "--bitrate",
    String(options.bitrate),
    "--speech",
    "--title",
    metadata.title,
    "--artist",
    metadata.artist,
    "--album",
    metadata.album,
    "--genre",
    metadata.genre,
    "--comment",
    `description=${metadata.comment}`,
    "--comment",
    `publisher=${metadata.publisher}`,
    "--comment",
    `copyright=${metadata.copyright}`,
  ];

  for (const chapter of metadata.chapters) {
    args.push("--comment", `CHAPTER${chapter.label}=${formatTimestamp(chapter.time)}`);
    args.push("--comment", `CHAPTER${chapter.label}NAME=${chapter.name}`);
  }

  if (metadata.image) {
    args.push("--picture", metadata.image);
  }

  args.push("-", options.output);
  return args;
}

export function buildPipelineSpec(metadata: FolderMetadata, options: PipelineSpecOptions): PipelineSpec {
  const files = metadata.files.map((track) => track.file);
  const filterGraph = buildFilterGraph(files, options);
  return {
    filterGraph,
    decoderArgs: buildDecoderArgs(files, filterGraph),
    encoderArgs: buildEncoderArgs(metadata, options),
    output: options.output,
  };
}
