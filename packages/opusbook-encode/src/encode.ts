import path from "node:path";
import {
  DEFAULT_BITRATE_KBPS,
  createLogger,
  formatTimestamp,
  getDefaultConfig,
  type OpusbookLogger,
} from "@opusbook/common";
import {
  createFfprobeRunner,
  readFolderMetadata,
  resolveSpeedFactor,
  type FolderMetadata,
  type RunProbe,
} from "@opusbook/metadata";

import { buildPipelineSpec, type PipelineSpec } from "./commands.js";
import { createCachedNoiseModelResolver, type NoiseModelResolver } from "./noise-model.js";
import { DEFAULT_PIPELINE_TOOLS, runPipeline, type PipelineTools, type SpawnProcess } from "./pipeline.js";
import type { ProgressListener } from "./progress.js";

export interface EncodeOptions {
  /** kbps */
  bitrate?: number;
  /** Keep chapters that look like subchapters */
  subchapters?: boolean;
  /** Signed percentage; 50 plays half again as fast */
  speed?: number;
  /** Target peak percentage for loudness normalisation */
  normalize?: number;
  isolateVoice?: boolean;
  customFilter?: string;
  progress?: boolean;
  onProgress?: ProgressListener;
  /** Called once the folder has been read, before encoding starts */
  onMetadata?: (metadata: FolderMetadata) => void;
}

export interface EncodeDependencies {
  tools?: PipelineTools & { ffprobePath?: string };
  runProbe?: RunProbe;
  resolveNoiseModel?: NoiseModelResolver;
  spawnProcess?: SpawnProcess;
  logger?: OpusbookLogger;
}

export interface EncodeResult {
  output: string;
  metadata: FolderMetadata;
  spec: PipelineSpec;
}

const defaultLogger = createLogger("encode");

/** "/books/My Book" => "/books/My Book.opus" */
export function defaultOutputPath(folder: string): string {
  const parsed = path.parse(path.resolve(folder));
  return path.format({ dir: parsed.dir, name: parsed.name, ext: ".opus" });
}

/**
 * Converts a folder of audiobook parts into one chaptered Opus file.
 */
export async function encode(
  folder: string,
  output?: string,
  options: EncodeOptions = {},
  dependencies: EncodeDependencies = {}
): Promise<EncodeResult> {
  const logger = dependencies.logger ?? defaultLogger;
  const tools = dependencies.tools ?? DEFAULT_PIPELINE_TOOLS;

  let target = output;
  if (target === undefined) {
    target = defaultOutputPath(folder);
    logger.warn(`No output given; writing to ${target}`);
  }

  const speedFactor = resolveSpeedFactor(options.speed ?? 0, logger);
  const metadata = await readFolderMetadata(folder, {
    subchapters: options.subchapters,
    speedFactor,
    runProbe: dependencies.runProbe ?? createFfprobeRunner(dependencies.tools?.ffprobePath),
    logger,
  });

  let noiseModelPath: string | undefined;
  if (options.isolateVoice) {
    const resolveNoiseModel = dependencies.resolveNoiseModel ?? createCachedNoiseModelResolver(getDefaultConfig());
    noiseModelPath = await resolveNoiseModel();
  }

  const spec = buildPipelineSpec(metadata, {
    bitrate: options.bitrate ?? DEFAULT_BITRATE_KBPS,
    output: target,
    noiseModelPath,
    normalize: options.normalize,
    speedFactor,
    customFilter: options.customFilter,
  });

  logger.info(`Encoding from ${path.resolve(folder)} to ${target}`);
  logger.info(`${metadata.files.length} files (${formatTimestamp(metadata.duration, 0)})`);
  options.onMetadata?.(metadata);

  const progress = options.progress ?? true;
  const onProgress: ProgressListener | undefined = progress
    ? options.onProgress ?? ((update) => logger.debug(`Encoded ${formatTimestamp(update.elapsed, 0)}`))
    : undefined;

  await runPipeline(spec, {
    tools,
    onProgress,
    totalSeconds: metadata.duration / speedFactor,
    spawnProcess: dependencies.spawnProcess,
    logger,
  });

  return { output: target, metadata, spec };
}
