import process from "node:process";
import {
  formatHelp,
  handleParseResult,
  loadConfig,
  parseArgs,
  setLogLevel,
  type ArgDef,
  type OpusbookConfig,
} from "@opusbook/common";

import { STDOUT_OUTPUT } from "./commands.js";
import { encode, type EncodeDependencies, type EncodeOptions, type EncodeResult } from "./encode.js";
import { createCachedNoiseModelResolver } from "./noise-model.js";
import { createProgressRenderer, type ProgressRenderer } from "./progress.js";

interface EncodeCliOptions {
  bitrate?: number;
  subchapters?: boolean;
  progress: boolean;
  speed: number;
  normalize?: number;
  isolateVoice?: boolean;
  filter?: string;
  config?: string;
  verbose?: boolean;
}

const ARG_DEFS: ArgDef[] = [
  {
    name: "--bitrate",
    type: "integer",
    description: "Target bitrate in kbps (default: from config, 15)",
    constraints: { positive: true }
  },
  {
    name: "--subchapters",
    type: "boolean",
    description: "Keep indented, timestamped and repeated chapter markers"
  },
  {
    name: "--progress",
    type: "boolean",
    description: "Show encoding progress",
    defaultValue: true,
    negation: "--no-progress"
  },
  {
    name: "--speed",
    type: "float",
    description: "Change playback speed by this percentage (-99 or more)",
    defaultValue: 0
  },
  {
    name: "--normalize",
    type: "float",
    description: "Normalise loudness to this peak percentage",
    constraints: { min: 0, max: 100 }
  },
  {
    name: "--isolate-voice",
    type: "boolean",
    description: "Suppress background noise with an rnnoise model"
  },
  {
    name: "--filter",
    type: "string",
    description: "Extra ffmpeg audio filter appended to the chain"
  },
  {
    name: "--config",
    type: "string",
    description: "Load an alternate .opusbook.json file"
  },
  {
    name: "--verbose",
    alias: "-v",
    type: "boolean",
    description: "Log every step"
  }
];

const HELP_TEXT = formatHelp(
  "opusbook [options] <folder> [output]",
  "Convert a folder of audiobook MP3 parts into a single chaptered Opus file.\nUse - as output to write the Opus stream to stdout.",
  ARG_DEFS,
  ["opusbook ~/Audiobooks/MyBook", "opusbook --speed 25 --normalize 95 ./MyBook MyBook.opus"]
);

export interface EncodeCliRuntime {
  encode?: typeof encode;
  loadConfig?: (configPath?: string) => Promise<OpusbookConfig>;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export function parseEncodeArgs(argv: string[]) {
  return parseArgs<EncodeCliOptions>(argv, ARG_DEFS, { maxPositional: 2 });
}

export async function runEncodeCli(argv: string[], runtime: EncodeCliRuntime = {}): Promise<number> {
  const stdout = runtime.stdout ?? process.stdout;
  const stderr = runtime.stderr ?? process.stderr;
  const result = parseEncodeArgs(argv);

  if (!result.helpRequested && result.positional.length === 0) {
    result.errors.push("Missing <folder> argument");
  }
  const exitCode = handleParseResult(result, HELP_TEXT, stdout, stderr);
  if (exitCode !== undefined) {
    return exitCode;
  }

  const { options, positional } = result;
  const [folder, output] = positional;
  if (options.verbose) {
    setLogLevel("debug");
  }

  let renderer: ProgressRenderer | undefined;
  try {
    const config = await (runtime.loadConfig ?? loadConfig)(options.config);

    const encodeOptions: EncodeOptions = {
      bitrate: options.bitrate ?? config.bitrate,
      subchapters: options.subchapters,
      speed: options.speed,
      normalize: options.normalize,
      isolateVoice: options.isolateVoice,
      customFilter: options.filter,
      progress: options.progress,
      onMetadata: (metadata) => {
        if (options.progress) {
          renderer = createProgressRenderer({ title: metadata.title, stream: stderr });
        }
      },
      onProgress: (update) => renderer?.update(update),
    };
    const dependencies: EncodeDependencies = {
      tools: {
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
        opusencPath: config.opusencPath,
      },
      resolveNoiseModel: createCachedNoiseModelResolver(config),
    };

    const encoded: EncodeResult = await (runtime.encode ?? encode)(folder, output, encodeOptions, dependencies);
    renderer?.done();

    if (encoded.output !== STDOUT_OUTPUT) {
      stdout.write(`Wrote ${encoded.output}\n`);
    }
    return 0;
  } catch (error) {
    renderer?.done();
    stderr.write(`Encoding failed: ${(error as Error).message}\n`);
    return 1;
  }
}
