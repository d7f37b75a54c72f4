import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import { PipelineError, createLogger, type OpusbookLogger, type PipelineStage } from "@opusbook/common";

import { STDOUT_OUTPUT, type PipelineSpec } from "./commands.js";
import { ProgressMonitor, type ProgressListener } from "./progress.js";

export interface PipelineTools {
  ffmpegPath: string;
  opusencPath: string;
}

export const DEFAULT_PIPELINE_TOOLS: PipelineTools = {
  ffmpegPath: "ffmpeg",
  opusencPath: "opusenc",
};

/** The part of a child process the pipeline drives. */
export interface SupervisedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "spawn", listener: () => void): this;
  once(event: "error", listener: (error: Error) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnProcess = (command: string, args: readonly string[], options: SpawnOptions) => SupervisedProcess;

export interface RunPipelineOptions {
  tools?: PipelineTools;
  /** Progress is only monitored when a listener is given */
  onProgress?: ProgressListener;
  /** Expected output length in seconds */
  totalSeconds?: number;
  spawnProcess?: SpawnProcess;
  logger?: OpusbookLogger;
}

type ProcessOutcome =
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "error"; error: Error };

const defaultLogger = createLogger("pipeline");

const spawnChild: SpawnProcess = (command, args, options) => spawn(command, [...args], options);

/** Settles with the first of "close" or "error"; never rejects. */
function waitForOutcome(child: SupervisedProcess): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    child.once("error", (error) => {
      resolve({ kind: "error", error });
    });
    child.once("close", (code, signal) => {
      resolve({ kind: "exit", code, signal });
    });
  });
}

function waitForSpawn(child: SupervisedProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", (error) => reject(error));
  });
}

function collectOutput(stream: Readable | null): () => string {
  let text = "";
  stream?.setEncoding("utf8");
  stream?.on("data", (chunk: string) => {
    text += chunk;
  });
  return () => text.trim();
}

function toPipelineError(stage: PipelineStage, command: string, outcome: ProcessOutcome, stderr = ""): PipelineError | undefined {
  if (outcome.kind === "error") {
    return new PipelineError(stage, `failed to run ${command}: ${outcome.error.message}`, { cause: outcome.error });
  }
  if (outcome.code === 0) {
    return undefined;
  }
  const reason = outcome.signal ? `was killed by ${outcome.signal}` : `exited with code ${outcome.code}`;
  const detail = stderr ? `: ${stderr}` : "";
  return new PipelineError(stage, `${command} ${reason}${detail}`, {
    exitCode: outcome.code,
    signal: outcome.signal,
    stderr,
  });
}

/**
 * Runs decoder | encoder with the decoder's stdout wired straight into the
 * encoder's stdin, reporting decoder progress while the encoder runs.
 */
export async function runPipeline(spec: PipelineSpec, options: RunPipelineOptions = {}): Promise<void> {
  const tools = options.tools ?? DEFAULT_PIPELINE_TOOLS;
  const spawnProcess = options.spawnProcess ?? spawnChild;
  const logger = options.logger ?? defaultLogger;
  const { onProgress } = options;

  logger.debug(`Decoder: ${tools.ffmpegPath} ${spec.decoderArgs.join(" ")}`);
  const decoder = spawnProcess(tools.ffmpegPath, spec.decoderArgs, {
    stdio: ["ignore", "pipe", onProgress ? "pipe" : "ignore"],
  });
  const decoderDone = waitForOutcome(decoder);

  try {
    await waitForSpawn(decoder);
  } catch (error) {
    await decoderDone;
    throw new PipelineError("decode", `failed to run ${tools.ffmpegPath}: ${(error as Error).message}`, { cause: error });
  }

  const audio = decoder.stdout;
  if (!audio) {
    decoder.kill();
    await decoderDone;
    throw new PipelineError("decode", `${tools.ffmpegPath} has no output stream`);
  }

  logger.debug(`Encoder: ${tools.opusencPath} ${spec.encoderArgs.join(" ")}`);
  const encoder = spawnProcess(tools.opusencPath, spec.encoderArgs, {
    stdio: [audio, spec.output === STDOUT_OUTPUT ? "inherit" : "ignore", "pipe"],
  });
  const encoderDone = waitForOutcome(encoder);
  // The encoder owns the pipe now; closing our end lets the decoder see EOF/EPIPE.
  audio.destroy();
  const encoderStderr = collectOutput(encoder.stderr);

  let monitor: ProgressMonitor | undefined;
  let watching: Promise<void> | undefined;
  if (onProgress && decoder.stderr) {
    monitor = new ProgressMonitor({ totalSeconds: options.totalSeconds ?? 0, onProgress });
    watching = monitor.watch(decoder.stderr);
  }

  const encoderOutcome = await encoderDone;
  monitor?.stop();
  await watching;

  const encodeError = toPipelineError("encode", tools.opusencPath, encoderOutcome, encoderStderr());
  if (encodeError) {
    decoder.kill();
    await decoderDone;
    throw encodeError;
  }

  const decodeError = toPipelineError("decode", tools.ffmpegPath, await decoderDone);
  if (decodeError) {
    throw decodeError;
  }
  logger.debug("Pipeline finished");
}
