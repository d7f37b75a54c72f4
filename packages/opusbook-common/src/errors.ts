interface ErrorOptions {
  cause?: unknown;
}

export class ProbeError extends Error {
  declare cause?: unknown;
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super(`Unable to probe ${file}: ${message}`);
    this.name = "ProbeError";
    this.file = file;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class MissingTrackError extends Error {
  readonly file: string;
  readonly title: string;

  constructor(file: string, title: string) {
    super(`No track number for ${file} and none in title ${JSON.stringify(title)}`);
    this.name = "MissingTrackError";
    this.file = file;
    this.title = title;
  }
}

export class NoTitleError extends Error {
  readonly file: string;

  constructor(file: string) {
    super(`No track number and no title for ${file}; cannot determine track order`);
    this.name = "NoTitleError";
    this.file = file;
  }
}

export class NoInputError extends Error {
  readonly folder: string;

  constructor(folder: string) {
    super(`No track files found in ${folder}; nothing to encode`);
    this.name = "NoInputError";
    this.folder = folder;
  }
}

export type PipelineStage = "decode" | "encode";

export interface PipelineErrorOptions extends ErrorOptions {
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stderr?: string;
}

export class PipelineError extends Error {
  declare cause?: unknown;
  readonly stage: PipelineStage;
  readonly exitCode?: number | null;
  readonly signal?: NodeJS.Signals | null;
  readonly stderr?: string;

  constructor(stage: PipelineStage, message: string, options: PipelineErrorOptions = {}) {
    super(`${stage} stage: ${message}`);
    this.name = "PipelineError";
    this.stage = stage;
    this.exitCode = options.exitCode;
    this.signal = options.signal;
    this.stderr = options.stderr;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
