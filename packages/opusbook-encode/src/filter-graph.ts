import { NoInputError } from "@opusbook/common";

export interface FilterGraphOptions {
  /** rnnoise model for voice isolation */
  noiseModelPath?: string;
  /** Target peak in percent; undefined leaves loudness alone */
  normalize?: number;
  speedFactor?: number;
  /** Appended verbatim after the built-in filters */
  customFilter?: string;
}

/** Escapes a value for use inside a single filter option. */
export function escapeFilterOption(value: string): string {
  return value.replace(/[\\':]/g, (char) => `\\${char}`);
}

/** Escapes text for the filter graph level, above the option level. */
export function escapeFilterGraph(value: string): string {
  return value.replace(/[\\'[\],;]/g, (char) => `\\${char}`);
}

export function concatFilter(inputCount: number): string {
  const inputs = Array.from({ length: inputCount }, (_, index) => `[${index}:a]`).join("");
  return `${inputs}concat=n=${inputCount}:v=0:a=1`;
}

export function normalizeFilter(peakPercent: number): string {
  const peak = Math.min(Math.max(peakPercent, 0), 100) / 100;
  return `dynaudnorm=peak=${String(peak)}:framelen=8000:gausssize=301:correctdc=1`;
}

export function tempoFilter(speedFactor: number): string {
  return `atempo=${speedFactor.toFixed(6)}`;
}

/**
 * Joins every input file into one stream and applies the optional voice
 * isolation, loudness, tempo and custom stages in that order.
 */
export function buildFilterGraph(files: readonly string[], options: FilterGraphOptions = {}): string {
  if (files.length === 0) {
    throw new NoInputError("(no files)");
  }

  const stages = [concatFilter(files.length)];
  if (options.noiseModelPath !== undefined) {
    stages.push(`arnndn=m=${escapeFilterGraph(escapeFilterOption(options.noiseModelPath))}`);
  }
  if (options.normalize !== undefined) {
    stages.push(normalizeFilter(options.normalize));
  }
  const speedFactor = options.speedFactor ?? 1;
  if (speedFactor !== 1) {
    stages.push(tempoFilter(speedFactor));
  }
  if (options.customFilter) {
    stages.push(options.customFilter);
  }
  return stages.join(",");
}
