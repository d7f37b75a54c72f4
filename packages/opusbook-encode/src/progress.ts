import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { formatTimestamp, tryParseTimestamp } from "@opusbook/common";

const TIME_PATTERN = /\s*time\s*=\s*(\S+)\s*/;

export interface ProgressUpdate {
  /** Output seconds encoded so far */
  elapsed: number;
  /** Seconds added since the previous update; always positive */
  delta: number;
  /** Expected output length in seconds */
  total: number;
}

export type ProgressListener = (update: ProgressUpdate) => void;

export interface ProgressMonitorOptions {
  totalSeconds: number;
  onProgress: ProgressListener;
}

/** Position reported by one decoder stats line, if it has one. */
export function parseProgressLine(line: string): number | undefined {
  const match = TIME_PATTERN.exec(line);
  return match ? tryParseTimestamp(match[1]) : undefined;
}

/**
 * Follows the decoder's stats output and turns its `time=` field into
 * forward-only progress updates.
 */
export class ProgressMonitor {
  private last = 0;
  private reader?: Interface;
  private input?: Readable;

  constructor(private readonly options: ProgressMonitorOptions) {}

  /** Resolves once the stream ends or stop() is called. */
  watch(stream: Readable): Promise<void> {
    this.input = stream;
    // readline splits on \r as well, which the stats line is rewritten with.
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    this.reader = reader;

    return new Promise((resolve) => {
      reader.on("line", (line) => {
        this.handleLine(line);
      });
      reader.once("close", () => {
        resolve();
      });
    });
  }

  handleLine(line: string): void {
    const position = parseProgressLine(line);
    if (position === undefined || position <= this.last) {
      return;
    }
    const delta = position - this.last;
    this.last = position;
    this.options.onProgress({ elapsed: position, delta, total: this.options.totalSeconds });
  }

  stop(): void {
    this.reader?.close();
    // Keep draining so the decoder never blocks on a full stats pipe.
    this.input?.resume();
  }
}

export interface ProgressRendererOptions {
  title: string;
  stream?: NodeJS.WritableStream;
  intervalMs?: number;
  now?: () => number;
}

export interface ProgressRenderer {
  update: ProgressListener;
  done(): void;
}

export function formatProgressLine(title: string, update: ProgressUpdate, etaSeconds: number | undefined): string {
  const percent = update.total > 0 ? Math.min(100, Math.floor((update.elapsed / update.total) * 100)) : 0;
  const eta = etaSeconds === undefined ? "--:--:--" : formatTimestamp(etaSeconds, 0);
  return `\r[Encoding] ${title} ${percent}% ${formatTimestamp(update.elapsed, 0)}/${formatTimestamp(update.total, 0)} ETA ${eta}`;
}

/** Single rewritten terminal line, refreshed at most every `intervalMs`. */
export function createProgressRenderer(options: ProgressRendererOptions): ProgressRenderer {
  const stream = options.stream ?? process.stderr;
  const intervalMs = options.intervalMs ?? 500;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let lastRender: number | undefined;

  return {
    update(update) {
      const current = now();
      if (lastRender !== undefined && current - lastRender < intervalMs) {
        return;
      }
      lastRender = current;

      const wallSeconds = (current - startedAt) / 1000;
      const eta =
        wallSeconds > 0 && update.elapsed > 0
          ? Math.max(0, update.total - update.elapsed) / (update.elapsed / wallSeconds)
          : undefined;
      stream.write(formatProgressLine(options.title, update, eta));
    },
    done() {
      if (lastRender !== undefined) {
        stream.write("\r\x1b[K");
      }
    },
  };
}
