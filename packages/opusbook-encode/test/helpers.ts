import { EventEmitter } from "node:events";
import type { SpawnOptions } from "node:child_process";
import { PassThrough, Writable } from "node:stream";
import { vi } from "vitest";
import type { OpusbookLogger } from "@opusbook/common";

import type { SpawnProcess, SupervisedProcess } from "../src/pipeline.js";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies OpusbookLogger;
}

/** Writable that records everything synchronously. */
export function createSink(): { stream: Writable; text: () => string } {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

export interface FakeScript {
  /** Emit "error" instead of "spawn" */
  spawnError?: Error;
  /** Exit by itself with this code; otherwise wait for finish() or kill() */
  exitCode?: number;
  stderr?: string;
}

export class FakeProcess extends EventEmitter implements SupervisedProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killedWith?: NodeJS.Signals;
  private closed = false;

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly options: SpawnOptions,
    script: FakeScript
  ) {
    super();
    setImmediate(() => {
      if (script.spawnError) {
        this.emit("error", script.spawnError);
        return;
      }
      this.emit("spawn");
      if (script.stderr !== undefined) {
        this.stderr.write(script.stderr);
      }
      if (script.exitCode !== undefined) {
        const code = script.exitCode;
        setImmediate(() => this.finish(code));
      }
    });
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stderr.end();
    setImmediate(() => this.emit("close", code, signal));
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.killedWith = signal;
    this.finish(null, signal);
    return true;
  }
}

/** Hands out one scripted fake per spawn call, in order. */
export function createFakeSpawner(...scripts: FakeScript[]) {
  const processes: FakeProcess[] = [];
  const spawnProcess: SpawnProcess = (command, args, options) => {
    const script = scripts[processes.length] ?? { exitCode: 0 };
    const child = new FakeProcess(command, args, options, script);
    processes.push(child);
    return child;
  };
  return { spawnProcess, processes };
}
