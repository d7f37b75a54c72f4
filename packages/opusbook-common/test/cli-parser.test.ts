import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";

import { formatHelp, handleParseResult, parseArgs, type ArgDef } from "../src/cli-parser.js";

const DEFS: ArgDef[] = [
  { name: "--bitrate", type: "integer", description: "Bitrate", defaultValue: 15, constraints: { positive: true } },
  { name: "--speed", type: "integer", description: "Speed", defaultValue: 0 },
  { name: "--gain", type: "float", description: "Gain", constraints: { min: 0, max: 1 } },
  { name: "--filter", type: "string", description: "Filter" },
  { name: "--isolate-voice", type: "boolean", description: "Isolate voice" },
  { name: "--progress", type: "boolean", description: "Progress", negation: "--no-progress", defaultValue: true },
  { name: "--verbose", alias: "-v", type: "boolean", description: "Verbose" }
];

interface Options {
  bitrate: number;
  speed: number;
  gain?: number;
  filter?: string;
  isolateVoice?: boolean;
  progress: boolean;
  verbose?: boolean;
}

function createSink(): { stream: Writable; read: () => string } {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString();
      callback();
    }
  });
  return { stream, read: () => text };
}

describe("parseArgs", () => {
  it("applies defaults", () => {
    const result = parseArgs<Options>([], DEFS);
    expect(result.errors).toEqual([]);
    expect(result.options).toEqual({ bitrate: 15, speed: 0, progress: true });
  });

  it("parses values, camel-cases keys and honours negations", () => {
    const result = parseArgs<Options>(
      ["--bitrate", "24", "--isolate-voice", "--no-progress", "--filter", "volume=2", "-v"],
      DEFS
    );
    expect(result.errors).toEqual([]);
    expect(result.options).toEqual({
      bitrate: 24,
      speed: 0,
      filter: "volume=2",
      isolateVoice: true,
      progress: false,
      verbose: true
    });
  });

  it("treats negative numbers as values", () => {
    const result = parseArgs<Options>(["--speed", "-150"], DEFS);
    expect(result.errors).toEqual([]);
    expect(result.options.speed).toBe(-150);
  });

  it("accepts inline values", () => {
    const result = parseArgs<Options>(["--speed=25", "--filter=a=b"], DEFS);
    expect(result.options.speed).toBe(25);
    expect(result.options.filter).toBe("a=b");
  });

  it("reports type and constraint violations", () => {
    expect(parseArgs<Options>(["--bitrate", "abc"], DEFS).errors).toEqual(["--bitrate must be an integer"]);
    expect(parseArgs<Options>(["--bitrate", "1.5"], DEFS).errors).toEqual(["--bitrate must be an integer"]);
    expect(parseArgs<Options>(["--bitrate", "0"], DEFS).errors).toEqual(["--bitrate must be a positive number"]);
    expect(parseArgs<Options>(["--gain", "2"], DEFS).errors).toEqual(["--gain must be at most 1"]);
    expect(parseArgs<Options>(["--gain", "x"], DEFS).errors).toEqual(["--gain must be a number"]);
  });

  it("reports missing values", () => {
    expect(parseArgs<Options>(["--filter"], DEFS).errors).toEqual(["--filter requires a value"]);
    expect(parseArgs<Options>(["--filter", "--verbose"], DEFS).errors).toEqual(["--filter requires a value"]);
  });

  it("rejects values on boolean flags", () => {
    expect(parseArgs<Options>(["--verbose=yes"], DEFS).errors).toEqual(["--verbose does not take a value"]);
  });

  it("collects positionals up to the limit", () => {
    const result = parseArgs<Options>(["book", "-", "extra"], DEFS, { maxPositional: 2 });
    expect(result.positional).toEqual(["book", "-"]);
    expect(result.errors).toEqual(["Unexpected argument: extra"]);
  });

  it("rejects positionals by default", () => {
    expect(parseArgs<Options>(["book"], DEFS).errors).toEqual(["Unexpected argument: book"]);
  });

  it("reports or ignores unknown options", () => {
    expect(parseArgs<Options>(["--nope"], DEFS).errors).toEqual(["Unknown option: --nope"]);
    expect(parseArgs<Options>(["--nope"], DEFS, { allowUnknown: true }).errors).toEqual([]);
  });

  it("stops at --help", () => {
    const result = parseArgs<Options>(["-h", "--bogus"], DEFS);
    expect(result.helpRequested).toBe(true);
    expect(result.errors).toEqual([]);
  });
});

describe("formatHelp", () => {
  it("aligns flags and lists defaults, negations and examples", () => {
    const help = formatHelp(
      "tool [options]",
      "Does things.",
      [
        { name: "--speed", type: "integer", description: "Speed", defaultValue: 0 },
        { name: "--progress", type: "boolean", description: "Progress", negation: "--no-progress" }
      ],
      ["tool --speed 10"]
    );

    expect(help.split("\n")).toEqual([
      "Usage: tool [options]",
      "",
      "Does things.",
      "",
      "Options:",
      "  -h, --help       Show this message and exit",
      "  --speed <value>  Speed (default: 0)",
      "  --progress       Progress",
      "  --no-progress    Disable progress",
      "",
      "Examples:",
      "  tool --speed 10",
      ""
    ]);
  });
});

describe("handleParseResult", () => {
  it("prints help and exits zero", () => {
    const stdout = createSink();
    const code = handleParseResult(
      { options: {}, errors: [], helpRequested: true, positional: [] },
      "HELP\n",
      stdout.stream,
      createSink().stream
    );
    expect(code).toBe(0);
    expect(stdout.read()).toBe("HELP\n");
  });

  it("prints errors and exits one", () => {
    const stderr = createSink();
    const code = handleParseResult(
      { options: {}, errors: ["Unknown option: --x"], helpRequested: false, positional: [] },
      "HELP\n",
      createSink().stream,
      stderr.stream
    );
    expect(code).toBe(1);
    expect(stderr.read()).toBe("Unknown option: --x\nUse --help to list supported options.\n");
  });

  it("lets execution continue otherwise", () => {
    expect(
      handleParseResult({ options: {}, errors: [], helpRequested: false, positional: [] }, "HELP\n")
    ).toBeUndefined();
  });
});
