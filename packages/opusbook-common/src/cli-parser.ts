/**
 * Declarative argument parser shared by the opusbook command line tools.
 */

export type ArgType = "string" | "boolean" | "integer" | "float";

export interface NumericConstraint {
  /** Inclusive lower bound */
  min?: number;
  /** Inclusive upper bound */
  max?: number;
  /** Value must be > 0 */
  positive?: boolean;
}

export interface ArgDef {
  /** Long flag, e.g. "--bitrate" */
  name: string;
  /** Short alias, e.g. "-v" */
  alias?: string;
  /** "boolean" flags take no value */
  type: ArgType;
  description: string;
  defaultValue?: string | number | boolean;
  constraints?: NumericConstraint;
  /** Flag that sets a boolean option to false, e.g. "--no-progress" */
  negation?: string;
}

export interface ParseResult<T> {
  options: T;
  errors: string[];
  helpRequested: boolean;
  positional: string[];
}

export interface ParseOptions {
  /** Ignore unknown flags instead of reporting them */
  allowUnknown?: boolean;
  /** Upper bound on positional arguments; 0 rejects them all (default) */
  maxPositional?: number;
}

const HELP_DEF: ArgDef = {
  name: "--help",
  alias: "-h",
  type: "boolean",
  description: "Show this message and exit"
};

function createFlagMap(defs: ArgDef[]): Map<string, ArgDef> {
  const map = new Map<string, ArgDef>();
  for (const def of [...defs, HELP_DEF]) {
    map.set(def.name, def);
    if (def.alias) {
      map.set(def.alias, def);
    }
    if (def.negation) {
      map.set(def.negation, def);
    }
  }
  return map;
}

function looksLikeFlag(token: string): boolean {
  // Negative numbers are values, not flags.
  return token.startsWith("-") && token !== "-" && !/^-\d/.test(token);
}

function checkConstraints(def: ArgDef, value: number): string | undefined {
  const { constraints } = def;
  if (!constraints) {
    return undefined;
  }
  if (constraints.positive && value <= 0) {
    return `${def.name} must be a positive number`;
  }
  if (constraints.min !== undefined && value < constraints.min) {
    return `${def.name} must be at least ${constraints.min}`;
  }
  if (constraints.max !== undefined && value > constraints.max) {
    return `${def.name} must be at most ${constraints.max}`;
  }
  return undefined;
}

function parseValue(def: ArgDef, raw: string): { value?: string | number; error?: string } {
  switch (def.type) {
    case "integer": {
      if (!/^-?\d+$/.test(raw.trim())) {
        return { error: `${def.name} must be an integer` };
      }
      const num = Number.parseInt(raw, 10);
      const constraintError = checkConstraints(def, num);
      return constraintError ? { error: constraintError } : { value: num };
    }
    case "float": {
      const num = Number(raw);
      if (raw.trim() === "" || Number.isNaN(num)) {
        return { error: `${def.name} must be a number` };
      }
      const constraintError = checkConstraints(def, num);
      return constraintError ? { error: constraintError } : { value: num };
    }
    default:
      return { value: raw };
  }
}

/** "--isolate-voice" becomes "isolateVoice". */
export function getOptionKey(def: ArgDef): string {
  return def.name
    .replace(/^-+/, "")
    .replace(/-([a-z])/g, (_, char: string) => char.toUpperCase());
}

export function parseArgs<T>(
  argv: string[],
  defs: ArgDef[],
  parseOptions: ParseOptions = {}
): ParseResult<T> {
  const flagMap = createFlagMap(defs);
  const options: Record<string, unknown> = {};
  const errors: string[] = [];
  const positional: string[] = [];
  const maxPositional = parseOptions.maxPositional ?? 0;
  let helpRequested = false;

  for (const def of defs) {
    if (def.defaultValue !== undefined) {
      options[getOptionKey(def)] = def.defaultValue;
    }
  }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (!looksLikeFlag(token)) {
      if (positional.length < maxPositional) {
        positional.push(token);
      } else {
        errors.push(`Unexpected argument: ${token}`);
      }
      continue;
    }

    const equalsIndex = token.startsWith("--") ? token.indexOf("=") : -1;
    const flag = equalsIndex >= 0 ? token.slice(0, equalsIndex) : token;
    const inlineValue = equalsIndex >= 0 ? token.slice(equalsIndex + 1) : undefined;
    const def = flagMap.get(flag);

    if (!def) {
      if (!parseOptions.allowUnknown) {
        errors.push(`Unknown option: ${flag}`);
      }
      continue;
    }

    if (def === HELP_DEF) {
      helpRequested = true;
      break;
    }

    const key = getOptionKey(def);

    if (def.type === "boolean") {
      if (inlineValue !== undefined) {
        errors.push(`${def.name} does not take a value`);
        continue;
      }
      options[key] = def.negation !== flag;
      continue;
    }

    let raw = inlineValue;
    if (raw === undefined) {
      const next = argv[i + 1];
      if (next === undefined || looksLikeFlag(next)) {
        errors.push(`${def.name} requires a value`);
        continue;
      }
      raw = next;
      i++;
    }

    const { value, error } = parseValue(def, raw);
    if (error) {
      errors.push(error);
    } else {
      options[key] = value;
    }
  }

  return {
    options: options as T,
    errors,
    helpRequested,
    positional
  };
}

export function formatHelp(
  usage: string,
  description: string,
  defs: ArgDef[],
  examples: string[] = []
): string {
  const flagLabel = (def: ArgDef): string => {
    const label = def.alias ? `${def.alias}, ${def.name}` : def.name;
    return def.type === "boolean" ? label : `${label} <value>`;
  };

  const width = Math.max(...[HELP_DEF, ...defs].map((def) => flagLabel(def).length));
  const lines = [`Usage: ${usage}`, "", description, "", "Options:"];

  for (const def of [HELP_DEF, ...defs]) {
    const suffix = def.defaultValue !== undefined ? ` (default: ${def.defaultValue})` : "";
    lines.push(`  ${flagLabel(def).padEnd(width)}  ${def.description}${suffix}`);
    if (def.negation) {
      lines.push(`  ${def.negation.padEnd(width)}  Disable ${def.name.replace(/^--/, "")}`);
    }
  }

  if (examples.length > 0) {
    lines.push("", "Examples:", ...examples.map((example) => `  ${example}`));
  }

  lines.push("");
  return lines.join("\n");
}

/**
 * Writes help or errors for a parse result.
 * Returns the exit code to stop with, or undefined to continue.
 */
export function handleParseResult<T>(
  result: ParseResult<T>,
  helpText: string,
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): number | undefined {
  if (result.helpRequested) {
    stdout.write(helpText);
    return result.errors.length > 0 ? 1 : 0;
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      stderr.write(`${error}\n`);
    }
    stderr.write("Use --help to list supported options.\n");
    return 1;
  }

  return undefined;
}
