import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import { getUserCacheDir } from "./fs.js";

export const APP_NAME = "opusbook";
export const DEFAULT_CONFIG_FILENAME = ".opusbook.json";
export const DEFAULT_BITRATE_KBPS = 15;
export const DEFAULT_NOISE_MODEL_URL =
  "https://raw.githubusercontent.com/GregorR/rnnoise-models/master/somnolent-hogwash-2018-09-01/sh.rnnn";

export interface OpusbookConfig {
  ffmpegPath: string;
  ffprobePath: string;
  opusencPath: string;
  cacheDir: string;
  /** Use this noise model file instead of the cached download */
  noiseModelPath?: string;
  noiseModelUrl: string;
  bitrate: number;
}

export class ConfigError extends Error {
  declare cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ConfigError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

let cachedConfig: OpusbookConfig | null = null;
let cachedPath: string | null = null;

export function getDefaultConfigPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

export function getDefaultConfig(): OpusbookConfig {
  return {
    ffmpegPath: "ffmpeg",
    ffprobePath: "ffprobe",
    opusencPath: "opusenc",
    cacheDir: getUserCacheDir(APP_NAME),
    noiseModelUrl: DEFAULT_NOISE_MODEL_URL,
    bitrate: DEFAULT_BITRATE_KBPS,
  };
}

export function resetConfigCache(): void {
  cachedConfig = null;
  cachedPath = null;
}

/**
 * Loads the configuration from `configPath`, $OPUSBOOK_CONFIG or ./.opusbook.json.
 * Only an explicitly named file has to exist.
 */
export async function loadConfig(configPath?: string): Promise<OpusbookConfig> {
  const envConfigPath = process.env.OPUSBOOK_CONFIG?.trim();
  const explicitPath = configPath ?? (envConfigPath ? envConfigPath : undefined);
  const resolvedPath = path.resolve(explicitPath ?? getDefaultConfigPath());

  if (cachedConfig && cachedPath === resolvedPath) {
    return cachedConfig;
  }

  let fileContents: string | undefined;
  try {
    fileContents = await readFile(resolvedPath, "utf8");
  } catch (error) {
    const missing = (error as NodeJS.ErrnoException).code === "ENOENT";
    if (!missing || explicitPath !== undefined) {
      throw new ConfigError(`Unable to read opusbook config at ${resolvedPath}`, { cause: error });
    }
  }

  let config = getDefaultConfig();
  if (fileContents !== undefined) {
    let data: unknown;
    try {
      data = JSON.parse(fileContents);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in opusbook config at ${resolvedPath}`, { cause: error });
    }
    config = validateConfig(data, resolvedPath, config);
  }

  cachedConfig = config;
  cachedPath = resolvedPath;
  return config;
}

function validateConfig(value: unknown, configPath: string, defaults: OpusbookConfig): OpusbookConfig {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object`);
  }

  const record = value as Record<string, unknown>;

  const optionalString = (key: keyof OpusbookConfig): string | undefined => {
    const raw = record[key];
    if (raw === undefined) {
      return undefined;
    }
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new ConfigError(`Config key "${key}" must be a non-empty string`);
    }
    return raw;
  };

  const optionalPath = (key: keyof OpusbookConfig): string | undefined => {
    const raw = optionalString(key);
    return raw === undefined ? undefined : path.resolve(path.dirname(configPath), raw);
  };

  let bitrate = defaults.bitrate;
  if (record.bitrate !== undefined) {
    if (typeof record.bitrate !== "number" || !Number.isInteger(record.bitrate) || record.bitrate <= 0) {
      throw new ConfigError(`Config key "bitrate" must be a positive integer number of kbps`);
    }
    bitrate = record.bitrate;
  }

  return {
    ffmpegPath: optionalString("ffmpegPath") ?? defaults.ffmpegPath,
    ffprobePath: optionalString("ffprobePath") ?? defaults.ffprobePath,
    opusencPath: optionalString("opusencPath") ?? defaults.opusencPath,
    cacheDir: optionalPath("cacheDir") ?? defaults.cacheDir,
    noiseModelPath: optionalPath("noiseModelPath"),
    noiseModelUrl: optionalString("noiseModelUrl") ?? defaults.noiseModelUrl,
    bitrate,
  };
}
