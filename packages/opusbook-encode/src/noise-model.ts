import { rename, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  createLogger,
  ensureDir,
  pathExists,
  retry,
  type OpusbookConfig,
  type OpusbookLogger,
} from "@opusbook/common";

export const NOISE_MODEL_FILENAME = "voice.rnnn";

/** Resolves to a local rnnoise model file. */
export type NoiseModelResolver = () => Promise<string>;

export type DownloadFile = (url: string, destination: string) => Promise<void>;

export interface CachedNoiseModelOptions extends Pick<OpusbookConfig, "cacheDir" | "noiseModelUrl" | "noiseModelPath"> {
  download?: DownloadFile;
  logger?: OpusbookLogger;
}

const defaultLogger = createLogger("noise-model");

export async function fetchModel(url: string, fetchImpl: typeof fetch = fetch): Promise<Response> {
  let result: Response;
  try {
    result = await fetchImpl(url);
  } catch (error) {
    throw new Error(`Failed to download ${url}: ${(error as Error).message}`, { cause: error });
  }
  if (!result.ok) {
    throw new Error(`Failed to download ${url}: ${result.status} ${result.statusText}`);
  }
  return result;
}

async function defaultDownload(url: string, destination: string): Promise<void> {
  const response = await retry(() => fetchModel(url), { delayMs: 1000 });

  const partial = `${destination}.part`;
  await writeFile(partial, Buffer.from(await response.arrayBuffer()));
  await rename(partial, destination);
}

/**
 * Uses the configured model file when there is one, otherwise a copy in the
 * cache directory that is downloaded on first use.
 */
export function createCachedNoiseModelResolver(options: CachedNoiseModelOptions): NoiseModelResolver {
  const logger = options.logger ?? defaultLogger;
  const download = options.download ?? defaultDownload;

  return async () => {
    if (options.noiseModelPath !== undefined) {
      if (!(await pathExists(options.noiseModelPath))) {
        throw new Error(`Noise model not found at ${options.noiseModelPath}`);
      }
      return options.noiseModelPath;
    }

    const cached = path.join(options.cacheDir, NOISE_MODEL_FILENAME);
    if (await pathExists(cached)) {
      logger.debug(`Using cached noise model ${cached}`);
      return cached;
    }

    logger.info(`Downloading noise model from ${options.noiseModelUrl}`);
    await ensureDir(options.cacheDir);
    await download(options.noiseModelUrl, cached);
    return cached;
  };
}
