import { mkdir, readdir, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Regular files directly inside `dir` whose suffix matches one of `extensions`
 * (case-insensitive), as absolute paths sorted by file name.
 */
export async function listFilesByExtension(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(normalizeExtension));
  const entries = await readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.resolve(dir, name));
}

/**
 * Per-user cache directory for `appName`, following each platform's convention.
 */
export function getUserCacheDir(
  appName: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  if (platform === "darwin") {
    return path.join(homeDir, "Library", "Caches", appName);
  }
  if (platform === "win32") {
    const localAppData = env.LOCALAPPDATA || path.join(homeDir, "AppData", "Local");
    return path.join(localAppData, appName, "Cache");
  }
  const xdgCache = env.XDG_CACHE_HOME?.trim();
  return path.join(xdgCache ? xdgCache : path.join(homeDir, ".cache"), appName);
}
