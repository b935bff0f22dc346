import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

// Later files win; .env.local holds a developer's own PurpleAir keys.
const ENV_FILES = [".env", ".env.local"] as const;

let loadedFrom: string[] | null = null;

/**
 * Makes the `PURPLEAIR_*`, `API_TIMEOUT_MS` and `LOG_LEVEL` settings of
 * `.env` files under `root` visible to `loadConfig`. Returns the files read;
 * calls after the first return the same list without reading again.
 */
export function loadLocalEnv(root: string = process.cwd()): string[] {
  if (loadedFrom) return loadedFrom;
  loadedFrom = [];
  for (const [position, file] of ENV_FILES.entries()) {
    const envPath = path.join(root, file);
    if (!existsSync(envPath)) continue;
    loadEnvFile({ path: envPath, override: position > 0 });
    loadedFrom.push(envPath);
  }
  return loadedFrom;
}
