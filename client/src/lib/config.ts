import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_BASE_URL } from "./api.js";

const optionalString = z.string().trim().transform((value) => value || undefined).optional();

const envSchema = z.object({
  PURPLEAIR_API_URL: z.string().url().default(DEFAULT_BASE_URL),
  PURPLEAIR_READ_KEY: optionalString,
  PURPLEAIR_WRITE_KEY: optionalString,
  PURPLEAIR_KEYS_FILE: optionalString,
  API_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn")
});

const keysFileSchema = z.object({
  read: optionalString,
  write: optionalString
});

export type ClientConfig = z.infer<typeof envSchema> & {
  readKey?: string;
  writeKey?: string;
};

export function readKeysFile(filePath: string): z.infer<typeof keysFileSchema> {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(readFileSync(resolved, "utf8"));
  return keysFileSchema.parse(raw);
}

/** Keys set in the environment take precedence over those in PURPLEAIR_KEYS_FILE. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = envSchema.parse(env);
  const fileKeys: z.infer<typeof keysFileSchema> = parsed.PURPLEAIR_KEYS_FILE
    ? readKeysFile(parsed.PURPLEAIR_KEYS_FILE)
    : {};

  return {
    ...parsed,
    readKey: parsed.PURPLEAIR_READ_KEY ?? fileKeys.read,
    writeKey: parsed.PURPLEAIR_WRITE_KEY ?? fileKeys.write
  };
}
