import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, readKeysFile } from "../../src/lib/config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "purpleair-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PURPLEAIR_API_URL: "https://api.purpleair.com/v1",
      API_TIMEOUT_MS: 30000,
      LOG_LEVEL: "warn",
      readKey: undefined,
      writeKey: undefined,
    });
  });

  it("trims keys and coerces the timeout", () => {
    const config = loadConfig({
      PURPLEAIR_READ_KEY: "  test-read-key  ",
      PURPLEAIR_WRITE_KEY: "",
      API_TIMEOUT_MS: "2500",
      LOG_LEVEL: "debug",
    });
    expect(config.readKey).toBe("test-read-key");
    expect(config.writeKey).toBeUndefined();
    expect(config.API_TIMEOUT_MS).toBe(2500);
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ API_TIMEOUT_MS: "soon" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ PURPLEAIR_API_URL: "not a url" })).toThrow();
  });

  it("fills keys missing from the environment from the keys file", () => {
    const file = path.join(dir, "keys.json");
    writeFileSync(file, JSON.stringify({ read: "test-file-read", write: "test-file-write" }));

    const config = loadConfig({ PURPLEAIR_KEYS_FILE: file, PURPLEAIR_WRITE_KEY: "test-env-write" });

    expect(config.readKey).toBe("test-file-read");
    expect(config.writeKey).toBe("test-env-write");
  });

  it("reads partial keys files", () => {
    const file = path.join(dir, "keys.json");
    writeFileSync(file, JSON.stringify({ write: "test-file-write" }));
    expect(readKeysFile(file)).toEqual({ write: "test-file-write" });
  });
});
