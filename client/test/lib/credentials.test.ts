import { describe, expect, it } from "vitest";
import { CredentialStore } from "../../src/lib/credentials.js";

describe("CredentialStore", () => {
  it("starts empty unless seeded", () => {
    const store = new CredentialStore();
    expect(store.has("read")).toBe(false);
    expect(store.get("write")).toBeNull();

    const seeded = new CredentialStore({ read: " test-read-key ", write: "   " });
    expect(seeded.get("read")).toBe("test-read-key");
    expect(seeded.has("write")).toBe(false);
  });

  it("retains enabled keys in the slot of their class", () => {
    const store = new CredentialStore();
    expect(store.retain("READ", "test-read-key")).toBe("read");
    expect(store.retain("WRITE", "test-write-key")).toBe("write");
    expect(store.get("read")).toBe("test-read-key");
    expect(store.get("write")).toBe("test-write-key");
  });

  it("replaces the previous key of the same class", () => {
    const store = new CredentialStore({ read: "test-old-key" });
    store.retain("READ", "test-new-key");
    expect(store.get("read")).toBe("test-new-key");
  });

  it("ignores disabled and unknown keys", () => {
    const store = new CredentialStore({ read: "test-read-key" });
    expect(store.retain("READ_DISABLED", "test-disabled-key")).toBeNull();
    expect(store.retain("WRITE_DISABLED", "test-disabled-key")).toBeNull();
    expect(store.retain("UNKNOWN", "test-unknown-key")).toBeNull();
    expect(store.get("read")).toBe("test-read-key");
    expect(store.has("write")).toBe(false);
  });
});
