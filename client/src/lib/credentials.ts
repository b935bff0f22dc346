import type { KeyType } from "@purpleair-client/types";

export type KeySlot = "read" | "write";

export type RetainedKeys = {
  read?: string;
  write?: string;
};

/**
 * One read key and one write key per client. A newly retained key replaces
 * the previous key of the same class; there is no way to clear a slot.
 */
export class CredentialStore {
  private readKey: string | null;
  private writeKey: string | null;

  constructor(initial: RetainedKeys = {}) {
    this.readKey = initial.read?.trim() || null;
    this.writeKey = initial.write?.trim() || null;
  }

  /** Stores `key` in the slot matching `keyType`; returns the slot, or null for disabled/unknown keys. */
  retain(keyType: KeyType, key: string): KeySlot | null {
    if (keyType === "READ") {
      this.readKey = key;
      return "read";
    }
    if (keyType === "WRITE") {
      this.writeKey = key;
      return "write";
    }
    return null;
  }

  get(slot: KeySlot): string | null {
    return slot === "read" ? this.readKey : this.writeKey;
  }

  has(slot: KeySlot): boolean {
    return this.get(slot) !== null;
  }
}
