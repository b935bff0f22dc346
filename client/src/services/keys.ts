import type { KeyType } from "@purpleair-client/types";
import type { Logger } from "pino";
import type { ApiRequester } from "../lib/api.js";
import type { CredentialStore } from "../lib/credentials.js";
import { AuthError } from "../lib/errors.js";
import { KeyCheckResponse, decode } from "../lib/wire.js";

export class KeyService {
  private readonly api: ApiRequester;
  private readonly credentials: CredentialStore;
  private readonly logger: Logger;

  constructor(api: ApiRequester, credentials: CredentialStore, logger: Logger) {
    this.api = api;
    this.credentials = credentials;
    this.logger = logger;
  }

  /** Asks the service which class of key `key` is. Nothing is retained. */
  async checkKey(key: string): Promise<KeyType> {
    const trimmed = key.trim();
    if (!trimmed) {
      throw new AuthError("KEY_REJECTED", "PurpleAir key is empty");
    }
    const check = await this.api.sendAndDecode(
      { method: "GET", path: "/keys", expect: 201, key: { value: trimmed }, keyCheck: true },
      (payload) => decode(KeyCheckResponse, payload, "key check")
    );
    return check.api_key_type;
  }

  /** Checks `key` and retains it for later read or write calls when it is an enabled key. */
  async setKey(key: string): Promise<KeyType> {
    const keyType = await this.checkKey(key);
    const slot = this.credentials.retain(keyType, key.trim());
    if (slot) {
      this.logger.info({ slot }, "PurpleAir key retained");
    }
    else {
      this.logger.warn({ keyType }, "PurpleAir key not retained");
    }
    return keyType;
  }
}
