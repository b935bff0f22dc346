import { PurpleAirClient } from "./client.js";
import { loadConfig, type ClientConfig } from "./lib/config.js";
import { loadLocalEnv } from "./lib/env.js";
import { createLogger } from "./lib/logger.js";
import { createFetchTransport } from "./lib/transport.js";

export * from "@purpleair-client/types";
export { PurpleAirClient, type PurpleAirClientOptions } from "./client.js";
export { DEFAULT_BASE_URL, KEY_HEADER } from "./lib/api.js";
export { loadConfig, readKeysFile, type ClientConfig } from "./lib/config.js";
export { CredentialStore, type KeySlot, type RetainedKeys } from "./lib/credentials.js";
export { loadLocalEnv } from "./lib/env.js";
export {
  AuthError,
  DecodeError,
  PurpleAirError,
  RemoteError,
  TransportError,
  ValidationError,
  describeError,
  type AuthErrorReason,
  type DescribedError,
  type PurpleAirErrorReason,
  type RemoteErrorPayload,
  type ValidationErrorReason,
} from "./lib/errors.js";
export { createLogger, silentLogger, type LogLevel } from "./lib/logger.js";
export {
  boundingBox,
  buildSensorQuery,
  type BulkDataParams,
  type MemberDataParams,
  type ParamOperation,
  type SensorDataParams,
  type SensorParams,
} from "./lib/params.js";
export { DATA_FIELDS, decodeSensorInfo, type SensorField, type SensorInfo, type SensorStats } from "./lib/sensorInfo.js";
export { decodeBulkSensors, transcodeBulkPayload, type BulkSensorsPayload } from "./lib/transcoder.js";
export {
  createFetchTransport,
  type FetchTransportOptions,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from "./lib/transport.js";
export { encodeGroup, encodeMember, type GroupRecord, type MemberRecord } from "./lib/wire.js";

/**
 * Builds a client from `.env` files and the process environment. Configured
 * keys are checked with the service before they are retained.
 */
export async function createClientFromEnv(env?: NodeJS.ProcessEnv): Promise<PurpleAirClient> {
  loadLocalEnv();
  const config: ClientConfig = loadConfig(env);
  const logger = createLogger({ level: config.LOG_LEVEL });
  const client = new PurpleAirClient({
    baseUrl: config.PURPLEAIR_API_URL,
    transport: createFetchTransport({ timeoutMs: config.API_TIMEOUT_MS }),
    logger,
  });

  for (const key of [config.readKey, config.writeKey]) {
    if (key) {
      await client.setKey(key);
    }
  }
  return client;
}
