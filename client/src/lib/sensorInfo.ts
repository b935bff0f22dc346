import {
  CHANNEL_FLAGS,
  CHANNEL_STATES,
  LOCATIONS,
  PRIVACY_SETTINGS,
} from "@purpleair-client/types";
import { z } from "zod";
import { decode, enumCode, epochSeconds } from "./wire.js";

// The service reports an unavailable reading as null; treat it as absent.
function dropNulls(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== null));
}

const num = z.number().optional();
const str = z.string().optional();
const location = enumCode(LOCATIONS).optional();
const privacy = enumCode(PRIVACY_SETTINGS).optional();
const channelState = enumCode(CHANNEL_STATES).optional();
const channelFlag = enumCode(CHANNEL_FLAGS).optional();

export const SensorStatsWire = z.preprocess(dropNulls, z.object({
  "pm2.5": num,
  "pm2.5_10minute": num,
  "pm2.5_30minute": num,
  "pm2.5_60minute": num,
  "pm2.5_6hour": num,
  "pm2.5_24hour": num,
  "pm2.5_1week": num,
  time_stamp: epochSeconds.optional(),
}));

export type SensorStats = z.infer<typeof SensorStatsWire>;

const stats = SensorStatsWire.optional();

export const SensorInfoShape = z.object({
  sensor_index: z.number().int().optional(),
  // Station information and status
  name: str,
  icon: num,
  model: str,
  hardware: str,
  location_type: location,
  private: privacy,
  latitude: num,
  longitude: num,
  altitude: num,
  position_rating: num,
  led_brightness: num,
  firmware_version: str,
  firmware_upgrade: str,
  rssi: num,
  uptime: num,
  pa_latency: num,
  memory: num,
  last_seen: num,
  last_modified: num,
  date_created: num,
  channel_state: channelState,
  channel_flags: channelFlag,
  channel_flags_manual: channelFlag,
  channel_flags_auto: channelFlag,
  confidence: num,
  confidence_manual: num,
  confidence_auto: num,
  // Environmental
  humidity: num,
  humidity_a: num,
  humidity_b: num,
  temperature: num,
  temperature_a: num,
  temperature_b: num,
  pressure: num,
  pressure_a: num,
  pressure_b: num,
  // Miscellaneous
  voc: num,
  voc_a: num,
  voc_b: num,
  ozone1: num,
  analog_input: num,
  // PM1.0
  "pm1.0": num,
  "pm1.0_a": num,
  "pm1.0_b": num,
  "pm1.0_atm": num,
  "pm1.0_atm_a": num,
  "pm1.0_atm_b": num,
  "pm1.0_cf_1": num,
  "pm1.0_cf_1_a": num,
  "pm1.0_cf_1_b": num,
  // PM2.5
  "pm2.5_alt": num,
  "pm2.5_alt_a": num,
  "pm2.5_alt_b": num,
  "pm2.5": num,
  "pm2.5_a": num,
  "pm2.5_b": num,
  "pm2.5_atm": num,
  "pm2.5_atm_a": num,
  "pm2.5_atm_b": num,
  "pm2.5_cf_1": num,
  "pm2.5_cf_1_a": num,
  "pm2.5_cf_1_b": num,
  // PM2.5 pseudo averages
  "pm2.5_10minute": num,
  "pm2.5_10minute_a": num,
  "pm2.5_10minute_b": num,
  "pm2.5_30minute": num,
  "pm2.5_30minute_a": num,
  "pm2.5_30minute_b": num,
  "pm2.5_60minute": num,
  "pm2.5_60minute_a": num,
  "pm2.5_60minute_b": num,
  "pm2.5_6hour": num,
  "pm2.5_6hour_a": num,
  "pm2.5_6hour_b": num,
  "pm2.5_24hour": num,
  "pm2.5_24hour_a": num,
  "pm2.5_24hour_b": num,
  "pm2.5_1week": num,
  "pm2.5_1week_a": num,
  "pm2.5_1week_b": num,
  // PM10.0
  "pm10.0": num,
  "pm10.0_a": num,
  "pm10.0_b": num,
  "pm10.0_atm": num,
  "pm10.0_atm_a": num,
  "pm10.0_atm_b": num,
  "pm10.0_cf_1": num,
  "pm10.0_cf_1_a": num,
  "pm10.0_cf_1_b": num,
  // Particle counts
  "0.3_um_count": num,
  "0.3_um_count_a": num,
  "0.3_um_count_b": num,
  "0.5_um_count": num,
  "0.5_um_count_a": num,
  "0.5_um_count_b": num,
  "1.0_um_count": num,
  "1.0_um_count_a": num,
  "1.0_um_count_b": num,
  "2.5_um_count": num,
  "2.5_um_count_a": num,
  "2.5_um_count_b": num,
  "5.0_um_count": num,
  "5.0_um_count_a": num,
  "5.0_um_count_b": num,
  "10.0_um_count": num,
  "10.0_um_count_a": num,
  "10.0_um_count_b": num,
  // ThingSpeak
  primary_id_a: num,
  primary_key_a: str,
  secondary_id_a: num,
  secondary_key_a: str,
  primary_id_b: num,
  primary_key_b: str,
  secondary_id_b: num,
  secondary_key_b: str,
  // Rolling statistics per channel
  stats,
  stats_a: stats,
  stats_b: stats,
});

export const SensorInfoWire = z.preprocess(dropNulls, SensorInfoShape);

/** Every property is optional: absent means not requested or not reported by the hardware. */
export type SensorInfo = z.infer<typeof SensorInfoWire>;

export type SensorField = Exclude<keyof SensorInfo, "sensor_index" | "stats" | "stats_a" | "stats_b">;

const NOT_SELECTABLE = new Set(["sensor_index", "stats", "stats_a", "stats_b"]);

function isSensorField(key: string): key is SensorField {
  return Object.hasOwn(SensorInfoShape.shape, key) && !NOT_SELECTABLE.has(key);
}

/** Field names accepted by the `fields` parameter. */
export const DATA_FIELDS: readonly SensorField[] = Object.keys(SensorInfoShape.shape).filter(isSensorField);

export const SensorResponse = z.object({
  api_version: z.string().optional(),
  time_stamp: z.number().optional(),
  data_time_stamp: z.number().optional(),
  sensor: SensorInfoWire,
});

export function decodeSensorInfo(payload: unknown, context = "sensor"): SensorInfo {
  return decode(SensorResponse, payload, context).sensor;
}
