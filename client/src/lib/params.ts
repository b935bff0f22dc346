import {
  LOCATIONS,
  labelToCode,
  type BoundingBox,
  type Location,
  type SensorIndex,
} from "@purpleair-client/types";
import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Query options for sensor data calls; each key takes exactly one value type. */
export type SensorParams = {
  fields?: readonly string[];
  location?: Location;
  /** Per-call read key, sent as `read_key` and used in place of the retained read key. */
  readKey?: string;
  readKeys?: readonly string[];
  showOnly?: readonly SensorIndex[];
  modifiedSince?: Date;
  /** Seconds. */
  maxAge?: number;
  nwLng?: number;
  nwLat?: number;
  seLng?: number;
  seLat?: number;
};

export type SensorDataParams = Pick<SensorParams, "fields" | "readKey">;
export type MemberDataParams = Pick<SensorParams, "fields">;
export type BulkDataParams = Omit<SensorParams, "fields" | "readKey"> & { fields: readonly string[] };

export type ParamOperation = "sensor" | "member" | "bulk";
type ParamKey = keyof SensorParams;

type ParamRule = {
  wireKey: string;
  expected: string;
  schema: z.ZodType<string, z.ZodTypeDef, unknown>;
};

const commaList = (values: readonly (string | number)[]) => values.join(",");

function coordinate(wireKey: string, limit: number): ParamRule {
  return {
    wireKey,
    expected: `a coordinate between -${limit} and ${limit}`,
    schema: z.number().finite().min(-limit).max(limit).transform((value) => value.toFixed(6)),
  };
}

const PARAM_RULES = {
  fields: {
    wireKey: "fields",
    expected: "a non-empty list of field names",
    schema: z.array(z.string().min(1)).min(1).transform(commaList),
  },
  location: {
    wireKey: "location_type",
    expected: `one of ${LOCATIONS.join(", ")}`,
    schema: z.enum(LOCATIONS).transform((value) => String(labelToCode(LOCATIONS, value))),
  },
  readKey: {
    wireKey: "read_key",
    expected: "a key string",
    schema: z.string().min(1),
  },
  readKeys: {
    wireKey: "read_keys",
    expected: "a non-empty list of key strings",
    schema: z.array(z.string().min(1)).min(1).transform(commaList),
  },
  showOnly: {
    wireKey: "show_only",
    expected: "a non-empty list of sensor indices",
    schema: z.array(z.number().int().nonnegative()).min(1).transform(commaList),
  },
  modifiedSince: {
    wireKey: "modified_since",
    expected: "a Date",
    schema: z.date().transform((value) => String(Math.floor(value.getTime() / 1000))),
  },
  maxAge: {
    wireKey: "max_age",
    expected: "a whole number of seconds",
    schema: z.number().int().nonnegative().transform(String),
  },
  nwLng: coordinate("nwlng", 180),
  nwLat: coordinate("nwlat", 90),
  seLng: coordinate("selng", 180),
  seLat: coordinate("selat", 90),
} satisfies Record<ParamKey, ParamRule>;

const BULK_PARAMS: readonly ParamKey[] = [
  "fields",
  "location",
  "readKeys",
  "showOnly",
  "modifiedSince",
  "maxAge",
  "nwLng",
  "nwLat",
  "seLng",
  "seLat",
];

const ALLOWED_PARAMS: Record<ParamOperation, ReadonlySet<ParamKey>> = {
  sensor: new Set<ParamKey>(["fields", "readKey"]),
  member: new Set<ParamKey>(["fields"]),
  bulk: new Set(BULK_PARAMS),
};

const REQUIRED_PARAMS: Record<ParamOperation, readonly ParamKey[]> = {
  sensor: [],
  member: [],
  bulk: ["fields"],
};

function isParamKey(key: string): key is ParamKey {
  return Object.hasOwn(PARAM_RULES, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  if (Array.isArray(value)) {
    const elementTypes = [...new Set(value.map((entry) => describeType(entry)))];
    return elementTypes.length ? `array<${elementTypes.join(" | ")}>` : "empty array";
  }
  return typeof value;
}

function isEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length === 0;
}

/**
 * Validates `params` against the allow-list of `operation` and renders the
 * query string parameters. Keys whose value is `undefined` are skipped.
 */
export function buildSensorQuery(operation: ParamOperation, params: unknown = {}): URLSearchParams {
  if (!isRecord(params)) {
    throw new ValidationError("PARAM_INVALID_TYPE", "params", `Expected a parameter object, received ${describeType(params)}`);
  }

  const allowed = ALLOWED_PARAMS[operation];
  const required = REQUIRED_PARAMS[operation];
  const query = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (!isParamKey(key) || !allowed.has(key)) {
      throw new ValidationError("PARAM_NOT_ALLOWED", key, `Unexpected ${operation} param encountered [${key}]`);
    }
    const rule: ParamRule = PARAM_RULES[key];
    const rendered = rule.schema.safeParse(value);
    if (!rendered.success) {
      if (required.includes(key) && isEmptyList(value)) {
        throw new ValidationError("PARAM_REQUIRED", key, `Required param is empty [${key}]`);
      }
      throw new ValidationError(
        "PARAM_INVALID_TYPE",
        key,
        `Param ${key} expects ${rule.expected}, received ${describeType(value)}`
      );
    }
    query.set(rule.wireKey, rendered.data);
  }

  for (const key of required) {
    if (!query.has(PARAM_RULES[key].wireKey)) {
      throw new ValidationError("PARAM_REQUIRED", key, `Required param not found [${key}]`);
    }
  }

  query.sort();
  return query;
}

/** Expands a box into the north-west / south-east corner params of a bulk query. */
export function boundingBox(box: BoundingBox): Pick<SensorParams, "nwLng" | "nwLat" | "seLng" | "seLat"> {
  return {
    nwLng: box.west,
    nwLat: box.north,
    seLng: box.east,
    seLat: box.south,
  };
}
