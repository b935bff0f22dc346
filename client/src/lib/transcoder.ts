import type { BulkDataSet, FieldValue, SensorDataRow } from "@purpleair-client/types";
import { z } from "zod";
import { DecodeError } from "./errors.js";
import { decode } from "./wire.js";

const FieldValueWire: z.ZodType<FieldValue> = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const BulkSensorsResponse = z.object({
  api_version: z.string().optional(),
  time_stamp: z.number().optional(),
  data_time_stamp: z.number().optional(),
  group_id: z.number().int().optional(),
  max_age: z.number().optional(),
  firmware_default_version: z.string().optional(),
  fields: z.array(z.string()),
  location_types: z.array(z.string()).optional(),
  channel_states: z.array(z.string()).optional(),
  channel_flags: z.array(z.string()).optional(),
  data: z.array(z.array(FieldValueWire)).default([]),
});

export type BulkSensorsPayload = z.infer<typeof BulkSensorsResponse>;

type LookupTable = "location_types" | "channel_states" | "channel_flags";

// Fields whose values arrive as an index into one of the payload's lookup tables.
const ENUMERATED_FIELDS: Readonly<Record<string, LookupTable>> = {
  location_type: "location_types",
  channel_state: "channel_states",
  channel_flags: "channel_flags",
  channel_flags_manual: "channel_flags",
  channel_flags_auto: "channel_flags",
};

function lookupTableFor(field: string): LookupTable | null {
  return Object.hasOwn(ENUMERATED_FIELDS, field) ? ENUMERATED_FIELDS[field] : null;
}

function resolveLabel(payload: BulkSensorsPayload, field: string, table: LookupTable, value: FieldValue): FieldValue {
  if (value === null) return null;
  const labels = payload[table];
  if (!labels) {
    throw new DecodeError(`Lookup table ${table} missing for enumerated field`, field);
  }
  const label = typeof value === "number" && Number.isInteger(value) ? labels[value] : undefined;
  if (label === undefined) {
    throw new DecodeError(`Code ${String(value)} has no entry in ${table}`, field);
  }
  return label;
}

function assertUniqueFields(fields: readonly string[]): void {
  const seen = new Set<string>();
  for (const field of fields) {
    if (seen.has(field)) {
      throw new DecodeError("Duplicate field in bulk response", `fields.${field}`);
    }
    seen.add(field);
  }
}

/**
 * Converts the columnar bulk payload (field list, lookup tables, rows of
 * positional values) into rows keyed by `sensor_index`. Enumerated codes are
 * replaced by their labels; every other value is kept as sent.
 */
export function transcodeBulkPayload(payload: BulkSensorsPayload): BulkDataSet {
  const { fields } = payload;
  assertUniqueFields(fields);

  const dataSet: BulkDataSet = new Map();
  payload.data.forEach((values, rowIndex) => {
    if (values.length !== fields.length) {
      throw new DecodeError(
        `Row has ${values.length} values for ${fields.length} fields`,
        `data.${rowIndex}`
      );
    }

    // Own keys only: a field named __proto__ is stored as data.
    const row: SensorDataRow = Object.fromEntries(fields.map((field, position) => {
      const value = values[position] ?? null;
      const table = lookupTableFor(field);
      return [field, table ? resolveLabel(payload, field, table, value) : value];
    }));

    const sensorIndex = row.sensor_index;
    if (typeof sensorIndex !== "number" || !Number.isInteger(sensorIndex)) {
      throw new DecodeError("Required element not found", `data.${rowIndex}.sensor_index`);
    }
    if (dataSet.has(sensorIndex)) {
      throw new DecodeError(`Sensor ${sensorIndex} appears in more than one row`, `data.${rowIndex}.sensor_index`);
    }
    dataSet.set(sensorIndex, row);
  });

  return dataSet;
}

export function decodeBulkSensors(payload: unknown, context = "sensors"): BulkDataSet {
  return transcodeBulkPayload(decode(BulkSensorsResponse, payload, context));
}
