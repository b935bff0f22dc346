import { describe, expect, it } from "vitest";
import { DecodeError } from "../../src/lib/errors.js";
import { decodeBulkSensors } from "../../src/lib/transcoder.js";

function decodeFailure(payload: unknown): DecodeError {
  try {
    decodeBulkSensors(payload);
  }
  catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error("expected a DecodeError");
}

describe("decodeBulkSensors", () => {
  it("keys rows by sensor index and resolves enumerated codes", () => {
    const dataSet = decodeBulkSensors({
      fields: ["sensor_index", "location_type"],
      location_types: ["outside", "inside"],
      data: [[42, 1]],
    });
    expect([...dataSet.entries()]).toEqual([[42, { sensor_index: 42, location_type: "inside" }]]);
  });

  it("resolves every channel flag field through the channel_flags table", () => {
    const dataSet = decodeBulkSensors({
      fields: ["sensor_index", "channel_state", "channel_flags", "channel_flags_manual", "channel_flags_auto", "pm2.5"],
      channel_states: ["No PM", "PM-A", "PM-B", "PM-A+PM-B"],
      channel_flags: ["Normal", "A-Downgraded", "B-Downgraded", "A+B-Downgraded"],
      data: [
        [7, 3, 0, 1, 2, 8.4],
        [9, 1, null, 0, 0, null],
      ],
    });
    expect(dataSet.get(7)).toEqual({
      sensor_index: 7,
      channel_state: "PM-A+PM-B",
      channel_flags: "Normal",
      channel_flags_manual: "A-Downgraded",
      channel_flags_auto: "B-Downgraded",
      "pm2.5": 8.4,
    });
    expect(dataSet.get(9)).toEqual({
      sensor_index: 9,
      channel_state: "PM-A",
      channel_flags: null,
      channel_flags_manual: "Normal",
      channel_flags_auto: "Normal",
      "pm2.5": null,
    });
  });

  it("stores a field named __proto__ as an own value", () => {
    const row = decodeBulkSensors({ fields: ["sensor_index", "__proto__"], data: [[3, "x"]] }).get(3);
    expect(row && Object.getOwnPropertyDescriptor(row, "__proto__")?.value).toBe("x");
    expect(row && Object.getPrototypeOf(row)).toBe(Object.prototype);
  });

  it("returns an empty set when no rows are sent", () => {
    expect(decodeBulkSensors({ fields: ["sensor_index"], data: [] }).size).toBe(0);
    expect(decodeBulkSensors({ fields: ["sensor_index"] }).size).toBe(0);
  });

  it("fails when an enumerated field has no lookup table", () => {
    const err = decodeFailure({ fields: ["sensor_index", "channel_state"], data: [[1, 0]] });
    expect(err.field).toBe("channel_state");
    expect(err.message).toBe("Lookup table channel_states missing for enumerated field [channel_state]");
  });

  it("fails on a code outside the lookup table", () => {
    const err = decodeFailure({
      fields: ["sensor_index", "channel_flags"],
      channel_flags: ["Normal", "A-Downgraded", "B-Downgraded", "A+B-Downgraded"],
      data: [[1, 4]],
    });
    expect(err.message).toBe("Code 4 has no entry in channel_flags [channel_flags]");
  });

  it("fails when a row does not match the field list", () => {
    const err = decodeFailure({ fields: ["sensor_index", "name"], data: [[1]] });
    expect(err.field).toBe("data.0");
    expect(err.message).toBe("Row has 1 values for 2 fields [data.0]");
  });

  it("fails when a row has no usable sensor index", () => {
    expect(decodeFailure({ fields: ["name"], data: [["Backyard"]] }).message)
      .toBe("Required element not found [data.0.sensor_index]");
    expect(decodeFailure({ fields: ["sensor_index"], data: [["42"]] }).field).toBe("data.0.sensor_index");
  });

  it("fails on duplicate sensors and duplicate fields", () => {
    expect(decodeFailure({ fields: ["sensor_index"], data: [[7], [7]] }).message)
      .toBe("Sensor 7 appears in more than one row [data.1.sensor_index]");
    expect(decodeFailure({ fields: ["sensor_index", "name", "name"], data: [] }).field).toBe("fields.name");
  });

  it("fails when the payload shape is wrong", () => {
    const err = decodeFailure({ data: [[1]] });
    expect(err.field).toBe("fields");
    expect(err.message.startsWith("Unexpected sensors payload:")).toBe(true);
  });
});
