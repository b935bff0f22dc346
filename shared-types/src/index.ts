export type SensorIndex = number;
export type SensorID = string;
export type GroupID = number;
export type MemberID = number;

// Wire codes are the index into each table.
export const LOCATIONS = ["outside", "inside"] as const;
export const PRIVACY_SETTINGS = ["public", "private"] as const;
export const CHANNEL_STATES = ["none", "a_only", "b_only", "both"] as const;
export const CHANNEL_FLAGS = ["normal", "a_downgraded", "b_downgraded", "both_downgraded"] as const;

export type Location = (typeof LOCATIONS)[number];
export type Privacy = (typeof PRIVACY_SETTINGS)[number];
export type ChannelState = (typeof CHANNEL_STATES)[number];
export type ChannelFlag = (typeof CHANNEL_FLAGS)[number];

export const KEY_TYPES = ["UNKNOWN", "READ", "WRITE", "READ_DISABLED", "WRITE_DISABLED"] as const;
export type KeyType = (typeof KEY_TYPES)[number];

export type Group = {
  id: GroupID;
  name: string;
  createdAt: Date;
};

export type Member = {
  id: MemberID;
  sensorIndex: SensorIndex;
  createdAt: Date;
};

/**
 * Ownership proof required to add a private sensor to a group.
 * Repeated mismatches can get the calling key suspended by the service.
 */
export type PrivateInfo = {
  email: string;
  location: Location;
};

export type SensorReference =
  | { by: "index"; sensorIndex: SensorIndex }
  | { by: "label"; sensorId: SensorID };

export function byIndex(sensorIndex: SensorIndex): SensorReference {
  return { by: "index", sensorIndex };
}

export function byLabel(sensorId: SensorID): SensorReference {
  return { by: "label", sensorId };
}

export type BoundingBox = {
  north: number;
  south: number;
  east: number;
  west: number;
};

export type FieldValue = string | number | boolean | null;
export type SensorDataRow = Record<string, FieldValue>;
export type BulkDataSet = Map<SensorIndex, SensorDataRow>;

export function codeToLabel<T extends string>(table: readonly T[], code: unknown): T | null {
  if (typeof code !== "number" || !Number.isInteger(code)) return null;
  return table[code] ?? null;
}

export function labelToCode<T extends string>(table: readonly T[], label: T): number {
  return table.indexOf(label);
}

export function epochSecondsToDate(input: unknown): Date | null {
  if (typeof input !== "number" || !Number.isInteger(input) || input < 0) return null;
  return new Date(input * 1000);
}

export function dateToEpochSeconds(input: Date): number | null {
  const millis = input.getTime();
  return Number.isNaN(millis) ? null : Math.floor(millis / 1000);
}
