import {
  KEY_TYPES,
  codeToLabel,
  dateToEpochSeconds,
  epochSecondsToDate,
  type Group,
  type Member,
} from "@purpleair-client/types";
import { z } from "zod";
import { DecodeError, type RemoteErrorPayload } from "./errors.js";

export const epochSeconds = z.unknown().transform((value, ctx) => {
  const date = epochSecondsToDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a Unix timestamp in whole seconds" });
    return z.NEVER;
  }
  return date;
});

export function enumCode<T extends string>(table: readonly T[]) {
  return z.unknown().transform((value, ctx) => {
    const label = codeToLabel(table, value);
    if (label === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected an integer code between 0 and ${table.length - 1}`,
      });
      return z.NEVER;
    }
    return label;
  });
}

export const GroupWire = z.object({
  id: z.number().int(),
  name: z.string(),
  created: epochSeconds,
}).transform((group): Group => ({ id: group.id, name: group.name, createdAt: group.created }));

export const MemberWire = z.object({
  id: z.number().int(),
  sensor_index: z.number().int(),
  created: epochSeconds,
}).transform((member): Member => ({ id: member.id, sensorIndex: member.sensor_index, createdAt: member.created }));

export const KeyCheckResponse = z.object({
  api_version: z.string().optional(),
  time_stamp: z.number().optional(),
  api_key_type: z.enum(KEY_TYPES),
});

export const GroupCreatedResponse = z.object({ group_id: z.number().int() });
export const GroupListResponse = z.object({ groups: z.array(GroupWire) });
export const GroupDetailResponse = z.object({
  group_id: z.number().int().optional(),
  members: z.array(MemberWire),
});
export const MemberCreatedResponse = z.object({ member_id: z.number().int() });

export const RemoteErrorResponse: z.ZodType<RemoteErrorPayload> = z.object({
  error: z.string().min(1),
  description: z.string().optional(),
});

export type GroupRecord = { id: number; name: string; created: number };
export type MemberRecord = { id: number; sensor_index: number; created: number };

function toEpochSeconds(date: Date, field: string): number {
  const seconds = dateToEpochSeconds(date);
  if (seconds === null) {
    throw new RangeError(`${field} is not a valid date`);
  }
  return seconds;
}

export function encodeGroup(group: Group): GroupRecord {
  return { id: group.id, name: group.name, created: toEpochSeconds(group.createdAt, "createdAt") };
}

export function encodeMember(member: Member): MemberRecord {
  return {
    id: member.id,
    sensor_index: member.sensorIndex,
    created: toEpochSeconds(member.createdAt, "createdAt"),
  };
}

export function parseJson(text: string, context: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }
  catch (err) {
    throw new DecodeError(`Unable to parse JSON payload from ${context}`, null, { cause: err });
  }
}

export function decode<S extends z.ZodTypeAny>(schema: S, payload: unknown, context: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : null;
  throw new DecodeError(`Unexpected ${context} payload: ${issue?.message ?? "invalid shape"}`, field, {
    cause: result.error,
  });
}
