import type { KeyType } from "@purpleair-client/types";

export type ValidationErrorReason = "PARAM_NOT_ALLOWED" | "PARAM_INVALID_TYPE" | "PARAM_REQUIRED";
export type AuthErrorReason = "KEY_NOT_SET" | "KEY_REJECTED";
export type PurpleAirErrorReason =
  | ValidationErrorReason
  | AuthErrorReason
  | "REMOTE_ERROR"
  | "DECODE_ERROR"
  | "TRANSPORT_ERROR";

export class PurpleAirError extends Error {
  readonly reason: PurpleAirErrorReason;

  constructor(reason: PurpleAirErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
    this.name = "PurpleAirError";
    Object.setPrototypeOf(this, PurpleAirError.prototype);
  }
}

export class ValidationError extends PurpleAirError {
  declare readonly reason: ValidationErrorReason;
  readonly param: string;

  constructor(reason: ValidationErrorReason, param: string, message: string) {
    super(reason, message);
    this.param = param;
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** Body the service returns with any non-success status. */
export type RemoteErrorPayload = {
  error: string;
  description?: string;
};

export function remoteErrorMessage(payload: RemoteErrorPayload): string {
  return payload.description ? `[${payload.error}]: ${payload.description}` : payload.error;
}

export class AuthError extends PurpleAirError {
  declare readonly reason: AuthErrorReason;
  readonly keyType: KeyType = "UNKNOWN";
  readonly statusCode: number | null;
  readonly code: string | null;
  readonly description: string | null;

  constructor(reason: AuthErrorReason, message: string, remote?: { statusCode: number } & RemoteErrorPayload) {
    super(reason, message);
    this.statusCode = remote?.statusCode ?? null;
    this.code = remote?.error ?? null;
    this.description = remote?.description ?? null;
    this.name = "AuthError";
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  static missingKey(slot: "read" | "write"): AuthError {
    return new AuthError("KEY_NOT_SET", `PurpleAir ${slot} key is not set`);
  }

  static rejected(statusCode: number, payload: RemoteErrorPayload): AuthError {
    return new AuthError("KEY_REJECTED", remoteErrorMessage(payload), { statusCode, ...payload });
  }
}

export class RemoteError extends PurpleAirError {
  readonly statusCode: number;
  readonly code: string;
  readonly description: string | null;

  constructor(statusCode: number, payload: RemoteErrorPayload) {
    super("REMOTE_ERROR", remoteErrorMessage(payload));
    this.statusCode = statusCode;
    this.code = payload.error;
    this.description = payload.description ?? null;
    this.name = "RemoteError";
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

export class DecodeError extends PurpleAirError {
  readonly field: string | null;

  constructor(message: string, field?: string | null, options?: { cause?: unknown }) {
    super("DECODE_ERROR", field ? `${message} [${field}]` : message, options);
    this.field = field ?? null;
    this.name = "DecodeError";
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class TransportError extends PurpleAirError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSPORT_ERROR", message, options);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export type DescribedError = {
  reason: PurpleAirErrorReason | "UNEXPECTED_ERROR";
  message: string;
  statusCode?: number;
};

function statusCodeFrom(err: unknown): number | undefined {
  if (err instanceof RemoteError) return err.statusCode;
  if (err instanceof AuthError && err.statusCode !== null) return err.statusCode;
  return undefined;
}

function messageFrom(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

export function describeError(err: unknown): DescribedError {
  const reason = err instanceof PurpleAirError ? err.reason : "UNEXPECTED_ERROR";
  const described: DescribedError = { reason, message: messageFrom(err) };
  const statusCode = statusCodeFrom(err);
  if (statusCode !== undefined) described.statusCode = statusCode;
  return described;
}
