import type { Logger } from "pino";
import type { CredentialStore, KeySlot } from "./credentials.js";
import { AuthError, DecodeError, PurpleAirError, RemoteError, TransportError, type RemoteErrorPayload } from "./errors.js";
import { redactUrl, type HttpMethod, type HttpRequest, type HttpResponse, type HttpTransport } from "./transport.js";
import { RemoteErrorResponse, parseJson } from "./wire.js";

export const KEY_HEADER = "X-API-Key";
export const DEFAULT_BASE_URL = "https://api.purpleair.com/v1";

export type ApiCall = {
  method: HttpMethod;
  path: string;
  /** Status the service answers with on success; anything else is an error. */
  expect: 200 | 201 | 204;
  /** Retained key to attach, or an explicit key for this call only. */
  key: { slot: KeySlot } | { value: string };
  query?: URLSearchParams;
  body?: Record<string, unknown>;
  /** Treat every failure status as a rejected key. */
  keyCheck?: boolean;
};

type ApiRequesterOptions = {
  baseUrl: string;
  transport: HttpTransport;
  credentials: CredentialStore;
  logger: Logger;
};

function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

export class ApiRequester {
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly credentials: CredentialStore;
  private readonly logger: Logger;

  constructor(options: ApiRequesterOptions) {
    this.baseUrl = options.baseUrl.trim().replace(/\/+$/, "");
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.logger = options.logger;
  }

  /** Sends one request and returns the parsed JSON body, or null for 204 responses. */
  async send(call: ApiCall): Promise<unknown> {
    const key = this.resolveKey(call);
    const search = call.query?.toString();
    const request: HttpRequest = {
      method: call.method,
      url: `${this.baseUrl}${call.path}${search ? `?${search}` : ""}`,
      headers: {
        "Content-Type": "application/json",
        [KEY_HEADER]: key,
      },
    };
    if (call.body) {
      request.body = JSON.stringify(call.body);
    }

    const response = await this.dispatch(request);
    this.logger.debug({ method: call.method, path: call.path, status: response.status }, "PurpleAir request completed");

    if (response.status !== call.expect) {
      throw this.failure(call, response);
    }
    if (call.expect === 204) {
      return null;
    }
    return this.warnOnDecodeFailure(call, () => parseJson(response.body, `${call.method} ${call.path}`));
  }

  /** Sends one request and converts its JSON body with `decodeBody`. */
  async sendAndDecode<T>(call: ApiCall, decodeBody: (payload: unknown) => T): Promise<T> {
    const payload = await this.send(call);
    return this.warnOnDecodeFailure(call, () => decodeBody(payload));
  }

  private warnOnDecodeFailure<T>(call: ApiCall, run: () => T): T {
    try {
      return run();
    }
    catch (err) {
      if (err instanceof DecodeError) {
        this.logger.warn({ method: call.method, path: call.path, field: err.field }, err.message);
      }
      throw err;
    }
  }

  private resolveKey(call: ApiCall): string {
    if ("value" in call.key) {
      return call.key.value;
    }
    const retained = this.credentials.get(call.key.slot);
    if (!retained) {
      throw AuthError.missingKey(call.key.slot);
    }
    return retained;
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.transport(request);
    }
    catch (err) {
      if (err instanceof TransportError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${request.method} ${redactUrl(request.url)} failed: ${message}`, { cause: err });
    }
  }

  private failure(call: ApiCall, response: HttpResponse): PurpleAirError {
    const payload = this.errorPayload(response);
    this.logger.warn(
      { method: call.method, path: call.path, status: response.status, error: payload.error },
      "PurpleAir request failed"
    );
    if (call.keyCheck || isAuthStatus(response.status)) {
      return AuthError.rejected(response.status, payload);
    }
    return new RemoteError(response.status, payload);
  }

  private errorPayload(response: HttpResponse): RemoteErrorPayload {
    const fallback: RemoteErrorPayload = { error: `http_${response.status}` };
    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    }
    catch {
      return fallback;
    }
    const result = RemoteErrorResponse.safeParse(parsed);
    return result.success ? result.data : fallback;
  }
}
