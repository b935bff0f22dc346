import { TransportError } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
};

export type HttpResponse = {
  status: number;
  body: string;
};

/** Performs one request. Failures to reach the service reject with any error; the client wraps them. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

/** The request URL without its query, which can carry `read_key`. */
export function redactUrl(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

export type FetchTransportOptions = {
  /** Abort the request after this many milliseconds; 0 or undefined waits indefinitely. */
  timeoutMs?: number;
};

export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const timeoutMs = options.timeoutMs ?? 0;
  return async (request) => {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
      });
      const body = await response.text();
      return { status: response.status, body };
    }
    catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${request.method} ${redactUrl(request.url)} failed: ${message}`, { cause: err });
    }
  };
}
