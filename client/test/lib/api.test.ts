import { describe, expect, it, vi } from "vitest";
import { ApiRequester } from "../../src/lib/api.js";
import { CredentialStore, type RetainedKeys } from "../../src/lib/credentials.js";
import { AuthError, DecodeError, RemoteError, TransportError } from "../../src/lib/errors.js";
import { silentLogger } from "../../src/lib/logger.js";
import type { HttpRequest, HttpResponse } from "../../src/lib/transport.js";

function requester(respond: (request: HttpRequest) => Promise<HttpResponse>, keys: RetainedKeys = { read: "test-read-key" }) {
  const transport = vi.fn(respond);
  const logger = silentLogger();
  const api = new ApiRequester({
    baseUrl: "https://purpleair.test/v1/",
    transport,
    credentials: new CredentialStore(keys),
    logger,
  });
  return { api, transport, logger };
}

async function failureOf(pending: Promise<unknown>): Promise<unknown> {
  return pending.then(
    () => {
      throw new Error("expected the request to fail");
    },
    (err: unknown) => err
  );
}

describe("ApiRequester", () => {
  it("sends the retained key with JSON headers and the query", async () => {
    const { api, transport } = requester(async () => ({ status: 200, body: "{\"groups\":[]}" }));

    const payload = await api.send({
      method: "GET",
      path: "/sensors",
      expect: 200,
      key: { slot: "read" },
      query: new URLSearchParams({ fields: "name" }),
    });

    expect(payload).toEqual({ groups: [] });
    expect(transport).toHaveBeenCalledWith({
      method: "GET",
      url: "https://purpleair.test/v1/sensors?fields=name",
      headers: { "Content-Type": "application/json", "X-API-Key": "test-read-key" },
    });
  });

  it("serialises the body and returns null for no-content responses", async () => {
    const { api, transport } = requester(async () => ({ status: 204, body: "" }), { read: "", write: "test-write-key" });

    const payload = await api.send({
      method: "POST",
      path: "/groups/1/members",
      expect: 204,
      key: { slot: "write" },
      body: { sensor_index: 101 },
    });

    expect(payload).toBeNull();
    expect(transport.mock.calls[0]?.[0].body).toBe("{\"sensor_index\":101}");
  });

  it("fails without calling the transport when the retained key is missing", async () => {
    const { api, transport } = requester(async () => ({ status: 201, body: "{}" }));

    const err = await failureOf(api.send({ method: "DELETE", path: "/groups/1", expect: 204, key: { slot: "write" } }));

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ reason: "KEY_NOT_SET", message: "PurpleAir write key is not set" });
    expect(transport).not.toHaveBeenCalled();
  });

  it("classifies 401 and 403 responses as rejected keys", async () => {
    const { api } = requester(async () => ({
      status: 403,
      body: "{\"error\":\"ApiKeyTypeMismatchError\",\"description\":\"Wrong key type.\"}",
    }));

    const err = await failureOf(api.send({ method: "GET", path: "/groups", expect: 200, key: { slot: "read" } }));

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({
      reason: "KEY_REJECTED",
      keyType: "UNKNOWN",
      statusCode: 403,
      code: "ApiKeyTypeMismatchError",
      message: "[ApiKeyTypeMismatchError]: Wrong key type.",
    });
  });

  it("treats any failed key check as a rejected key", async () => {
    const { api } = requester(async () => ({ status: 400, body: "{\"error\":\"ApiKeyMissingError\"}" }));

    const err = await failureOf(api.send({
      method: "GET",
      path: "/keys",
      expect: 201,
      key: { value: "test-unknown-key" },
      keyCheck: true,
    }));

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ statusCode: 400, code: "ApiKeyMissingError" });
  });

  it("names non-JSON error bodies after the status", async () => {
    const { api, logger } = requester(async () => ({ status: 502, body: "<html>Bad Gateway</html>" }));
    const warn = vi.spyOn(logger, "warn");

    const err = await failureOf(api.send({ method: "GET", path: "/groups", expect: 200, key: { slot: "read" } }));

    expect(err).toBeInstanceOf(RemoteError);
    expect(err).toMatchObject({ statusCode: 502, code: "http_502", description: null, message: "http_502" });
    expect(warn).toHaveBeenCalledWith(
      { method: "GET", path: "/groups", status: 502, error: "http_502" },
      "PurpleAir request failed"
    );
  });

  it("rejects success bodies that are not JSON", async () => {
    const { api } = requester(async () => ({ status: 200, body: "not json" }));

    const err = await failureOf(api.send({ method: "GET", path: "/groups", expect: 200, key: { slot: "read" } }));

    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toMatchObject({ message: "Unable to parse JSON payload from GET /groups" });
  });

  it("passes decoded payloads through sendAndDecode", async () => {
    const { api } = requester(async () => ({ status: 200, body: "{\"count\":3}" }));

    const count = await api.sendAndDecode(
      { method: "GET", path: "/groups", expect: 200, key: { slot: "read" } },
      (payload) => (typeof payload === "object" && payload !== null && "count" in payload ? payload.count : null)
    );

    expect(count).toBe(3);
  });

  it("wraps foreign transport failures and rethrows transport errors as they are", async () => {
    const cause = new Error("socket hang up");
    const foreign = requester(async () => {
      throw cause;
    });
    const wrapped = await failureOf(foreign.api.send({ method: "GET", path: "/groups", expect: 200, key: { slot: "read" } }));
    expect(wrapped).toBeInstanceOf(TransportError);
    expect(wrapped).toMatchObject({ message: "GET https://purpleair.test/v1/groups failed: socket hang up" });
    if (wrapped instanceof TransportError) expect(wrapped.cause).toBe(cause);

    const original = new TransportError("GET https://purpleair.test/v1/groups failed: timeout");
    const own = requester(async () => {
      throw original;
    });
    const rethrown = await failureOf(own.api.send({ method: "GET", path: "/groups", expect: 200, key: { slot: "read" } }));
    expect(rethrown).toBe(original);
  });

  it("keeps a per-call read key out of transport failure messages", async () => {
    const { api } = requester(async () => {
      throw new Error("ECONNRESET");
    });

    const err = await failureOf(api.send({
      method: "GET",
      path: "/sensors/101",
      expect: 200,
      key: { value: "test-private-key" },
      query: new URLSearchParams({ read_key: "test-private-key" }),
    }));

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: "GET https://purpleair.test/v1/sensors/101 failed: ECONNRESET" });
  });
});
