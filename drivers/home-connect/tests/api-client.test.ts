import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StaticTokenProvider } from "@hc-bridge/driver-fake";
import { ApiClient } from "../src/api-client";
import { DEFAULT_API_URL, VENDOR_MEDIA_TYPE } from "../src/config";
import { ApiError } from "../src/errors";
import { RateTracker } from "../src/rate-tracker";
import { createLogger, jsonResponse } from "./helpers";

const T0 = new Date("2026-03-01T12:00:00.000Z");

const OPTIONS = {
  apiUrl: DEFAULT_API_URL,
  locale: "en-US",
  mediaType: VENDOR_MEDIA_TYPE,
  httpCooldownSeconds: 60
};

function setup(tokens = new StaticTokenProvider("test-token")) {
  const fetchMock = vi.fn<typeof fetch>();
  const rateTracker = new RateTracker();
  const logger = createLogger();
  const client = new ApiClient(OPTIONS, { tokenProvider: tokens, rateTracker, fetch: fetchMock, logger });
  return { client, fetchMock, rateTracker, logger, tokens };
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  return Object.fromEntries(new Headers(init?.headers).entries());
}

describe("ApiClient", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends authenticated GETs and records the quota", async () => {
    const { client, fetchMock, rateTracker } = setup();
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { data: { homeappliances: [] } },
        { headers: { "X-RateLimit-Remaining": "500", "X-RateLimit-Limit": "1000" } }
      )
    );

    await expect(client.get("/api/homeappliances")).resolves.toEqual({ data: { homeappliances: [] } });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.home-connect.com/api/homeappliances");
    expect(init?.method).toBe("GET");
    expect(headersOf(init)).toEqual({
      authorization: "Bearer test-token",
      "accept-language": "en-US",
      accept: VENDOR_MEDIA_TYPE
    });
    expect(rateTracker.getQuota()?.remaining).toBe(500);
  });

  it("sends PUT bodies as JSON", async () => {
    const { client, fetchMock } = setup();
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(client.put("/api/homeappliances/HA-1/settings/K", { data: { key: "K", value: 1 } })).resolves.toBeNull();

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"data":{"key":"K","value":1}}');
    expect(headersOf(init)["content-type"]).toBe(VENDOR_MEDIA_TYPE);
  });

  it("refreshes the token once after a 401 and retries with the new token", async () => {
    const { client, fetchMock, tokens } = setup(new StaticTokenProvider("test-token-1", ["test-token-2"]));
    fetchMock
      .mockResolvedValueOnce(new Response("", { status: 401 }))
      .mockResolvedValueOnce(jsonResponse({ data: { status: [] } }));

    await expect(client.get("/api/homeappliances/HA-1/status")).resolves.toEqual({ data: { status: [] } });

    expect(tokens.refreshCalls).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(headersOf(fetchMock.mock.calls[1]?.[1]).authorization).toBe("Bearer test-token-2");
  });

  it("retries PUT after a token refresh", async () => {
    const { client, fetchMock } = setup(new StaticTokenProvider("test-token-1", ["test-token-2"]));
    fetchMock
      .mockResolvedValueOnce(new Response("", { status: 401 }))
      .mockResolvedValueOnce(new Response(null, { status: 204 }));

    await client.put("/api/homeappliances/HA-1/programs/active", { data: { key: "P" } });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1]?.[1]?.method).toBe("PUT");
    expect(fetchMock.mock.calls[1]?.[1]?.body).toBe('{"data":{"key":"P"}}');
  });

  it("gives up after a second 401", async () => {
    const { client, fetchMock, tokens } = setup(new StaticTokenProvider("test-token-1", ["test-token-2"]));
    fetchMock.mockImplementation(async () => new Response("", { status: 401 }));

    await expect(client.get("/api/homeappliances")).rejects.toMatchObject({ kind: "unauthorized", status: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(tokens.refreshCalls).toBe(1);
  });

  it("does not retry when the refresh fails", async () => {
    const { client, fetchMock } = setup(new StaticTokenProvider("test-token-1"));
    fetchMock.mockImplementation(async () => new Response("", { status: 401 }));

    await expect(client.delete("/api/homeappliances/HA-1/programs/active")).rejects.toMatchObject({
      kind: "unauthorized"
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("treats a 404 on the active program as an idle appliance", async () => {
    const { client, fetchMock, logger } = setup();
    fetchMock.mockResolvedValueOnce(new Response('{"error":{"key":"SDK.Error.NoProgramActive"}}', { status: 404 }));

    await expect(client.get("/api/homeappliances/HA-1/programs/active")).resolves.toBeNull();
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("maps failure statuses to error kinds", async () => {
    const { client, fetchMock } = setup();
    fetchMock
      .mockResolvedValueOnce(new Response("", { status: 404 }))
      .mockResolvedValueOnce(new Response('{"error":{"key":"SDK.Error.WrongOperationState"}}', { status: 409 }))
      .mockResolvedValueOnce(new Response("", { status: 503 }))
      .mockResolvedValueOnce(new Response("boom", { status: 500 }));

    await expect(client.get("/api/homeappliances/HA-9")).rejects.toMatchObject({ kind: "not-found", status: 404 });
    await expect(client.put("/api/homeappliances/HA-1/programs/active", { data: {} })).rejects.toMatchObject({
      kind: "conflict",
      status: 409,
      body: '{"error":{"key":"SDK.Error.WrongOperationState"}}'
    });
    await expect(client.get("/api/homeappliances/HA-1/status")).rejects.toMatchObject({ kind: "unavailable" });
    await expect(client.get("/api/homeappliances/HA-1/settings")).rejects.toMatchObject({
      kind: "http",
      status: 500,
      body: "boom"
    });
  });

  it("starts a cooldown on 429 that blocks PUT and DELETE", async () => {
    const { client, fetchMock, rateTracker } = setup();
    fetchMock
      .mockResolvedValueOnce(new Response("", { status: 429, headers: { "x-ratelimit-limit": "1000" } }))
      .mockResolvedValueOnce(jsonResponse({ data: { status: [] } }));

    await expect(client.get("/api/homeappliances/HA-1/status")).rejects.toMatchObject({ kind: "rate-limited" });
    expect(rateTracker.getQuota()?.remaining).toBe(0);
    expect(rateTracker.getCooldown()).toEqual({
      until: new Date("2026-03-01T12:01:00.000Z").getTime(),
      source: "http"
    });

    await expect(client.put("/api/homeappliances/HA-1/settings/K", { data: {} })).rejects.toMatchObject({
      kind: "cooldown"
    });
    await expect(client.delete("/api/homeappliances/HA-1/programs/active")).rejects.toMatchObject({
      kind: "cooldown"
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    await expect(client.get("/api/homeappliances/HA-1/status")).resolves.toEqual({ data: { status: [] } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("lets PUT through once the cooldown expires", async () => {
    const { client, fetchMock, rateTracker } = setup();
    rateTracker.startCooldown(60_000, "http");
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    vi.setSystemTime(new Date(T0.getTime() + 60_000));
    await expect(client.put("/api/homeappliances/HA-1/settings/K", { data: {} })).resolves.toBeNull();
  });

  it("wraps network faults", async () => {
    const { client, fetchMock } = setup();
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    const error = await client.get("/api/homeappliances").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ kind: "network", message: "GET /api/homeappliances failed: fetch failed" });
  });

  it("refuses to send without a token", async () => {
    const { client, fetchMock } = setup(new StaticTokenProvider(null));
    await expect(client.get("/api/homeappliances")).rejects.toMatchObject({ kind: "no-token" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects a success body that is not JSON", async () => {
    const { client, fetchMock } = setup();
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
    await expect(client.get("/api/homeappliances")).rejects.toMatchObject({ kind: "invalid-response" });
  });

  it("changes the base URL at runtime", async () => {
    const { client, fetchMock } = setup();
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    client.setApiUrl("http://127.0.0.1:8080/");
    expect(client.getApiUrl()).toBe("http://127.0.0.1:8080");
    await client.get("/api/homeappliances");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://127.0.0.1:8080/api/homeappliances");
  });

  it("takes the locale from the locale provider", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({}));
    const client = new ApiClient(OPTIONS, {
      tokenProvider: new StaticTokenProvider("test-token"),
      rateTracker: new RateTracker(),
      localeProvider: { getLocale: () => "de-DE" },
      fetch: fetchMock
    });

    await client.get("/api/homeappliances");
    expect(headersOf(fetchMock.mock.calls[0]?.[1])["accept-language"]).toBe("de-DE");
  });
});
