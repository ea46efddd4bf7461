import type { DriverLogger, LocaleProvider, TokenProvider } from "@hc-bridge/driver-core";
import { ApiError } from "./errors";
import type { RateTracker } from "./rate-tracker";

export type HttpMethod = "GET" | "PUT" | "DELETE";

const ACTIVE_PROGRAM_PATH = /\/programs\/active$/;

export interface ApiClientOptions {
  apiUrl: string;
  locale: string;
  mediaType: string;
  httpCooldownSeconds: number;
}

interface ApiClientDeps {
  tokenProvider: TokenProvider;
  rateTracker: RateTracker;
  localeProvider?: LocaleProvider;
  fetch?: typeof fetch;
  logger?: DriverLogger;
}

/**
 * Authenticated GET/PUT/DELETE against the vendor API.
 *
 * Every response feeds the rate tracker. A 401 triggers one token refresh and
 * one retry; every other failure becomes an {@link ApiError} whose `kind` tells
 * the caller what happened. The only non-error failure is a 404 on the active
 * program, which means the appliance is idle and resolves to `null`.
 */
export class ApiClient {
  private apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ApiClientOptions, private readonly deps: ApiClientDeps) {
    this.apiUrl = normalizeBaseUrl(options.apiUrl);
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  setApiUrl(url: string): void {
    this.apiUrl = normalizeBaseUrl(url);
    this.deps.logger?.info({ apiUrl: this.apiUrl }, "api: base URL changed");
  }

  getLocale(): string {
    return this.deps.localeProvider?.getLocale() ?? this.options.locale;
  }

  async get(path: string): Promise<unknown> {
    return this.request("GET", path);
  }

  async put(path: string, body: Record<string, unknown>): Promise<unknown> {
    return this.request("PUT", path, body);
  }

  async delete(path: string): Promise<unknown> {
    return this.request("DELETE", path);
  }

  private async request(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<unknown> {
    if (method !== "GET" && this.deps.rateTracker.isCoolingDown()) {
      this.deps.logger?.warn({ method, path }, "api: request blocked - rate limited");
      throw new ApiError("cooldown", `${method} ${path} blocked while rate limited`);
    }

    const token = await this.resolveToken(method, path);
    this.deps.logger?.debug({ method, path }, "api: request");
    let response = await this.send(method, path, token, body);

    if (response.status === 401) {
      this.deps.logger?.warn({ method, path }, "api: 401 unauthorized - refreshing token");
      const refreshed = await this.deps.tokenProvider.refreshTokenAndRetry().catch((err: unknown) => {
        this.deps.logger?.error({ err }, "api: token refresh failed");
        return false;
      });
      if (!refreshed) {
        throw new ApiError("unauthorized", `${method} ${path} unauthorized and token refresh failed`, 401);
      }
      const retryToken = await this.resolveToken(method, path);
      this.deps.logger?.info({ method, path }, "api: retrying after token refresh");
      response = await this.send(method, path, retryToken, body);
    }

    if (response.ok) {
      return this.readBody(method, path, response);
    }
    return this.handleFailure(method, path, response);
  }

  private async resolveToken(method: HttpMethod, path: string): Promise<string> {
    let token: string | null;
    try {
      token = await this.deps.tokenProvider.getToken();
    } catch (err) {
      this.deps.logger?.error({ err, method, path }, "api: token provider failed");
      token = null;
    }
    if (!token) {
      this.deps.logger?.error({ method, path }, "api: no OAuth token available");
      throw new ApiError("no-token", `no OAuth token for ${method} ${path}`);
    }
    return token;
  }

  private async send(
    method: HttpMethod,
    path: string,
    token: string,
    body?: Record<string, unknown>
  ): Promise<Response> {
    const headers: Record<string, string> = {
      authorization: `Bearer ${token}`,
      "accept-language": this.getLocale(),
      accept: this.options.mediaType
    };
    if (body !== undefined) {
      headers["content-type"] = this.options.mediaType;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body)
      });
    } catch (err) {
      this.deps.logger?.error({ err, method, path }, "api: request failed");
      throw new ApiError("network", `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.deps.rateTracker.recordHeaders(response.headers);
    return response;
  }

  private async readBody(method: HttpMethod, path: string, response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.trim().length === 0) return null;
    try {
      return JSON.parse(text);
    } catch {
      this.deps.logger?.error({ method, path, status: response.status }, "api: response is not JSON");
      throw new ApiError("invalid-response", `${method} ${path} returned a non-JSON body`, response.status, text);
    }
  }

  private async handleFailure(method: HttpMethod, path: string, response: Response): Promise<null> {
    const status = response.status;
    const body = await response.text().catch(() => "");

    switch (status) {
      case 401:
        this.deps.logger?.error({ method, path }, "api: still unauthorized after token refresh");
        throw new ApiError("unauthorized", `${method} ${path} unauthorized after token refresh`, status, body);
      case 404:
        if (method === "GET" && ACTIVE_PROGRAM_PATH.test(path)) {
          this.deps.logger?.debug({ path }, "api: no active program");
          return null;
        }
        this.deps.logger?.warn({ method, path }, "api: 404 not found");
        throw new ApiError("not-found", `${method} ${path} not found`, status, body);
      case 409:
        this.deps.logger?.warn({ method, path, body }, "api: 409 conflict - command rejected in current appliance state");
        throw new ApiError("conflict", `${method} ${path} rejected by appliance state`, status, body);
      case 429: {
        const cooldownMs = this.options.httpCooldownSeconds * 1000;
        this.deps.rateTracker.markExhausted();
        this.deps.rateTracker.startCooldown(cooldownMs, "http");
        this.deps.logger?.error({ method, path, cooldownMs }, "api: 429 rate limited");
        throw new ApiError("rate-limited", `${method} ${path} rate limited`, status, body);
      }
      case 503:
        this.deps.logger?.warn({ method, path }, "api: 503 service unavailable - appliance may be offline");
        throw new ApiError("unavailable", `${method} ${path} unavailable`, status, body);
      default:
        this.deps.logger?.error({ method, path, status, body }, "api: request error");
        throw new ApiError("http", `${method} ${path} failed with ${status}`, status, body);
    }
  }
}

function normalizeBaseUrl(url: string): string {
  return new URL(url).toString().replace(/\/+$/, "");
}
