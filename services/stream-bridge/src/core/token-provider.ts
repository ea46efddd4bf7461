import type { DriverLogger, TokenProvider } from "@hc-bridge/driver-core";
import { z } from "zod";

const REFRESH_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional()
});

export interface OAuthTokenProviderOptions {
  tokenUrl: string;
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  accessToken?: string;
  fetch?: typeof fetch;
  logger?: DriverLogger;
}

export interface TokenState {
  hasAccessToken: boolean;
  hasRefreshToken: boolean;
  expiresAt: string | null;
  lastRefreshAt: string | null;
  lastError: string | null;
}

/**
 * Access token from the vendor's OAuth endpoint via `grant_type=refresh_token`.
 * The token is renewed a minute before it expires, and on demand after a 401.
 * Concurrent callers share one in-flight refresh.
 */
export class OAuthTokenProvider implements TokenProvider {
  private accessToken: string | null;
  private refreshToken: string | null;
  private expiresAt: number | null = null;
  private lastRefreshAt: number | null = null;
  private lastError: string | null = null;
  private inFlight: Promise<boolean> | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OAuthTokenProviderOptions) {
    this.accessToken = options.accessToken ?? null;
    this.refreshToken = options.refreshToken ?? null;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async getToken(): Promise<string | null> {
    if (this.needsRefresh()) {
      await this.refresh();
    }
    return this.accessToken;
  }

  async refreshTokenAndRetry(): Promise<boolean> {
    this.options.logger?.info("oauth: forcing token refresh after 401");
    return this.refresh();
  }

  getState(): TokenState {
    return {
      hasAccessToken: this.accessToken !== null,
      hasRefreshToken: this.refreshToken !== null,
      expiresAt: this.expiresAt === null ? null : new Date(this.expiresAt).toISOString(),
      lastRefreshAt: this.lastRefreshAt === null ? null : new Date(this.lastRefreshAt).toISOString(),
      lastError: this.lastError
    };
  }

  private needsRefresh(): boolean {
    if (this.refreshToken === null) return false;
    if (this.accessToken === null) return true;
    return this.expiresAt !== null && Date.now() >= this.expiresAt - REFRESH_MARGIN_MS;
  }

  private async refresh(): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = this.requestToken().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async requestToken(): Promise<boolean> {
    if (this.refreshToken === null) {
      this.fail("no refresh token available");
      return false;
    }

    const form = new URLSearchParams({ grant_type: "refresh_token", refresh_token: this.refreshToken });
    if (this.options.clientId) form.set("client_id", this.options.clientId);
    if (this.options.clientSecret) form.set("client_secret", this.options.clientSecret);

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.tokenUrl, {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: form.toString()
      });
    } catch (err) {
      this.fail(`token request failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }

    const text = await response.text();
    if (!response.ok) {
      this.fail(`token endpoint responded ${response.status}: ${text.slice(0, 200)}`);
      return false;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      this.fail("token response is not JSON");
      return false;
    }
    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.fail("token response is missing access_token");
      return false;
    }

    const now = Date.now();
    this.accessToken = parsed.data.access_token;
    this.refreshToken = parsed.data.refresh_token ?? this.refreshToken;
    this.expiresAt = parsed.data.expires_in === undefined ? null : now + parsed.data.expires_in * 1000;
    this.lastRefreshAt = now;
    this.lastError = null;
    this.options.logger?.info({ expiresIn: parsed.data.expires_in }, "oauth: token refreshed");
    return true;
  }

  private fail(message: string): void {
    this.lastError = message;
    this.options.logger?.error({ tokenUrl: this.options.tokenUrl }, `oauth: ${message}`);
  }
}
