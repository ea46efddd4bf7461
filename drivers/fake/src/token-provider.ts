import type { TokenProvider } from "@hc-bridge/driver-core";

/**
 * Hands out a fixed token. `refreshTokenAndRetry` rotates to the next entry of
 * `refreshedTokens` and resolves false once they run out.
 */
export class StaticTokenProvider implements TokenProvider {
  getTokenCalls = 0;
  refreshCalls = 0;
  private readonly pending: string[];

  constructor(private token: string | null, refreshedTokens: string[] = []) {
    this.pending = [...refreshedTokens];
  }

  async getToken(): Promise<string | null> {
    this.getTokenCalls += 1;
    return this.token;
  }

  async refreshTokenAndRetry(): Promise<boolean> {
    this.refreshCalls += 1;
    const next = this.pending.shift();
    if (next === undefined) return false;
    this.token = next;
    return true;
  }

  setToken(token: string | null): void {
    this.token = token;
  }
}
