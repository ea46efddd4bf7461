import type { CooldownSource, RateQuota } from "@hc-bridge/schemas";
import type { DriverLogger } from "@hc-bridge/driver-core";

const REMAINING_HEADER = "x-ratelimit-remaining";
const LIMIT_HEADER = "x-ratelimit-limit";

export interface Cooldown {
  until: number;
  source: CooldownSource;
}

interface RateTrackerOptions {
  lowWaterMark?: number;
  logger?: DriverLogger;
}

/**
 * Quota bookkeeping from response headers plus one cooldown gate. The stream
 * rate-limit signal and HTTP 429 both feed the gate; the later expiry wins.
 */
export class RateTracker {
  private quota: RateQuota | null = null;
  private cooldown: Cooldown | null = null;
  private readonly lowWaterMark: number;

  constructor(private readonly options: RateTrackerOptions = {}) {
    this.lowWaterMark = options.lowWaterMark ?? 100;
  }

  recordHeaders(headers: Headers): void {
    const remaining = parseCount(headers.get(REMAINING_HEADER));
    const limit = parseCount(headers.get(LIMIT_HEADER));
    if (remaining === null && limit === null) return;

    this.quota = {
      remaining: remaining ?? this.quota?.remaining ?? null,
      limit: limit ?? this.quota?.limit ?? null,
      observedAt: new Date().toISOString()
    };

    if (remaining !== null && remaining < this.lowWaterMark) {
      this.options.logger?.warn({ remaining, limit: this.quota.limit }, "api: rate limit running low");
    }
  }

  markExhausted(): void {
    this.quota = {
      remaining: 0,
      limit: this.quota?.limit ?? null,
      observedAt: new Date().toISOString()
    };
  }

  startCooldown(durationMs: number, source: CooldownSource): void {
    const until = Date.now() + durationMs;
    if (this.cooldown && this.cooldown.until >= until) return;
    this.cooldown = { until, source };
  }

  clearCooldown(): void {
    this.cooldown = null;
  }

  isCoolingDown(now: number = Date.now()): boolean {
    return this.cooldown !== null && now < this.cooldown.until;
  }

  getCooldown(): Cooldown | null {
    return this.isCoolingDown() && this.cooldown ? { ...this.cooldown } : null;
  }

  getQuota(): RateQuota | null {
    return this.quota ? { ...this.quota } : null;
  }
}

function parseCount(raw: string | null): number | null {
  if (raw === null) return null;
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(value) && value >= 0 ? value : null;
}
