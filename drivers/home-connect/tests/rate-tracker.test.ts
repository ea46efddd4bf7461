import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateTracker } from "../src/rate-tracker";
import { createLogger } from "./helpers";

const T0 = new Date("2026-03-01T12:00:00.000Z");

describe("RateTracker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("records quota headers case-insensitively", () => {
    const tracker = new RateTracker();
    tracker.recordHeaders(new Headers({ "X-RateLimit-Remaining": "950", "X-RateLimit-Limit": "1000" }));
    expect(tracker.getQuota()).toEqual({ remaining: 950, limit: 1000, observedAt: T0.toISOString() });
  });

  it("ignores responses without quota headers", () => {
    const tracker = new RateTracker();
    tracker.recordHeaders(new Headers({ "content-type": "application/json" }));
    expect(tracker.getQuota()).toBeNull();
  });

  it("warns when the remaining quota drops below the low-water mark", () => {
    const logger = createLogger();
    const tracker = new RateTracker({ logger });
    tracker.recordHeaders(new Headers({ "x-ratelimit-remaining": "100", "x-ratelimit-limit": "1000" }));
    expect(logger.warn).not.toHaveBeenCalled();

    tracker.recordHeaders(new Headers({ "x-ratelimit-remaining": "99" }));
    expect(logger.warn).toHaveBeenCalledWith({ remaining: 99, limit: 1000 }, "api: rate limit running low");
  });

  it("marks the quota exhausted and keeps the known limit", () => {
    const tracker = new RateTracker();
    tracker.recordHeaders(new Headers({ "x-ratelimit-remaining": "12", "x-ratelimit-limit": "1000" }));
    tracker.markExhausted();
    expect(tracker.getQuota()).toEqual({ remaining: 0, limit: 1000, observedAt: T0.toISOString() });
  });

  it("keeps the longer cooldown when a shorter one starts later", () => {
    const tracker = new RateTracker();
    tracker.startCooldown(86_400_000, "stream");
    tracker.startCooldown(60_000, "http");
    expect(tracker.getCooldown()).toEqual({ until: T0.getTime() + 86_400_000, source: "stream" });

    vi.advanceTimersByTime(61_000);
    expect(tracker.isCoolingDown()).toBe(true);
  });

  it("extends a short cooldown with a longer one", () => {
    const tracker = new RateTracker();
    tracker.startCooldown(60_000, "http");
    tracker.startCooldown(3_600_000, "stream");
    expect(tracker.getCooldown()).toEqual({ until: T0.getTime() + 3_600_000, source: "stream" });
  });

  it("expires and clears cooldowns", () => {
    const tracker = new RateTracker();
    tracker.startCooldown(60_000, "http");
    vi.advanceTimersByTime(59_999);
    expect(tracker.isCoolingDown()).toBe(true);
    vi.advanceTimersByTime(1);
    expect(tracker.isCoolingDown()).toBe(false);
    expect(tracker.getCooldown()).toBeNull();

    tracker.startCooldown(60_000, "http");
    tracker.clearCooldown();
    expect(tracker.isCoolingDown()).toBe(false);
  });
});
