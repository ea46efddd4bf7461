import { describe, expect, it } from "vitest";
import {
  ApplianceEventSchema,
  ApplianceListResponseSchema,
  ProgramRequestSchema,
  StreamItemSchema,
  StreamPayloadSchema,
  StreamStatusSchema
} from "./index";

describe("stream schemas", () => {
  it("accepts vendor stream items with primitive values", () => {
    const parsed = StreamItemSchema.parse({
      key: "BSH.Common.Option.RemainingProgramTime",
      value: 3600,
      unit: "seconds",
      level: "hint",
      timestamp: 1767268800
    });
    expect(parsed.value).toBe(3600);
  });

  it("rejects items without a key", () => {
    expect(StreamItemSchema.safeParse({ value: 1 }).success).toBe(false);
  });

  it("keeps structured values and renders non-string text fields", () => {
    const parsed = StreamItemSchema.parse({
      key: "K",
      value: { nested: [true, 2] },
      displayvalue: 5,
      unit: null,
      timestamp: "not a number"
    });
    expect(parsed).toEqual({ key: "K", value: { nested: [true, 2] }, displayvalue: "5" });
  });

  it("keeps unknown payload fields and requires haId", () => {
    const parsed = StreamPayloadSchema.parse({ haId: "HA-1", items: [], extra: "kept" });
    expect(parsed).toEqual({ haId: "HA-1", items: [], extra: "kept" });
    expect(StreamPayloadSchema.safeParse({ items: [] }).success).toBe(false);
    expect(StreamPayloadSchema.safeParse({ haId: "" }).success).toBe(false);
  });

  it("validates appliance events", () => {
    const result = ApplianceEventSchema.safeParse({
      applianceId: "HA-1",
      key: "K1",
      value: null,
      displayValue: null,
      unit: null,
      eventType: "EVENT"
    });
    expect(result.success).toBe(true);
  });

  it("validates a full status snapshot", () => {
    const result = StreamStatusSchema.safeParse({
      state: "rate-limited",
      status: "rate limited until 2026-03-01T13:00:00.000Z",
      established: false,
      lastConnectAt: "2026-03-01T12:00:00.000Z",
      lastDisconnectAt: "2026-03-01T12:00:00.000Z",
      lastEventAt: null,
      consecutiveFailures: 0,
      rateLimitedUntil: "2026-03-01T13:00:00.000Z",
      nextReconnectAt: "2026-03-01T13:05:00.000Z",
      reconnects: 0,
      quota: { remaining: 0, limit: 1000, observedAt: "2026-03-01T12:00:00.000Z" },
      cooldownUntil: "2026-03-01T13:00:00.000Z",
      apiUrl: "https://api.home-connect.com",
      router: { messagesRouted: 3, eventsDispatched: 2, heartbeats: 1, connectivityChanges: 0, messagesDropped: 0 }
    });
    expect(result.success).toBe(true);
  });

  it("rejects unknown connection states", () => {
    const result = StreamStatusSchema.shape.state.safeParse("reconnecting");
    expect(result.success).toBe(false);
  });
});

describe("api schemas", () => {
  it("defaults a missing appliance list to empty", () => {
    expect(ApplianceListResponseSchema.parse({ data: {} })).toEqual({ data: { homeappliances: [] } });
  });

  it("validates program requests", () => {
    expect(
      ProgramRequestSchema.safeParse({
        programKey: "Dishcare.Dishwasher.Program.Eco50",
        options: [{ key: "Dishcare.Dishwasher.Option.ExtraDry", value: true }]
      }).success
    ).toBe(true);
    expect(ProgramRequestSchema.safeParse({ programKey: "" }).success).toBe(false);
  });
});
