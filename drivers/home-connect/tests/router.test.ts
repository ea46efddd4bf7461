import { describe, expect, it } from "vitest";
import type { ApplianceConnectivity, ApplianceEvent } from "@hc-bridge/schemas";
import type { SubscriberRegistry } from "@hc-bridge/driver-core";
import { RecordingRegistry } from "@hc-bridge/driver-fake";
import { EventRouter, parseMessage } from "../src/router";
import { createLogger } from "./helpers";

function setup(applianceIds: string[] = ["HA-1"]) {
  const registry = new RecordingRegistry(applianceIds);
  const logger = createLogger();
  const router = new EventRouter({ registry, logger });
  return { registry, logger, router };
}

describe("parseMessage", () => {
  it("reads the event type, id and joined data lines", () => {
    expect(parseMessage('event: STATUS\ndata: {"haId":"HA-1",\ndata: "items":[]}\nid: HA-1')).toEqual({
      eventType: "STATUS",
      data: '{"haId":"HA-1",\n"items":[]}',
      id: "HA-1"
    });
  });

  it("reports an absent payload as null", () => {
    expect(parseMessage("event: KEEP-ALIVE\ndata: ")).toEqual({ eventType: "KEEP-ALIVE", data: null, id: null });
  });
});

describe("EventRouter", () => {
  it("dispatches every item in order", () => {
    const { registry, router } = setup();
    const outcome = router.route(
      'event: STATUS\ndata: {"haId":"HA-1","items":[{"key":"K1","value":1},{"key":"K2","value":"On","displayvalue":"Switched on","unit":"mode"}]}'
    );

    expect(outcome).toEqual({ kind: "dispatched", applianceId: "HA-1", events: 2 });
    expect(registry.events).toEqual([
      { applianceId: "HA-1", key: "K1", value: 1, displayValue: "1", unit: null, eventType: "STATUS" },
      { applianceId: "HA-1", key: "K2", value: "On", displayValue: "Switched on", unit: "mode", eventType: "STATUS" }
    ]);
  });

  it("fills value and displayValue with null when the item has no value", () => {
    const { registry, router } = setup();
    router.route('event: EVENT\ndata: {"haId":"HA-1","items":[{"key":"BSH.Common.Event.ProgramFinished"}]}');
    expect(registry.events).toEqual([
      {
        applianceId: "HA-1",
        key: "BSH.Common.Event.ProgramFinished",
        value: null,
        displayValue: null,
        unit: null,
        eventType: "EVENT"
      }
    ]);
  });

  it("drops events for an unknown appliance with a warning", () => {
    const { registry, logger, router } = setup();
    const outcome = router.route('event: STATUS\ndata: {"haId":"Y","items":[{"key":"K1","value":1}]}');

    expect(outcome).toEqual({ kind: "dropped", reason: "unknown-appliance", applianceId: "Y" });
    expect(registry.events).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith({ haId: "Y" }, "stream: no subscriber for appliance");
  });

  it("ignores heartbeats silently", () => {
    const { registry, logger, router } = setup();
    expect(router.route("event: KEEP-ALIVE\ndata: ")).toEqual({ kind: "heartbeat" });
    expect(registry.events).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(router.getMetrics().heartbeats).toBe(1);
  });

  it("forwards appliance connectivity and dispatches nothing else", () => {
    const { registry, router } = setup();
    const outcome = router.route('event: DISCONNECTED\ndata: {"haId":"HA-1","items":[{"key":"K1","value":1}]}');

    expect(outcome).toEqual({ kind: "connectivity", applianceId: "HA-1", state: "DISCONNECTED" });
    expect(registry.connectivity).toEqual([{ applianceId: "HA-1", state: "DISCONNECTED" }]);
    expect(registry.events).toEqual([]);
  });

  it("drops malformed payloads and keeps routing", () => {
    const { registry, logger, router } = setup();

    expect(router.route("event: STATUS\ndata: {not json")).toEqual({ kind: "dropped", reason: "invalid-json" });
    expect(router.route('event: STATUS\ndata: ["HA-1"]')).toEqual({ kind: "dropped", reason: "invalid-json" });
    expect(router.route('event: STATUS\ndata: {"items":[]}')).toEqual({
      kind: "dropped",
      reason: "missing-appliance-id"
    });
    expect(router.route("event: STATUS")).toEqual({ kind: "dropped", reason: "empty-payload" });
    expect(router.route('event: NOTIFY\ndata: {"haId":"HA-1","items":[{"key":"K3","value":false}]}')).toEqual({
      kind: "dispatched",
      applianceId: "HA-1",
      events: 1
    });

    expect(registry.events.map((event) => event.key)).toEqual(["K3"]);
    expect(logger.warn).toHaveBeenCalledWith({ eventType: "STATUS" }, "stream: payload missing haId");
    expect(router.getMetrics()).toEqual({
      messagesRouted: 5,
      eventsDispatched: 1,
      heartbeats: 0,
      connectivityChanges: 0,
      messagesDropped: 4
    });
  });

  it("skips items without a key", () => {
    const { registry, logger, router } = setup();
    const outcome = router.route(
      'event: STATUS\ndata: {"haId":"HA-1","items":[{"value":1},{"key":"K3","value":true}]}'
    );

    expect(outcome).toEqual({ kind: "dispatched", applianceId: "HA-1", events: 1 });
    expect(registry.events.map((event) => event.key)).toEqual(["K3"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("forwards structured values and non-string display values", () => {
    const { registry, router } = setup();
    const outcome = router.route(
      'event: NOTIFY\ndata: {"haId":"HA-1","items":[{"key":"K1","value":{"a":1}},{"key":"K2","value":2,"displayvalue":5,"unit":7}]}'
    );

    expect(outcome).toEqual({ kind: "dispatched", applianceId: "HA-1", events: 2 });
    expect(registry.events).toEqual([
      { applianceId: "HA-1", key: "K1", value: { a: 1 }, displayValue: '{"a":1}', unit: null, eventType: "NOTIFY" },
      { applianceId: "HA-1", key: "K2", value: 2, displayValue: "5", unit: "7", eventType: "NOTIFY" }
    ]);
  });

  it("keeps routing when a subscriber throws", () => {
    const delivered: ApplianceEvent[] = [];
    const registry: SubscriberRegistry = {
      dispatch(_applianceId: string, event: ApplianceEvent) {
        if (event.key === "K1") throw new Error("subscriber exploded");
        delivered.push(event);
        return true;
      },
      notifyConnectivity(_applianceId: string, _state: ApplianceConnectivity) {},
      notifyResyncNeeded() {}
    };
    const logger = createLogger();
    const router = new EventRouter({ registry, logger });

    const outcome = router.route('data: {"haId":"HA-1","items":[{"key":"K1","value":1},{"key":"K2","value":2}]}');

    expect(outcome).toEqual({ kind: "dispatched", applianceId: "HA-1", events: 1 });
    expect(delivered.map((event) => event.key)).toEqual(["K2"]);
    expect(delivered[0]?.eventType).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ haId: "HA-1", key: "K1" }),
      "stream: subscriber failed"
    );
  });
});
