import {
  ApplianceConnectivitySchema,
  StreamItemSchema,
  StreamPayloadSchema,
  type ApplianceConnectivity,
  type ApplianceEvent,
  type RouterMetrics,
  type StreamItem
} from "@hc-bridge/schemas";
import type { DriverLogger, SubscriberRegistry } from "@hc-bridge/driver-core";

export const HEARTBEAT_EVENT = "KEEP-ALIVE";

export type RouteOutcome =
  | { kind: "dispatched"; applianceId: string; events: number }
  | { kind: "heartbeat" }
  | { kind: "connectivity"; applianceId: string; state: ApplianceConnectivity }
  | { kind: "dropped"; reason: DropReason; applianceId?: string };

export type DropReason = "empty-payload" | "invalid-json" | "missing-appliance-id" | "unknown-appliance";

export interface ParsedMessage {
  eventType: string | null;
  data: string | null;
  id: string | null;
}

interface RouterDeps {
  registry: SubscriberRegistry;
  logger?: DriverLogger;
}

export function parseMessage(message: string): ParsedMessage {
  let eventType: string | null = null;
  let id: string | null = null;
  const dataLines: string[] = [];

  for (const line of message.split("\n")) {
    if (line.startsWith("event:")) {
      eventType = line.slice("event:".length).trim() || null;
    } else if (line.startsWith("data:")) {
      dataLines.push(line.slice("data:".length).trim());
    } else if (line.startsWith("id:")) {
      id = line.slice("id:".length).trim() || null;
    }
  }

  const data = dataLines.join("\n").trim();
  return { eventType, data: data.length > 0 ? data : null, id };
}

/**
 * Turns one framed SSE message into appliance events and hands them to the
 * registry. Nothing here throws: bad input is counted, logged and dropped so
 * the next message is processed normally.
 */
export class EventRouter {
  private readonly metrics: RouterMetrics = {
    messagesRouted: 0,
    eventsDispatched: 0,
    heartbeats: 0,
    connectivityChanges: 0,
    messagesDropped: 0
  };

  constructor(private readonly deps: RouterDeps) {}

  route(message: string): RouteOutcome {
    this.metrics.messagesRouted += 1;
    const { eventType, data } = parseMessage(message);

    if (eventType === HEARTBEAT_EVENT) {
      this.metrics.heartbeats += 1;
      return { kind: "heartbeat" };
    }

    if (data === null) {
      this.deps.logger?.debug({ eventType }, "stream: message without payload");
      return this.drop("empty-payload");
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      json = undefined;
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) {
      this.deps.logger?.warn({ eventType, payload: data.slice(0, 200) }, "stream: payload is not a JSON object");
      return this.drop("invalid-json");
    }

    const payload = StreamPayloadSchema.safeParse(json);
    if (!payload.success) {
      this.deps.logger?.warn({ eventType }, "stream: payload missing haId");
      return this.drop("missing-appliance-id");
    }

    const applianceId = payload.data.haId;
    const connectivity = ApplianceConnectivitySchema.safeParse(eventType);
    if (connectivity.success) {
      this.metrics.connectivityChanges += 1;
      this.deps.logger?.info({ haId: applianceId, state: connectivity.data }, "stream: appliance connectivity changed");
      try {
        this.deps.registry.notifyConnectivity(applianceId, connectivity.data);
      } catch (err) {
        this.deps.logger?.warn({ err, haId: applianceId }, "stream: connectivity handler failed");
      }
      return { kind: "connectivity", applianceId, state: connectivity.data };
    }

    let dispatched = 0;
    for (const raw of payload.data.items ?? []) {
      const item = StreamItemSchema.safeParse(raw);
      if (!item.success) {
        this.deps.logger?.warn({ haId: applianceId, issues: item.error.issues }, "stream: skipping invalid item");
        continue;
      }
      const event = toApplianceEvent(applianceId, item.data, eventType);
      let delivered: boolean;
      try {
        delivered = this.deps.registry.dispatch(applianceId, event);
      } catch (err) {
        this.deps.logger?.warn({ err, haId: applianceId, key: event.key }, "stream: subscriber failed");
        continue;
      }
      if (!delivered) {
        this.deps.logger?.warn({ haId: applianceId }, "stream: no subscriber for appliance");
        return this.drop("unknown-appliance", applianceId);
      }
      dispatched += 1;
    }

    this.metrics.eventsDispatched += dispatched;
    return { kind: "dispatched", applianceId, events: dispatched };
  }

  getMetrics(): RouterMetrics {
    return { ...this.metrics };
  }

  private drop(reason: DropReason, applianceId?: string): RouteOutcome {
    this.metrics.messagesDropped += 1;
    return applianceId === undefined ? { kind: "dropped", reason } : { kind: "dropped", reason, applianceId };
  }
}

export function toApplianceEvent(applianceId: string, item: StreamItem, eventType: string | null): ApplianceEvent {
  const value = item.value ?? null;
  return {
    applianceId,
    key: item.key,
    value,
    displayValue: item.displayvalue ?? displayText(value),
    unit: item.unit ?? null,
    eventType
  };
}

function displayText(value: ApplianceEvent["value"]): string | null {
  if (value === null) return null;
  return typeof value === "string" ? value : JSON.stringify(value);
}
