import type { ApplianceConnectivity, ApplianceEvent } from "@hc-bridge/schemas";
import type { DriverLogger, SubscriberRegistry } from "@hc-bridge/driver-core";
import type { MqttPublisher } from "../mqtt/publisher";
import { ErrorBuffer, type RecordedError } from "./error-buffer";

export const DEFAULT_TOPIC_PREFIX = "homeconnect";

export interface ApplianceStats {
  eventsPublished: number;
  lastEventAt?: string;
  lastKey?: string;
  connectivity: ApplianceConnectivity | "UNKNOWN";
  lastError?: string;
}

export interface RegisteredAppliance {
  haId: string;
  name?: string;
  type?: string;
  stats: ApplianceStats;
}

export type ResyncHandler = () => Promise<unknown> | void;

interface RegistryDeps {
  publisher: MqttPublisher | null;
  logger?: DriverLogger;
  topicPrefix?: string;
}

/**
 * Maps appliance ids to their MQTT subscriber. Events for unregistered
 * appliances are refused so the stream driver can count and log them.
 */
export class ApplianceRegistry implements SubscriberRegistry {
  private readonly appliances = new Map<string, RegisteredAppliance>();
  private readonly errorBuffer = new ErrorBuffer();
  private resyncHandler: ResyncHandler | null = null;
  private readonly topicPrefix: string;

  constructor(private readonly deps: RegistryDeps) {
    this.topicPrefix = deps.topicPrefix ?? DEFAULT_TOPIC_PREFIX;
  }

  register(appliance: { haId: string; name?: string; type?: string }): RegisteredAppliance {
    const existing = this.appliances.get(appliance.haId);
    if (existing) {
      existing.name = appliance.name ?? existing.name;
      existing.type = appliance.type ?? existing.type;
      return existing;
    }
    const entry: RegisteredAppliance = {
      haId: appliance.haId,
      name: appliance.name,
      type: appliance.type,
      stats: { eventsPublished: 0, connectivity: "UNKNOWN" }
    };
    this.appliances.set(appliance.haId, entry);
    this.deps.logger?.info({ haId: appliance.haId }, "registry: appliance registered");
    return entry;
  }

  unregister(haId: string): boolean {
    const removed = this.appliances.delete(haId);
    if (removed) this.deps.logger?.info({ haId }, "registry: appliance removed");
    return removed;
  }

  get(haId: string): RegisteredAppliance | undefined {
    return this.appliances.get(haId);
  }

  has(haId: string): boolean {
    return this.appliances.has(haId);
  }

  list(): RegisteredAppliance[] {
    return Array.from(this.appliances.values());
  }

  errors(): { total: number; recent: RecordedError[] } {
    return { total: this.errorBuffer.total, recent: this.errorBuffer.list() };
  }

  setResyncHandler(handler: ResyncHandler): void {
    this.resyncHandler = handler;
  }

  dispatch(applianceId: string, event: ApplianceEvent): boolean {
    const entry = this.appliances.get(applianceId);
    if (!entry) return false;

    entry.stats.eventsPublished += 1;
    entry.stats.lastEventAt = new Date().toISOString();
    entry.stats.lastKey = event.key;
    this.publish(entry, `${this.topicPrefix}/${applianceId}/events`, JSON.stringify(event), false);
    return true;
  }

  notifyConnectivity(applianceId: string, state: ApplianceConnectivity): void {
    const entry = this.appliances.get(applianceId);
    if (!entry) {
      this.deps.logger?.debug({ haId: applianceId, state }, "registry: connectivity for unregistered appliance");
      return;
    }
    entry.stats.connectivity = state;
    const payload = JSON.stringify({ applianceId, state, at: new Date().toISOString() });
    this.publish(entry, `${this.topicPrefix}/${applianceId}/connectivity`, payload, true);
  }

  notifyResyncNeeded(): void {
    const handler = this.resyncHandler;
    if (!handler) {
      this.deps.logger?.debug("registry: resync requested but no handler is set");
      return;
    }
    void Promise.resolve()
      .then(() => handler())
      .catch((err: unknown) => {
        this.record("resync failed", err);
      });
  }

  private publish(entry: RegisteredAppliance, topic: string, payload: string, retain: boolean): void {
    const publisher = this.deps.publisher;
    if (!publisher) {
      this.deps.logger?.debug({ topic }, "registry: no MQTT publisher, dropping message");
      return;
    }
    void publisher.publish(topic, payload, { retain }).catch((err: unknown) => {
      entry.stats.lastError = errorMessage(err);
      this.record("publish failed", err, { topic });
    });
  }

  private record(message: string, err: unknown, meta: Record<string, unknown> = {}): void {
    this.errorBuffer.push(`${message}: ${errorMessage(err)}`, meta);
    this.deps.logger?.error({ err, ...meta }, `registry: ${message}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
