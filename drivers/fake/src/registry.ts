import type { ApplianceConnectivity, ApplianceEvent } from "@hc-bridge/schemas";
import type { SubscriberRegistry } from "@hc-bridge/driver-core";

export class RecordingRegistry implements SubscriberRegistry {
  readonly events: ApplianceEvent[] = [];
  readonly connectivity: Array<{ applianceId: string; state: ApplianceConnectivity }> = [];
  resyncRequests = 0;
  private readonly known: Set<string>;

  constructor(applianceIds: string[]) {
    this.known = new Set(applianceIds);
  }

  dispatch(applianceId: string, event: ApplianceEvent): boolean {
    if (!this.known.has(applianceId)) return false;
    this.events.push(event);
    return true;
  }

  notifyConnectivity(applianceId: string, state: ApplianceConnectivity): void {
    this.connectivity.push({ applianceId, state });
  }

  notifyResyncNeeded(): void {
    this.resyncRequests += 1;
  }
}
