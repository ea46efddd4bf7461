import type { StreamItem } from "@hc-bridge/schemas";
import type { DriverLogger } from "@hc-bridge/driver-core";
import { toApplianceEvent, type ApplianceApi } from "@hc-bridge/driver-home-connect";
import type { ApplianceRegistry } from "./registry";

export interface ResyncSummary {
  appliances: number;
  events: number;
  failures: number;
  skipped: boolean;
}

interface ResyncDeps {
  api: Pick<ApplianceApi, "getStatus" | "getSettings">;
  registry: ApplianceRegistry;
  logger?: DriverLogger;
}

/**
 * Re-reads status and settings of every registered appliance after a long
 * stream outage and replays them as STATUS and NOTIFY events. Appliances are
 * fetched one at a time to stay gentle on the daily quota.
 */
export class ResyncService {
  private running: Promise<ResyncSummary> | null = null;
  private lastRunAt: string | null = null;

  constructor(private readonly deps: ResyncDeps) {}

  get lastRun(): string | null {
    return this.lastRunAt;
  }

  async run(): Promise<ResyncSummary> {
    if (this.running) {
      this.deps.logger?.debug("resync: already running");
      return { appliances: 0, events: 0, failures: 0, skipped: true };
    }
    this.running = this.resyncAll();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private async resyncAll(): Promise<ResyncSummary> {
    const appliances = this.deps.registry.list();
    this.deps.logger?.info({ appliances: appliances.length }, "resync: refreshing appliance state");
    const summary: ResyncSummary = { appliances: appliances.length, events: 0, failures: 0, skipped: false };

    for (const { haId } of appliances) {
      try {
        summary.events += this.replay(haId, await this.deps.api.getStatus(haId), "STATUS");
        summary.events += this.replay(haId, await this.deps.api.getSettings(haId), "NOTIFY");
      } catch (err) {
        summary.failures += 1;
        this.deps.logger?.warn({ err, haId }, "resync: failed to refresh appliance");
      }
    }

    this.lastRunAt = new Date().toISOString();
    this.deps.logger?.info(summary, "resync: done");
    return summary;
  }

  private replay(haId: string, items: StreamItem[], eventType: string): number {
    let delivered = 0;
    for (const item of items) {
      if (this.deps.registry.dispatch(haId, toApplianceEvent(haId, item, eventType))) {
        delivered += 1;
      }
    }
    return delivered;
  }
}
