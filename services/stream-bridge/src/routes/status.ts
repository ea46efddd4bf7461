import type { FastifyInstance } from "fastify";
import type { HomeConnectStreamDriver } from "@hc-bridge/driver-home-connect";
import type { ApplianceRegistry } from "../core/registry";
import type { ResyncService } from "../core/resync";

interface StatusDeps {
  driver: HomeConnectStreamDriver;
  registry: ApplianceRegistry;
  resync: ResyncService;
}

export function registerStatusRoute(app: FastifyInstance, deps: StatusDeps): void {
  app.get("/status", () => ({
    stream: deps.driver.getStatus(),
    appliances: deps.registry.list(),
    errors: deps.registry.errors(),
    lastResyncAt: deps.resync.lastRun
  }));
}
