import type { FastifyInstance } from "fastify";
import type { HomeConnectStreamDriver } from "@hc-bridge/driver-home-connect";
import type { BridgeConfig } from "../config";

interface ConfigDeps {
  config: BridgeConfig;
  driver: HomeConnectStreamDriver;
}

/** Effective settings. Credentials are reported as present or absent only. */
export function registerConfigRoute(app: FastifyInstance, deps: ConfigDeps): void {
  app.get("/config", () => {
    const { config, driver } = deps;
    return {
      apiUrl: driver.getStatus().apiUrl,
      locale: config.locale,
      transport: config.transport,
      autoconnect: config.autoconnect,
      mqtt: config.mqttUrl !== undefined,
      applianceIds: config.applianceIds,
      credentials: {
        clientId: config.clientId !== undefined,
        clientSecret: config.clientSecret !== undefined,
        refreshToken: config.refreshToken !== undefined,
        accessToken: config.accessToken !== undefined
      },
      stream: driver.config
    };
  });
}
