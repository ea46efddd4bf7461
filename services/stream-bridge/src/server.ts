import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { StreamTransport, TokenProvider } from "@hc-bridge/driver-core";
import { FakeStreamTransport, StaticTokenProvider, createSimulatorScript } from "@hc-bridge/driver-fake";
import { createHomeConnectDriver } from "@hc-bridge/driver-home-connect";
import { loadBridgeConfig, resolveTokenUrl, type BridgeConfig } from "./config";
import { ApplianceRegistry } from "./core/registry";
import { ResyncService } from "./core/resync";
import { OAuthTokenProvider } from "./core/token-provider";
import { RealMqttPublisher, type MqttPublisher } from "./mqtt/publisher";
import { registerApplianceRoutes } from "./routes/appliances";
import { registerConfigRoute } from "./routes/config";
import { registerHealthRoute } from "./routes/health";
import { registerStatusRoute } from "./routes/status";
import { registerStreamRoutes } from "./routes/stream";

interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  env?: NodeJS.ProcessEnv;
  config?: BridgeConfig;
  mqttPublisher?: MqttPublisher | null;
  tokenProvider?: TokenProvider;
  transport?: StreamTransport;
  fetch?: typeof fetch;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const config = options.config ?? loadBridgeConfig(options.env);

  const mqttPublisher = resolveMqttPublisher(options.mqttPublisher, config, app);
  if (!mqttPublisher) {
    app.log.warn("stream-bridge: MQTT_URL not set, running HTTP-only");
  }

  const registry = new ApplianceRegistry({ publisher: mqttPublisher, logger: app.log });
  for (const haId of config.applianceIds) {
    registry.register({ haId });
  }

  const driver = createHomeConnectDriver(
    { connection: { ...config.stream, apiUrl: config.apiUrl, locale: config.locale } },
    {
      tokenProvider: options.tokenProvider ?? resolveTokenProvider(config, options.fetch, app),
      registry,
      transport: options.transport ?? resolveTransport(config),
      fetch: options.fetch,
      logger: app.log
    }
  );

  const resync = new ResyncService({ api: driver.api, registry, logger: app.log });
  registry.setResyncHandler(() => resync.run());

  registerHealthRoute(app);
  registerStatusRoute(app, { driver, registry, resync });
  registerConfigRoute(app, { config, driver });
  registerStreamRoutes(app, { driver });
  registerApplianceRoutes(app, { api: driver.api, registry });

  app.addHook("onReady", async () => {
    if (config.autoconnect) {
      await driver.connect();
    }
  });

  app.addHook("onClose", async () => {
    await driver.disconnect();
    if (mqttPublisher) {
      await mqttPublisher.disconnect().catch((err: unknown) => {
        app.log.error(err, "stream-bridge: failed to disconnect MQTT publisher");
      });
    }
  });

  return app;
}

function resolveMqttPublisher(
  provided: MqttPublisher | null | undefined,
  config: BridgeConfig,
  app: FastifyInstance
): MqttPublisher | null {
  if (provided === null) return null;
  if (provided) return provided;
  if (!config.mqttUrl) return null;
  try {
    return new RealMqttPublisher(config.mqttUrl);
  } catch (err) {
    app.log.error(err, "stream-bridge: failed to init MQTT publisher");
    return null;
  }
}

function resolveTokenProvider(
  config: BridgeConfig,
  fetchImpl: typeof fetch | undefined,
  app: FastifyInstance
): TokenProvider {
  if (config.transport === "fake") {
    return new StaticTokenProvider("simulated-token");
  }
  return new OAuthTokenProvider({
    tokenUrl: resolveTokenUrl(config),
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    refreshToken: config.refreshToken,
    accessToken: config.accessToken,
    fetch: fetchImpl,
    logger: app.log
  });
}

function resolveTransport(config: BridgeConfig): StreamTransport | undefined {
  if (config.transport !== "fake") return undefined;
  return new FakeStreamTransport(createSimulatorScript(config.applianceIds));
}
