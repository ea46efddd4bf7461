import type { Driver, DriverConfig, DriverDependencies } from "@hc-bridge/driver-core";
import type { StreamStatus } from "@hc-bridge/schemas";
import { ApiClient } from "./api-client";
import { ApplianceApi } from "./appliance-api";
import { StreamDriverConfigSchema, type StreamDriverConfig } from "./config";
import { ConnectionManager } from "./lifecycle";
import { RateTracker } from "./rate-tracker";
import { EventRouter } from "./router";
import { FetchStreamTransport } from "./transport";

export class HomeConnectStreamDriver implements Driver {
  readonly config: StreamDriverConfig;
  readonly api: ApplianceApi;
  private readonly client: ApiClient;
  private readonly connection: ConnectionManager;

  constructor(cfg: DriverConfig, deps: DriverDependencies) {
    this.config = StreamDriverConfigSchema.parse({
      ...(cfg.connection ?? {})
    });
    const { logger } = deps;

    const rateTracker = new RateTracker({ lowWaterMark: this.config.rateLimit.lowWaterMark, logger });
    this.client = new ApiClient(
      {
        apiUrl: this.config.apiUrl,
        locale: this.config.locale,
        mediaType: this.config.mediaType,
        httpCooldownSeconds: this.config.rateLimit.httpCooldownSeconds
      },
      {
        tokenProvider: deps.tokenProvider,
        rateTracker,
        localeProvider: deps.localeProvider,
        fetch: deps.fetch,
        logger
      }
    );
    this.api = new ApplianceApi(this.client, logger);
    this.connection = new ConnectionManager({
      config: this.config,
      client: this.client,
      tokenProvider: deps.tokenProvider,
      registry: deps.registry,
      transport: deps.transport ?? new FetchStreamTransport({ fetch: deps.fetch, logger }),
      rateTracker,
      router: new EventRouter({ registry: deps.registry, logger }),
      logger
    });
  }

  async connect(): Promise<void> {
    await this.connection.connect();
  }

  async disconnect(): Promise<void> {
    this.connection.disconnect();
  }

  async refresh(): Promise<void> {
    await this.connection.refresh();
  }

  clearRateLimit(): void {
    this.connection.clearRateLimit();
  }

  /** The stream URL follows the new base on the next connect. */
  setApiUrl(url: string): void {
    this.client.setApiUrl(url);
  }

  getStatus(): StreamStatus {
    return this.connection.getStatus();
  }
}
