import type { ConnectionState, StreamStatus } from "@hc-bridge/schemas";
import type {
  DriverLogger,
  StreamSignal,
  StreamTransport,
  SubscriberRegistry,
  TokenProvider
} from "@hc-bridge/driver-core";
import type { ApiClient } from "./api-client";
import { Backoff } from "./backoff";
import { APPLIANCES_ENDPOINT, type StreamDriverConfig } from "./config";
import { SseFramer } from "./framer";
import { isRateLimitSignal, parseRetryAfterSeconds } from "./rate-limit-signal";
import type { RateTracker } from "./rate-tracker";
import type { EventRouter } from "./router";

export const STATUS_DISCONNECTED = "disconnected";
export const STATUS_CONNECTING = "connecting";
export const STATUS_CONNECTED = "connected";
export const STATUS_NO_TOKEN = "error - no token";
export const STATUS_GAVE_UP = "failed - manual reconnect required";

export function rateLimitedStatus(until: number): string {
  return `rate limited until ${new Date(until).toISOString()}`;
}

interface ConnectionManagerDeps {
  config: StreamDriverConfig;
  client: ApiClient;
  tokenProvider: TokenProvider;
  registry: SubscriberRegistry;
  transport: StreamTransport;
  rateTracker: RateTracker;
  router: EventRouter;
  logger?: DriverLogger;
}

/**
 * Owns the single stream subscription and its reconnect policy.
 *
 * Every `open` gets a fresh generation number. Signals and data tagged with
 * any other generation belong to a superseded or closed subscription and are
 * ignored, which also collapses duplicate STOP/ERROR signals into one.
 */
export class ConnectionManager {
  private state: ConnectionState = "disconnected";
  private statusText = STATUS_DISCONNECTED;
  private established = false;
  private lastConnectAt: number | null = null;
  private lastDisconnectAt: number | null = null;
  private lastEventAt: number | null = null;
  private consecutiveFailures = 0;
  private rateLimitedUntil: number | null = null;
  private nextReconnectAt: number | null = null;
  private reconnects = 0;
  private disconnects = 0;

  private generation = 0;
  private activeGeneration: number | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private resyncTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly framer = new SseFramer();
  private readonly backoff: Backoff;

  constructor(private readonly deps: ConnectionManagerDeps) {
    const { backoffBaseSeconds, backoffMaxSeconds } = deps.config.reconnect;
    this.backoff = new Backoff(backoffBaseSeconds, backoffMaxSeconds);
  }

  async connect(): Promise<void> {
    const now = Date.now();
    if (this.rateLimitedUntil !== null) {
      if (now < this.rateLimitedUntil) {
        this.statusText = rateLimitedStatus(this.rateLimitedUntil);
        this.deps.logger?.warn(
          { rateLimitedUntil: new Date(this.rateLimitedUntil).toISOString() },
          "stream: cannot connect while rate limited"
        );
        return;
      }
      this.rateLimitedUntil = null;
      this.resetFailures();
      this.deps.logger?.info("stream: rate limit expired");
    }

    if (this.state === "connecting" || this.state === "connected") {
      this.deps.logger?.debug({ state: this.state }, "stream: connect ignored");
      return;
    }
    if (this.state === "failed") {
      this.resetFailures();
    }

    this.cancelReconnect();
    const generation = ++this.generation;
    this.activeGeneration = generation;
    this.setState("connecting", STATUS_CONNECTING);

    const token = await this.resolveToken();
    if (this.activeGeneration !== generation) return;
    if (!token) {
      this.activeGeneration = null;
      this.deps.logger?.error("stream: no OAuth token available - cannot connect");
      this.setState("failed", STATUS_NO_TOKEN);
      return;
    }

    const url = `${this.deps.client.getApiUrl()}${APPLIANCES_ENDPOINT}/events`;
    this.deps.logger?.info({ url }, "stream: connecting");
    try {
      this.deps.transport.open(
        {
          url,
          headers: {
            authorization: `Bearer ${token}`,
            accept: "text/event-stream",
            "accept-language": this.deps.client.getLocale()
          }
        },
        {
          onData: (chunk) => this.handleData(generation, chunk),
          onStatus: (signal) => this.handleSignal(generation, signal)
        }
      );
    } catch (err) {
      this.handleSignal(generation, {
        type: "ERROR",
        message: err instanceof Error ? err.message : String(err)
      });
    }
  }

  disconnect(): void {
    this.deps.logger?.info("stream: disconnecting");
    const wasOpen = this.activeGeneration !== null;
    this.disconnects += 1;
    this.activeGeneration = null;
    this.deps.transport.close();
    this.cancelReconnect();
    this.cancelResync();
    this.established = false;
    if (wasOpen && this.state === "connected") {
      this.lastDisconnectAt = Date.now();
    }
    this.setState("disconnected", STATUS_DISCONNECTED);
  }

  clearRateLimit(): void {
    this.deps.logger?.info("stream: clearing rate limit");
    this.rateLimitedUntil = null;
    this.deps.rateTracker.clearCooldown();
    this.resetFailures();
    this.cancelReconnect();
    if (this.state === "rate-limited" || this.state === "failed") {
      this.setState("disconnected", STATUS_DISCONNECTED);
    }
  }

  async refresh(): Promise<void> {
    this.deps.logger?.info("stream: refreshing connection");
    this.disconnect();
    const disconnects = this.disconnects;
    await new Promise<void>((resolve) => setTimeout(resolve, this.deps.config.reconnect.refreshPauseMs));
    if (this.disconnects !== disconnects) {
      this.deps.logger?.info("stream: refresh cancelled by disconnect");
      return;
    }
    await this.connect();
  }

  getStatus(): StreamStatus {
    return {
      state: this.state,
      status: this.statusText,
      established: this.established,
      lastConnectAt: toIso(this.lastConnectAt),
      lastDisconnectAt: toIso(this.lastDisconnectAt),
      lastEventAt: toIso(this.lastEventAt),
      consecutiveFailures: this.consecutiveFailures,
      rateLimitedUntil: toIso(this.rateLimitedUntil),
      nextReconnectAt: toIso(this.nextReconnectAt),
      reconnects: this.reconnects,
      quota: this.deps.rateTracker.getQuota(),
      cooldownUntil: toIso(this.deps.rateTracker.getCooldown()?.until ?? null),
      apiUrl: this.deps.client.getApiUrl(),
      router: this.deps.router.getMetrics()
    };
  }

  private handleData(generation: number, chunk: string): void {
    if (generation !== this.activeGeneration || !chunk) return;
    const now = Date.now();
    if (this.rateLimitedUntil !== null && now < this.rateLimitedUntil) return;

    this.lastEventAt = now;
    if (isRateLimitSignal(chunk)) {
      this.enterRateLimit(chunk);
      return;
    }

    if (!this.established) {
      this.established = true;
      this.resetFailures();
    }
    this.routeMessages(this.framer.feed(chunk));
  }

  /** Stops at a framed rate-limit error whose text arrived split across chunks. */
  private routeMessages(messages: string[]): boolean {
    for (const message of messages) {
      if (isRateLimitSignal(message)) {
        this.enterRateLimit(message);
        return false;
      }
      this.deps.router.route(message);
    }
    return true;
  }

  private handleSignal(generation: number, signal: StreamSignal): void {
    if (generation !== this.activeGeneration) {
      this.deps.logger?.debug({ signal: signal.type }, "stream: ignoring signal from closed subscription");
      return;
    }

    if (signal.type === "START") {
      this.onStart();
      return;
    }

    if (!this.routeMessages(this.framer.flush())) return;
    this.activeGeneration = null;
    if (signal.type === "ERROR") {
      const text = signal.body ?? signal.message;
      if (signal.status === 429 || isRateLimitSignal(text)) {
        this.enterRateLimit(text);
        return;
      }
      this.deps.logger?.warn({ status: signal.status, message: signal.message }, "stream: error");
      if (signal.status === 401) {
        void this.deps.tokenProvider
          .refreshTokenAndRetry()
          .then((refreshed) => {
            this.deps.logger?.info({ refreshed }, "stream: token refresh after 401");
          })
          .catch((err: unknown) => {
            this.deps.logger?.error({ err }, "stream: token refresh failed");
          });
      }
    }
    this.onStop();
  }

  private onStart(): void {
    const now = Date.now();
    this.setState("connected", STATUS_CONNECTED);
    this.established = false;
    this.lastConnectAt = now;
    this.framer.reset();
    this.deps.logger?.info("stream: connected");

    const { disconnectThresholdSeconds, delaySeconds } = this.deps.config.resync;
    const previousDisconnect = this.lastDisconnectAt;
    if (previousDisconnect !== null && now - previousDisconnect > disconnectThresholdSeconds * 1000) {
      this.deps.logger?.info(
        { disconnectedSeconds: Math.floor((now - previousDisconnect) / 1000) },
        "stream: long disconnect - scheduling resync"
      );
      this.scheduleResync(delaySeconds);
    }
  }

  private onStop(): void {
    this.setState("disconnected", STATUS_DISCONNECTED);
    this.lastDisconnectAt = Date.now();
    const wasEstablished = this.established;
    this.established = false;

    if (this.rateLimitedUntil !== null && Date.now() < this.rateLimitedUntil) {
      this.deps.logger?.warn("stream: rate limited - not reconnecting");
      return;
    }

    const { normalDelaySeconds, maxAttempts } = this.deps.config.reconnect;
    if (wasEstablished) {
      this.resetFailures();
      this.deps.logger?.debug({ delaySeconds: normalDelaySeconds }, "stream: disconnected - scheduling reconnect");
      this.scheduleReconnect(normalDelaySeconds);
      return;
    }

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures > maxAttempts) {
      this.deps.logger?.error({ maxAttempts }, "stream: max reconnect attempts reached - giving up");
      this.setState("failed", STATUS_GAVE_UP);
      return;
    }
    const delaySeconds = this.backoff.next();
    this.deps.logger?.warn(
      { delaySeconds, attempt: this.consecutiveFailures, maxAttempts },
      "stream: connection failed - backing off"
    );
    this.scheduleReconnect(delaySeconds);
  }

  private enterRateLimit(text: string): void {
    const { defaultRetryAfterSeconds, resumeBufferSeconds } = this.deps.config.rateLimit;
    const retryAfterSeconds = parseRetryAfterSeconds(text, defaultRetryAfterSeconds);
    const until = Date.now() + retryAfterSeconds * 1000;

    this.rateLimitedUntil = until;
    this.resetFailures();
    this.activeGeneration = null;
    this.deps.transport.close();
    this.lastDisconnectAt = Date.now();
    this.established = false;
    this.setState("rate-limited", rateLimitedStatus(until));

    this.deps.rateTracker.markExhausted();
    this.deps.rateTracker.startCooldown(retryAfterSeconds * 1000, "stream");
    this.deps.logger?.error(
      { retryAfterSeconds, rateLimitedUntil: new Date(until).toISOString() },
      "stream: rate limited"
    );
    this.scheduleReconnect(retryAfterSeconds + resumeBufferSeconds);
  }

  private scheduleReconnect(delaySeconds: number): void {
    this.cancelReconnect();
    const delayMs = delaySeconds * 1000;
    this.nextReconnectAt = Date.now() + delayMs;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.nextReconnectAt = null;
      this.reconnects += 1;
      void this.connect().catch((err: unknown) => {
        this.deps.logger?.error({ err }, "stream: scheduled reconnect failed");
      });
    }, delayMs);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.nextReconnectAt = null;
  }

  private scheduleResync(delaySeconds: number): void {
    this.cancelResync();
    this.resyncTimer = setTimeout(() => {
      this.resyncTimer = null;
      try {
        this.deps.registry.notifyResyncNeeded();
      } catch (err) {
        this.deps.logger?.error({ err }, "stream: resync notification failed");
      }
    }, delaySeconds * 1000);
  }

  private cancelResync(): void {
    if (this.resyncTimer) {
      clearTimeout(this.resyncTimer);
      this.resyncTimer = null;
    }
  }

  private resetFailures(): void {
    this.consecutiveFailures = 0;
    this.backoff.reset();
  }

  private setState(state: ConnectionState, statusText: string): void {
    this.state = state;
    this.statusText = statusText;
  }

  private async resolveToken(): Promise<string | null> {
    try {
      return await this.deps.tokenProvider.getToken();
    } catch (err) {
      this.deps.logger?.error({ err }, "stream: token provider failed");
      return null;
    }
  }
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}
