import type { FastifyBaseLogger } from "fastify";
import type { ApplianceConnectivity, ApplianceEvent, StreamStatus } from "@hc-bridge/schemas";

export type DriverLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

/**
 * Supplies OAuth access tokens. Token acquisition and storage live behind this
 * interface; the driver only asks for the current token or a forced refresh.
 */
export interface TokenProvider {
  getToken(): Promise<string | null>;
  /** Forces a refresh after a 401. Resolves true when a new token is available. */
  refreshTokenAndRetry(): Promise<boolean>;
}

export interface LocaleProvider {
  getLocale(): string;
}

/**
 * Owned by the surrounding application. The driver looks subscribers up and
 * never manages their lifecycle.
 */
export interface SubscriberRegistry {
  /** Returns false when no subscriber is registered for the appliance. */
  dispatch(applianceId: string, event: ApplianceEvent): boolean;
  notifyConnectivity(applianceId: string, state: ApplianceConnectivity): void;
  notifyResyncNeeded(): void;
}

export type StreamSignal =
  | { type: "START" }
  | { type: "STOP"; reason?: string }
  | { type: "ERROR"; message: string; status?: number; body?: string };

export interface StreamHandlers {
  onData(chunk: string): void;
  onStatus(signal: StreamSignal): void;
}

export interface StreamRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * One open subscription at a time. `close()` ends the current subscription
 * without emitting further signals.
 */
export interface StreamTransport {
  open(request: StreamRequest, handlers: StreamHandlers): void;
  close(): void;
}

export interface DriverConfig {
  connection: Record<string, unknown>;
}

export interface DriverDependencies {
  tokenProvider: TokenProvider;
  registry: SubscriberRegistry;
  localeProvider?: LocaleProvider;
  transport?: StreamTransport;
  fetch?: typeof fetch;
  logger?: DriverLogger;
}

export interface Driver {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  refresh(): Promise<void>;
  clearRateLimit(): void;
  getStatus(): StreamStatus;
}

export type DriverFactory<D extends Driver = Driver> = (cfg: DriverConfig, deps: DriverDependencies) => D;
