import type { DriverConfig, DriverDependencies, DriverFactory } from "@hc-bridge/driver-core";
import { HomeConnectStreamDriver } from "./driver";

export const createHomeConnectDriver: DriverFactory<HomeConnectStreamDriver> = (
  cfg: DriverConfig,
  deps: DriverDependencies
) => new HomeConnectStreamDriver(cfg, deps);

export default createHomeConnectDriver;

export { HomeConnectStreamDriver } from "./driver";
export { ApiClient, type ApiClientOptions, type HttpMethod } from "./api-client";
export { ApplianceApi, type ProgramOptionValue } from "./appliance-api";
export { Backoff } from "./backoff";
export {
  APPLIANCES_ENDPOINT,
  DEFAULT_API_URL,
  StreamDriverConfigSchema,
  VENDOR_MEDIA_TYPE,
  type StreamDriverConfig,
  type StreamDriverConfigInput
} from "./config";
export { ApiError, isApiError, type ApiErrorKind } from "./errors";
export { SseFramer } from "./framer";
export {
  ConnectionManager,
  STATUS_CONNECTED,
  STATUS_CONNECTING,
  STATUS_DISCONNECTED,
  STATUS_GAVE_UP,
  STATUS_NO_TOKEN,
  rateLimitedStatus
} from "./lifecycle";
export { isRateLimitSignal, parseRetryAfterSeconds } from "./rate-limit-signal";
export { RateTracker, type Cooldown } from "./rate-tracker";
export { EventRouter, HEARTBEAT_EVENT, parseMessage, toApplianceEvent, type DropReason, type RouteOutcome } from "./router";
export { FetchStreamTransport } from "./transport";
