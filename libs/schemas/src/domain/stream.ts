import { z } from "zod";
import { IsoDateTimeSchema, NonNegativeIntegerSchema } from "../common/scalars";

export const ConnectionStateSchema = z.enum([
  "disconnected",
  "connecting",
  "connected",
  "rate-limited",
  "failed"
]);

export type ConnectionState = z.infer<typeof ConnectionStateSchema>;

export const RateQuotaSchema = z.object({
  remaining: NonNegativeIntegerSchema.nullable(),
  limit: NonNegativeIntegerSchema.nullable(),
  observedAt: IsoDateTimeSchema
});

export type RateQuota = z.infer<typeof RateQuotaSchema>;

export const CooldownSourceSchema = z.enum(["stream", "http"]);

export type CooldownSource = z.infer<typeof CooldownSourceSchema>;

export const RouterMetricsSchema = z.object({
  messagesRouted: NonNegativeIntegerSchema,
  eventsDispatched: NonNegativeIntegerSchema,
  heartbeats: NonNegativeIntegerSchema,
  connectivityChanges: NonNegativeIntegerSchema,
  messagesDropped: NonNegativeIntegerSchema
});

export type RouterMetrics = z.infer<typeof RouterMetricsSchema>;

export const StreamStatusSchema = z.object({
  state: ConnectionStateSchema,
  status: z.string(),
  established: z.boolean(),
  lastConnectAt: IsoDateTimeSchema.nullable(),
  lastDisconnectAt: IsoDateTimeSchema.nullable(),
  lastEventAt: IsoDateTimeSchema.nullable(),
  consecutiveFailures: NonNegativeIntegerSchema,
  rateLimitedUntil: IsoDateTimeSchema.nullable(),
  nextReconnectAt: IsoDateTimeSchema.nullable(),
  reconnects: NonNegativeIntegerSchema,
  quota: RateQuotaSchema.nullable(),
  cooldownUntil: IsoDateTimeSchema.nullable(),
  apiUrl: z.string().url(),
  router: RouterMetricsSchema
});

export type StreamStatus = z.infer<typeof StreamStatusSchema>;
