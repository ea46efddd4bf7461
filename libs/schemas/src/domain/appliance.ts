import { z } from "zod";
import { IdentifierSchema, JsonValueSchema, LenientTextSchema, NonEmptyStringSchema } from "../common/scalars";

/** One `{key, value, ...}` entry as the vendor sends it in stream payloads and status lists. */
export const StreamItemSchema = z.object({
  key: NonEmptyStringSchema,
  value: JsonValueSchema.optional(),
  displayvalue: LenientTextSchema,
  unit: LenientTextSchema,
  name: LenientTextSchema,
  uri: LenientTextSchema,
  level: LenientTextSchema,
  handling: LenientTextSchema,
  timestamp: z.number().optional().catch(undefined)
});

export type StreamItem = z.infer<typeof StreamItemSchema>;

export const StreamPayloadSchema = z
  .object({
    haId: IdentifierSchema,
    items: z.array(z.unknown()).optional()
  })
  .passthrough();

export type StreamPayload = z.infer<typeof StreamPayloadSchema>;

export const ApplianceConnectivitySchema = z.enum(["CONNECTED", "DISCONNECTED"]);

export type ApplianceConnectivity = z.infer<typeof ApplianceConnectivitySchema>;

export const ApplianceEventSchema = z.object({
  applianceId: IdentifierSchema,
  key: NonEmptyStringSchema,
  value: JsonValueSchema,
  displayValue: z.string().nullable(),
  unit: z.string().nullable(),
  eventType: z.string().nullable()
});

export type ApplianceEvent = z.infer<typeof ApplianceEventSchema>;
