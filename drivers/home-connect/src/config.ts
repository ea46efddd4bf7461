import { z } from "zod";

export const DEFAULT_API_URL = "https://api.home-connect.com";
export const APPLIANCES_ENDPOINT = "/api/homeappliances";
export const VENDOR_MEDIA_TYPE = "application/vnd.bsh.sdk.v1+json";

export const StreamDriverConfigSchema = z.object({
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  locale: z.string().default("en-US"),
  mediaType: z.string().default(VENDOR_MEDIA_TYPE),
  reconnect: z
    .object({
      normalDelaySeconds: z.number().int().positive().default(300),
      backoffBaseSeconds: z.number().int().positive().default(60),
      backoffMaxSeconds: z.number().int().positive().default(300),
      maxAttempts: z.number().int().positive().default(10),
      refreshPauseMs: z.number().int().nonnegative().default(1000)
    })
    .default({}),
  rateLimit: z
    .object({
      resumeBufferSeconds: z.number().int().nonnegative().default(300),
      defaultRetryAfterSeconds: z.number().int().positive().default(86_400),
      httpCooldownSeconds: z.number().int().positive().default(60),
      lowWaterMark: z.number().int().nonnegative().default(100)
    })
    .default({}),
  resync: z
    .object({
      disconnectThresholdSeconds: z.number().int().nonnegative().default(300),
      delaySeconds: z.number().int().nonnegative().default(2)
    })
    .default({})
});

export type StreamDriverConfig = z.infer<typeof StreamDriverConfigSchema>;
export type StreamDriverConfigInput = z.input<typeof StreamDriverConfigSchema>;
