import { DEFAULT_API_URL } from "@hc-bridge/driver-home-connect";
import { z } from "zod";

export const BridgeConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(4010),
  host: z.string().default("0.0.0.0"),
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  tokenUrl: z.string().url().optional(),
  locale: z.string().default("en-US"),
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  refreshToken: z.string().optional(),
  accessToken: z.string().optional(),
  applianceIds: z.array(z.string().min(1)).default([]),
  mqttUrl: z.string().url().optional(),
  transport: z.enum(["fetch", "fake"]).default("fetch"),
  autoconnect: z.boolean().default(false),
  stream: z.record(z.string(), z.unknown()).default({})
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;

export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  return BridgeConfigSchema.parse({
    port: value(env.STREAM_BRIDGE_PORT) ?? value(env.PORT),
    host: value(env.STREAM_BRIDGE_HOST),
    apiUrl: value(env.HC_API_URL),
    tokenUrl: value(env.HC_TOKEN_URL),
    locale: value(env.HC_LOCALE),
    clientId: value(env.HC_CLIENT_ID),
    clientSecret: value(env.HC_CLIENT_SECRET),
    refreshToken: value(env.HC_REFRESH_TOKEN),
    accessToken: value(env.HC_ACCESS_TOKEN),
    applianceIds: splitList(env.HC_APPLIANCE_IDS),
    mqttUrl: value(env.MQTT_URL),
    transport: value(env.STREAM_TRANSPORT),
    autoconnect: flag(env.HC_AUTOCONNECT),
    stream: parseJsonObject("HC_STREAM_CONFIG_JSON", env.HC_STREAM_CONFIG_JSON)
  });
}

/** The vendor serves its token endpoint from the API host. */
export function resolveTokenUrl(config: BridgeConfig): string {
  return config.tokenUrl ?? `${config.apiUrl.replace(/\/+$/, "")}/security/oauth/token`;
}

function value(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

function splitList(raw: string | undefined): string[] | undefined {
  const list = raw
    ?.split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return list && list.length > 0 ? list : undefined;
}

function flag(raw: string | undefined): boolean | undefined {
  const normalized = value(raw)?.toLowerCase();
  if (normalized === undefined) return undefined;
  return normalized === "true" || normalized === "1" || normalized === "yes";
}

function parseJsonObject(name: string, raw: string | undefined): Record<string, unknown> | undefined {
  const text = value(raw);
  if (text === undefined) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`${name} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!result.success) {
    throw new Error(`${name} must be a JSON object`);
  }
  return result.data;
}
