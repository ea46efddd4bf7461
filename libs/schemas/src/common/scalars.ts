import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const IdentifierSchema = NonEmptyStringSchema;
export const IsoDateTimeSchema = z.string().datetime({ offset: true });
export const NonNegativeIntegerSchema = z.number().int().nonnegative();
export const JsonRecordSchema = z.record(z.string(), z.unknown());
export const ItemValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type ItemValue = z.infer<typeof ItemValueSchema>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

/** Free text the vendor sometimes sends as a number; anything non-string is rendered as JSON. */
export const LenientTextSchema = z
  .unknown()
  .transform((value) => (value === undefined || value === null ? undefined : typeof value === "string" ? value : JSON.stringify(value)));
