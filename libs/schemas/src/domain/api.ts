import { z } from "zod";
import { IdentifierSchema, ItemValueSchema, JsonRecordSchema, NonEmptyStringSchema } from "../common/scalars";
import { StreamItemSchema } from "./appliance";

export const ApplianceSchema = z.object({
  haId: IdentifierSchema,
  name: z.string().optional(),
  type: z.string().optional(),
  brand: z.string().optional(),
  vib: z.string().optional(),
  enumber: z.string().optional(),
  connected: z.boolean().optional()
});

export type Appliance = z.infer<typeof ApplianceSchema>;

export const ProgramOptionSchema = z.object({
  key: NonEmptyStringSchema,
  value: ItemValueSchema.optional(),
  unit: z.string().optional(),
  name: z.string().optional(),
  displayvalue: z.string().optional(),
  type: z.string().optional(),
  constraints: JsonRecordSchema.optional()
});

export type ProgramOption = z.infer<typeof ProgramOptionSchema>;

export const ProgramSchema = z.object({
  key: NonEmptyStringSchema,
  name: z.string().optional(),
  options: z.array(ProgramOptionSchema).optional(),
  constraints: JsonRecordSchema.optional()
});

export type Program = z.infer<typeof ProgramSchema>;

export const ApplianceListResponseSchema = z.object({
  data: z.object({ homeappliances: z.array(ApplianceSchema).default([]) })
});

export const ApplianceResponseSchema = z.object({ data: ApplianceSchema });

export const ProgramListResponseSchema = z.object({
  data: z.object({ programs: z.array(ProgramSchema).default([]) })
});

export const ProgramResponseSchema = z.object({ data: ProgramSchema });

export const StatusListResponseSchema = z.object({
  data: z.object({ status: z.array(StreamItemSchema).default([]) })
});

export const SettingListResponseSchema = z.object({
  data: z.object({ settings: z.array(StreamItemSchema).default([]) })
});

export const ProgramRequestSchema = z.object({
  programKey: NonEmptyStringSchema,
  options: z
    .array(
      z.object({
        key: NonEmptyStringSchema,
        value: ItemValueSchema,
        unit: z.string().optional()
      })
    )
    .optional()
});

export type ProgramRequest = z.infer<typeof ProgramRequestSchema>;
