import {
  ApplianceListResponseSchema,
  ApplianceResponseSchema,
  ProgramListResponseSchema,
  ProgramResponseSchema,
  SettingListResponseSchema,
  StatusListResponseSchema,
  type Appliance,
  type ItemValue,
  type Program,
  type StreamItem
} from "@hc-bridge/schemas";
import type { DriverLogger } from "@hc-bridge/driver-core";
import type { z } from "zod";
import type { ApiClient } from "./api-client";
import { APPLIANCES_ENDPOINT } from "./config";
import { ApiError } from "./errors";

export interface ProgramOptionValue {
  key: string;
  value: ItemValue;
  unit?: string;
}

export class ApplianceApi {
  constructor(private readonly client: ApiClient, private readonly logger?: DriverLogger) {}

  async listAppliances(): Promise<Appliance[]> {
    const body = await this.client.get(APPLIANCES_ENDPOINT);
    return parse(ApplianceListResponseSchema, body, APPLIANCES_ENDPOINT).data.homeappliances;
  }

  async getAppliance(haId: string): Promise<Appliance> {
    const path = appliancePath(haId);
    return parse(ApplianceResponseSchema, await this.client.get(path), path).data;
  }

  async getAvailablePrograms(haId: string): Promise<Program[]> {
    const path = `${appliancePath(haId)}/programs/available`;
    return parse(ProgramListResponseSchema, await this.client.get(path), path).data.programs;
  }

  async getAvailableProgram(haId: string, programKey: string): Promise<Program> {
    const path = `${appliancePath(haId)}/programs/available/${encodeURIComponent(programKey)}`;
    return parse(ProgramResponseSchema, await this.client.get(path), path).data;
  }

  /** Resolves to `null` while the appliance is idle. */
  async getActiveProgram(haId: string): Promise<Program | null> {
    const path = `${appliancePath(haId)}/programs/active`;
    const body = await this.client.get(path);
    if (body === null) return null;
    return parse(ProgramResponseSchema, body, path).data;
  }

  async setActiveProgram(haId: string, programKey: string, options?: ProgramOptionValue[]): Promise<void> {
    this.logger?.info({ haId, programKey }, "api: starting program");
    await this.client.put(`${appliancePath(haId)}/programs/active`, { data: programBody(programKey, options) });
  }

  async stopActiveProgram(haId: string): Promise<void> {
    this.logger?.info({ haId }, "api: stopping program");
    await this.client.delete(`${appliancePath(haId)}/programs/active`);
  }

  async getSelectedProgram(haId: string): Promise<Program | null> {
    const path = `${appliancePath(haId)}/programs/selected`;
    const body = await this.client.get(path);
    if (body === null) return null;
    return parse(ProgramResponseSchema, body, path).data;
  }

  async setSelectedProgram(haId: string, programKey: string, options?: ProgramOptionValue[]): Promise<void> {
    await this.client.put(`${appliancePath(haId)}/programs/selected`, { data: programBody(programKey, options) });
  }

  async setSelectedProgramOption(haId: string, optionKey: string, value: ItemValue): Promise<void> {
    await this.client.put(`${appliancePath(haId)}/programs/selected/options/${encodeURIComponent(optionKey)}`, {
      data: { key: optionKey, value }
    });
  }

  async getStatus(haId: string): Promise<StreamItem[]> {
    const path = `${appliancePath(haId)}/status`;
    return parse(StatusListResponseSchema, await this.client.get(path), path).data.status;
  }

  async getSettings(haId: string): Promise<StreamItem[]> {
    const path = `${appliancePath(haId)}/settings`;
    return parse(SettingListResponseSchema, await this.client.get(path), path).data.settings;
  }

  async setSetting(haId: string, settingKey: string, value: ItemValue): Promise<void> {
    this.logger?.info({ haId, settingKey, value }, "api: changing setting");
    await this.client.put(`${appliancePath(haId)}/settings/${encodeURIComponent(settingKey)}`, {
      data: { key: settingKey, value }
    });
  }

  async sendCommand(haId: string, commandKey: string): Promise<void> {
    this.logger?.info({ haId, commandKey }, "api: sending command");
    await this.client.put(`${appliancePath(haId)}/commands/${encodeURIComponent(commandKey)}`, {
      data: { key: commandKey, value: true }
    });
  }
}

function appliancePath(haId: string): string {
  return `${APPLIANCES_ENDPOINT}/${encodeURIComponent(haId)}`;
}

function programBody(programKey: string, options?: ProgramOptionValue[]): Record<string, unknown> {
  return options && options.length > 0 ? { key: programKey, options } : { key: programKey };
}

function parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("invalid-response", `GET ${path} returned an unexpected body: ${result.error.message}`);
  }
  return result.data;
}
