import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { ItemValueSchema, ProgramRequestSchema } from "@hc-bridge/schemas";
import type { ApplianceApi } from "@hc-bridge/driver-home-connect";
import type { ApplianceRegistry } from "../core/registry";
import { sendApiError } from "./errors";

const RegisterBodySchema = z.object({
  haId: z.string().min(1),
  name: z.string().optional(),
  type: z.string().optional()
});

const SettingBodySchema = z.object({
  value: ItemValueSchema
});

interface ApplianceRoute {
  Params: { haId: string };
}

interface ApplianceKeyRoute {
  Params: { haId: string; key: string };
}

interface ApplianceDeps {
  api: ApplianceApi;
  registry: ApplianceRegistry;
}

export function registerApplianceRoutes(app: FastifyInstance, deps: ApplianceDeps): void {
  const { api, registry } = deps;

  const notRegistered = (reply: FastifyReply, haId: string): FastifyReply =>
    reply.status(404).send({ error: "not-registered", message: `appliance ${haId} is not registered` });

  app.get("/appliances", () => ({ appliances: registry.list() }));

  app.post("/appliances", (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = RegisterBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid appliance", issues: parsed.error.issues });
    }
    return reply.status(201).send(registry.register(parsed.data));
  });

  app.delete<ApplianceRoute>("/appliances/:haId", (request, reply) => {
    const { haId } = request.params;
    if (!registry.unregister(haId)) return notRegistered(reply, haId);
    return reply.status(204).send();
  });

  app.post("/appliances/discover", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const appliances = await api.listAppliances();
      const registered = appliances.map((appliance) =>
        registry.register({ haId: appliance.haId, name: appliance.name, type: appliance.type })
      );
      return { appliances: registered };
    } catch (err) {
      return sendApiError(reply, err);
    }
  });

  app.get<ApplianceRoute>("/appliances/:haId/programs/active", async (request, reply) => {
    const { haId } = request.params;
    if (!registry.has(haId)) return notRegistered(reply, haId);
    try {
      return { program: await api.getActiveProgram(haId) };
    } catch (err) {
      return sendApiError(reply, err);
    }
  });

  app.post<ApplianceRoute>("/appliances/:haId/programs/active", async (request, reply) => {
    const { haId } = request.params;
    if (!registry.has(haId)) return notRegistered(reply, haId);
    const parsed = ProgramRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid program request", issues: parsed.error.issues });
    }
    try {
      await api.setActiveProgram(haId, parsed.data.programKey, parsed.data.options);
      return reply.status(204).send();
    } catch (err) {
      return sendApiError(reply, err);
    }
  });

  app.delete<ApplianceRoute>("/appliances/:haId/programs/active", async (request, reply) => {
    const { haId } = request.params;
    if (!registry.has(haId)) return notRegistered(reply, haId);
    try {
      await api.stopActiveProgram(haId);
      return reply.status(204).send();
    } catch (err) {
      return sendApiError(reply, err);
    }
  });

  app.get<ApplianceRoute>("/appliances/:haId/status", async (request, reply) => {
    const { haId } = request.params;
    if (!registry.has(haId)) return notRegistered(reply, haId);
    try {
      return { status: await api.getStatus(haId) };
    } catch (err) {
      return sendApiError(reply, err);
    }
  });

  app.put<ApplianceKeyRoute>(
    "/appliances/:haId/settings/:key",
    async (request, reply) => {
      const { haId, key } = request.params;
      if (!registry.has(haId)) return notRegistered(reply, haId);
      const parsed = SettingBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid setting", issues: parsed.error.issues });
      }
      try {
        await api.setSetting(haId, key, parsed.data.value);
        return reply.status(204).send();
      } catch (err) {
        return sendApiError(reply, err);
      }
    }
  );

  app.post<ApplianceKeyRoute>(
    "/appliances/:haId/commands/:key",
    async (request, reply) => {
      const { haId, key } = request.params;
      if (!registry.has(haId)) return notRegistered(reply, haId);
      try {
        await api.sendCommand(haId, key);
        return reply.status(204).send();
      } catch (err) {
        return sendApiError(reply, err);
      }
    }
  );
}
