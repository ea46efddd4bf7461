import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { HomeConnectStreamDriver } from "@hc-bridge/driver-home-connect";

const ApiUrlBodySchema = z.object({
  apiUrl: z.string().url()
});

interface StreamDeps {
  driver: HomeConnectStreamDriver;
}

export function registerStreamRoutes(app: FastifyInstance, deps: StreamDeps): void {
  const { driver } = deps;

  app.post("/stream/connect", async () => {
    await driver.connect();
    return driver.getStatus();
  });

  app.post("/stream/disconnect", async () => {
    await driver.disconnect();
    return driver.getStatus();
  });

  app.post("/stream/refresh", async () => {
    await driver.refresh();
    return driver.getStatus();
  });

  app.post("/stream/clear-rate-limit", () => {
    driver.clearRateLimit();
    return driver.getStatus();
  });

  app.put("/stream/api-url", (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = ApiUrlBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid API URL", issues: parsed.error.issues });
    }
    driver.setApiUrl(parsed.data.apiUrl);
    return driver.getStatus();
  });
}
