import { fileURLToPath } from "node:url";
import { buildServer } from "./server";
import { loadBridgeConfig } from "./config";

export { buildServer } from "./server";
export { loadBridgeConfig, BridgeConfigSchema, type BridgeConfig } from "./config";

async function main(): Promise<void> {
  try {
    const config = loadBridgeConfig();
    const server = await buildServer({ config });
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`stream-bridge listening on ${config.host}:${String(config.port)}`);
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`stream-bridge failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
