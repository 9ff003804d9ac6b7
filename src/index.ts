import { shutdownTelemetry } from "./telemetry.ts";

import { serve } from "@hono/node-server";
import { app } from "./app.ts";
import { config } from "./config.ts";
import { closePool } from "./db/pool.ts";
import { logger } from "./logger.ts";

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info("Lease alerts service listening", { port: info.port, env: config.nodeEnv });
});

async function shutdown(signal: string): Promise<void> {
  logger.info("Shutting down", { signal });
  server.close();
  await closePool();
  await shutdownTelemetry();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  });
}
