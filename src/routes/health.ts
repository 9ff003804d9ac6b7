import { Hono } from "hono";
import { getPool } from "../db/pool.ts";
import { logger } from "../logger.ts";

const health = new Hono();

health.get("/health", async (c) => {
  const pool = getPool();
  try {
    await pool.query("SELECT 1");
    return c.json({ status: "ok", db: "connected" });
  } catch (err) {
    logger.warn("Health check failed", { error: err instanceof Error ? err.message : String(err) });
    return c.json({ status: "error", db: "disconnected" }, 503);
  }
});

export { health };
