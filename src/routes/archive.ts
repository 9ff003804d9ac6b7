import { Hono } from "hono";
import { listArchivedAgreements, restoreAgreement } from "../db/agreements.ts";
import { getPool } from "../db/pool.ts";
import { logger } from "../logger.ts";
import { limitPerHour } from "../middleware/rate-limit.ts";
import { withAlertStatus } from "../pipeline/record.ts";
import { isRecordId } from "./params.ts";

export const archive = new Hono();

// Archived records are shown as stored: no re-normalization, no alert tier
archive.get("/archive", async (c) => {
  const rows = await listArchivedAgreements(getPool());
  return c.json({ agreements: rows });
});

archive.post("/archive/:id/restore", limitPerHour(20), async (c) => {
  const { id } = c.req.param();
  if (!isRecordId(id)) return c.json({ error: "archived agreement not found" }, 404);
  const restored = await restoreAgreement(getPool(), id);
  if (!restored) {
    logger.warn("Restore requested for unknown archived agreement", { agreement_id: id });
    return c.json({ error: "archived agreement not found" }, 404);
  }
  logger.info("Agreement restored", { agreement_id: id });
  return c.json({ agreement: withAlertStatus(restored) });
});
