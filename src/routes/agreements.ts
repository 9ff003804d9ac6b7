import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { config } from "../config.ts";
import { archiveAgreement, findAgreementById, listAgreements } from "../db/agreements.ts";
import { getPool } from "../db/pool.ts";
import { csvFilename, toAgreementsCsv } from "../export/csv.ts";
import { logger } from "../logger.ts";
import { limitPerHour } from "../middleware/rate-limit.ts";
import { errorCode } from "../pipeline/ingest.ts";
import { processAgreement } from "../pipeline/orchestrator.ts";
import { withAlertStatus } from "../pipeline/record.ts";
import { isRecordId } from "./params.ts";

export const agreements = new Hono();

const ALLOWED_TYPES = ["application/pdf", "text/plain"];

// POST /api/agreements: upload, extract, normalize, store
agreements.post(
  "/agreements",
  bodyLimit({
    maxSize: config.maxUploadBytes,
    onError: (c) =>
      c.json({ error: `file too large, limit is ${config.maxUploadBytes} bytes` }, 413),
  }),
  async (c) => {
    if (!c.req.header("Content-Type")?.toLowerCase().startsWith("multipart/form-data")) {
      return c.json({ error: "field 'file' is required (multipart/form-data)" }, 400);
    }
    const formData = await c.req.formData();
    const file = formData.get("file");

    if (!file || !(file instanceof File)) {
      return c.json({ error: "field 'file' is required (multipart/form-data)" }, 400);
    }
    if (!ALLOWED_TYPES.some((t) => file.type === t || file.type.startsWith(`${t};`))) {
      return c.json(
        { error: `unsupported file type '${file.type}', use application/pdf or text/plain` },
        415,
      );
    }

    try {
      const agreement = await processAgreement(file, getPool());
      return c.json({ agreement }, 201);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const code = errorCode(err);
      if (code === "PARSE_ERROR" || code === "EMPTY_DOCUMENT") {
        return c.json({ error: message }, 422);
      }
      logger.error("Agreement upload failed", { filename: file.name, error: message });
      return c.json({ error: "agreement processing failed" }, 500);
    }
  },
);

// GET /api/agreements: every active agreement with a fresh alert tier
agreements.get("/agreements", async (c) => {
  const rows = await listAgreements(getPool());
  const today = new Date();
  return c.json({ agreements: rows.map((row) => withAlertStatus(row, today)) });
});

// GET /api/agreements/export.csv: registered before /:id so it is not taken as an id
agreements.get("/agreements/export.csv", async (c) => {
  const now = new Date();
  const rows = await listAgreements(getPool());
  const csv = toAgreementsCsv(rows.map((row) => withAlertStatus(row, now)));

  logger.info("CSV export generated", { agreements: rows.length });
  return c.body(csv, 200, {
    "Content-Type": "text/csv; charset=utf-8",
    "Content-Disposition": `attachment; filename=${csvFilename(now)}`,
  });
});

agreements.get("/agreements/:id", async (c) => {
  const { id } = c.req.param();
  if (!isRecordId(id)) return c.json({ error: "agreement not found" }, 404);
  const row = await findAgreementById(getPool(), id);
  if (!row) return c.json({ error: "agreement not found" }, 404);
  return c.json({ agreement: withAlertStatus(row) });
});

// DELETE /api/agreements/:id: moves the record to the archive
agreements.delete("/agreements/:id", limitPerHour(20), async (c) => {
  const { id } = c.req.param();
  if (!isRecordId(id)) return c.json({ error: "agreement not found" }, 404);
  const archived = await archiveAgreement(getPool(), id);
  if (!archived) {
    logger.warn("Archive requested for unknown agreement", { agreement_id: id });
    return c.json({ error: "agreement not found" }, 404);
  }
  logger.info("Agreement archived", { agreement_id: id });
  return c.json({ archived });
});
