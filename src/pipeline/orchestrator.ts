import { metrics, SpanStatusCode, trace } from "@opentelemetry/api";
import type { Pool } from "pg";
import { insertAgreement } from "../db/agreements.ts";
import { logger } from "../logger.ts";
import type { Agreement } from "../types/agreements.ts";
import { extractAgreementFields } from "./extract.ts";
import { ingestDocument } from "./ingest.ts";
import { normalizeAgreement, withAlertStatus } from "./record.ts";

const tracer = trace.getTracer("lease-alerts");
const meter = metrics.getMeter("lease-alerts");

const processingDuration = meter.createHistogram("agreement.processing.duration", {
  description: "Upload-to-record duration for one agreement",
  unit: "s",
});
const agreementsProcessed = meter.createCounter("agreement.processed.count", {
  description: "Agreements stored, by alert tier at ingestion",
});
const extractionTokens = meter.createHistogram("agreement.extraction.tokens", {
  description: "LLM tokens spent extracting one agreement",
  unit: "{token}",
});

/** Ingest, extract, normalize and store one uploaded agreement. */
export async function processAgreement(
  file: File,
  pool: Pool,
  today: Date = new Date(),
): Promise<Agreement> {
  const startMs = Date.now();

  return tracer.startActiveSpan("process_agreement", async (rootSpan) => {
    rootSpan.setAttribute("document.filename", file.name);
    rootSpan.setAttribute("document.size_bytes", file.size);
    rootSpan.setAttribute("document.content_type", file.type);

    logger.info("Agreement processing started", { filename: file.name, size_bytes: file.size });

    try {
      const ingestResult = await tracer.startActiveSpan("pipeline_stage ingest", async (span) => {
        span.setAttribute("pipeline.stage", "ingest");
        try {
          const result = await ingestDocument(file);
          span.setAttribute("document.page_count", result.page_count);
          span.setAttribute("document.total_characters", result.total_characters);
          return result;
        } finally {
          span.end();
        }
      });

      const extractResult = await tracer.startActiveSpan("pipeline_stage extract", async (span) => {
        span.setAttribute("pipeline.stage", "extract");
        try {
          const result = await extractAgreementFields(ingestResult.full_text);
          span.setAttribute("gen_ai.request.model", result.model_id);
          span.setAttribute("gen_ai.usage.input_tokens", result.input_tokens);
          span.setAttribute("gen_ai.usage.output_tokens", result.output_tokens);
          extractionTokens.record(result.input_tokens + result.output_tokens, {
            "gen_ai.request.model": result.model_id,
          });
          return result;
        } finally {
          span.end();
        }
      });

      const row = await tracer.startActiveSpan("pipeline_stage store", async (span) => {
        span.setAttribute("pipeline.stage", "store");
        try {
          const fields = normalizeAgreement(extractResult.fields);
          return await insertAgreement(pool, fields, file.name);
        } finally {
          span.end();
        }
      });

      const agreement = withAlertStatus(row, today);
      const durationMs = Date.now() - startMs;

      rootSpan.setAttribute("agreement.id", agreement.id);
      rootSpan.setAttribute("agreement.alert_status", agreement.alert_status || "none");
      rootSpan.setAttribute("pipeline.duration_ms", durationMs);
      processingDuration.record(durationMs / 1000, { "document.type": file.type });
      agreementsProcessed.add(1, { alert_status: agreement.alert_status || "none" });

      logger.info("Agreement processing complete", {
        filename: file.name,
        agreement_id: agreement.id,
        alert_status: agreement.alert_status,
        duration_ms: durationMs,
      });
      return agreement;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Agreement processing failed", { filename: file.name, error: message });
      if (err instanceof Error) rootSpan.recordException(err);
      rootSpan.setStatus({ code: SpanStatusCode.ERROR, message });
      throw err;
    } finally {
      rootSpan.end();
    }
  });
}
