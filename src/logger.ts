import { trace } from "@opentelemetry/api";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";

const otelLogger = logs.getLogger("lease-alerts");

type LogAttrs = Record<string, string | number | boolean | undefined>;

const LEVEL_FLOOR: Record<string, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

// Read directly from env, same as telemetry.ts: config.ts may not have loaded yet
const minSeverity = LEVEL_FLOOR[process.env.LOG_LEVEL ?? "info"] ?? SeverityNumber.INFO;

function emit(
  severityNumber: SeverityNumber,
  severityText: string,
  message: string,
  attrs?: LogAttrs,
) {
  if (severityNumber < minSeverity) return;

  const span = trace.getActiveSpan();
  const ctx = span?.spanContext();

  otelLogger.emit({
    severityNumber,
    severityText,
    body: message,
    attributes: {
      ...attrs,
      ...(ctx
        ? {
            trace_id: ctx.traceId,
            span_id: ctx.spanId,
          }
        : {}),
    },
  });

  // Mirror to stdout so local dev sees logs without needing a backend
  const record: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level: severityText,
    msg: message,
    ...attrs,
    ...(ctx ? { trace_id: ctx.traceId, span_id: ctx.spanId } : {}),
  };
  const line = JSON.stringify(record);
  if (severityNumber >= SeverityNumber.ERROR) {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

export const logger = {
  debug: (msg: string, attrs?: LogAttrs) => emit(SeverityNumber.DEBUG, "DEBUG", msg, attrs),
  info: (msg: string, attrs?: LogAttrs) => emit(SeverityNumber.INFO, "INFO", msg, attrs),
  warn: (msg: string, attrs?: LogAttrs) => emit(SeverityNumber.WARN, "WARN", msg, attrs),
  error: (msg: string, attrs?: LogAttrs) => emit(SeverityNumber.ERROR, "ERROR", msg, attrs),
};
