import { DiagConsoleLogger, DiagLogLevel, diag } from "@opentelemetry/api";
import { logs } from "@opentelemetry/api-logs";
import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { PgInstrumentation } from "@opentelemetry/instrumentation-pg";
import { BatchLogRecordProcessor, LoggerProvider } from "@opentelemetry/sdk-logs";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeSDK } from "@opentelemetry/sdk-node";

// Read from env, not config.ts: this module loads first and config.ts would pull in pg
const otelEnabled = process.env.OTEL_ENABLED !== "false";
const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";
const serviceName = process.env.OTEL_SERVICE_NAME ?? "lease-alerts";

let sdk: NodeSDK | null = null;
let loggerProvider: LoggerProvider | null = null;

if (otelEnabled) {
  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.WARN);

  // One metric reader owned by the SDK; started before pg loads so the
  // instrumentation can patch it
  sdk = new NodeSDK({
    serviceName,
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` }),
      exportIntervalMillis: 15_000,
      exportTimeoutMillis: 10_000,
    }),
    instrumentations: [new PgInstrumentation({ enhancedDatabaseReporting: false })],
  });
  sdk.start();

  loggerProvider = new LoggerProvider({
    processors: [new BatchLogRecordProcessor(new OTLPLogExporter({ url: `${endpoint}/v1/logs` }))],
  });
  logs.setGlobalLoggerProvider(loggerProvider);
}

/** Flush pending spans, metrics and log records. No-op when telemetry is off. */
export async function shutdownTelemetry(): Promise<void> {
  await Promise.all([sdk?.shutdown(), loggerProvider?.shutdown()]);
  sdk = null;
  loggerProvider = null;
}
