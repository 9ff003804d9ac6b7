import { metrics } from "@opentelemetry/api";
import type { MiddlewareHandler } from "hono";

const meter = metrics.getMeter("lease-alerts");

const requestDuration = meter.createHistogram("http.server.request.duration", {
  description: "HTTP server request duration",
  unit: "s",
});

const activeRequests = meter.createUpDownCounter("http.server.active_requests", {
  description: "Requests currently being handled",
});

const serverErrors = meter.createCounter("http.server.error.count", {
  description: "Responses with a 5xx status",
});

export const requestMetrics: MiddlewareHandler = async (c, next) => {
  const method = c.req.method;
  const start = performance.now();
  activeRequests.add(1, { "http.request.method": method });

  try {
    await next();
  } finally {
    activeRequests.add(-1, { "http.request.method": method });
  }

  // Route pattern, not raw path, so agreement ids stay out of metric labels
  const attrs = {
    "http.request.method": method,
    "http.response.status_code": c.res.status,
    "http.route": c.req.routePath,
  };
  requestDuration.record((performance.now() - start) / 1000, attrs);
  if (c.res.status >= 500) serverErrors.add(1, attrs);
};
