import { Hono } from "hono";
import { logger } from "./logger.ts";
import { requestMetrics } from "./middleware/metrics.ts";
import { agreements } from "./routes/agreements.ts";
import { alerts } from "./routes/alerts.ts";
import { archive } from "./routes/archive.ts";
import { contacts } from "./routes/contacts.ts";
import { health } from "./routes/health.ts";

const app = new Hono();

app.use("*", requestMetrics);

app.route("/", health);
app.route("/api", agreements);
app.route("/api", archive);
app.route("/api", contacts);
app.route("/api", alerts);

app.notFound((c) => c.json({ error: "not found" }, 404));
app.onError((err, c) => {
  logger.error("Unhandled error", { error: err.message, path: c.req.path, method: c.req.method });
  return c.json({ error: "internal server error" }, 500);
});

export { app };
