import { Hono } from "hono";
import { flattenError, z } from "zod";
import { config } from "../config.ts";
import { listAgreements } from "../db/agreements.ts";
import { listContacts } from "../db/contacts.ts";
import { getPool } from "../db/pool.ts";
import { logger } from "../logger.ts";
import { limitPerHour } from "../middleware/rate-limit.ts";
import { dispatchAlerts } from "../notify/dispatch.ts";
import { createSmtpSender, type NotificationSender } from "../notify/email.ts";
import { buildTestEmail } from "../notify/templates.ts";
import { withAlertStatus } from "../pipeline/record.ts";

export const alerts = new Hono();

let sender: NotificationSender | null = null;

function getSender(): NotificationSender {
  sender ??= createSmtpSender({
    host: config.smtpHost,
    port: config.smtpPort,
    user: config.smtpUser,
    password: config.smtpPassword,
    senderEmail: config.senderEmail,
    senderName: config.senderName,
  });
  return sender;
}

// POST /api/alerts/send: email every tenant with an active expiry alert
alerts.post("/alerts/send", limitPerHour(5), async (c) => {
  const pool = getPool();
  const contactRows = await listContacts(pool);
  if (contactRows.length === 0) {
    return c.json({ error: "no tenant contacts configured" }, 409);
  }

  const now = new Date();
  const rows = await listAgreements(pool);
  const summary = await dispatchAlerts(
    rows.map((row) => withAlertStatus(row, now)),
    contactRows,
    getSender(),
    now,
  );

  logger.info("Alert dispatch finished", { ...summary });
  return c.json(summary);
});

const TestEmailSchema = z.object({ email: z.string().trim().pipe(z.email()) });

// POST /api/alerts/test: check SMTP settings with a single message
alerts.post("/alerts/test", limitPerHour(5), async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = TestEmailSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: "invalid request", issues: flattenError(parsed.error).fieldErrors }, 400);
  }

  const { subject, html } = buildTestEmail();
  const result = await getSender().send({ to: parsed.data.email, subject, html });
  if (!result.ok) return c.json({ error: result.error }, 502);
  return c.json({ sent: true, message_id: result.messageId });
});
