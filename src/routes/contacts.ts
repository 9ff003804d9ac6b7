import { Hono } from "hono";
import { flattenError, z } from "zod";
import { deleteContact, insertContact, listContacts } from "../db/contacts.ts";
import { getPool } from "../db/pool.ts";
import { logger } from "../logger.ts";
import { limitPerHour } from "../middleware/rate-limit.ts";
import { isRecordId } from "./params.ts";

export const contacts = new Hono();

const ContactSchema = z.object({
  tenant_name: z.string().trim().max(255).default(""),
  email: z.string().trim().pipe(z.email()),
});

contacts.get("/contacts", async (c) => {
  const rows = await listContacts(getPool());
  return c.json({ contacts: rows });
});

contacts.post("/contacts", limitPerHour(10), async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = ContactSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: "invalid contact", issues: flattenError(parsed.error).fieldErrors }, 400);
  }

  const contact = await insertContact(getPool(), parsed.data);
  if (!contact) {
    logger.warn("Contact email already registered", { email: parsed.data.email });
    return c.json({ error: "email already registered" }, 409);
  }
  return c.json({ contact }, 201);
});

contacts.delete("/contacts/:id", limitPerHour(10), async (c) => {
  const { id } = c.req.param();
  if (!isRecordId(id)) return c.json({ error: "contact not found" }, 404);
  const removed = await deleteContact(getPool(), id);
  if (!removed) return c.json({ error: "contact not found" }, 404);
  return c.body(null, 204);
});
