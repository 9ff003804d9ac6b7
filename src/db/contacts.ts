import type { Pool } from "pg";
import type { TenantContact } from "../types/agreements.ts";

export async function listContacts(pool: Pool): Promise<TenantContact[]> {
  const result = await pool.query<TenantContact>(
    "SELECT * FROM tenant_contacts ORDER BY created_at",
  );
  return result.rows;
}

/** Returns null when the email is already registered. */
export async function insertContact(
  pool: Pool,
  data: { tenant_name: string; email: string },
): Promise<TenantContact | null> {
  const result = await pool.query<TenantContact>(
    `INSERT INTO tenant_contacts (tenant_name, email)
     VALUES ($1, $2)
     ON CONFLICT (email) DO NOTHING
     RETURNING *`,
    [data.tenant_name, data.email],
  );
  return result.rows[0] ?? null;
}

export async function deleteContact(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query("DELETE FROM tenant_contacts WHERE id = $1", [id]);
  return (result.rowCount ?? 0) > 0;
}
