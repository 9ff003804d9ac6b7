import type { Pool } from "pg";
import {
  AGREEMENT_FIELD_NAMES,
  type AgreementFields,
  type AgreementRow,
  type ArchivedAgreementRow,
} from "../types/agreements.ts";

const FIELD_COLUMNS = AGREEMENT_FIELD_NAMES.join(", ");

// $1..$n for the agreement fields, offset past any leading parameters
function fieldPlaceholders(offset: number): string {
  return AGREEMENT_FIELD_NAMES.map((_, i) => `$${i + offset + 1}`).join(", ");
}

function fieldValues(fields: AgreementFields): Array<string | boolean> {
  return AGREEMENT_FIELD_NAMES.map((name) => fields[name]);
}

export async function insertAgreement(
  pool: Pool,
  fields: AgreementFields,
  sourceFilename: string | null,
): Promise<AgreementRow> {
  const result = await pool.query<AgreementRow>(
    `INSERT INTO agreements (source_filename, ${FIELD_COLUMNS})
     VALUES ($1, ${fieldPlaceholders(1)})
     RETURNING *`,
    [sourceFilename, ...fieldValues(fields)],
  );
  const inserted = result.rows[0];
  if (!inserted) throw new Error("INSERT into agreements returned no rows");
  return inserted;
}

export async function listAgreements(pool: Pool): Promise<AgreementRow[]> {
  const result = await pool.query<AgreementRow>(
    "SELECT * FROM agreements ORDER BY uploaded_at DESC",
  );
  return result.rows;
}

export async function findAgreementById(pool: Pool, id: string): Promise<AgreementRow | null> {
  const result = await pool.query<AgreementRow>("SELECT * FROM agreements WHERE id = $1", [id]);
  return result.rows[0] ?? null;
}

export async function listArchivedAgreements(pool: Pool): Promise<ArchivedAgreementRow[]> {
  const result = await pool.query<ArchivedAgreementRow>(
    "SELECT * FROM archived_agreements ORDER BY archived_at DESC",
  );
  return result.rows;
}

/**
 * Move an agreement into the archive. Delete and insert share one transaction, so the
 * record is never in both tables or in neither. Returns null when the id is unknown.
 */
export async function archiveAgreement(
  pool: Pool,
  id: string,
): Promise<ArchivedAgreementRow | null> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const removed = await client.query<AgreementRow>(
      "DELETE FROM agreements WHERE id = $1 RETURNING *",
      [id],
    );
    const row = removed.rows[0];
    if (!row) {
      await client.query("ROLLBACK");
      return null;
    }

    const archived = await client.query<ArchivedAgreementRow>(
      `INSERT INTO archived_agreements (id, source_filename, uploaded_at, restored_at, ${FIELD_COLUMNS})
       VALUES ($1, $2, $3, $4, ${fieldPlaceholders(4)})
       RETURNING *`,
      [row.id, row.source_filename, row.uploaded_at, row.restored_at, ...fieldValues(row)],
    );
    await client.query("COMMIT");
    return archived.rows[0] ?? null;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

/** Move an archived agreement back to the active set, stamping restored_at. */
export async function restoreAgreement(pool: Pool, id: string): Promise<AgreementRow | null> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const removed = await client.query<ArchivedAgreementRow>(
      "DELETE FROM archived_agreements WHERE id = $1 RETURNING *",
      [id],
    );
    const row = removed.rows[0];
    if (!row) {
      await client.query("ROLLBACK");
      return null;
    }

    const restored = await client.query<AgreementRow>(
      `INSERT INTO agreements (id, source_filename, uploaded_at, restored_at, ${FIELD_COLUMNS})
       VALUES ($1, $2, $3, now(), ${fieldPlaceholders(3)})
       RETURNING *`,
      [row.id, row.source_filename, row.uploaded_at, ...fieldValues(row)],
    );
    await client.query("COMMIT");
    return restored.rows[0] ?? null;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}
