import { z } from "zod";

// Postgres accepts any 8-4-4-4-12 hex id, not only RFC 4122 variants
const RecordIdSchema = z.guid();

/** Path ids that could never match a UUID column are treated as not found. */
export function isRecordId(id: string): boolean {
  return RecordIdSchema.safeParse(id).success;
}
