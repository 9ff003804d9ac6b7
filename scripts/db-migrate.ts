import { readFileSync } from "node:fs";
import pg from "pg";
import { config } from "../src/config.ts";

async function migrate() {
  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  try {
    const schema = readFileSync(new URL("../db/schema.sql", import.meta.url), "utf-8");
    await pool.query(schema);
    console.log("Migration complete");
  } finally {
    await pool.end();
  }
}

await migrate();
