import path from "node:path";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type sqlite3 from "sqlite3";
import { logger } from "../logger.js";
import { exec, withTransaction } from "./sqlite.js";

/**
 * Create the `options`, `question_bodies` and `questions` tables. Meant for a
 * fresh database: the DDL has no IF NOT EXISTS, so a second run fails. The
 * three statements apply together or not at all.
 */
export async function initialize(conn: sqlite3.Database): Promise<void> {
  await withTransaction(conn, (tx) => applySchema(tx));
}

/** The DDL alone, for callers that already hold a transaction. */
export async function applySchema(tx: sqlite3.Database): Promise<void> {
  const schemaPath = locateSchemaPath();
  await exec(tx, fs.readFileSync(schemaPath, "utf8"));
  logger.info(`Applied schema from ${schemaPath}`);
}

function locateSchemaPath(): string {
  // Prefer a copy next to this module (dist/db/schema.sql after build)
  const here = path.dirname(fileURLToPath(import.meta.url));
  const besideModule = path.resolve(here, "schema.sql");
  if (fs.existsSync(besideModule)) return besideModule;

  // Fallback: dev path from project root
  const devCandidate = path.resolve(process.cwd(), "src", "db", "schema.sql");
  if (fs.existsSync(devCandidate)) return devCandidate;

  throw new Error("schema.sql not found in dist/db or src/db");
}
