import type sqlite3 from "sqlite3";
import { get, run } from "../db/sqlite.js";
import { NotFoundError } from "../domain/errors.js";
import type { Option, OptionRow } from "../domain/types.js";

export async function createOption(
  tx: sqlite3.Database,
  body: string,
  correct: boolean
): Promise<number> {
  const { lastID } = await run(
    tx,
    `INSERT INTO options (body, correct) VALUES (?, ?)`,
    [body, correct ? 1 : 0]
  );
  return lastID;
}

export async function readOption(
  db: sqlite3.Database,
  id: number
): Promise<Option> {
  const row = await get<OptionRow>(
    db,
    `SELECT id, body, correct FROM options WHERE id=?`,
    [id]
  );
  if (!row) throw new NotFoundError("Option", id);
  return toOption(row);
}

/** Zero matched rows is fine: deleting an option twice is not an error. */
export async function deleteOption(
  tx: sqlite3.Database,
  id: number
): Promise<void> {
  await run(tx, `DELETE FROM options WHERE id=?`, [id]);
}

export function toOption(row: OptionRow): Option {
  return { id: row.id, body: row.body, correct: row.correct !== 0 };
}
