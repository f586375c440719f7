import type sqlite3 from "sqlite3";
import { all, run } from "../db/sqlite.js";

/**
 * Store the options of a question in the given order. Position in the input
 * becomes `option_order`, starting at 0. A failed insert leaves the earlier
 * rows in place for the surrounding transaction to roll back.
 */
export async function createLinks(
  tx: sqlite3.Database,
  questionId: number,
  orderedOptionIds: readonly number[]
): Promise<void> {
  let order = 0;
  for (const optionId of orderedOptionIds) {
    await run(
      tx,
      `INSERT INTO questions (question_id, option_id, option_order) VALUES (?, ?, ?)`,
      [questionId, optionId, order++]
    );
  }
}

export async function readLinkedOptionIds(
  db: sqlite3.Database,
  questionId: number
): Promise<number[]> {
  const rows = await all<{ option_id: number }>(
    db,
    `SELECT option_id FROM questions WHERE question_id=? ORDER BY option_order ASC`,
    [questionId]
  );
  return rows.map((r) => r.option_id);
}

export async function deleteLinksForQuestion(
  tx: sqlite3.Database,
  questionId: number
): Promise<void> {
  await run(tx, `DELETE FROM questions WHERE question_id=?`, [questionId]);
}

export async function deleteLink(
  tx: sqlite3.Database,
  questionId: number,
  optionId: number
): Promise<void> {
  await run(tx, `DELETE FROM questions WHERE question_id=? AND option_id=?`, [
    questionId,
    optionId,
  ]);
}
