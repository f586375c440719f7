import fs from "node:fs";
import path from "node:path";
import type sqlite3 from "sqlite3";
import { logger } from "../logger.js";
import { tableExists, withTransaction } from "./sqlite.js";
import { applySchema } from "./schema.js";
import { insertQuestion } from "../services/question.service.js";
import type { AddQuestion } from "../domain/types.js";
import { parseWith, SeedFileSchema } from "../domain/schemas.js";

export const DEFAULT_SEED: readonly AddQuestion[] = [
  {
    body: "a",
    options: [
      { body: "b", correct: true },
      { body: "c", correct: false },
    ],
  },
];

/**
 * First-run setup: on a database without our tables, create the schema and
 * insert the seed questions in one transaction, so a failed seed leaves no
 * tables behind and the next start tries again. A database that already has
 * them is left alone.
 * @returns whether the schema was created and seeded
 */
export async function bootstrap(
  db: sqlite3.Database,
  seed: readonly AddQuestion[] = DEFAULT_SEED
): Promise<boolean> {
  if (await tableExists(db, "question_bodies")) {
    logger.info("Schema already present, skipping seed");
    return false;
  }

  await withTransaction(db, async (tx) => {
    await applySchema(tx);
    for (const q of seed) {
      await insertQuestion(tx, q.body, q.options);
    }
  });
  logger.info(`Seeded ${seed.length} question(s)`);
  return true;
}

export function readSeedFile(filePath: string): AddQuestion[] {
  const raw = fs.readFileSync(path.resolve(filePath), "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`${filePath} is not valid JSON`, { cause: e });
  }
  return parseWith(SeedFileSchema, parsed, `seed file ${filePath}`);
}
