import type sqlite3 from "sqlite3";
import { all, exclusive, get, run, withTransaction } from "../db/sqlite.js";
import { initialize } from "../db/schema.js";
import { NotFoundError, PersistenceError } from "../domain/errors.js";
import type {
  AddOption,
  Option,
  Question,
  QuestionBodyRow,
  QuestionInput,
} from "../domain/types.js";
import { logger } from "../logger.js";
import { createOption, deleteOption, readOption } from "./option.service.js";
import {
  createLinks,
  deleteLinksForQuestion,
  readLinkedOptionIds,
} from "./link.service.js";

/**
 * Insert a question body and its options, then link them in input order.
 * Nothing from a failed attempt stays visible.
 */
export async function createQuestion(
  db: sqlite3.Database,
  body: string,
  orderedOptions: readonly AddOption[]
): Promise<number> {
  const id = await withTransaction(db, (tx) =>
    insertQuestion(tx, body, orderedOptions)
  );
  logger.debug(`Created question ${id} with ${orderedOptions.length} options`);
  return id;
}

/** The writes of `createQuestion`, inside a transaction the caller owns. */
export async function insertQuestion(
  tx: sqlite3.Database,
  body: string,
  orderedOptions: readonly AddOption[]
): Promise<number> {
  const { lastID: questionId } = await run(
    tx,
    `INSERT INTO question_bodies (body) VALUES (?)`,
    [body]
  );

  const optionIds: number[] = [];
  for (const option of orderedOptions) {
    optionIds.push(await createOption(tx, option.body, option.correct));
  }

  await createLinks(tx, questionId, optionIds);
  return questionId;
}

export async function readQuestion(
  db: sqlite3.Database,
  id: number
): Promise<Question> {
  const row = await get<QuestionBodyRow>(
    db,
    `SELECT id, body FROM question_bodies WHERE id=?`,
    [id]
  );
  if (!row) throw new NotFoundError("Question", id);

  return { id: row.id, body: row.body, options: await readOptions(db, row.id) };
}

/** One query per question and one per option; fine for a quiz-sized table. */
export async function readAllQuestions(
  db: sqlite3.Database
): Promise<Question[]> {
  const rows = await all<QuestionBodyRow>(
    db,
    `SELECT id, body FROM question_bodies ORDER BY id ASC`
  );

  const questions: Question[] = [];
  for (const row of rows) {
    questions.push({
      id: row.id,
      body: row.body,
      options: await readOptions(db, row.id),
    });
  }
  return questions;
}

/**
 * Full replace. Every option row of the question is deleted and recreated,
 * so option ids change on each update even when the content does not.
 *
 * The caller is expected to pass a question obtained from a prior read.
 * Options it dropped are removed along with the ones it kept; an option id
 * owned by another question breaks that question's links and the commit
 * fails on foreign keys.
 */
export async function updateQuestion(
  db: sqlite3.Database,
  question: QuestionInput
): Promise<void> {
  await withTransaction(db, async (tx) => {
    const { changes } = await run(
      tx,
      `UPDATE question_bodies SET body=? WHERE id=?`,
      [question.body, question.id]
    );
    if (changes === 0) throw new NotFoundError("Question", question.id);

    const linked = await readLinkedOptionIds(tx, question.id);
    await deleteLinksForQuestion(tx, question.id);

    const optionIds: number[] = [];
    for (const option of question.options) {
      if (option.id !== undefined) await deleteOption(tx, option.id);
      optionIds.push(await createOption(tx, option.body, option.correct));
    }

    const supplied = new Set(question.options.map((o) => o.id));
    for (const staleId of linked) {
      if (!supplied.has(staleId)) await deleteOption(tx, staleId);
    }

    await createLinks(tx, question.id, optionIds);
  });

  logger.debug(
    `Updated question ${question.id} with ${question.options.length} options`
  );
}

/** Options first, then links, then the body row. */
export async function deleteQuestion(
  db: sqlite3.Database,
  question: QuestionInput
): Promise<void> {
  await withTransaction(db, async (tx) => {
    const optionIds = new Set<number>();
    for (const option of question.options) {
      if (option.id !== undefined) optionIds.add(option.id);
    }
    for (const linkedId of await readLinkedOptionIds(tx, question.id)) {
      optionIds.add(linkedId);
    }

    for (const optionId of optionIds) await deleteOption(tx, optionId);
    await deleteLinksForQuestion(tx, question.id);

    const { changes } = await run(
      tx,
      `DELETE FROM question_bodies WHERE id=?`,
      [question.id]
    );
    if (changes === 0) throw new NotFoundError("Question", question.id);
  });

  logger.debug(`Deleted question ${question.id}`);
}

async function readOptions(
  db: sqlite3.Database,
  questionId: number
): Promise<Option[]> {
  const options: Option[] = [];
  for (const optionId of await readLinkedOptionIds(db, questionId)) {
    try {
      options.push(await readOption(db, optionId));
    } catch (e) {
      if (e instanceof NotFoundError) {
        throw new PersistenceError(
          `Question ${questionId} links missing option ${optionId}`,
          { cause: e }
        );
      }
      throw e;
    }
  }
  return options;
}

/* ------------------------- connection-bound service ------------------------- */

export interface QuestionService {
  initialize(): Promise<void>;
  createQuestion(body: string, options: readonly AddOption[]): Promise<number>;
  getQuestion(id: number): Promise<Question>;
  getAllQuestions(): Promise<Question[]>;
  updateQuestion(question: QuestionInput): Promise<void>;
  deleteQuestion(question: QuestionInput): Promise<void>;
}

/** Every call runs alone on `db`, in arrival order. */
export const createQuestionService = (
  db: sqlite3.Database
): QuestionService => ({
  initialize: () => exclusive(db, () => initialize(db)),
  createQuestion: (body, options) =>
    exclusive(db, () => createQuestion(db, body, options)),
  getQuestion: (id) => exclusive(db, () => readQuestion(db, id)),
  getAllQuestions: () => exclusive(db, () => readAllQuestions(db)),
  updateQuestion: (question) =>
    exclusive(db, () => updateQuestion(db, question)),
  deleteQuestion: (question) =>
    exclusive(db, () => deleteQuestion(db, question)),
});
