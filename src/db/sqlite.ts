import sqlite3 from "sqlite3";
import path from "node:path";
import fs from "node:fs";
import { logger } from "../logger.js";
import { PersistenceError } from "../domain/errors.js";

export type SqlParam = string | number | null;

export interface RunResult {
  lastID: number;
  changes: number;
}

/**
 * Open a connection, turn on foreign keys and return it. `:memory:` skips
 * directory creation and WAL, which an in-memory database cannot use.
 */
export async function openDb(dbFile: string): Promise<sqlite3.Database> {
  const inMemory = dbFile === ":memory:";
  if (!inMemory) {
    const dir = path.dirname(dbFile);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const conn = await new Promise<sqlite3.Database>((resolve, reject) => {
    const handle: sqlite3.Database = new sqlite3.Database(dbFile, (err) =>
      err ? reject(wrap(err, `open ${dbFile}`)) : resolve(handle)
    );
  });

  await exec(conn, "PRAGMA foreign_keys = ON;");
  if (!inMemory) await exec(conn, "PRAGMA journal_mode = WAL;");

  return conn;
}

/** Connection for the HTTP entry point, with verbose stack traces. */
export async function initDb(dbFile: string): Promise<sqlite3.Database> {
  sqlite3.verbose();
  const conn = await openDb(dbFile);
  logger.info(`SQLite ready at ${dbFile}`);
  return conn;
}

export function closeDb(conn: sqlite3.Database): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    conn.close((err) => (err ? reject(wrap(err, "close")) : resolve()));
  });
}

/* ------------ small typed helpers ------------ */

export function exec(conn: sqlite3.Database, sql: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    conn.exec(sql, (err) => (err ? reject(wrap(err, sql)) : resolve()));
  });
}

export function run(
  conn: sqlite3.Database,
  sql: string,
  params: readonly SqlParam[] = []
): Promise<RunResult> {
  return new Promise<RunResult>((resolve, reject) => {
    conn.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) {
        reject(wrap(err, sql));
        return;
      }
      resolve({ lastID: this.lastID, changes: this.changes });
    });
  });
}

export function get<T>(
  conn: sqlite3.Database,
  sql: string,
  params: readonly SqlParam[] = []
): Promise<T | undefined> {
  return new Promise<T | undefined>((resolve, reject) => {
    conn.get(sql, params, (err: Error | null, row: T | undefined) =>
      err ? reject(wrap(err, sql)) : resolve(row)
    );
  });
}

export function all<T>(
  conn: sqlite3.Database,
  sql: string,
  params: readonly SqlParam[] = []
): Promise<T[]> {
  return new Promise<T[]>((resolve, reject) => {
    conn.all(sql, params, (err: Error | null, rows: T[]) =>
      err ? reject(wrap(err, sql)) : resolve(rows)
    );
  });
}

export async function tableExists(
  conn: sqlite3.Database,
  name: string
): Promise<boolean> {
  const row = await get<{ name: string }>(
    conn,
    `SELECT name FROM sqlite_master WHERE type='table' AND name=? LIMIT 1`,
    [name]
  );
  return !!row;
}

/* ------------------------------ transactions ------------------------------ */

/**
 * Run `fn` between BEGIN and COMMIT. Any error, including a failed COMMIT
 * (deferred foreign keys are checked there), rolls the transaction back
 * before it is rethrown.
 */
export async function withTransaction<T>(
  conn: sqlite3.Database,
  fn: (tx: sqlite3.Database) => Promise<T>
): Promise<T> {
  await run(conn, "BEGIN");
  try {
    const result = await fn(conn);
    await run(conn, "COMMIT");
    return result;
  } catch (e) {
    try {
      await run(conn, "ROLLBACK");
    } catch (rollbackErr) {
      // SQLite may already have rolled back on its own (e.g. SQLITE_FULL).
      logger.warn("ROLLBACK failed after transaction error", {
        err: rollbackErr,
      });
    }
    throw e;
  }
}

const queues = new WeakMap<sqlite3.Database, Promise<void>>();

/**
 * Serialize work on one connection. Statements of two callers never
 * interleave, so one caller's transaction cannot pick up another's writes.
 */
export function exclusive<T>(
  conn: sqlite3.Database,
  fn: () => Promise<T>
): Promise<T> {
  const prev = queues.get(conn) ?? Promise.resolve();
  const next = prev.then(fn);
  // The queue moves on whatever the outcome; the caller gets `next` itself.
  queues.set(
    conn,
    next.then(
      () => undefined,
      () => undefined
    )
  );
  return next;
}

function wrap(err: Error, sql: string): PersistenceError {
  const statement = sql.replace(/\s+/g, " ").trim();
  return new PersistenceError(`${err.message} (${statement})`, { cause: err });
}
