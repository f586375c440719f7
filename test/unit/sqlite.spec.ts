import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type sqlite3 from "sqlite3";
import {
  closeDb,
  exclusive,
  exec,
  get,
  initDb,
  openDb,
  run,
  withTransaction,
} from "../../src/db/sqlite.js";
import { initialize } from "../../src/db/schema.js";
import { PersistenceError } from "../../src/domain/errors.js";
import { count } from "../helpers/db.js";

describe("sqlite helpers", () => {
  let db: sqlite3.Database;

  beforeEach(async () => {
    db = await openDb(":memory:");
    await exec(db, "CREATE TABLE t (x INTEGER NOT NULL)");
  });

  afterEach(async () => {
    await closeDb(db);
  });

  it("reports the generated rowid and the number of changed rows", async () => {
    const first = await run(db, "INSERT INTO t (x) VALUES (?)", [10]);
    const second = await run(db, "INSERT INTO t (x) VALUES (?)", [20]);
    expect(first.lastID).toBe(1);
    expect(second.lastID).toBe(2);

    const updated = await run(db, "UPDATE t SET x = x + 1");
    expect(updated.changes).toBe(2);
  });

  it("wraps driver errors in PersistenceError and keeps the cause", async () => {
    const err = await run(db, "SELECT * FROM missing_table").catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(PersistenceError);
    expect(err instanceof PersistenceError && err.cause).toBeInstanceOf(Error);
    expect(err instanceof PersistenceError && err.message).toContain(
      "no such table: missing_table"
    );
  });

  it("commits when the callback resolves", async () => {
    const result = await withTransaction(db, async (tx) => {
      await run(tx, "INSERT INTO t (x) VALUES (1)");
      return "done";
    });
    expect(result).toBe("done");
    expect(await count(db, "SELECT COUNT(*) AS c FROM t")).toBe(1);
  });

  it("rolls back and rethrows the same error when the callback fails", async () => {
    const boom = new Error("boom");
    await expect(
      withTransaction(db, async (tx) => {
        await run(tx, "INSERT INTO t (x) VALUES (1)");
        throw boom;
      })
    ).rejects.toBe(boom);

    expect(await count(db, "SELECT COUNT(*) AS c FROM t")).toBe(0);
    // no transaction left open
    await run(db, "BEGIN");
    await run(db, "ROLLBACK");
  });

  it("rolls back when COMMIT fails on a deferred foreign key", async () => {
    await initialize(db);

    await expect(
      withTransaction(db, async (tx) => {
        await run(
          tx,
          "INSERT INTO questions (question_id, option_id, option_order) VALUES (1, 1, 0)"
        );
      })
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(await count(db, "SELECT COUNT(*) AS c FROM questions")).toBe(0);
    await run(db, "BEGIN");
    await run(db, "ROLLBACK");
  });

  it("runs exclusive work one caller at a time, in arrival order", async () => {
    const events: string[] = [];
    const slow = exclusive(db, async () => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push("slow:end");
      return 1;
    });
    const failing = exclusive(db, async () => {
      events.push("failing");
      throw new Error("nope");
    });
    const fast = exclusive(db, async () => {
      events.push("fast");
      return 2;
    });

    const [a, b, c] = await Promise.allSettled([slow, failing, fast]);
    expect(a).toEqual({ status: "fulfilled", value: 1 });
    expect(b.status).toBe("rejected");
    expect(c).toEqual({ status: "fulfilled", value: 2 });
    expect(events).toEqual(["slow:start", "slow:end", "failing", "fast"]);
  });

  it("hands out independent connections that the caller closes", async () => {
    const a = await initDb(":memory:");
    const b = await initDb(":memory:");
    await exec(a, "CREATE TABLE only_in_a (x INTEGER)");

    await closeDb(a);
    await expect(run(a, "SELECT 1")).rejects.toBeInstanceOf(PersistenceError);
    expect(await get<{ one: number }>(b, "SELECT 1 AS one")).toEqual({ one: 1 });
    expect(
      await get<{ name: string }>(
        b,
        "SELECT name FROM sqlite_master WHERE name='only_in_a'"
      )
    ).toBeUndefined();
    await closeDb(b);
  });
});
