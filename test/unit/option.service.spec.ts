import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type sqlite3 from "sqlite3";
import { closeDb } from "../../src/db/sqlite.js";
import {
  createOption,
  deleteOption,
  readOption,
} from "../../src/services/option.service.js";
import { NotFoundError } from "../../src/domain/errors.js";
import { count, freshDb } from "../helpers/db.js";

describe("option store", () => {
  let db: sqlite3.Database;

  beforeEach(async () => {
    db = await freshDb();
  });

  afterEach(async () => {
    await closeDb(db);
  });

  it("assigns increasing ids and reads the row back", async () => {
    const first = await createOption(db, "yes", true);
    const second = await createOption(db, "no", false);

    expect(first).toBe(1);
    expect(second).toBe(2);
    expect(await readOption(db, first)).toEqual({
      id: 1,
      body: "yes",
      correct: true,
    });
    expect(await readOption(db, second)).toEqual({
      id: 2,
      body: "no",
      correct: false,
    });
  });

  it("stores the correct flag as 0 or 1", async () => {
    const id = await createOption(db, "yes", true);
    expect(
      await count(db, "SELECT correct AS c FROM options WHERE id=?", [id])
    ).toBe(1);
  });

  it("throws NotFoundError for an unknown id", async () => {
    await expect(readOption(db, 42)).rejects.toBeInstanceOf(NotFoundError);
    await expect(readOption(db, 42)).rejects.toThrow("Option 42 not found");
  });

  it("does not reuse the id of a deleted row", async () => {
    const first = await createOption(db, "x", false);
    await deleteOption(db, first);
    expect(await createOption(db, "y", false)).toBe(2);
  });

  it("accepts deleting the same option twice", async () => {
    const id = await createOption(db, "x", false);
    await deleteOption(db, id);
    await expect(deleteOption(db, id)).resolves.toBeUndefined();
    expect(await count(db, "SELECT COUNT(*) AS c FROM options")).toBe(0);
  });
});
