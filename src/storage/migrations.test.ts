import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { applyMigrations, LATEST_SCHEMA_VERSION, readSchemaVersion } from "./migrations.js";

describe("applyMigrations", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("creates the schema and records its version", () => {
    expect(readSchemaVersion(db)).toBe(0);

    expect(applyMigrations(db)).toBe(LATEST_SCHEMA_VERSION);

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name);
    expect(tables).toEqual(["projects", "rulebooks", "rules", "rulesets"]);
  });

  it("is a no-op on an up-to-date database", () => {
    applyMigrations(db);

    expect(applyMigrations(db)).toBe(LATEST_SCHEMA_VERSION);
    expect(readSchemaVersion(db)).toBe(1);
  });
});
