import type Database from "better-sqlite3";

export interface MigrationDefinition {
  version: number;
  name: string;
  sql: string;
}

const MIGRATIONS: MigrationDefinition[] = [
  {
    version: 1,
    name: "initial",
    sql: [
      "CREATE TABLE IF NOT EXISTS projects (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL, description TEXT NOT NULL DEFAULT '', url TEXT NOT NULL, git_hash TEXT NOT NULL, archive_file TEXT, created_at TEXT NOT NULL);",
      "CREATE TABLE IF NOT EXISTS rulebooks (id INTEGER PRIMARY KEY AUTOINCREMENT, project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE, name TEXT NOT NULL, path TEXT NOT NULL, raw_content TEXT NOT NULL);",
      "CREATE INDEX IF NOT EXISTS idx_rulebooks_project ON rulebooks(project_id);",
      "CREATE TABLE IF NOT EXISTS rulesets (id INTEGER PRIMARY KEY AUTOINCREMENT, rulebook_id INTEGER NOT NULL REFERENCES rulebooks(id) ON DELETE CASCADE, name TEXT NOT NULL, sources TEXT);",
      "CREATE INDEX IF NOT EXISTS idx_rulesets_rulebook ON rulesets(rulebook_id);",
      "CREATE TABLE IF NOT EXISTS rules (id INTEGER PRIMARY KEY AUTOINCREMENT, ruleset_id INTEGER NOT NULL REFERENCES rulesets(id) ON DELETE CASCADE, name TEXT NOT NULL, action TEXT NOT NULL);",
      "CREATE INDEX IF NOT EXISTS idx_rules_ruleset ON rules(ruleset_id);",
    ].join("\n"),
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0;

export function applyMigrations(db: Database.Database): number {
  const current = readSchemaVersion(db);
  const pending = MIGRATIONS.filter((migration) => migration.version > current);

  const apply = db.transaction((migrations: MigrationDefinition[]) => {
    for (const migration of migrations) {
      db.exec(migration.sql);
      db.pragma(`user_version = ${migration.version}`);
    }
  });
  apply(pending);

  return readSchemaVersion(db);
}

export function readSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}
