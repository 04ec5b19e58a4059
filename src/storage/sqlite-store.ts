// SQLite persistence gateway.
// Purpose: store projects, rulebooks, rulesets, and rules with explicit transactions.
// Assumes one connection per store; transactions and reads are serialized through a promise chain.

import path from "node:path";

import Database from "better-sqlite3";
import fse from "fs-extra";
import { z } from "zod";

import { PersistenceError } from "../core/errors.js";
import type { ExpandedSource } from "../rulebooks/types.js";

import { applyMigrations } from "./migrations.js";
import type {
  NewProject,
  NewRule,
  NewRulebook,
  NewRuleset,
  Project,
  ProjectStore,
  Rule,
  Rulebook,
  Ruleset,
  StoreTransaction,
} from "./types.js";

// =============================================================================
// ROW DECODING
// =============================================================================

type ProjectRow = Project;
type RulebookRow = Rulebook;
type RulesetRow = { id: number; rulebook_id: number; name: string; sources: string | null };
type RuleRow = { id: number; ruleset_id: number; name: string; action: string };

const ExpandedSourcesSchema = z.array(
  z.object({
    name: z.string(),
    type: z.string(),
    source: z.string(),
    config: z.unknown(),
    filters: z.array(z.unknown()).optional(),
  }),
);

function decodeRuleset(row: RulesetRow): Ruleset {
  return {
    id: row.id,
    rulebook_id: row.rulebook_id,
    name: row.name,
    sources: row.sources === null ? null : decodeSources(row.sources),
  };
}

function decodeSources(text: string): ExpandedSource[] {
  const parsed = ExpandedSourcesSchema.safeParse(parseJsonColumn(text));
  if (!parsed.success) {
    throw new PersistenceError("Stored ruleset sources are corrupt.", parsed.error);
  }
  return parsed.data;
}

function decodeRule(row: RuleRow): Rule {
  return { id: row.id, ruleset_id: row.ruleset_id, name: row.name, action: parseJsonColumn(row.action) };
}

function parseJsonColumn(text: string): unknown {
  return JSON.parse(text);
}

function encodeJson(value: unknown): string {
  return JSON.stringify(value ?? null);
}

// =============================================================================
// STORE
// =============================================================================

export class SqliteProjectStore implements ProjectStore {
  private transactionChain: Promise<void> = Promise.resolve();

  private constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): SqliteProjectStore {
    try {
      if (dbPath !== ":memory:") {
        fse.ensureDirSync(path.dirname(dbPath));
      }
      const db = new Database(dbPath);
      db.pragma("journal_mode = WAL");
      db.pragma("foreign_keys = ON");
      db.pragma("busy_timeout = 5000");
      applyMigrations(db);
      return new SqliteProjectStore(db);
    } catch (err) {
      throw new PersistenceError(`Could not open project database at ${dbPath}`, err);
    }
  }

  async begin(): Promise<StoreTransaction> {
    const release = await this.acquire();
    try {
      this.db.exec("BEGIN IMMEDIATE");
    } catch (err) {
      release();
      throw new PersistenceError("Could not begin a transaction.", err);
    }
    return new SqliteTransaction(this.db, release);
  }

  async listProjects(): Promise<Project[]> {
    return this.read("list projects", () =>
      this.db.prepare<[], ProjectRow>("SELECT * FROM projects ORDER BY id").all(),
    );
  }

  async getProject(id: number): Promise<Project | null> {
    return this.read(
      "get project",
      () => this.db.prepare<[number], ProjectRow>("SELECT * FROM projects WHERE id = ?").get(id) ?? null,
    );
  }

  async listRulebooks(projectId: number): Promise<Rulebook[]> {
    return this.read("list rulebooks", () =>
      this.db
        .prepare<[number], RulebookRow>("SELECT * FROM rulebooks WHERE project_id = ? ORDER BY id")
        .all(projectId),
    );
  }

  async listRulesets(rulebookId: number): Promise<Ruleset[]> {
    return this.read("list rulesets", () =>
      this.db
        .prepare<[number], RulesetRow>("SELECT * FROM rulesets WHERE rulebook_id = ? ORDER BY id")
        .all(rulebookId)
        .map(decodeRuleset),
    );
  }

  async listRules(rulesetId: number): Promise<Rule[]> {
    return this.read("list rules", () =>
      this.db
        .prepare<[number], RuleRow>("SELECT * FROM rules WHERE ruleset_id = ? ORDER BY id")
        .all(rulesetId)
        .map(decodeRule),
    );
  }

  async close(): Promise<void> {
    const release = await this.acquire();
    try {
      this.db.close();
    } finally {
      release();
    }
  }

  private async read<T>(label: string, fn: () => T): Promise<T> {
    const release = await this.acquire();
    try {
      return guard(label, fn);
    } finally {
      release();
    }
  }

  private async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.transactionChain;
    this.transactionChain = previous.then(() => gate);
    await previous;

    return release;
  }
}

// =============================================================================
// TRANSACTION
// =============================================================================

class SqliteTransaction implements StoreTransaction {
  private finished = false;

  constructor(
    private readonly db: Database.Database,
    private readonly release: () => void,
  ) {}

  async createProject(input: NewProject): Promise<Project> {
    return this.write("create project", () => {
      const info = this.db
        .prepare(
          "INSERT INTO projects (name, description, url, git_hash, archive_file, created_at) VALUES (?, ?, ?, ?, NULL, ?)",
        )
        .run(input.name, input.description, input.url, input.git_hash, input.created_at);
      return { ...input, id: Number(info.lastInsertRowid), archive_file: null };
    });
  }

  async createRulebook(input: NewRulebook): Promise<Rulebook> {
    return this.write("create rulebook", () => {
      const info = this.db
        .prepare("INSERT INTO rulebooks (project_id, name, path, raw_content) VALUES (?, ?, ?, ?)")
        .run(input.project_id, input.name, input.path, input.raw_content);
      return { ...input, id: Number(info.lastInsertRowid) };
    });
  }

  async bulkCreateRulesets(inputs: NewRuleset[]): Promise<Ruleset[]> {
    return this.write("create rulesets", () => {
      const insert = this.db.prepare(
        "INSERT INTO rulesets (rulebook_id, name, sources) VALUES (?, ?, ?)",
      );
      return inputs.map((input) => {
        const sources = input.sources === null ? null : encodeJson(input.sources);
        const info = insert.run(input.rulebook_id, input.name, sources);
        return { ...input, id: Number(info.lastInsertRowid) };
      });
    });
  }

  async bulkCreateRules(inputs: NewRule[]): Promise<Rule[]> {
    return this.write("create rules", () => {
      const insert = this.db.prepare(
        "INSERT INTO rules (ruleset_id, name, action) VALUES (?, ?, ?)",
      );
      return inputs.map((input) => {
        const info = insert.run(input.ruleset_id, input.name, encodeJson(input.action));
        return { ...input, id: Number(info.lastInsertRowid) };
      });
    });
  }

  async attachArchive(projectId: number, archiveFile: string): Promise<Project> {
    return this.write("attach archive", () => {
      this.db
        .prepare("UPDATE projects SET archive_file = ? WHERE id = ?")
        .run(archiveFile, projectId);
      const project = this.db
        .prepare<[number], ProjectRow>("SELECT * FROM projects WHERE id = ?")
        .get(projectId);
      if (!project) {
        throw new PersistenceError(`Project ${projectId} does not exist.`);
      }
      return project;
    });
  }

  async commit(): Promise<void> {
    this.ensureOpen();
    this.finished = true;
    try {
      this.db.exec("COMMIT");
    } catch (err) {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      throw new PersistenceError("Could not commit the transaction.", err);
    } finally {
      this.release();
    }
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    try {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
    } catch (err) {
      throw new PersistenceError("Could not roll back the transaction.", err);
    } finally {
      this.release();
    }
  }

  private write<T>(label: string, fn: () => T): T {
    this.ensureOpen();
    return guard(label, fn);
  }

  private ensureOpen(): void {
    if (this.finished) {
      throw new PersistenceError("Transaction is already finished.");
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function guard<T>(label: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Could not ${label}.`, err);
  }
}
