/**
 * Persistence contract for imported projects.
 * Purpose: describe the rows the importer writes and the transactional gateway that writes them.
 * Assumptions: ids are assigned by the store; bulk creates return rows in input order.
 * Usage: const tx = await store.begin(); ...; await tx.commit() or await tx.rollback().
 */

import type { ExpandedSource } from "../rulebooks/types.js";

// =============================================================================
// ROWS
// =============================================================================

export type Project = {
  id: number;
  name: string;
  description: string;
  url: string;
  git_hash: string;
  archive_file: string | null;
  created_at: string;
};

export type Rulebook = {
  id: number;
  project_id: number;
  name: string;
  path: string;
  raw_content: string;
};

export type Ruleset = {
  id: number;
  rulebook_id: number;
  name: string;
  sources: ExpandedSource[] | null;
};

export type Rule = {
  id: number;
  ruleset_id: number;
  name: string;
  action: unknown;
};

export type NewProject = Omit<Project, "id" | "archive_file">;
export type NewRulebook = Omit<Rulebook, "id">;
export type NewRuleset = Omit<Ruleset, "id">;
export type NewRule = Omit<Rule, "id">;

// =============================================================================
// GATEWAY
// =============================================================================

export interface StoreTransaction {
  createProject(input: NewProject): Promise<Project>;
  createRulebook(input: NewRulebook): Promise<Rulebook>;
  bulkCreateRulesets(inputs: NewRuleset[]): Promise<Ruleset[]>;
  bulkCreateRules(inputs: NewRule[]): Promise<Rule[]>;
  attachArchive(projectId: number, archiveFile: string): Promise<Project>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface ProjectStore {
  /** Opens a transaction; later callers wait until the open one commits or rolls back. */
  begin(): Promise<StoreTransaction>;
  listProjects(): Promise<Project[]>;
  getProject(id: number): Promise<Project | null>;
  listRulebooks(projectId: number): Promise<Rulebook[]>;
  listRulesets(rulebookId: number): Promise<Ruleset[]>;
  listRules(rulesetId: number): Promise<Rule[]>;
  close(): Promise<void>;
}

export interface ArchiveStorage {
  save(filename: string, sourcePath: string): Promise<void>;
  remove(filename: string): Promise<void>;
  resolve(filename: string): string;
}
