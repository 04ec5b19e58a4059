/**
 * Project import pipeline.
 * Purpose: clone a repository, persist its rulebooks, and archive the tree as one all-or-nothing unit.
 * Assumptions: the store serializes transactions; the archive blob is removed again when the commit does not happen.
 * Usage: const project = await importProject(buildImportContext({ config }), { name, url });
 */

import path from "node:path";

import { formatErrorMessage } from "../../core/error-format.js";
import { ProjectImportError } from "../../core/errors.js";
import { logImportEvent, type JsonObject } from "../../core/logger.js";
import { scanRulebooks } from "../../rulebooks/scanner.js";
import type { Project, StoreTransaction } from "../../storage/types.js";

import type { ImportContext } from "./import-context.js";
import { importRulebook } from "./rulebook-import.js";
import type { RepositoryHandle } from "./vcs/vcs.js";
import { withTemporaryDirectory } from "./workspace.js";

// =============================================================================
// TYPES
// =============================================================================

export type ImportProjectInput = {
  name: string;
  url: string;
  description?: string;
};

type ImportTotals = {
  rulebooks: number;
  rulesets: number;
  rules: number;
};

export const ARCHIVE_FORMAT = "tar.gz";
const CLONE_DIR = "src";
const ARCHIVE_TEMP_FILE = "archive.tar.gz";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Imports a project from a git url.
 *
 * Either the project, all of its rulebooks and the archive are stored, or nothing is.
 * The temporary clone is removed in both cases.
 */
export async function importProject(
  context: ImportContext,
  input: ImportProjectInput,
): Promise<Project> {
  const { logger } = context.ports;
  logImportEvent(logger, "import.start", { name: input.name, url: input.url });

  try {
    const { project, totals } = await withTemporaryDirectory(
      context.config.temp_dir_prefix,
      (tempDir) => importIntoWorkspace(context, input, tempDir),
    );
    logImportEvent(logger, "import.complete", {
      project_id: project.id,
      archive_file: project.archive_file,
      ...totals,
    });
    return project;
  } catch (err) {
    logImportEvent(logger, "import.failed", describeFailure(input, err), "error");
    throw err;
  }
}

export function archiveFileName(projectId: number): string {
  return `${String(projectId).padStart(10, "0")}.archive.${ARCHIVE_FORMAT}`;
}

// =============================================================================
// PIPELINE
// =============================================================================

async function importIntoWorkspace(
  context: ImportContext,
  input: ImportProjectInput,
  tempDir: string,
): Promise<{ project: Project; totals: ImportTotals }> {
  const { vcs, store, archives, logger, clock } = context.ports;

  const repo = await vcs.clone(input.url, path.join(tempDir, CLONE_DIR), {
    depth: context.config.git.clone_depth,
  });
  const gitHash = await vcs.resolveRevision(repo, "HEAD");
  logImportEvent(logger, "import.cloned", { url: input.url, git_hash: gitHash });

  const tx = await store.begin();
  let storedArchive: string | null = null;
  try {
    const project = await tx.createProject({
      name: input.name,
      description: input.description ?? "",
      url: input.url,
      git_hash: gitHash,
      created_at: clock.isoNow(),
    });
    logImportEvent(logger, "import.project_created", { project_id: project.id });

    const totals = await importRulebooks(context, tx, project, repo);

    const archiveFile = archiveFileName(project.id);
    const archivePath = path.join(tempDir, ARCHIVE_TEMP_FILE);
    await vcs.archive(repo, gitHash, archivePath, ARCHIVE_FORMAT);
    await archives.save(archiveFile, archivePath);
    storedArchive = archiveFile;
    const archived = await tx.attachArchive(project.id, archiveFile);
    logImportEvent(logger, "import.archived", { project_id: project.id, archive_file: archiveFile });

    await tx.commit();
    return { project: archived, totals };
  } catch (err) {
    await abandonImport(context, tx, storedArchive);
    throw err;
  }
}

async function importRulebooks(
  context: ImportContext,
  tx: StoreTransaction,
  project: Project,
  repo: RepositoryHandle,
): Promise<ImportTotals> {
  const { logger } = context.ports;
  const totals: ImportTotals = { rulebooks: 0, rulesets: 0, rules: 0 };

  const records = await scanRulebooks(repo.path, { logger });
  for await (const record of records) {
    const imported = await importRulebook(tx, project, record, logger);
    totals.rulebooks += 1;
    totals.rulesets += imported.rulesets.length;
    totals.rules += imported.rules.length;
  }

  return totals;
}

// =============================================================================
// FAILURE HANDLING
// =============================================================================

// Cleanup failures are logged; the caller rethrows the error that started the cleanup.
async function abandonImport(
  context: ImportContext,
  tx: StoreTransaction,
  storedArchive: string | null,
): Promise<void> {
  const { archives, logger } = context.ports;

  try {
    await tx.rollback();
  } catch (err) {
    logImportEvent(logger, "import.rollback_failed", { message: formatErrorMessage(err) }, "error");
  }

  if (storedArchive === null) return;
  try {
    await archives.remove(storedArchive);
  } catch (err) {
    logImportEvent(
      logger,
      "import.archive_cleanup_failed",
      { archive_file: storedArchive, message: formatErrorMessage(err) },
      "error",
    );
  }
}

function describeFailure(input: ImportProjectInput, err: unknown): JsonObject {
  const payload: JsonObject = { url: input.url, message: formatErrorMessage(err) };
  if (err instanceof ProjectImportError) payload.code = err.code;
  return payload;
}
