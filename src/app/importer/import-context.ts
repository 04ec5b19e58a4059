/**
 * ImportContext + composition root for project imports.
 * Purpose: bundle the importer settings with injected ports to avoid globals.
 * Assumptions: default ports are built lazily so tests can override any of them without side effects.
 * Usage: buildImportContext({ config, ports }) and pass to importProject.
 */

import type { ImporterConfig } from "../../core/config.js";
import { JsonlLogger } from "../../core/logger.js";
import { importLogPath } from "../../core/paths.js";
import { FileArchiveStorage } from "../../storage/archive-storage.js";
import { SqliteProjectStore } from "../../storage/sqlite-store.js";

import type { Clock, ImporterPorts } from "./ports.js";
import { createGitVcs } from "./vcs/git-vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type ImportContext = {
  runId: string;
  config: ImporterConfig;
  ports: ImporterPorts;
};

export type BuildImportContextInput = {
  config: ImporterConfig;
  runId?: string;
  ports?: Partial<ImporterPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

export function createDefaultPorts(
  config: ImporterConfig,
  runId: string,
  overrides: Partial<ImporterPorts> = {},
): ImporterPorts {
  return {
    vcs: overrides.vcs ?? createGitVcs(),
    store: overrides.store ?? SqliteProjectStore.open(config.database_path),
    archives: overrides.archives ?? new FileArchiveStorage(config.archive_dir),
    logger:
      overrides.logger ??
      new JsonlLogger(importLogPath(config.log_dir, runId), { runId, level: config.log_level }),
    clock: overrides.clock ?? systemClock,
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildImportContext(input: BuildImportContextInput): ImportContext {
  const runId = input.runId ?? defaultRunId(input.ports?.clock ?? systemClock);

  return {
    runId,
    config: input.config,
    ports: createDefaultPorts(input.config, runId, input.ports),
  };
}

export function defaultRunId(clock: Clock): string {
  return clock.isoNow().replace(/[-:]/g, "").replace(/\..*$/, "").replace("T", "-");
}
