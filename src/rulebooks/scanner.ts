// Rulebook discovery.
// Purpose: walk a cloned repository's rulebooks directory and yield the files that parse as rulebooks.
// Assumes the tree is untrusted: broken files are logged and skipped, nothing outside the repository is read.

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { TextDecoder } from "node:util";

import YAML, { YAMLError } from "yaml";

import { formatErrorMessage } from "../core/error-format.js";
import { MissingDirectoryError } from "../core/errors.js";
import { logImportEvent, type Logger } from "../core/logger.js";

import { RULEBOOKS_DIR, YAML_EXTENSIONS, type RulebookRecord } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanOptions = {
  logger: Logger;
};

type WalkScope = {
  repoDir: string;
  repoRoot: string;
  logger: Logger;
};

type LinkTarget = "file" | "directory" | "outside" | "other";

type RulebookLoadResult =
  | { status: "loaded"; record: RulebookRecord }
  | { status: "invalid_yaml"; message: string }
  | { status: "not_rulebook" };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Opens a scan of `<repoDir>/rulebooks`.
 *
 * Rejects with MissingDirectoryError before producing anything when the directory is absent
 * or resolves to a location outside the repository.
 * The returned generator is single pass; call again for a fresh walk.
 */
export async function scanRulebooks(
  repoDir: string,
  options: ScanOptions,
): Promise<AsyncGenerator<RulebookRecord, void, undefined>> {
  const rulebooksDir = path.join(repoDir, RULEBOOKS_DIR);
  const repoRoot = await fs.realpath(repoDir);
  if (!(await isDirectoryInside(rulebooksDir, repoRoot))) {
    throw new MissingDirectoryError(
      `The '${RULEBOOKS_DIR}' directory doesn't exist within the project root.`,
      rulebooksDir,
    );
  }

  return walkRulebooks({ repoDir, repoRoot, logger: options.logger }, rulebooksDir);
}

export function isRulebookContent(data: unknown): data is Record<string, unknown>[] {
  if (!Array.isArray(data)) return false;
  return data.every((entry) => isPlainObject(entry) && "rules" in entry);
}

export function isYamlCandidate(filePath: string): boolean {
  return YAML_EXTENSIONS.includes(path.extname(filePath));
}

// =============================================================================
// WALK
// =============================================================================

async function* walkRulebooks(
  scope: WalkScope,
  rulebooksDir: string,
): AsyncGenerator<RulebookRecord, void, undefined> {
  const { repoDir, logger } = scope;
  for await (const filePath of walkFiles(scope, rulebooksDir)) {
    if (!isYamlCandidate(filePath)) continue;

    const relpath = toPosixRelative(repoDir, filePath);
    let result: RulebookLoadResult;
    try {
      result = await tryLoadRulebook(filePath, {
        relpath,
        name: toPosixRelative(rulebooksDir, filePath),
      });
    } catch (err) {
      logImportEvent(
        logger,
        "rulebook.scan_failed",
        { path: relpath, message: formatErrorMessage(err) },
        "error",
      );
      continue;
    }

    if (result.status === "invalid_yaml") {
      logImportEvent(
        logger,
        "rulebook.invalid_yaml",
        { path: relpath, message: result.message },
        "warn",
      );
      continue;
    }

    if (result.status === "not_rulebook") {
      logImportEvent(logger, "rulebook.skip", { path: relpath, reason: "not_a_rulebook" }, "debug");
      continue;
    }

    yield result.record;
  }
}

/**
 * Symlinks to files inside the repository are read. Symlinked directories are listed but
 * not descended into, and links that resolve outside the repository are skipped.
 */
async function* walkFiles(scope: WalkScope, dir: string): AsyncGenerator<string, void, undefined> {
  const { repoDir, logger } = scope;
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    logImportEvent(
      logger,
      "rulebook.scan_failed",
      { path: toPosixRelative(repoDir, dir), message: formatErrorMessage(err) },
      "error",
    );
    return;
  }

  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      const relpath = toPosixRelative(repoDir, entryPath);
      let target: LinkTarget;
      try {
        target = await classifyLink(entryPath, scope.repoRoot);
      } catch (err) {
        logImportEvent(
          logger,
          "rulebook.scan_failed",
          { path: relpath, message: formatErrorMessage(err) },
          "error",
        );
        continue;
      }

      if (target === "file") {
        yield entryPath;
      } else if (target === "outside") {
        logImportEvent(
          logger,
          "rulebook.skip",
          { path: relpath, reason: "symlink_outside_repository" },
          "debug",
        );
      } else if (target === "directory") {
        logImportEvent(
          logger,
          "rulebook.skip",
          { path: relpath, reason: "symlinked_directory" },
          "debug",
        );
      }
      continue;
    }

    if (entry.isDirectory()) {
      yield* walkFiles(scope, entryPath);
    } else if (entry.isFile()) {
      yield entryPath;
    }
  }
}

// =============================================================================
// LOADING
// =============================================================================

async function tryLoadRulebook(
  filePath: string,
  location: { relpath: string; name: string },
): Promise<RulebookLoadResult> {
  // Undecodable bytes throw here and surface as a scan failure, never as replacement characters.
  const rawContent = UTF8.decode(await fs.readFile(filePath));

  let content: unknown;
  try {
    // YAML 1.1 keeps `<<` merge keys and yes/no booleans; a repeated key keeps its last value.
    content = YAML.parse(rawContent, { version: "1.1", uniqueKeys: false, logLevel: "error" });
  } catch (err) {
    if (err instanceof YAMLError) {
      return { status: "invalid_yaml", message: err.message };
    }
    throw err;
  }

  if (!isRulebookContent(content)) {
    return { status: "not_rulebook" };
  }

  return {
    status: "loaded",
    record: { relpath: location.relpath, name: location.name, rawContent, content },
  };
}

// =============================================================================
// HELPERS
// =============================================================================

const UTF8 = new TextDecoder("utf-8", { fatal: true });

async function isDirectoryInside(dir: string, repoRoot: string): Promise<boolean> {
  let resolved: string;
  try {
    resolved = await fs.realpath(dir);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") return false;
    throw err;
  }

  if (!isInside(repoRoot, resolved)) return false;
  const stat = await fs.stat(resolved);
  return stat.isDirectory();
}

async function classifyLink(linkPath: string, repoRoot: string): Promise<LinkTarget> {
  const resolved = await fs.realpath(linkPath);
  if (!isInside(repoRoot, resolved)) return "outside";

  const stat = await fs.stat(resolved);
  if (stat.isDirectory()) return "directory";
  if (stat.isFile()) return "file";
  return "other";
}

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === "") return true;
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPosixRelative(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join("/");
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
