/**
 * Git-backed VCS adapter.
 * Purpose: map Vcs interface calls to the git command helpers.
 * Assumptions: the git binary is on PATH.
 * Usage: createGitVcs() and inject into ImporterPorts.
 */

import path from "node:path";

import { archiveTree, cloneRepository, revParse } from "../../../git/git.js";

import type { Vcs } from "./vcs.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(): Vcs {
  return {
    async clone(url, destination, options) {
      const target = path.resolve(destination);
      await cloneRepository({
        url,
        destination: target,
        depth: options.depth,
        cwd: path.dirname(target),
      });
      return { url, path: target };
    },
    resolveRevision: (repo, ref) => revParse(repo.path, ref),
    archive: (repo, ref, outputPath, format) =>
      archiveTree({ repoPath: repo.path, ref, outputPath: path.resolve(outputPath), format }),
  };
}
