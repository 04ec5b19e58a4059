/**
 * VCS adapter interface for project imports.
 * Purpose: provide the minimal clone, resolve, and archive surface the importer needs.
 * Assumptions: implementations create filesystem artifacts that the caller cleans up.
 * Usage: inject into ImporterPorts and call from importProject.
 */

import type { ArchiveFormat } from "../../../git/git.js";

// =============================================================================
// TYPES
// =============================================================================

export type RepositoryHandle = {
  url: string;
  path: string;
};

export type CloneOptions = {
  depth: number;
};

export interface Vcs {
  /** Fails with TransferError on network or auth failure, or an invalid url. */
  clone(url: string, destination: string, options: CloneOptions): Promise<RepositoryHandle>;
  /** Fails with ResolutionError when the ref is unknown. */
  resolveRevision(repo: RepositoryHandle, ref: string): Promise<string>;
  /** Fails with ArchiveError on I/O or VCS failure. */
  archive(
    repo: RepositoryHandle,
    ref: string,
    outputPath: string,
    format: ArchiveFormat,
  ): Promise<void>;
}
