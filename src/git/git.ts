import { execa } from "execa";

import { ArchiveError, ResolutionError, TransferError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type ArchiveFormat = "tar" | "tar.gz" | "tgz" | "zip";

// Never block on a credentials prompt: unauthenticated clones must fail fast.
const NON_INTERACTIVE_ENV = {
  GIT_TERMINAL_PROMPT: "0",
  GIT_ASKPASS: "",
  SSH_ASKPASS: "",
};

// =============================================================================
// LOW-LEVEL RUNNER
// =============================================================================

export async function git(cwd: string, args: string[]): Promise<GitResult> {
  const res = await execa("git", args, {
    cwd,
    reject: false,
    stdio: "pipe",
    env: NON_INTERACTIVE_ENV,
  });

  return {
    stdout: res.stdout,
    stderr: res.stderr,
    exitCode: res.exitCode ?? -1,
  };
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function cloneRepository(opts: {
  url: string;
  destination: string;
  depth: number;
  cwd: string;
}): Promise<void> {
  const url = opts.url.trim();
  if (url.length === 0) {
    throw new TransferError("Repository URL is empty.");
  }
  if (url.startsWith("-")) {
    throw new TransferError(`Refusing to clone a URL that looks like an option: ${url}`);
  }

  const res = await git(opts.cwd, [
    "clone",
    "--quiet",
    "--depth",
    String(opts.depth),
    "--",
    url,
    opts.destination,
  ]).catch((err: unknown) => {
    throw new TransferError(`git clone of ${url} could not be started`, err);
  });

  if (res.exitCode !== 0) {
    throw new TransferError(`git clone of ${url} failed: ${describeFailure(res)}`);
  }
}

export async function revParse(repoPath: string, ref: string): Promise<string> {
  const res = await git(repoPath, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]).catch(
    (err: unknown) => {
      throw new ResolutionError(`git rev-parse ${ref} could not be started`, err);
    },
  );

  const sha = res.stdout.trim();
  if (res.exitCode !== 0 || sha.length === 0) {
    throw new ResolutionError(`Unknown git revision: ${ref}`);
  }
  return sha;
}

export async function archiveTree(opts: {
  repoPath: string;
  ref: string;
  outputPath: string;
  format: ArchiveFormat;
}): Promise<void> {
  const res = await git(opts.repoPath, [
    "archive",
    `--format=${opts.format}`,
    `--output=${opts.outputPath}`,
    opts.ref,
  ]).catch((err: unknown) => {
    throw new ArchiveError(`git archive of ${opts.ref} could not be started`, err);
  });

  if (res.exitCode !== 0) {
    throw new ArchiveError(`git archive of ${opts.ref} failed: ${describeFailure(res)}`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function describeFailure(res: GitResult): string {
  const output = (res.stderr || res.stdout).trim();
  return output.length > 0 ? output : `exit code ${res.exitCode}`;
}
