import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  cleanupTempDirs,
  createTempRepoFromFixture,
  fileUrl,
  headSha,
  makeTempDir,
} from "../../../__tests__/git-fixtures.helpers.js";
import { ResolutionError, TransferError } from "../../../core/errors.js";

import { createGitVcs } from "./git-vcs.js";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("createGitVcs", () => {
  it("clones, resolves HEAD, and archives the tree", async () => {
    const origin = await createTempRepoFromFixture("single-rulebook-repo");
    const workDir = await makeTempDir("git-vcs-");
    const vcs = createGitVcs();

    const repo = await vcs.clone(fileUrl(origin), path.join(workDir, "src"), { depth: 1 });

    expect(repo.path).toBe(path.join(workDir, "src"));
    const cloned = await fs.readFile(path.join(repo.path, "rulebooks", "a.yml"), "utf8");
    expect(cloned).toContain("name: r1");

    const commitId = await vcs.resolveRevision(repo, "HEAD");
    expect(commitId).toBe(await headSha(origin));

    const archivePath = path.join(workDir, "archive.tar.gz");
    await vcs.archive(repo, "HEAD", archivePath, "tar.gz");

    const archive = await fs.readFile(archivePath);
    expect(archive[0]).toBe(0x1f);
    expect(archive[1]).toBe(0x8b);
  });

  it("fails with a transfer error for an unreachable repository", async () => {
    const workDir = await makeTempDir("git-vcs-");
    const vcs = createGitVcs();

    await expect(
      vcs.clone(fileUrl(path.join(workDir, "does-not-exist")), path.join(workDir, "src"), {
        depth: 1,
      }),
    ).rejects.toBeInstanceOf(TransferError);
  });

  it("fails with a resolution error for an unknown ref", async () => {
    const origin = await createTempRepoFromFixture("single-rulebook-repo");
    const workDir = await makeTempDir("git-vcs-");
    const vcs = createGitVcs();
    const repo = await vcs.clone(fileUrl(origin), path.join(workDir, "src"), { depth: 1 });

    await expect(vcs.resolveRevision(repo, "no-such-branch")).rejects.toBeInstanceOf(
      ResolutionError,
    );
  });
});
