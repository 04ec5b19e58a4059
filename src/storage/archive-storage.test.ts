import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { PersistenceError } from "../core/errors.js";

import { FileArchiveStorage } from "./archive-storage.js";

describe("FileArchiveStorage", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "archive-storage-"));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("copies the archive into the storage directory and removes it again", async () => {
    const source = path.join(workDir, "archive.tar.gz");
    await fs.writeFile(source, "archive-bytes", "utf8");
    const storage = new FileArchiveStorage(path.join(workDir, "archives"));

    await storage.save("0000000042.archive.tar.gz", source);

    const stored = storage.resolve("0000000042.archive.tar.gz");
    expect(stored).toBe(path.join(workDir, "archives", "0000000042.archive.tar.gz"));
    await expect(fs.readFile(stored, "utf8")).resolves.toBe("archive-bytes");

    await storage.remove("0000000042.archive.tar.gz");
    await expect(fs.stat(stored)).rejects.toThrow();
  });

  it("refuses to overwrite an existing archive", async () => {
    const source = path.join(workDir, "archive.tar.gz");
    await fs.writeFile(source, "archive-bytes", "utf8");
    const storage = new FileArchiveStorage(path.join(workDir, "archives"));
    await storage.save("0000000001.archive.tar.gz", source);

    await expect(storage.save("0000000001.archive.tar.gz", source)).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });

  it("rejects names that would leave the storage directory", () => {
    const storage = new FileArchiveStorage(path.join(workDir, "archives"));

    expect(() => storage.resolve("../escape.tar.gz")).toThrow(PersistenceError);
    expect(() => storage.resolve("nested/file.tar.gz")).toThrow(PersistenceError);
    expect(() => storage.resolve("")).toThrow(PersistenceError);
  });
});
