import path from "node:path";

import fse from "fs-extra";

import { PersistenceError } from "../core/errors.js";

import type { ArchiveStorage } from "./types.js";

/** Stores archive blobs as files under one directory. */
export class FileArchiveStorage implements ArchiveStorage {
  constructor(private readonly rootDir: string) {}

  resolve(filename: string): string {
    if (filename.length === 0 || path.basename(filename) !== filename || filename.startsWith(".")) {
      throw new PersistenceError(`Invalid archive file name: ${filename}`);
    }
    return path.join(this.rootDir, filename);
  }

  async save(filename: string, sourcePath: string): Promise<void> {
    const target = this.resolve(filename);
    try {
      await fse.ensureDir(this.rootDir);
      await fse.copy(sourcePath, target, { overwrite: false, errorOnExist: true });
    } catch (err) {
      throw new PersistenceError(`Could not store archive ${filename}`, err);
    }
  }

  async remove(filename: string): Promise<void> {
    const target = this.resolve(filename);
    try {
      await fse.remove(target);
    } catch (err) {
      throw new PersistenceError(`Could not remove archive ${filename}`, err);
    }
  }
}
