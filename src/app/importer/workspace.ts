import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

/**
 * Runs `fn` inside a fresh directory under the OS temp dir and removes the directory afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withTemporaryDirectory<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fse.remove(dir);
  }
}
