import os from "node:os";
import path from "node:path";

const HOME_ENV = "RULEBOOK_IMPORT_HOME";
const HOME_DIR_NAME = ".rulebook-import";

export function importerHome(): string {
  const fromEnv = process.env[HOME_ENV]?.trim();
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(os.homedir(), HOME_DIR_NAME);
}

export function defaultConfigPath(): string {
  return path.join(importerHome(), "config.yaml");
}

export function defaultDatabasePath(): string {
  return path.join(importerHome(), "projects.db");
}

export function defaultArchiveDir(): string {
  return path.join(importerHome(), "archives");
}

export function defaultLogDir(): string {
  return path.join(importerHome(), "logs");
}

export function importLogPath(logDir: string, runId: string): string {
  return path.join(logDir, `import-${runId}.jsonl`);
}
