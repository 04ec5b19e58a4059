import fs from "node:fs";
import path from "node:path";

import YAML from "yaml";

import { ImporterConfigSchema, type ImporterConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { defaultConfigPath } from "./paths.js";
import { formatSchemaIssues } from "./schema-issues.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadedConfig = {
  config: ImporterConfig;
  configPath: string;
  fromFile: boolean;
};

export function loadImporterConfig(explicitPath?: string): LoadedConfig {
  const configPath = path.resolve(explicitPath ?? defaultConfigPath());

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { config: parseImporterConfig({}, path.dirname(configPath)), configPath, fromFile: false };
  }

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Config file is not valid YAML: ${configPath}`, err);
  }

  return {
    config: parseImporterConfig(raw ?? {}, path.dirname(configPath)),
    configPath,
    fromFile: true,
  };
}

export function parseImporterConfig(raw: unknown, baseDir: string): ImporterConfig {
  const parsed = ImporterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatSchemaIssues(parsed.error.issues).join("; ");
    throw new ConfigError(`Invalid config: ${details}`, parsed.error);
  }

  const config = parsed.data;
  return {
    ...config,
    database_path: resolveConfigPath(config.database_path, baseDir),
    archive_dir: resolveConfigPath(config.archive_dir, baseDir),
    log_dir: resolveConfigPath(config.log_dir, baseDir),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveConfigPath(value: string, baseDir: string): string {
  // ":memory:" is SQLite's in-process database and stays as written.
  if (value === ":memory:") return value;
  return path.resolve(baseDir, value);
}
