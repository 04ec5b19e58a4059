import { z } from "zod";

import { LOG_LEVELS } from "./logger.js";
import { defaultArchiveDir, defaultDatabasePath, defaultLogDir } from "./paths.js";

export const DEFAULT_TEMP_DIR_PREFIX = "rulebook-project-";
export const DEFAULT_CLONE_DEPTH = 1;

export const GitConfigSchema = z
  .object({
    clone_depth: z.number().int().positive().default(DEFAULT_CLONE_DEPTH),
  })
  .strict();

export const ImporterConfigSchema = z
  .object({
    database_path: z.string().min(1).default(defaultDatabasePath),
    archive_dir: z.string().min(1).default(defaultArchiveDir),
    log_dir: z.string().min(1).default(defaultLogDir),
    log_level: z.enum(LOG_LEVELS).default("info"),
    temp_dir_prefix: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/, "Must not contain path separators")
      .default(DEFAULT_TEMP_DIR_PREFIX),
    git: GitConfigSchema.default({ clone_depth: DEFAULT_CLONE_DEPTH }),
  })
  .strict();

export type ImporterConfig = z.infer<typeof ImporterConfigSchema>;
export type GitConfig = z.infer<typeof GitConfigSchema>;
