/*
Purpose: structured JSONL event logging for import runs.
Assumptions: one JSON object per line; events below the configured level are dropped.
Usage: const log = new JsonlLogger(path, { runId, level: "info" }); logImportEvent(log, "import.start", { url });
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogEvent = {
  type: string;
  level?: LogLevel;
  payload?: JsonObject;
};

export interface Logger {
  log(event: LogEvent): void;
}

export type JsonlLoggerOptions = {
  runId?: string;
  level?: LogLevel;
  now?: () => Date;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements Logger {
  readonly filePath: string;
  private readonly runId?: string;
  private readonly minLevel: LogLevel;
  private readonly now: () => Date;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.runId = options.runId;
    this.minLevel = options.level ?? "info";
    this.now = options.now ?? (() => new Date());
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: LogEvent): void {
    const level = event.level ?? "info";
    if (!isLevelEnabled(level, this.minLevel)) return;

    const line: JsonObject = {
      ts: this.now().toISOString(),
      type: event.type,
      level,
    };
    if (this.runId) line.run_id = this.runId;
    if (event.payload) line.payload = event.payload;

    fs.appendFileSync(this.filePath, JSON.stringify(line) + "\n", "utf8");
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function logImportEvent(
  logger: Logger,
  type: string,
  payload?: JsonObject,
  level: LogLevel = "info",
): void {
  logger.log(payload ? { type, level, payload } : { type, level });
}

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}
