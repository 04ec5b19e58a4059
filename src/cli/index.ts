import { Command } from "commander";

import { formatErrorLines, type ErrorFormatLine } from "../core/error-format.js";

import type { GlobalCliOptions } from "./config.js";
import { registerImportCommand } from "./import.js";
import { registerProjectsCommand } from "./projects.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("rulebook-import")
    .description("Import rulebook projects from git repositories")
    .option("--config <path>", "Path to config.yaml (default: ~/.rulebook-import/config.yaml)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  registerImportCommand(program);
  registerProjectsCommand(program);

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const { debug } = program.opts<GlobalCliOptions>();
    printErrorLines(formatErrorLines(err, { mode: debug ? "debug" : "short" }));
    process.exitCode = 1;
  }
}

export function printErrorLines(lines: ErrorFormatLine[]): void {
  for (const line of lines) {
    console.error(renderErrorLine(line));
  }
}

function renderErrorLine(line: ErrorFormatLine): string {
  switch (line.kind) {
    case "title":
      return `Error: ${line.text}`;
    case "message":
      return line.text;
    case "hint":
      return `Hint: ${line.text}`;
    case "code":
      return `Code: ${line.text}`;
    case "name":
      return `Name: ${line.text}`;
    case "cause":
      return `Cause: ${line.text}`;
    case "stack":
      return line.text;
  }
}
