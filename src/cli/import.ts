import type { Command } from "commander";

import { buildImportContext } from "../app/importer/import-context.js";
import type { ImporterPorts } from "../app/importer/ports.js";
import { importProject } from "../app/importer/project-import.js";
import type { ImporterConfig } from "../core/config.js";
import { SqliteProjectStore } from "../storage/sqlite-store.js";

import { loadConfigForCli } from "./config.js";

export type ImportCommandOptions = {
  name: string;
  url: string;
  description?: string;
};

export function registerImportCommand(program: Command): void {
  program
    .command("import")
    .description("Clone a git repository and import its rulebooks as a new project")
    .requiredOption("--name <name>", "Project name")
    .requiredOption("--url <url>", "Git URL to clone")
    .option("--description <text>", "Project description", "")
    .action(async (_opts: unknown, command: Command) => {
      const { config } = loadConfigForCli(command);
      await importCommand(config, command.opts<ImportCommandOptions>());
    });
}

export async function importCommand(
  config: ImporterConfig,
  opts: ImportCommandOptions,
  ports: Partial<ImporterPorts> = {},
): Promise<void> {
  const store = ports.store ?? SqliteProjectStore.open(config.database_path);

  try {
    const context = buildImportContext({ config, ports: { ...ports, store } });
    const project = await importProject(context, {
      name: opts.name,
      url: opts.url,
      description: opts.description,
    });

    console.log(`Imported project ${project.id} (${project.name})`);
    console.log(`Commit: ${project.git_hash}`);
    if (project.archive_file) {
      console.log(`Archive: ${context.ports.archives.resolve(project.archive_file)}`);
    }

    const rulebooks = await store.listRulebooks(project.id);
    console.log(`Rulebooks: ${rulebooks.length}`);
    for (const rulebook of rulebooks) {
      console.log(`  ${rulebook.path}`);
    }
  } finally {
    await store.close();
  }
}
