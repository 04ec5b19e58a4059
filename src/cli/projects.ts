import { InvalidArgumentError, type Command } from "commander";

import type { Project, ProjectStore } from "../storage/types.js";
import { SqliteProjectStore } from "../storage/sqlite-store.js";

import { loadConfigForCli } from "./config.js";

const SHORT_HASH_LENGTH = 12;

export function registerProjectsCommand(program: Command): void {
  const projects = program.command("projects").description("Inspect imported projects");

  projects
    .command("list")
    .description("List imported projects")
    .action(async (_opts: unknown, command: Command) => {
      await withStore(command, (store) => projectsListCommand(store));
    });

  projects
    .command("show")
    .description("Show a project with its rulebooks and rulesets")
    .argument("<id>", "Project id", parseProjectId)
    .action(async (id: number, _opts: unknown, command: Command) => {
      await withStore(command, (store) => projectsShowCommand(store, id));
    });
}

export function parseProjectId(value: string): number {
  if (!/^[1-9][0-9]*$/.test(value)) {
    throw new InvalidArgumentError("Project id must be a positive integer.");
  }
  return Number(value);
}

async function withStore(
  command: Command,
  fn: (store: ProjectStore) => Promise<void>,
): Promise<void> {
  const { config } = loadConfigForCli(command);
  const store = SqliteProjectStore.open(config.database_path);
  try {
    await fn(store);
  } finally {
    await store.close();
  }
}

// =============================================================================
// LIST
// =============================================================================

export async function projectsListCommand(store: ProjectStore): Promise<void> {
  const projects = await store.listProjects();
  if (projects.length === 0) {
    console.log("No projects imported yet.");
    console.log("Import one with: rulebook-import import --name <name> --url <url>");
    return;
  }

  printProjectTable(projects);
}

function printProjectTable(rows: Project[]): void {
  const cells = rows.map((row) => ({
    id: `${row.id}`,
    name: row.name,
    commit: row.git_hash.slice(0, SHORT_HASH_LENGTH),
    created: row.created_at,
  }));

  const idWidth = Math.max("ID".length, ...cells.map((c) => c.id.length));
  const nameWidth = Math.max("Name".length, ...cells.map((c) => c.name.length));
  const commitWidth = Math.max("Commit".length, ...cells.map((c) => c.commit.length));

  console.log(
    `${pad("ID", idWidth)}  ${pad("Name", nameWidth)}  ${pad("Commit", commitWidth)}  Created`,
  );
  for (const cell of cells) {
    console.log(
      `${pad(cell.id, idWidth)}  ${pad(cell.name, nameWidth)}  ${pad(cell.commit, commitWidth)}  ${cell.created}`,
    );
  }
}

// =============================================================================
// SHOW
// =============================================================================

export async function projectsShowCommand(store: ProjectStore, id: number): Promise<void> {
  const project = await store.getProject(id);
  if (!project) {
    console.log(`Project ${id} not found.`);
    process.exitCode = 1;
    return;
  }

  console.log(`Project ${project.id}: ${project.name}`);
  if (project.description) console.log(`Description: ${project.description}`);
  console.log(`URL: ${project.url}`);
  console.log(`Commit: ${project.git_hash}`);
  console.log(`Archive: ${project.archive_file ?? "-"}`);
  console.log(`Created: ${project.created_at}`);
  console.log("");

  const rulebooks = await store.listRulebooks(project.id);
  console.log("Rulebooks:");
  if (rulebooks.length === 0) {
    console.log("  (none)");
    return;
  }

  for (const rulebook of rulebooks) {
    console.log(`  ${rulebook.path}`);
    const rulesets = await store.listRulesets(rulebook.id);
    for (const ruleset of rulesets) {
      const rules = await store.listRules(ruleset.id);
      const sources = ruleset.sources?.length ?? 0;
      console.log(
        `    ${ruleset.name} (${plural(rules.length, "rule")}, ${plural(sources, "source")})`,
      );
    }
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
