import { runCli } from "./cli/index.js";

export { importProject, archiveFileName } from "./app/importer/project-import.js";
export type { ImportProjectInput } from "./app/importer/project-import.js";
export { buildImportContext, createDefaultPorts } from "./app/importer/import-context.js";
export type { ImportContext } from "./app/importer/import-context.js";
export type { ImporterPorts, Clock } from "./app/importer/ports.js";
export { loadImporterConfig, parseImporterConfig } from "./core/config-loader.js";
export type { ImporterConfig } from "./core/config.js";
export * from "./core/errors.js";
export { SqliteProjectStore } from "./storage/sqlite-store.js";
export { FileArchiveStorage } from "./storage/archive-storage.js";
export type * from "./storage/types.js";

export async function main(argv: string[]): Promise<void> {
  await runCli(argv);
}
