import type { Command } from "commander";

import { loadImporterConfig, type LoadedConfig } from "../core/config-loader.js";

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
};

export function loadConfigForCli(command: Command): LoadedConfig {
  const globals = command.optsWithGlobals<GlobalCliOptions>();
  return loadImporterConfig(globals.config);
}
