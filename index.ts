#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export * from "./src/index.js";

// Allow `node dist/index.js` and the npm bin link to run the CLI directly
function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectRun()) {
  void main(process.argv);
}
