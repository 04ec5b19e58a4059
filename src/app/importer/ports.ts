import type { Logger } from "../../core/logger.js";
import type { ArchiveStorage, ProjectStore } from "../../storage/types.js";

import type { Vcs } from "./vcs/vcs.js";

// =============================================================================
// PORTS
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type ImporterPorts = {
  vcs: Vcs;
  store: ProjectStore;
  archives: ArchiveStorage;
  logger: Logger;
  clock: Clock;
};
