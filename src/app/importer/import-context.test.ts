import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { cleanupTempDirs, makeTempDir } from "../../__tests__/git-fixtures.helpers.js";
import { parseImporterConfig } from "../../core/config-loader.js";
import { JsonlLogger } from "../../core/logger.js";
import { FileArchiveStorage } from "../../storage/archive-storage.js";
import { SqliteProjectStore } from "../../storage/sqlite-store.js";

import {
  FakeClock,
  FakeVcs,
  InMemoryArchiveStorage,
  InMemoryProjectStore,
  RecordingLogger,
} from "./__tests__/fakes.js";
import { buildImportContext, defaultRunId } from "./import-context.js";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("buildImportContext", () => {
  it("uses the given ports and derives the run id from the clock", async () => {
    const root = await makeTempDir("import-context-");
    const config = parseImporterConfig({}, root);
    const ports = {
      vcs: new FakeVcs(root),
      store: new InMemoryProjectStore(),
      archives: new InMemoryArchiveStorage(),
      logger: new RecordingLogger(),
      clock: new FakeClock(new Date("2024-03-05T06:07:08.900Z")),
    };

    const context = buildImportContext({ config, ports });

    expect(context.runId).toBe("20240305-060708");
    expect(context.config).toBe(config);
    expect(context.ports).toEqual(ports);
    expect(context.ports.store).toBe(ports.store);
  });

  it("builds SQLite, file archive and JSONL adapters from the config", async () => {
    const root = await makeTempDir("import-context-");
    const config = parseImporterConfig(
      { database_path: ":memory:", archive_dir: "archives", log_dir: "logs", log_level: "warn" },
      root,
    );

    const context = buildImportContext({ config, runId: "run-1" });

    try {
      expect(context.ports.store).toBeInstanceOf(SqliteProjectStore);
      expect(context.ports.archives).toBeInstanceOf(FileArchiveStorage);
      expect(context.ports.archives.resolve("0000000001.archive.tar.gz")).toBe(
        path.join(root, "archives", "0000000001.archive.tar.gz"),
      );
      expect(context.ports.logger).toBeInstanceOf(JsonlLogger);
      if (context.ports.logger instanceof JsonlLogger) {
        expect(context.ports.logger.filePath).toBe(path.join(root, "logs", "import-run-1.jsonl"));
      }
    } finally {
      await context.ports.store.close();
    }
  });
});

describe("defaultRunId", () => {
  it("formats the clock time as a compact timestamp", () => {
    expect(defaultRunId(new FakeClock(new Date("2024-01-01T00:00:00.000Z")))).toBe(
      "20240101-000000",
    );
  });
});
