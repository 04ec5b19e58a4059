import { beforeEach, describe, expect, it } from "vitest";

import { PersistenceError, RulebookContentError } from "../../core/errors.js";
import type { RulebookRecord } from "../../rulebooks/types.js";
import type { Project, StoreTransaction } from "../../storage/types.js";

import { InMemoryProjectStore, RecordingLogger } from "./__tests__/fakes.js";
import { importRulebook } from "./rulebook-import.js";

const ALERTS: RulebookRecord = {
  relpath: "rulebooks/alerts.yml",
  name: "alerts.yml",
  rawContent: "# alerts\n",
  content: [
    {
      name: "alerts",
      hosts: "all",
      sources: [
        { name: "tick", "ansible.eda.range": { limit: 5 } },
        {
          "ansible.eda.webhook": { port: 5000 },
          filters: [{ "ansible.eda.dashes_to_underscores": null }],
        },
      ],
      rules: [{ name: "page on call", action: { run_playbook: { name: "page.yml" } } }],
    },
    {
      name: "audit",
      hosts: "all",
      rules: [
        { name: "record", action: { print_event: null } },
        { name: "forget", action: { none: null } },
      ],
    },
  ],
};

describe("importRulebook", () => {
  let store: InMemoryProjectStore;
  let tx: StoreTransaction;
  let project: Project;
  let logger: RecordingLogger;

  beforeEach(async () => {
    store = new InMemoryProjectStore();
    tx = await store.begin();
    project = await tx.createProject({
      name: "demo",
      description: "",
      url: "https://git.example.test/demo.git",
      git_hash: "abc123",
      created_at: "2024-01-01T00:00:00.000Z",
    });
    logger = new RecordingLogger();
  });

  it("stores the rulebook, its rulesets in order, and their rules", async () => {
    const imported = await importRulebook(tx, project, ALERTS, logger);
    await tx.commit();

    expect(imported.rulebook).toEqual({
      id: 1,
      project_id: project.id,
      name: "alerts.yml",
      path: "rulebooks/alerts.yml",
      raw_content: "# alerts\n",
    });
    expect(imported.rulesets).toEqual([
      {
        id: 1,
        rulebook_id: 1,
        name: "alerts",
        sources: [
          { name: "tick", type: "range", source: "ansible.eda.range", config: { limit: 5 } },
          {
            name: "<unnamed>",
            type: "webhook",
            source: "ansible.eda.webhook",
            config: { port: 5000 },
            filters: [{ "ansible.eda.dashes_to_underscores": null }],
          },
        ],
      },
      { id: 2, rulebook_id: 1, name: "audit", sources: [] },
    ]);
    expect(imported.rules.map((rule) => [rule.ruleset_id, rule.name, rule.action])).toEqual([
      [1, "page on call", { run_playbook: { name: "page.yml" } }],
      [2, "record", { print_event: null }],
      [2, "forget", { none: null }],
    ]);

    await expect(store.listRulebooks(project.id)).resolves.toEqual([imported.rulebook]);
    expect(logger.events).toEqual([
      {
        type: "import.rulebook",
        level: "info",
        payload: { path: "rulebooks/alerts.yml", rulebook_id: 1, rulesets: 2, rules: 3 },
      },
    ]);
  });

  it("keeps every ruleset of a repeated name and gives them the last declared sources", async () => {
    const record: RulebookRecord = {
      relpath: "rulebooks/dup.yml",
      name: "dup.yml",
      rawContent: "",
      content: [
        { name: "dup", sources: [{ "ansible.eda.range": { limit: 1 } }], rules: [] },
        { name: "dup", sources: [{ "ansible.eda.tick": { delay: 2 } }], rules: [] },
      ],
    };

    const imported = await importRulebook(tx, project, record, logger);

    const lastSources = [
      { name: "<unnamed>", type: "tick", source: "ansible.eda.tick", config: { delay: 2 } },
    ];
    expect(imported.rulesets.map((ruleset) => [ruleset.name, ruleset.sources])).toEqual([
      ["dup", lastSources],
      ["dup", lastSources],
    ]);
    expect(logger.ofType("rulebook.duplicate_ruleset")).toEqual([
      {
        type: "rulebook.duplicate_ruleset",
        level: "warn",
        payload: { path: "rulebooks/dup.yml", name: "dup" },
      },
    ]);
  });

  it("stores an empty rulebook without rulesets", async () => {
    const imported = await importRulebook(
      tx,
      project,
      { relpath: "rulebooks/empty.yml", name: "empty.yml", rawContent: "[]\n", content: [] },
      logger,
    );

    expect(imported.rulebook.name).toBe("empty.yml");
    expect(imported.rulesets).toEqual([]);
    expect(imported.rules).toEqual([]);
  });

  it("rejects malformed content before writing anything", async () => {
    const record: RulebookRecord = {
      relpath: "rulebooks/bad.yml",
      name: "bad.yml",
      rawContent: "",
      content: [{ name: "bad", rules: [{ name: "no action" }] }],
    };

    await expect(importRulebook(tx, project, record, logger)).rejects.toBeInstanceOf(
      RulebookContentError,
    );
    await tx.commit();

    await expect(store.listRulebooks(project.id)).resolves.toEqual([]);
  });

  it("surfaces store failures", async () => {
    store.failOn.add("bulkCreateRules");

    await expect(importRulebook(tx, project, ALERTS, logger)).rejects.toBeInstanceOf(
      PersistenceError,
    );
    expect(logger.events).toEqual([]);
  });
});
