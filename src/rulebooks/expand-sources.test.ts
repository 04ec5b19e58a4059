import { describe, expect, it } from "vitest";

import { expandRulesetSources, expandSource, UNNAMED_SOURCE } from "./expand-sources.js";
import type { RulesetDocument } from "./schema.js";

function ruleset(name: string, sources?: RulesetDocument["sources"]): RulesetDocument {
  return { name, rules: [], sources };
}

describe("expandSource", () => {
  it("splits the plugin key into type and source", () => {
    expect(expandSource({ name: "tick", "ansible.eda.range": { limit: 5 } })).toEqual({
      name: "tick",
      type: "range",
      source: "ansible.eda.range",
      config: { limit: 5 },
    });
  });

  it("defaults the name and an empty config", () => {
    expect(expandSource({ generic: null })).toEqual({
      name: UNNAMED_SOURCE,
      type: "generic",
      source: "generic",
      config: {},
    });
  });

  it("keeps filters", () => {
    expect(
      expandSource({
        "ansible.eda.webhook": { port: 5000 },
        filters: [{ "ansible.eda.dashes_to_underscores": null }],
      }),
    ).toEqual({
      name: "<unnamed>",
      type: "webhook",
      source: "ansible.eda.webhook",
      config: { port: 5000 },
      filters: [{ "ansible.eda.dashes_to_underscores": null }],
    });
  });
});

describe("expandRulesetSources", () => {
  it("maps every ruleset name to its expanded sources", () => {
    const expanded = expandRulesetSources([
      ruleset("alerts", [{ name: "tick", "ansible.eda.range": { limit: 5 } }]),
      ruleset("audit"),
    ]);

    expect([...expanded.keys()]).toEqual(["alerts", "audit"]);
    expect(expanded.get("alerts")).toEqual([
      { name: "tick", type: "range", source: "ansible.eda.range", config: { limit: 5 } },
    ]);
    expect(expanded.get("audit")).toEqual([]);
  });

  it("lets a later ruleset replace an earlier one with the same name", () => {
    const expanded = expandRulesetSources([
      ruleset("dup", [{ "ansible.eda.range": { limit: 1 } }]),
      ruleset("dup", [{ "ansible.eda.tick": { delay: 2 } }]),
    ]);

    expect(expanded.size).toBe(1);
    expect(expanded.get("dup")).toEqual([
      { name: UNNAMED_SOURCE, type: "tick", source: "ansible.eda.tick", config: { delay: 2 } },
    ]);
  });
});
