import { SOURCE_RESERVED_KEYS, type RulesetDocument, type SourceDeclaration } from "./schema.js";
import type { ExpandedSource, ExpandedSources } from "./types.js";

export const UNNAMED_SOURCE = "<unnamed>";

/**
 * Expands each ruleset's shorthand `sources` into full source configurations, keyed by ruleset name.
 *
 * A later ruleset with the same name replaces the earlier entry.
 */
export function expandRulesetSources(content: readonly RulesetDocument[]): ExpandedSources {
  const expanded: ExpandedSources = new Map();

  for (const ruleset of content) {
    expanded.set(ruleset.name, (ruleset.sources ?? []).map(expandSource));
  }

  return expanded;
}

export function expandSource(declaration: SourceDeclaration): ExpandedSource {
  const expanded: ExpandedSource = {
    name: typeof declaration.name === "string" ? declaration.name : UNNAMED_SOURCE,
    type: "",
    source: "",
    config: {},
  };

  for (const [key, value] of Object.entries(declaration)) {
    if (key === "filters") {
      if (Array.isArray(value)) expanded.filters = value;
      continue;
    }
    if (SOURCE_RESERVED_KEYS.includes(key)) continue;

    expanded.source = key;
    expanded.type = key.split(".").pop() ?? key;
    expanded.config = value ?? {};
  }

  return expanded;
}
