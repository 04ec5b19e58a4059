/**
 * Rulebook import.
 * Purpose: persist one discovered rulebook with its rulesets and rules inside an open transaction.
 * Assumptions: the caller owns the transaction and rolls it back when this throws.
 * Usage: await importRulebook(tx, project, record, logger) for each scanned record.
 */

import { PersistenceError } from "../../core/errors.js";
import { logImportEvent, type Logger } from "../../core/logger.js";
import { expandRulesetSources } from "../../rulebooks/expand-sources.js";
import { parseRulebookContent, type RulesetDocument } from "../../rulebooks/schema.js";
import type { RulebookRecord } from "../../rulebooks/types.js";
import type {
  NewRule,
  NewRuleset,
  Project,
  Rule,
  Rulebook,
  Ruleset,
  StoreTransaction,
} from "../../storage/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ImportedRulebook = {
  rulebook: Rulebook;
  rulesets: Ruleset[];
  rules: Rule[];
};

type RulesetDraft = {
  document: RulesetDocument;
  row: NewRuleset;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function importRulebook(
  tx: StoreTransaction,
  project: Project,
  record: RulebookRecord,
  logger: Logger,
): Promise<ImportedRulebook> {
  const documents = parseRulebookContent(record);
  warnOnDuplicateRulesets(documents, record, logger);

  const rulebook = await tx.createRulebook({
    project_id: project.id,
    name: record.name,
    path: record.relpath,
    raw_content: record.rawContent,
  });

  const expandedSources = expandRulesetSources(documents);
  const drafts: RulesetDraft[] = documents.map((document) => ({
    document,
    row: {
      rulebook_id: rulebook.id,
      name: document.name,
      sources: expandedSources.get(document.name) ?? null,
    },
  }));

  const rulesets = await tx.bulkCreateRulesets(drafts.map((draft) => draft.row));
  const ruleRows = pairRulesets(drafts, rulesets, record).flatMap(({ document, ruleset }) =>
    document.rules.map(
      (rule): NewRule => ({ ruleset_id: ruleset.id, name: rule.name, action: rule.action }),
    ),
  );
  const rules = ruleRows.length > 0 ? await tx.bulkCreateRules(ruleRows) : [];

  logImportEvent(logger, "import.rulebook", {
    path: record.relpath,
    rulebook_id: rulebook.id,
    rulesets: rulesets.length,
    rules: rules.length,
  });

  return { rulebook, rulesets, rules };
}

// =============================================================================
// HELPERS
// =============================================================================

function pairRulesets(
  drafts: RulesetDraft[],
  rulesets: Ruleset[],
  record: RulebookRecord,
): Array<{ document: RulesetDocument; ruleset: Ruleset }> {
  if (rulesets.length !== drafts.length) {
    throw new PersistenceError(
      `Stored ${rulesets.length} rulesets for ${record.relpath}, expected ${drafts.length}`,
    );
  }

  return drafts.map((draft, index) => {
    const ruleset = rulesets[index];
    if (ruleset.name !== draft.row.name) {
      throw new PersistenceError(
        `Ruleset order mismatch in ${record.relpath}: expected ${draft.row.name}, got ${ruleset.name}`,
      );
    }
    return { document: draft.document, ruleset };
  });
}

// Sources of a repeated name resolve to the last declaration.
function warnOnDuplicateRulesets(
  documents: RulesetDocument[],
  record: RulebookRecord,
  logger: Logger,
): void {
  const seen = new Set<string>();
  const reported = new Set<string>();
  for (const { name } of documents) {
    if (seen.has(name) && !reported.has(name)) {
      reported.add(name);
      logImportEvent(logger, "rulebook.duplicate_ruleset", { path: record.relpath, name }, "warn");
    }
    seen.add(name);
  }
}
