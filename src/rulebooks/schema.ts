import { z } from "zod";

import { RulebookContentError } from "../core/errors.js";
import { formatSchemaIssues } from "../core/schema-issues.js";

import type { RulebookRecord } from "./types.js";

// Keys of a source declaration that are not the source plugin itself.
export const SOURCE_RESERVED_KEYS: readonly string[] = ["name", "filters"];

// Any scalar names a ruleset or rule; it is stored as text, so `2024` becomes "2024".
export const NameSchema = z
  .unknown()
  .superRefine((value, ctx) => {
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Required" });
    } else if (!isScalar(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Must be a string, number or boolean" });
    }
  })
  .transform((value) => String(value));

export const RuleSchema = z.object({
  name: NameSchema,
  action: z.unknown().refine((value) => value !== undefined, { message: "Required" }),
});

export const SourceDeclarationSchema = z.record(z.unknown()).superRefine((source, ctx) => {
  if ("name" in source && typeof source.name !== "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["name"], message: "Must be a string" });
  }
  if ("filters" in source && !Array.isArray(source.filters)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["filters"], message: "Must be a list" });
  }

  const pluginKeys = Object.keys(source).filter((key) => !SOURCE_RESERVED_KEYS.includes(key));
  if (pluginKeys.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected exactly one source plugin, found ${pluginKeys.length}`,
    });
  }
});

export const RulesetSchema = z.object({
  name: NameSchema,
  rules: z.array(RuleSchema),
  sources: z.array(SourceDeclarationSchema).nullish(),
});

export const RulebookContentSchema = z.array(RulesetSchema);

export type RuleDocument = z.infer<typeof RuleSchema>;
export type SourceDeclaration = z.infer<typeof SourceDeclarationSchema>;
export type RulesetDocument = z.infer<typeof RulesetSchema>;

export function parseRulebookContent(record: RulebookRecord): RulesetDocument[] {
  const parsed = RulebookContentSchema.safeParse(record.content);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new RulebookContentError(
      `Rulebook ${record.relpath} is malformed: ${issues.join("; ")}`,
      record.relpath,
      issues,
    );
  }
  return parsed.data;
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}
