/*
Purpose: turn any thrown value into the lines the CLI prints on failure.
Assumptions: debug mode may include code, error name, cause and stack.
Usage: formatErrorLines(err, { mode: "debug" }); formatErrorMessage(err).
*/

import {
  IMPORT_ERROR_CODES,
  ProjectImportError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type ImportErrorCode,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind = "title" | "message" | "hint" | "code" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

// =============================================================================
// IMPORT ERROR PRESENTATION
// =============================================================================

const IMPORT_ERROR_PRESENTATION: Record<ImportErrorCode, { title: string; hint?: string }> = {
  [IMPORT_ERROR_CODES.missingDirectory]: {
    title: "Project has no rulebooks directory.",
    hint: "Rulebook files must live under a top-level 'rulebooks/' directory.",
  },
  [IMPORT_ERROR_CODES.transfer]: {
    title: "Repository clone failed.",
    hint: "Check the URL and that the repository is reachable without credentials prompts.",
  },
  [IMPORT_ERROR_CODES.resolution]: {
    title: "Git revision could not be resolved.",
  },
  [IMPORT_ERROR_CODES.archive]: {
    title: "Project archive could not be created.",
  },
  [IMPORT_ERROR_CODES.persistence]: {
    title: "Project could not be saved.",
    hint: "Nothing from this import was persisted.",
  },
  [IMPORT_ERROR_CODES.rulebookContent]: {
    title: "Rulebook content is invalid.",
    hint: "Every ruleset needs a name and a list of rules with a name and an action.",
  },
  [IMPORT_ERROR_CODES.config]: {
    title: "Configuration is invalid.",
  },
};

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }

  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error && error.name) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = resolveCauseMessage(normalized.cause, normalized.message);
    if (cause) {
      lines.push({ kind: "cause", text: cause });
    }

    if (error instanceof Error && error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = normalizeOptionalText(error.message);
    if (message) return message;

    const name = normalizeOptionalText(error.name);
    if (name) return name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeError(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: normalizeOptionalText(error.title) ?? DEFAULT_ERROR_TITLE,
      message: normalizeOptionalText(error.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: normalizeOptionalText(error.hint),
      cause: error.cause,
    };
  }

  if (error instanceof ProjectImportError) {
    const presentation = IMPORT_ERROR_PRESENTATION[error.code];
    return {
      code: error.code,
      title: presentation.title,
      message: normalizeOptionalText(error.message) ?? DEFAULT_ERROR_MESSAGE,
      hint: presentation.hint,
      cause: error.cause,
    };
  }

  if (error === null || error === undefined) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: DEFAULT_ERROR_MESSAGE,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  const resolved = normalizeOptionalText(formatErrorMessage(cause));
  if (!resolved || resolved === message) {
    return undefined;
  }

  return resolved;
}
