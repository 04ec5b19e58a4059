/*
Purpose: error types raised by the import pipeline and rendered by the CLI.
Assumptions: every fatal import failure is a ProjectImportError subclass; UserFacingError is safe to display.
Usage: throw new TransferError("...", cause); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// IMPORT ERRORS
// =============================================================================

export const IMPORT_ERROR_CODES = {
  missingDirectory: "MISSING_DIRECTORY",
  transfer: "GIT_TRANSFER",
  resolution: "GIT_RESOLUTION",
  archive: "GIT_ARCHIVE",
  persistence: "PERSISTENCE",
  rulebookContent: "RULEBOOK_CONTENT",
  config: "CONFIG",
} as const;

export type ImportErrorCode = (typeof IMPORT_ERROR_CODES)[keyof typeof IMPORT_ERROR_CODES];

export class ProjectImportError extends Error {
  constructor(
    message: string,
    public readonly code: ImportErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ProjectImportError";
  }
}

export class MissingDirectoryError extends ProjectImportError {
  constructor(
    message: string,
    public readonly directory: string,
  ) {
    super(message, IMPORT_ERROR_CODES.missingDirectory);
    this.name = "MissingDirectoryError";
  }
}

export class TransferError extends ProjectImportError {
  constructor(message: string, cause?: unknown) {
    super(message, IMPORT_ERROR_CODES.transfer, cause);
    this.name = "TransferError";
  }
}

export class ResolutionError extends ProjectImportError {
  constructor(message: string, cause?: unknown) {
    super(message, IMPORT_ERROR_CODES.resolution, cause);
    this.name = "ResolutionError";
  }
}

export class ArchiveError extends ProjectImportError {
  constructor(message: string, cause?: unknown) {
    super(message, IMPORT_ERROR_CODES.archive, cause);
    this.name = "ArchiveError";
  }
}

export class PersistenceError extends ProjectImportError {
  constructor(message: string, cause?: unknown) {
    super(message, IMPORT_ERROR_CODES.persistence, cause);
    this.name = "PersistenceError";
  }
}

export class RulebookContentError extends ProjectImportError {
  constructor(
    message: string,
    public readonly rulebookPath: string,
    public readonly issues: string[] = [],
  ) {
    super(message, IMPORT_ERROR_CODES.rulebookContent);
    this.name = "RulebookContentError";
  }
}

export class ConfigError extends ProjectImportError {
  constructor(message: string, cause?: unknown) {
    super(message, IMPORT_ERROR_CODES.config, cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  ...IMPORT_ERROR_CODES,
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
