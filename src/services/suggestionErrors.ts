// src/services/suggestionErrors.ts

export type SuggestionErrorKind =
  | "InvalidCatalog"
  | "InvalidTargets"
  | "InvalidConfiguration";

/**
 * Input validation failure raised by the suggestion engine before any trial
 * runs. Callers get either a result or one of these, never both.
 */
export class SuggestionError extends Error {
  readonly kind: SuggestionErrorKind;

  constructor(kind: SuggestionErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

export class InvalidCatalogError extends SuggestionError {
  constructor(message: string) {
    super("InvalidCatalog", message);
  }
}

export class InvalidTargetsError extends SuggestionError {
  constructor(message: string) {
    super("InvalidTargets", message);
  }
}

export class InvalidConfigurationError extends SuggestionError {
  constructor(message: string) {
    super("InvalidConfiguration", message);
  }
}
