// Domain errors raised to callers. Soft failures (text, ability, row count)
// never surface as exceptions; see the result types in the interfaces.

export type ErrorCategory = 'validation' | 'resource' | 'external' | 'system';

export class CardDataError extends Error {
  constructor(
    message: string,
    readonly code: number,
    readonly category: ErrorCategory
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class LocalizationTablesMissingError extends CardDataError {
  constructor(database: string) {
    super(`No localization tables found in ${database}.`, -32010, 'resource');
  }
}

export class LanguageNotAvailableError extends CardDataError {
  constructor(
    readonly language: string,
    readonly available: readonly string[]
  ) {
    super(`Language '${language}' not available. Options: ${available.join(', ')}`, -32011, 'validation');
  }
}

export class DatabaseNotFoundError extends CardDataError {
  constructor(
    readonly database: string,
    readonly pattern: string
  ) {
    super(`No file found for database '${database}' (pattern: ${pattern})`, -32012, 'resource');
  }
}

export class NoDatabaseFilesError extends CardDataError {
  constructor(extension: string) {
    super(`No ${extension} database files found for the given targets.`, -32013, 'resource');
  }
}

export class AssetBundleUnavailableError extends CardDataError {
  constructor(detail: string) {
    super(`Asset bundle unpacking is unavailable: ${detail}`, -32014, 'external');
  }
}
