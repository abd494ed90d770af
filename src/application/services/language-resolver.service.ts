import type Database from 'better-sqlite3';
import type { LocalizationSelection } from '../../core/interfaces/card-reader.interface.js';
import { LanguageNotAvailableError, LocalizationTablesMissingError } from '../../core/errors.js';

export const LOCALIZATION_PREFIX = 'Localizations_';
export const DEFAULT_LANGUAGE = 'enUS';

/** `en-US`, `en_us` and `EnUs` all normalize to `enus`. */
export function normalizeLanguage(language: string): string {
  return language.replace(/[-_]/g, '').toLowerCase();
}

function isLocalizationTable(table: string, prefix: string): boolean {
  return table.startsWith(prefix) && table.length > prefix.length;
}

/**
 * Localization table names in catalog order. `_` is a LIKE wildcard, so the
 * prefix is re-checked on the JavaScript side.
 */
export function listLocalizationTables(db: Database.Database, prefix: string = LOCALIZATION_PREFIX): string[] {
  const rows = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name LIKE ?")
    .all(`${prefix}%`);
  return rows.map(row => row.name).filter(name => isLocalizationTable(name, prefix));
}

/** Normalized language key to table name; a later table wins a duplicate key. */
export function indexLocalizationTables(tables: readonly string[], prefix: string = LOCALIZATION_PREFIX): Map<string, string> {
  const available = new Map<string, string>();
  for (const table of tables) {
    if (!isLocalizationTable(table, prefix)) continue;
    available.set(normalizeLanguage(table.slice(prefix.length)), table);
  }
  return available;
}

export interface ResolveLanguageOptions {
  defaultLanguage?: string;
  prefix?: string;
  /** Database name used in the error raised when no table exists */
  database?: string;
}

export function resolveLanguage(
  tables: readonly string[],
  language: string,
  options: ResolveLanguageOptions = {}
): LocalizationSelection {
  const prefix = options.prefix ?? LOCALIZATION_PREFIX;
  const available = indexLocalizationTables(tables, prefix);

  const firstTable = tables.find(table => isLocalizationTable(table, prefix));
  if (firstTable === undefined) {
    throw new LocalizationTablesMissingError(options.database ?? 'CardDatabase');
  }

  const key = normalizeLanguage(language);
  const table = available.get(key);
  if (!table) {
    throw new LanguageNotAvailableError(language, [...available.keys()].sort());
  }

  const defaultTable = available.get(normalizeLanguage(options.defaultLanguage ?? DEFAULT_LANGUAGE)) ?? firstTable;
  return { language, key, table, defaultTable };
}
