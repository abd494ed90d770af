import type Database from 'better-sqlite3';
import type { EnumTable, EnumValue, TextRef } from '../../core/interfaces/card-reader.interface.js';
import type { SqlValue } from '../../core/interfaces/schema-inspector.interface.js';

export interface EnumTextSource {
  translate(textId: TextRef): TextRef;
}

function toEnumValue(value: SqlValue): EnumValue | null {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

/**
 * Category -> (raw value -> display text), read once from the flat `Enums`
 * table. Values whose text cannot be resolved keep their LocId.
 */
export function loadEnums(db: Database.Database, texts: EnumTextSource): EnumTable {
  const categories = db
    .prepare<[], { Type: SqlValue }>('SELECT "Type" FROM Enums GROUP BY "Type"')
    .all()
    .map(row => row.Type)
    .filter((type): type is string => typeof type === 'string');

  const valuesOf = db.prepare<[string], { Value: SqlValue; LocId: SqlValue }>(
    'SELECT Value, LocId FROM Enums WHERE "Type" = ?'
  );

  const table = new Map<string, ReadonlyMap<EnumValue, TextRef>>();
  for (const category of categories) {
    const entries = new Map<EnumValue, TextRef>();
    for (const row of valuesOf.all(category)) {
      const value = toEnumValue(row.Value);
      if (value !== null) {
        entries.set(value, texts.translate(row.LocId));
      }
    }
    table.set(category, entries);
  }
  return table;
}
