// SQLite schema inspector: catalog walk, PRAGMA metadata, optional row counts
// File: src/application/services/schema-inspector.service.ts

import Database from 'better-sqlite3';
import { injectable } from 'inversify';
import { statSync } from 'node:fs';
import type {
  ColumnInfo,
  DatabaseSummary,
  DiscoveryOptions,
  ForeignKeyInfo,
  IndexInfo,
  InspectOptions,
  ISchemaInspector,
  RowCountResult,
  SchemaPragmas,
  SqlValue,
  TableSummary,
  ViewSummary
} from '../../core/interfaces/schema-inspector.interface.js';
import { discoverDatabases } from './database-discovery.service.js';
import { logger } from '../../utils/logger.js';
import { quoteIdentifier } from '../../utils/sql.js';

const log = logger.child({ component: 'SchemaInspector' });

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: SqlValue;
  pk: number;
}

interface IndexListRow {
  seq: number;
  name: string;
  unique: number;
  origin: string;
  partial: number;
}

interface IndexInfoRow {
  seqno: number;
  cid: number;
  name: string | null;
}

interface ForeignKeyRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  to: string | null;
  on_update: string;
  on_delete: string;
  match: string;
}

export function fetchTableColumns(db: Database.Database, table: string): ColumnInfo[] {
  return db
    .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(table)})`)
    .all()
    .map(row => ({
      cid: row.cid,
      name: row.name,
      type: row.type,
      not_null: Boolean(row.notnull),
      default_value: row.dflt_value,
      primary_key_position: row.pk
    }));
}

export function fetchIndexes(db: Database.Database, table: string): IndexInfo[] {
  return db
    .prepare<[], IndexListRow>(`PRAGMA index_list(${quoteIdentifier(table)})`)
    .all()
    .map(index => ({
      name: index.name,
      unique: Boolean(index.unique),
      origin: index.origin,
      partial: Boolean(index.partial),
      columns: db
        .prepare<[], IndexInfoRow>(`PRAGMA index_info(${quoteIdentifier(index.name)})`)
        .all()
        .map(info => info.name)
    }));
}

export function fetchForeignKeys(db: Database.Database, table: string): ForeignKeyInfo[] {
  return db
    .prepare<[], ForeignKeyRow>(`PRAGMA foreign_key_list(${quoteIdentifier(table)})`)
    .all()
    .map(row => ({
      id: row.id,
      seq: row.seq,
      table: row.table,
      from_column: row.from,
      to_column: row.to,
      on_update: row.on_update,
      on_delete: row.on_delete,
      match: row.match
    }));
}

export function fetchRowCount(db: Database.Database, table: string): RowCountResult {
  try {
    const count = db.prepare<[], number>(`SELECT COUNT(*) FROM ${quoteIdentifier(table)}`).pluck().get();
    if (typeof count !== 'number') {
      return { status: 'error', error: new Error('COUNT(*) returned no row') };
    }
    return { status: 'counted', count };
  } catch (error) {
    return { status: 'error', error };
  }
}

function fetchDefinition(db: Database.Database, type: 'table' | 'view', name: string): string | null {
  const row = db
    .prepare<[string, string], { sql: string | null }>('SELECT sql FROM sqlite_master WHERE type = ? AND name = ?')
    .get(type, name);
  return row?.sql ?? null;
}

export function inspectTable(db: Database.Database, table: string, includeRowCount: boolean): TableSummary {
  let rowCount: number | null = null;
  if (includeRowCount) {
    const result = fetchRowCount(db, table);
    if (result.status === 'counted') {
      rowCount = result.count;
    } else {
      log.warn({ table, error: result.error }, 'Row count failed, reporting null');
    }
  }

  return {
    name: table,
    sql: fetchDefinition(db, 'table', table),
    columns: fetchTableColumns(db, table),
    indexes: fetchIndexes(db, table),
    foreign_keys: fetchForeignKeys(db, table),
    row_count: rowCount
  };
}

export function inspectView(db: Database.Database, view: string): ViewSummary {
  return { name: view, sql: fetchDefinition(db, 'view', view) };
}

export function inspectSchema(db: Database.Database): SchemaPragmas {
  const read = (pragma: keyof SchemaPragmas): SqlValue => {
    const value: unknown = db.pragma(pragma, { simple: true });
    return value === undefined ? null : toSqlValue(value);
  };
  return {
    page_size: read('page_size'),
    user_version: read('user_version'),
    application_id: read('application_id'),
    auto_vacuum: read('auto_vacuum'),
    encoding: read('encoding')
  };
}

function toSqlValue(value: unknown): SqlValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  return String(value);
}

function catalogNames(db: Database.Database, type: 'table' | 'view'): string[] {
  const filter = type === 'table' ? " AND name NOT LIKE 'sqlite_%'" : '';
  return db
    .prepare<[string], string>(`SELECT name FROM sqlite_master WHERE type = ?${filter} ORDER BY name`)
    .pluck()
    .all(type);
}

export function inspectDatabase(filePath: string, options: InspectOptions): DatabaseSummary {
  const stats = statSync(filePath);
  const db = new Database(filePath, { readonly: true, fileMustExist: true });

  try {
    const tables = catalogNames(db, 'table').map(name => inspectTable(db, name, options.includeRowCount));
    const views = catalogNames(db, 'view').map(name => inspectView(db, name));

    return {
      file: filePath,
      size_bytes: stats.size,
      modified: stats.mtimeMs / 1000,
      modified_iso: stats.mtime.toISOString(),
      schema: inspectSchema(db),
      tables,
      views
    };
  } finally {
    db.close();
  }
}

@injectable()
export class SchemaInspector implements ISchemaInspector {
  discover(targets: readonly string[], options: DiscoveryOptions): Promise<string[]> {
    return discoverDatabases(targets, options);
  }

  inspectDatabase(filePath: string, options: InspectOptions): DatabaseSummary {
    log.debug({ filePath }, 'Inspecting database');
    return inspectDatabase(filePath, options);
  }

  inspectMany(filePaths: readonly string[], options: InspectOptions): DatabaseSummary[] {
    return filePaths.map(filePath => this.inspectDatabase(filePath, options));
  }
}
