// JSON shapes emitted by the schema inspector. Keys are snake_case because
// they form the inspector's output format.

export type SqlValue = string | number | bigint | Buffer | null;

export interface SchemaPragmas {
  page_size: SqlValue;
  user_version: SqlValue;
  application_id: SqlValue;
  auto_vacuum: SqlValue;
  encoding: SqlValue;
}

export interface ColumnInfo {
  cid: number;
  name: string;
  type: string;
  not_null: boolean;
  default_value: SqlValue;
  primary_key_position: number;
}

export interface IndexInfo {
  name: string;
  unique: boolean;
  origin: string;
  partial: boolean;
  columns: Array<string | null>;
}

export interface ForeignKeyInfo {
  id: number;
  seq: number;
  table: string;
  from_column: string;
  to_column: string | null;
  on_update: string;
  on_delete: string;
  match: string;
}

export interface TableSummary {
  name: string;
  sql: string | null;
  columns: ColumnInfo[];
  indexes: IndexInfo[];
  foreign_keys: ForeignKeyInfo[];
  row_count: number | null;
}

export interface ViewSummary {
  name: string;
  sql: string | null;
}

export interface DatabaseSummary {
  file: string;
  size_bytes: number;
  modified: number;
  modified_iso: string;
  schema: SchemaPragmas;
  tables: TableSummary[];
  views: ViewSummary[];
}

export type RowCountResult = { status: 'counted'; count: number } | { status: 'error'; error: unknown };

export interface InspectOptions {
  includeRowCount: boolean;
}

export interface DiscoveryOptions {
  recursive: boolean;
  extension: string;
  cwd?: string;
}

export interface ISchemaInspector {
  discover(targets: readonly string[], options: DiscoveryOptions): Promise<string[]>;
  inspectDatabase(filePath: string, options: InspectOptions): DatabaseSummary;
  inspectMany(filePaths: readonly string[], options: InspectOptions): DatabaseSummary[];
}
