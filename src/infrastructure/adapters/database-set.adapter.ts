// Read-only handle set over the client's raw SQLite files
// File: src/infrastructure/adapters/database-set.adapter.ts

import Database from 'better-sqlite3';
import { globSync } from 'glob';
import { statSync } from 'node:fs';
import path from 'node:path';
import { DatabaseNotFoundError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'DatabaseSet' });

export interface DatabaseSetOptions {
  /** Directory holding the `Raw_<Name>_*` files */
  rawDir: string;
  fileExtension: string;
  databases: readonly string[];
  requiredDatabases: readonly string[];
}

/** Creation time where the platform reports one, change time otherwise. */
function creationTimeMs(filePath: string): number {
  const stats = statSync(filePath);
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

export function databaseFilePattern(rawDir: string, name: string, fileExtension: string): string {
  return path.join(rawDir, `Raw_${name}_*${fileExtension}`);
}

/**
 * Newest file matching the logical database's pattern, or null. Ties on the
 * timestamp go to the lexicographically greater path.
 */
export function findLatestDatabaseFile(rawDir: string, name: string, fileExtension: string): string | null {
  const matches = globSync(`Raw_${name}_*${fileExtension}`, { cwd: rawDir, nodir: true, absolute: true });
  let latest: { file: string; time: number } | null = null;

  for (const file of matches.sort()) {
    const time = creationTimeMs(file);
    if (!latest || time >= latest.time) {
      latest = { file, time };
    }
  }
  return latest ? latest.file : null;
}

export class DatabaseSet {
  private readonly connections = new Map<string, Database.Database>();
  private readonly files = new Map<string, string>();

  constructor(options: DatabaseSetOptions) {
    try {
      for (const name of options.databases) {
        const file = findLatestDatabaseFile(options.rawDir, name, options.fileExtension);
        if (!file) {
          if (options.requiredDatabases.includes(name)) {
            throw new DatabaseNotFoundError(name, databaseFilePattern(options.rawDir, name, options.fileExtension));
          }
          log.warn({ database: name, rawDir: options.rawDir }, 'Optional database file not found, skipping');
          continue;
        }

        this.connections.set(name, new Database(file, { readonly: true, fileMustExist: true }));
        this.files.set(name, file);
        log.debug({ database: name, file }, 'Database opened');
      }
    } catch (error) {
      this.close();
      throw error;
    }
  }

  has(name: string): boolean {
    return this.connections.has(name);
  }

  get(name: string): Database.Database {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new Error(`Database '${name}' is not open`);
    }
    return connection;
  }

  fileOf(name: string): string | undefined {
    return this.files.get(name);
  }

  names(): string[] {
    return Array.from(this.connections.keys());
  }

  close(): void {
    for (const [name, connection] of this.connections) {
      if (connection.open) {
        connection.close();
        log.debug({ database: name }, 'Database closed');
      }
    }
    this.connections.clear();
    this.files.clear();
  }
}
