import type Database from 'better-sqlite3';
import type {
  LocalizationSelection,
  TextRef,
  TextResolution
} from '../../core/interfaces/card-reader.interface.js';
import { logger } from '../../utils/logger.js';
import { quoteIdentifier } from '../../utils/sql.js';

const log = logger.child({ component: 'TextResolver' });

type LookupResult = { status: 'found'; text: string } | { status: 'not-found' } | { status: 'error'; error: unknown };

export interface TextResolverStats {
  resolved: number;
  fallbackHits: number;
  notFound: number;
  errors: number;
}

/**
 * Resolves LocIds against the active localization table, then the default one.
 * Lookup failures are reported as values, never thrown.
 */
export class TextResolver {
  private readonly stats: TextResolverStats = { resolved: 0, fallbackHits: 0, notFound: 0, errors: 0 };

  constructor(
    private readonly db: Database.Database,
    private readonly localization: Pick<LocalizationSelection, 'table' | 'defaultTable'>
  ) {}

  resolve(textId: TextRef): TextResolution {
    if (textId === null || textId === undefined) {
      return { status: 'not-found' };
    }

    const active = this.lookup(textId, this.localization.table);
    if (active.status === 'found') {
      this.stats.resolved++;
      return { status: 'resolved', text: active.text, source: 'active' };
    }

    let outcome: LookupResult = active;
    if (this.localization.defaultTable !== this.localization.table) {
      const fallback = this.lookup(textId, this.localization.defaultTable);
      if (fallback.status === 'found') {
        this.stats.resolved++;
        this.stats.fallbackHits++;
        return { status: 'resolved', text: fallback.text, source: 'default' };
      }
      if (active.status !== 'error') {
        outcome = fallback;
      }
    }

    if (outcome.status === 'error') {
      this.stats.errors++;
      return { status: 'error', error: outcome.error };
    }
    this.stats.notFound++;
    return { status: 'not-found' };
  }

  /** Display text, or the identifier itself when it cannot be resolved. */
  translate(textId: TextRef): TextRef {
    const result = this.resolve(textId);
    return result.status === 'resolved' ? result.text : textId;
  }

  getStats(): TextResolverStats {
    return { ...this.stats };
  }

  private lookup(textId: Exclude<TextRef, null | undefined>, table: string): LookupResult {
    try {
      const row = this.db
        .prepare<[Exclude<TextRef, null | undefined>], { Loc: unknown }>(
          `SELECT Loc FROM ${quoteIdentifier(table)} WHERE LocId = ? ORDER BY Formatted DESC LIMIT 1`
        )
        .get(textId);

      if (row && typeof row.Loc === 'string' && row.Loc !== '') {
        return { status: 'found', text: row.Loc };
      }
      return { status: 'not-found' };
    } catch (error) {
      log.debug({ error, textId, table }, 'Localization lookup failed');
      return { status: 'error', error };
    }
  }
}
