import type Database from 'better-sqlite3';
import type { ArtResult } from '../../core/interfaces/asset-bundle.interface.js';
import type {
  AbilityRecord,
  CardFieldValue,
  CardLookupOptions,
  CardRecord,
  CardSearchOptions,
  RawRow,
  TextRef
} from '../../core/interfaces/card-reader.interface.js';
import type { SqlValue } from '../../core/interfaces/schema-inspector.interface.js';
import { logger } from '../../utils/logger.js';
import { quoteIdentifier } from '../../utils/sql.js';

const log = logger.child({ component: 'CardResolver' });

export type FieldRule =
  | { kind: 'text'; key: string }
  | { kind: 'abilities'; key: string }
  | { kind: 'art'; key: string };

/** Columns of `Cards` that are references; every other column passes through. */
export const CARD_FIELDS: Readonly<Record<string, FieldRule>> = {
  TitleId: { kind: 'text', key: 'title' },
  AltTitleId: { kind: 'text', key: 'altTitle' },
  AltPrintedTitleId: { kind: 'text', key: 'altPrintedTitle' },
  InterchangeableTitleId: { kind: 'text', key: 'interchangeableTitle' },
  FlavorTextId: { kind: 'text', key: 'flavorText' },
  TypeTextId: { kind: 'text', key: 'typeText' },
  SubtypeTextId: { kind: 'text', key: 'subtypeText' },
  AbilityIds: { kind: 'abilities', key: 'abilities' },
  HiddenAbilityIds: { kind: 'abilities', key: 'hiddenAbilities' },
  ArtId: { kind: 'art', key: 'art' }
};

export const ABILITY_FIELDS: Readonly<Record<string, FieldRule>> = {
  TextId: { kind: 'text', key: 'text' }
};

export interface TextSource {
  translate(textId: TextRef): TextRef;
}

export interface ArtSource {
  extract(artId: number): Promise<ArtResult>;
}

export type AbilityLookup =
  | { status: 'found'; record: AbilityRecord }
  | { status: 'not-found' }
  | { status: 'error'; error: unknown };

function toInteger(value: SqlValue): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

/**
 * Ability references are stored as a single id or a comma-separated list of
 * `abilityId` / `abilityId:textId` tokens.
 */
export function parseAbilityIds(value: SqlValue): number[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map(token => toInteger(token.split(':')[0] ?? ''))
      .filter((id): id is number => id !== null);
  }
  const single = toInteger(value);
  return single === null ? [] : [single];
}

/** `'200:30,201'` lists several abilities; `'200:30'` or `200` is a single reference. */
export function isAbilityList(value: SqlValue): boolean {
  return typeof value === 'string' && value.includes(',');
}

export class CardResolver {
  private abilityErrors = 0;

  constructor(
    private readonly db: Database.Database,
    private readonly texts: TextSource,
    private readonly localizationTable: string,
    private readonly art: ArtSource
  ) {}

  lookupAbility(abilityId: number): AbilityLookup {
    try {
      const row = this.db.prepare<[number], RawRow>('SELECT * FROM Abilities WHERE Id = ?').get(abilityId);
      if (!row) {
        return { status: 'not-found' };
      }
      return { status: 'found', record: this.transformAbility(row) };
    } catch (error) {
      return { status: 'error', error };
    }
  }

  getAbility(abilityId: number): AbilityRecord | null {
    const result = this.lookupAbility(abilityId);
    if (result.status === 'error') {
      this.abilityErrors++;
      log.debug({ error: result.error, abilityId }, 'Ability lookup failed');
      return null;
    }
    return result.status === 'found' ? result.record : null;
  }

  async getCardById(cardId: number, options: CardLookupOptions = {}): Promise<CardRecord | null> {
    const row = this.db.prepare<[number], RawRow>('SELECT * FROM Cards WHERE GrpId = ? LIMIT 1').get(cardId);
    if (!row) {
      return null;
    }
    return this.transformCard(row, options.includeArt ?? false);
  }

  async getCardByName(cardName: string, options: CardSearchOptions = {}): Promise<CardRecord[]> {
    const limit = options.limit;
    const limited = limit !== undefined && limit > 0;
    const sql =
      `SELECT GrpId FROM Cards WHERE TitleId IN ` +
      `(SELECT LocId FROM ${quoteIdentifier(this.localizationTable)} WHERE Loc LIKE ?)` +
      (limited ? ' LIMIT ?' : '');
    const params: Array<string | number> = limited ? [cardName, limit] : [cardName];

    const ids = this.db
      .prepare<Array<string | number>, { GrpId: SqlValue }>(sql)
      .all(...params)
      .map(row => toInteger(row.GrpId))
      .filter((id): id is number => id !== null);

    const cards: CardRecord[] = [];
    for (const id of ids) {
      const card = await this.getCardById(id, options);
      if (card) {
        cards.push(card);
      }
    }
    return cards;
  }

  getAbilityErrorCount(): number {
    return this.abilityErrors;
  }

  private transformAbility(row: RawRow): AbilityRecord {
    const record: AbilityRecord = {};
    for (const [column, value] of Object.entries(row)) {
      const rule = ABILITY_FIELDS[column];
      if (rule?.kind === 'text') {
        record[rule.key] = this.translate(value);
      } else {
        record[column] = value;
      }
    }
    return record;
  }

  private async transformCard(row: RawRow, includeArt: boolean): Promise<CardRecord> {
    const card: CardRecord = {};
    for (const [column, value] of Object.entries(row)) {
      const rule = CARD_FIELDS[column];
      if (!rule) {
        card[column] = value;
        continue;
      }

      switch (rule.kind) {
        case 'text':
          card[rule.key] = this.translate(value);
          break;
        case 'abilities':
          card[rule.key] = value === null ? null : this.resolveAbilities(value);
          break;
        case 'art':
          card[rule.key] = await this.resolveArt(value, includeArt);
          break;
      }
    }
    return card;
  }

  private translate(value: SqlValue): SqlValue {
    const text = this.texts.translate(value);
    return text === undefined ? null : text;
  }

  /**
   * A single reference resolves to its record or null; a comma-separated list
   * resolves to the records that exist, in order. Any query error keeps the
   * raw value.
   */
  private resolveAbilities(value: SqlValue): CardFieldValue {
    const abilityIds = parseAbilityIds(value);

    if (!isAbilityList(value)) {
      const [abilityId] = abilityIds;
      if (abilityId === undefined) {
        return null;
      }
      const result = this.lookupCardAbility(abilityId);
      if (result.status === 'error') {
        return value;
      }
      return result.status === 'found' ? result.record : null;
    }

    const records: AbilityRecord[] = [];
    for (const abilityId of abilityIds) {
      const result = this.lookupCardAbility(abilityId);
      if (result.status === 'error') {
        return value;
      }
      if (result.status === 'found') {
        records.push(result.record);
      }
    }
    return records;
  }

  private lookupCardAbility(abilityId: number): AbilityLookup {
    const result = this.lookupAbility(abilityId);
    if (result.status === 'error') {
      this.abilityErrors++;
      log.debug({ error: result.error, abilityId }, 'Ability lookup failed, keeping raw reference');
    }
    return result;
  }

  private async resolveArt(value: SqlValue, includeArt: boolean): Promise<CardFieldValue> {
    if (!includeArt || value === null) {
      return value;
    }
    const artId = toInteger(value);
    return artId === null ? value : this.art.extract(artId);
  }
}
