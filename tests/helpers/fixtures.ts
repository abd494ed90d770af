import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getConfigDefaults, type AppConfig } from '../../src/infrastructure/config/schema.js';

export type FixtureValue = string | number | null;

export interface LocalizationRow {
  locId: number;
  loc: string;
  formatted?: number;
}

export interface CardDatabaseSeed {
  /** Keyed by language suffix, e.g. `enUS` creates `Localizations_enUS` */
  localizations: Record<string, LocalizationRow[]>;
  cards?: Array<Record<string, FixtureValue>>;
  abilities?: Array<{ Id: number; TextId: number | null; Category: number }>;
  enums?: Array<{ Type: string; Value: number; LocId: number }>;
}

const CARD_COLUMNS = [
  'GrpId',
  'TitleId',
  'FlavorTextId',
  'TypeTextId',
  'AbilityIds',
  'HiddenAbilityIds',
  'ArtId',
  'Power',
  'Rarity'
] as const;

/**
 * Two languages; `Localizations_jaJP` lacks LocIds 11, 31, 40 and 41 so
 * lookups in Japanese fall back to English for them.
 */
export const STANDARD_SEED: CardDatabaseSeed = {
  localizations: {
    enUS: [
      { locId: 10, loc: 'lightning bolt', formatted: 0 },
      { locId: 10, loc: 'Lightning Bolt', formatted: 1 },
      { locId: 11, loc: 'Lightning Helix', formatted: 1 },
      { locId: 20, loc: 'Instant', formatted: 1 },
      { locId: 30, loc: 'Deal 3 damage to any target.', formatted: 1 },
      { locId: 31, loc: 'Flying', formatted: 1 },
      { locId: 40, loc: 'Red', formatted: 1 },
      { locId: 41, loc: 'Green', formatted: 1 },
      { locId: 60, loc: '', formatted: 1 }
    ],
    jaJP: [
      { locId: 10, loc: 'Inazuma', formatted: 1 },
      { locId: 20, loc: 'Insutanto', formatted: 1 },
      { locId: 30, loc: 'Santen dameeji', formatted: 1 }
    ]
  },
  cards: [
    { GrpId: 1001, TitleId: 10, TypeTextId: 20, AbilityIds: '200:30', ArtId: 501, Rarity: 2 },
    { GrpId: 1002, TitleId: 10, TypeTextId: 20, AbilityIds: '200:30,201', Rarity: 2 },
    { GrpId: 1003, TitleId: 11, TypeTextId: 20, AbilityIds: '999', ArtId: 502, Power: '2', Rarity: 3 },
    { GrpId: 1004, TitleId: 99, AbilityIds: '', Rarity: 1 }
  ],
  abilities: [
    { Id: 200, TextId: 30, Category: 1 },
    { Id: 201, TextId: 31, Category: 2 }
  ],
  enums: [
    { Type: 'Color', Value: 1, LocId: 40 },
    { Type: 'Color', Value: 2, LocId: 41 },
    { Type: 'Rarity', Value: 2, LocId: 77 }
  ]
};

export function makeTempDir(prefix = 'card-data-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function seedCardDatabase(db: Database.Database, seed: CardDatabaseSeed): void {
  for (const [language, rows] of Object.entries(seed.localizations)) {
    const table = `Localizations_${language}`;
    db.exec(`CREATE TABLE "${table}" (LocId INTEGER, Formatted INTEGER, Loc TEXT)`);
    const insert = db.prepare(`INSERT INTO "${table}" (LocId, Formatted, Loc) VALUES (?, ?, ?)`);
    for (const row of rows) {
      insert.run(row.locId, row.formatted ?? 1, row.loc);
    }
  }

  db.exec(`CREATE TABLE Cards (
    GrpId INTEGER PRIMARY KEY, TitleId INTEGER, FlavorTextId INTEGER, TypeTextId INTEGER,
    AbilityIds TEXT, HiddenAbilityIds TEXT, ArtId INTEGER, Power TEXT, Rarity INTEGER
  )`);
  const insertCard = db.prepare(
    `INSERT INTO Cards (${CARD_COLUMNS.join(', ')}) VALUES (${CARD_COLUMNS.map(() => '?').join(', ')})`
  );
  for (const card of seed.cards ?? []) {
    insertCard.run(...CARD_COLUMNS.map(column => card[column] ?? null));
  }

  db.exec('CREATE TABLE Abilities (Id INTEGER PRIMARY KEY, TextId INTEGER, Category INTEGER)');
  const insertAbility = db.prepare('INSERT INTO Abilities (Id, TextId, Category) VALUES (?, ?, ?)');
  for (const ability of seed.abilities ?? []) {
    insertAbility.run(ability.Id, ability.TextId, ability.Category);
  }

  db.exec('CREATE TABLE Enums ("Type" TEXT, Value INTEGER, LocId INTEGER)');
  const insertEnum = db.prepare('INSERT INTO Enums ("Type", Value, LocId) VALUES (?, ?, ?)');
  for (const entry of seed.enums ?? []) {
    insertEnum.run(entry.Type, entry.Value, entry.LocId);
  }
}

export function createCardDatabase(filePath: string, seed: CardDatabaseSeed = STANDARD_SEED): void {
  const db = new Database(filePath);
  try {
    seedCardDatabase(db, seed);
  } finally {
    db.close();
  }
}

export interface GameRoot {
  rootDir: string;
  rawDir: string;
  assetsDir: string;
  cardDatabase: string;
}

/** Lays out `<root>/MTGA_Data/Downloads/{Raw,AssetBundle}` with one card database. */
export function createGameRoot(rootDir: string, seed: CardDatabaseSeed = STANDARD_SEED): GameRoot {
  const rawDir = path.join(rootDir, 'MTGA_Data', 'Downloads', 'Raw');
  const assetsDir = path.join(rootDir, 'MTGA_Data', 'Downloads', 'AssetBundle');
  fs.mkdirSync(rawDir, { recursive: true });
  fs.mkdirSync(assetsDir, { recursive: true });

  const cardDatabase = path.join(rawDir, 'Raw_CardDatabase_fixture.mtga');
  createCardDatabase(cardDatabase, seed);
  return { rootDir, rawDir, assetsDir, cardDatabase };
}

export function readerConfig(rootDir: string, language = 'enUS'): AppConfig {
  const defaults = getConfigDefaults();
  return { ...defaults, reader: { ...defaults.reader, rootDir, language } };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
