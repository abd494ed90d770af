import type { ArtResult } from './asset-bundle.interface.js';
import type { SqlValue } from './schema-inspector.interface.js';

export type RawRow = Record<string, SqlValue>;

/** A text reference as stored in a row: usually an integer LocId, possibly null. */
export type TextRef = SqlValue | undefined;

export type TextResolution =
  | { status: 'resolved'; text: string; source: 'active' | 'default' }
  | { status: 'not-found' }
  | { status: 'error'; error: unknown };

export interface LocalizationSelection {
  /** Language as requested by the caller */
  language: string;
  /** Normalized key that matched, e.g. `enus` */
  key: string;
  table: string;
  defaultTable: string;
}

export type EnumValue = string | number;
export type EnumTable = ReadonlyMap<string, ReadonlyMap<EnumValue, TextRef>>;

export type AbilityRecord = Record<string, SqlValue>;

/**
 * Ability columns hold one record (or null) for a single reference and a list
 * for a comma-separated one.
 */
export type CardFieldValue = SqlValue | AbilityRecord | AbilityRecord[] | ArtResult;
export type CardRecord = Record<string, CardFieldValue>;

export interface CardLookupOptions {
  includeArt?: boolean;
}

export interface CardSearchOptions extends CardLookupOptions {
  /** Maximum number of cards; absent or non-positive means unbounded */
  limit?: number;
}

export interface ResolverDiagnostics {
  resolved: number;
  fallbackHits: number;
  notFound: number;
  errors: number;
  abilityErrors: number;
}

export interface ICardReader {
  readonly localization: LocalizationSelection;
  getCardById(cardId: number, options?: CardLookupOptions): Promise<CardRecord | null>;
  getCardByName(cardName: string, options?: CardSearchOptions): Promise<CardRecord[]>;
  getAbility(abilityId: number): AbilityRecord | null;
  getCardArtById(artId: number): Promise<ArtResult>;
  resolveText(textId: TextRef): TextResolution;
  getTranslation(textId: TextRef): TextRef;
  getEnums(): EnumTable;
  getEnumText(category: string, value: EnumValue): TextRef;
  getDiagnostics(): ResolverDiagnostics;
  close(): void;
}
