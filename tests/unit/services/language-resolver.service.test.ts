import Database from 'better-sqlite3';
import {
  indexLocalizationTables,
  listLocalizationTables,
  normalizeLanguage,
  resolveLanguage
} from '../../../src/application/services/language-resolver.service.js';
import { LanguageNotAvailableError, LocalizationTablesMissingError } from '../../../src/core/errors.js';

const TABLES = ['Localizations_enUS', 'Localizations_jaJP'];

describe('normalizeLanguage', () => {
  it('strips separators and lower-cases', () => {
    expect(normalizeLanguage('en-US')).toBe('enus');
    expect(normalizeLanguage('en_us')).toBe('enus');
    expect(normalizeLanguage('EnUs')).toBe('enus');
    expect(normalizeLanguage('pt-_BR')).toBe('ptbr');
  });
});

describe('resolveLanguage', () => {
  it('resolves en_us to the enUS table', () => {
    expect(resolveLanguage(TABLES, 'en_us')).toEqual({
      language: 'en_us',
      key: 'enus',
      table: 'Localizations_enUS',
      defaultTable: 'Localizations_enUS'
    });
  });

  it.each(['enUS', 'en-US', 'EN_us', 'en_US', 'enus'])('selects the same table for %s', language => {
    expect(resolveLanguage(TABLES, language).table).toBe('Localizations_enUS');
  });

  it('keeps English as the default table when another language is active', () => {
    const selection = resolveLanguage(TABLES, 'ja-JP');
    expect(selection.table).toBe('Localizations_jaJP');
    expect(selection.defaultTable).toBe('Localizations_enUS');
  });

  it('falls back to the first table in catalog order when English is absent', () => {
    const selection = resolveLanguage(['Localizations_jaJP', 'Localizations_frFR'], 'fr-FR');
    expect(selection.table).toBe('Localizations_frFR');
    expect(selection.defaultTable).toBe('Localizations_jaJP');
  });

  it('honours a configured default language', () => {
    const selection = resolveLanguage(TABLES, 'enUS', { defaultLanguage: 'ja_jp' });
    expect(selection.defaultTable).toBe('Localizations_jaJP');
  });

  it('lists the sorted available keys when the language is unknown', () => {
    expect(() => resolveLanguage(['Localizations_jaJP', 'Localizations_enUS'], 'xx')).toThrow(
      new LanguageNotAvailableError('xx', ['enus', 'jajp'])
    );
    expect(() => resolveLanguage(TABLES, 'xx')).toThrow("Language 'xx' not available. Options: enus, jajp");
  });

  it('fails when there are no localization tables at all', () => {
    expect(() => resolveLanguage([], 'enUS')).toThrow(LocalizationTablesMissingError);
    expect(() => resolveLanguage(['Cards'], 'enUS', { database: 'CardDatabase' })).toThrow(
      'No localization tables found in CardDatabase.'
    );
  });
});

describe('indexLocalizationTables', () => {
  it('keeps the last table for a duplicate key', () => {
    const index = indexLocalizationTables(['Localizations_enUS', 'Localizations_en_US', 'Localizations_']);
    expect([...index.entries()]).toEqual([['enus', 'Localizations_en_US']]);
  });

  it('falls back to the first catalog table even when a later one shares its key', () => {
    const selection = resolveLanguage(['Localizations_frFR', 'Localizations_jaJP', 'Localizations_fr_FR'], 'jaJP');
    expect(selection.table).toBe('Localizations_jaJP');
    expect(selection.defaultTable).toBe('Localizations_frFR');
  });
});

describe('listLocalizationTables', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    for (const table of [
      'Localizations_enUS',
      'LocalizationsXjaJP',
      'localizations_frFR',
      'Localizations_',
      'Cards',
      'Localizations_jaJP'
    ]) {
      db.exec(`CREATE TABLE "${table}" (LocId INTEGER)`);
    }
  });

  afterEach(() => {
    db.close();
  });

  it('returns only tables carrying the exact prefix, in catalog order', () => {
    expect(listLocalizationTables(db)).toEqual(['Localizations_enUS', 'Localizations_jaJP']);
  });
});
