import fs from 'node:fs';
import path from 'node:path';
import { DatabaseNotFoundError } from '../../../src/core/errors.js';
import {
  DatabaseSet,
  findLatestDatabaseFile
} from '../../../src/infrastructure/adapters/database-set.adapter.js';
import { createCardDatabase, makeTempDir, removeDir, sleep } from '../../helpers/fixtures.js';

describe('DatabaseSet', () => {
  let rawDir: string;
  let newest: string;

  beforeEach(async () => {
    rawDir = makeTempDir();
    // Lexical order is the reverse of creation order
    createCardDatabase(path.join(rawDir, 'Raw_CardDatabase_zzz.mtga'));
    await sleep(25);
    newest = path.join(rawDir, 'Raw_CardDatabase_aaa.mtga');
    createCardDatabase(newest);
    await sleep(25);
    fs.writeFileSync(path.join(rawDir, 'Raw_CardDatabaseExtra_1.mtga'), '');
    fs.writeFileSync(path.join(rawDir, 'Raw_CardDatabase_later.txt'), '');
  });

  afterEach(() => {
    removeDir(rawDir);
  });

  it('picks the most recently created file for a logical name', () => {
    expect(findLatestDatabaseFile(rawDir, 'CardDatabase', '.mtga')).toBe(newest);
    expect(findLatestDatabaseFile(rawDir, 'ClientLocalization', '.mtga')).toBeNull();
  });

  it('opens present databases read-only and skips missing optional ones', () => {
    const set = new DatabaseSet({
      rawDir,
      fileExtension: '.mtga',
      databases: ['CardDatabase', 'ClientLocalization'],
      requiredDatabases: ['CardDatabase']
    });

    try {
      expect(set.names()).toEqual(['CardDatabase']);
      expect(set.has('ClientLocalization')).toBe(false);
      expect(set.fileOf('CardDatabase')).toBe(newest);
      expect(set.get('CardDatabase').readonly).toBe(true);
      expect(() => set.get('ClientLocalization')).toThrow("Database 'ClientLocalization' is not open");
    } finally {
      set.close();
    }
    expect(set.has('CardDatabase')).toBe(false);
  });

  it('fails when a required database has no file', () => {
    const create = () =>
      new DatabaseSet({
        rawDir,
        fileExtension: '.mtga',
        databases: ['CardDatabase', 'ClientLocalization'],
        requiredDatabases: ['CardDatabase', 'ClientLocalization']
      });

    expect(create).toThrow(DatabaseNotFoundError);
    expect(create).toThrow(
      `No file found for database 'ClientLocalization' (pattern: ${path.join(rawDir, 'Raw_ClientLocalization_*.mtga')})`
    );
  });
});
