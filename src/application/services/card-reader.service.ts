// Card data reader: owns the database handles and the per-language resolvers
// File: src/application/services/card-reader.service.ts

import { inject, injectable } from 'inversify';
import path from 'node:path';
import type { ArtResult, IAssetBundleUnpacker, IImageDecoder } from '../../core/interfaces/asset-bundle.interface.js';
import type {
  AbilityRecord,
  CardLookupOptions,
  CardRecord,
  CardSearchOptions,
  EnumTable,
  EnumValue,
  ICardReader,
  LocalizationSelection,
  ResolverDiagnostics,
  TextRef,
  TextResolution
} from '../../core/interfaces/card-reader.interface.js';
import type { AppConfig, ReaderConfig } from '../../infrastructure/config/schema.js';
import { DatabaseSet } from '../../infrastructure/adapters/database-set.adapter.js';
import { ArtExtractor } from './art-extractor.service.js';
import { CardResolver } from './card-resolver.service.js';
import { loadEnums } from './enum-loader.service.js';
import { listLocalizationTables, resolveLanguage } from './language-resolver.service.js';
import { TextResolver } from './text-resolver.service.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'CardReader' });

export const CARD_DATABASE = 'CardDatabase';

export interface ReaderPaths {
  dataDir: string;
  rawDir: string;
  assetsDir: string;
}

export function resolveReaderPaths(config: ReaderConfig): ReaderPaths {
  const dataDir = path.resolve(config.rootDir, config.dataDir);
  return {
    dataDir,
    rawDir: path.join(dataDir, config.rawDir),
    assetsDir: path.join(dataDir, config.assetsDir)
  };
}

@injectable()
export class CardReader implements ICardReader {
  readonly localization: LocalizationSelection;
  readonly paths: ReaderPaths;
  private readonly databases: DatabaseSet;
  private readonly texts: TextResolver;
  private readonly cards: CardResolver;
  private readonly art: ArtExtractor;
  private readonly enums: EnumTable;

  constructor(
    @inject('Config') config: AppConfig,
    @inject('AssetBundleUnpacker') unpacker: IAssetBundleUnpacker,
    @inject('ImageDecoder') decoder: IImageDecoder
  ) {
    const reader = config.reader;
    this.paths = resolveReaderPaths(reader);
    this.databases = new DatabaseSet({
      rawDir: this.paths.rawDir,
      fileExtension: reader.fileExtension,
      databases: [...new Set([CARD_DATABASE, ...reader.databases])],
      requiredDatabases: [...new Set([CARD_DATABASE, ...reader.requiredDatabases])]
    });

    try {
      const cardDb = this.databases.get(CARD_DATABASE);
      this.localization = resolveLanguage(
        listLocalizationTables(cardDb, reader.localizationPrefix),
        reader.language,
        { defaultLanguage: reader.defaultLanguage, prefix: reader.localizationPrefix, database: CARD_DATABASE }
      );
      this.texts = new TextResolver(cardDb, this.localization);
      this.art = new ArtExtractor(
        { assetsDir: this.paths.assetsDir, fileExtension: reader.fileExtension },
        unpacker,
        decoder
      );
      this.cards = new CardResolver(cardDb, this.texts, this.localization.table, this.art);
      this.enums = loadEnums(cardDb, this.texts);
    } catch (error) {
      this.databases.close();
      throw error;
    }

    log.info(
      {
        language: this.localization.language,
        table: this.localization.table,
        defaultTable: this.localization.defaultTable,
        databases: this.databases.names(),
        enumCategories: this.enums.size
      },
      'Card reader ready'
    );
  }

  getCardById(cardId: number, options?: CardLookupOptions): Promise<CardRecord | null> {
    return this.cards.getCardById(cardId, options);
  }

  getCardByName(cardName: string, options?: CardSearchOptions): Promise<CardRecord[]> {
    return this.cards.getCardByName(cardName, options);
  }

  getAbility(abilityId: number): AbilityRecord | null {
    return this.cards.getAbility(abilityId);
  }

  getCardArtById(artId: number): Promise<ArtResult> {
    return this.art.extract(artId);
  }

  resolveText(textId: TextRef): TextResolution {
    return this.texts.resolve(textId);
  }

  getTranslation(textId: TextRef): TextRef {
    return this.texts.translate(textId);
  }

  getEnums(): EnumTable {
    return this.enums;
  }

  getEnumText(category: string, value: EnumValue): TextRef {
    return this.enums.get(category)?.get(value);
  }

  getDiagnostics(): ResolverDiagnostics {
    return { ...this.texts.getStats(), abilityErrors: this.cards.getAbilityErrorCount() };
  }

  close(): void {
    const diagnostics = this.getDiagnostics();
    if (diagnostics.errors > 0 || diagnostics.abilityErrors > 0) {
      log.warn(diagnostics, 'Soft failures occurred while resolving card data');
    }
    this.databases.close();
  }
}
