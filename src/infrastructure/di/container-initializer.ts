// src/infrastructure/di/container-initializer.ts
import type { Container } from 'inversify';
import type { IToolRegistry } from '../../core/interfaces/tool-registry.interface.js';
import type { ICardReader } from '../../core/interfaces/card-reader.interface.js';
import type { AppConfig } from '../config/schema.js';

import { GetCardTool, FindCardsTool } from '../../application/tools/card-lookup.tool.js';
import { TranslateTextTool, ListEnumsTool } from '../../application/tools/localization.tool.js';
import { ReaderDiagnosticsTool } from '../../application/tools/reader-diagnostics.tool.js';
import { InspectDatabaseTool } from '../../application/tools/schema-inspection.tool.js';
import { logger } from '../../utils/logger.js';

export class ContainerInitializer {
  static async initialize(container: Container): Promise<void> {
    logger.info('Initializing container...');

    this.initializeTools(container);
    this.warmCardReader(container);

    logger.info('Container initialization complete');
  }

  private static initializeTools(container: Container): void {
    const toolRegistry = container.get<IToolRegistry>('ToolRegistry');

    // Card data
    toolRegistry.register(container.get<GetCardTool>(GetCardTool));
    toolRegistry.register(container.get<FindCardsTool>(FindCardsTool));
    toolRegistry.register(container.get<TranslateTextTool>(TranslateTextTool));
    toolRegistry.register(container.get<ListEnumsTool>(ListEnumsTool));
    toolRegistry.register(container.get<ReaderDiagnosticsTool>(ReaderDiagnosticsTool));

    // Schema inspection
    toolRegistry.register(container.get<InspectDatabaseTool>(InspectDatabaseTool));
  }

  /**
   * Opens the card databases up front so a bad root or language shows in the
   * startup log. The server still starts; card tools then report the error.
   */
  private static warmCardReader(container: Container): void {
    const config = container.get<AppConfig>('Config');
    try {
      container.get<ICardReader>('CardReader');
    } catch (error) {
      logger.warn(
        { error, rootDir: config.reader.rootDir, language: config.reader.language },
        'Card reader unavailable; only schema inspection will work until the data directory is fixed'
      );
    }
  }
}
