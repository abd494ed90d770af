// src/infrastructure/di/container.ts
import { Container } from 'inversify';
import 'reflect-metadata';

// Interfaces
import type { IToolRegistry } from '../../core/interfaces/tool-registry.interface.js';
import type { IAssetBundleUnpacker, IImageDecoder } from '../../core/interfaces/asset-bundle.interface.js';
import type { ICardReader } from '../../core/interfaces/card-reader.interface.js';
import type { ISchemaInspector } from '../../core/interfaces/schema-inspector.interface.js';
import type { AppConfig } from '../config/schema.js';

// Implementations
import { ToolRegistry } from '../../application/services/tool-registry.service.js';
import { CardReader } from '../../application/services/card-reader.service.js';
import { SchemaInspector } from '../../application/services/schema-inspector.service.js';
import { SharpImageDecoder } from '../adapters/sharp-image-decoder.adapter.js';
import { UnconfiguredBundleUnpacker } from '../adapters/unconfigured-bundle-unpacker.adapter.js';

// Tools
import { GetCardTool, FindCardsTool } from '../../application/tools/card-lookup.tool.js';
import { TranslateTextTool, ListEnumsTool } from '../../application/tools/localization.tool.js';
import { ReaderDiagnosticsTool } from '../../application/tools/reader-diagnostics.tool.js';
import { InspectDatabaseTool } from '../../application/tools/schema-inspection.tool.js';

export function createContainer(config: AppConfig): Container {
  const container = new Container();

  container.bind<AppConfig>('Config').toConstantValue(config);

  // Art extraction collaborators; hosts with a bundle reader rebind 'AssetBundleUnpacker'
  container.bind<IImageDecoder>('ImageDecoder').to(SharpImageDecoder).inSingletonScope();
  container.bind<IAssetBundleUnpacker>('AssetBundleUnpacker').to(UnconfiguredBundleUnpacker).inSingletonScope();

  // Core services. The reader opens its databases on first resolution.
  container.bind<ICardReader>('CardReader').to(CardReader).inSingletonScope();
  container.bind<ISchemaInspector>('SchemaInspector').to(SchemaInspector).inSingletonScope();
  container.bind<IToolRegistry>('ToolRegistry').to(ToolRegistry).inSingletonScope();

  container.bind<GetCardTool>(GetCardTool).to(GetCardTool).inSingletonScope();
  container.bind<FindCardsTool>(FindCardsTool).to(FindCardsTool).inSingletonScope();
  container.bind<TranslateTextTool>(TranslateTextTool).to(TranslateTextTool).inSingletonScope();
  container.bind<ListEnumsTool>(ListEnumsTool).to(ListEnumsTool).inSingletonScope();
  container.bind<ReaderDiagnosticsTool>(ReaderDiagnosticsTool).to(ReaderDiagnosticsTool).inSingletonScope();
  container.bind<InspectDatabaseTool>(InspectDatabaseTool).to(InspectDatabaseTool).inSingletonScope();

  return container;
}
