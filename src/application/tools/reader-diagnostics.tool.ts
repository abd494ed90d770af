import { injectable } from 'inversify';
import { z } from 'zod';
import type { ICardReader } from '../../core/interfaces/card-reader.interface.js';
import type { IMCPTool, ToolContext, ToolResult } from '../../core/interfaces/tool-registry.interface.js';
import { MCPErrorHandler } from '../../utils/error-handler.js';

const readerDiagnosticsSchema = z.object({});

@injectable()
export class ReaderDiagnosticsTool implements IMCPTool<typeof readerDiagnosticsSchema> {
  name = 'reader_diagnostics';
  description = 'Report the selected localization tables, soft-failure counters and error counts';
  schema = readerDiagnosticsSchema;

  async execute(_params: z.infer<typeof readerDiagnosticsSchema>, context: ToolContext): Promise<ToolResult> {
    const reader = context.container.get<ICardReader>('CardReader');
    const report = {
      localization: reader.localization,
      resolver: reader.getDiagnostics(),
      enumCategories: reader.getEnums().size,
      errorCounts: MCPErrorHandler.getErrorCounts()
    };

    return { content: [{ type: 'text', text: JSON.stringify(report, null, 2) }] };
  }
}
