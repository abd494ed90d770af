// Localization tools: text lookups and the enum table
// File: src/application/tools/localization.tool.ts

import { injectable } from 'inversify';
import { z } from 'zod';
import type { ICardReader } from '../../core/interfaces/card-reader.interface.js';
import type { IMCPTool, ToolContext, ToolResult } from '../../core/interfaces/tool-registry.interface.js';
import { sqlValueToJson, type JsonValue } from '../../utils/json.js';

const translateTextSchema = z.object({
  textId: z.number().int().describe('LocId of the text to resolve')
});

const listEnumsSchema = z.object({
  category: z.string().optional().describe('Only list values of this enum category')
});

@injectable()
export class TranslateTextTool implements IMCPTool<typeof translateTextSchema> {
  name = 'translate_text';
  description = 'Resolve a localization id in the active language, falling back to the default language';
  schema = translateTextSchema;

  async execute(params: z.infer<typeof translateTextSchema>, context: ToolContext): Promise<ToolResult> {
    const reader = context.container.get<ICardReader>('CardReader');
    const resolution = reader.resolveText(params.textId);

    const payload: Record<string, JsonValue> = {
      textId: params.textId,
      language: reader.localization.language,
      status: resolution.status
    };
    if (resolution.status === 'resolved') {
      payload.text = resolution.text;
      payload.source = resolution.source === 'active' ? reader.localization.table : reader.localization.defaultTable;
    } else if (resolution.status === 'error') {
      context.logger.warn({ textId: params.textId, error: resolution.error }, 'Text lookup failed');
    }

    return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  }
}

@injectable()
export class ListEnumsTool implements IMCPTool<typeof listEnumsSchema> {
  name = 'list_enums';
  description = 'List enum categories and the display text of each value';
  schema = listEnumsSchema;

  async execute(params: z.infer<typeof listEnumsSchema>, context: ToolContext): Promise<ToolResult> {
    const enums = context.container.get<ICardReader>('CardReader').getEnums();
    const categories: Record<string, Record<string, JsonValue>> = {};

    for (const [category, values] of enums) {
      if (params.category !== undefined && category !== params.category) continue;
      const entries: Record<string, JsonValue> = {};
      for (const [value, text] of values) {
        entries[String(value)] = sqlValueToJson(text);
      }
      categories[category] = entries;
    }

    if (params.category !== undefined && !(params.category in categories)) {
      return { content: [{ type: 'text', text: `Unknown enum category: ${params.category}` }] };
    }

    return { content: [{ type: 'text', text: JSON.stringify(categories, null, 2) }] };
  }
}
