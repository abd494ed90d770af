// Card lookup tools: by GrpId and by localized name
// File: src/application/tools/card-lookup.tool.ts

import { injectable } from 'inversify';
import { z } from 'zod';
import type { ICardReader } from '../../core/interfaces/card-reader.interface.js';
import type { IMCPTool, ToolContext, ToolResult } from '../../core/interfaces/tool-registry.interface.js';
import { cardToJson } from '../../utils/json.js';

const getCardSchema = z.object({
  grpId: z.number().int().describe('Card GrpId'),
  includeArt: z.boolean().optional().default(false).describe('Extract and summarize card art; needs a host-bound asset bundle unpacker')
});

const findCardsSchema = z.object({
  name: z.string().min(1).describe('Localized card name; SQL LIKE wildcards (% and _) are honoured'),
  limit: z.number().int().positive().optional().describe('Maximum number of cards to return'),
  includeArt: z.boolean().optional().default(false).describe('Extract and summarize card art; needs a host-bound asset bundle unpacker')
});

@injectable()
export class GetCardTool implements IMCPTool<typeof getCardSchema> {
  name = 'get_card';
  description = 'Get a card by GrpId with localized text and resolved abilities';
  schema = getCardSchema;

  async execute(params: z.infer<typeof getCardSchema>, context: ToolContext): Promise<ToolResult> {
    const reader = context.container.get<ICardReader>('CardReader');
    const card = await reader.getCardById(params.grpId, { includeArt: params.includeArt });

    if (!card) {
      context.logger.debug({ grpId: params.grpId }, 'Card not found');
      return { content: [{ type: 'text', text: `No card with GrpId ${params.grpId}` }] };
    }

    return { content: [{ type: 'text', text: JSON.stringify(cardToJson(card), null, 2) }] };
  }
}

@injectable()
export class FindCardsTool implements IMCPTool<typeof findCardsSchema> {
  name = 'find_cards';
  description = 'Find cards whose title in the active language matches a name pattern';
  schema = findCardsSchema;

  async execute(params: z.infer<typeof findCardsSchema>, context: ToolContext): Promise<ToolResult> {
    const reader = context.container.get<ICardReader>('CardReader');
    const cards = await reader.getCardByName(params.name, { limit: params.limit, includeArt: params.includeArt });
    context.logger.debug({ name: params.name, found: cards.length }, 'Card search finished');

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({ query: params.name, count: cards.length, cards: cards.map(cardToJson) }, null, 2)
        }
      ]
    };
  }
}
