import { Container } from 'inversify';
import { FindCardsTool, GetCardTool } from '../../../src/application/tools/card-lookup.tool.js';
import { ListEnumsTool, TranslateTextTool } from '../../../src/application/tools/localization.tool.js';
import { ReaderDiagnosticsTool } from '../../../src/application/tools/reader-diagnostics.tool.js';
import type {
  EnumValue,
  ICardReader,
  TextRef
} from '../../../src/core/interfaces/card-reader.interface.js';
import type { ToolContext, ToolResult } from '../../../src/core/interfaces/tool-registry.interface.js';
import { getConfigDefaults } from '../../../src/infrastructure/config/schema.js';
import { MCPErrorHandler } from '../../../src/utils/error-handler.js';

const createMockLogger = () => ({
  error: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn()
});

const createMockReader = (): jest.Mocked<ICardReader> => ({
  localization: {
    language: 'jaJP',
    key: 'jajp',
    table: 'Localizations_jaJP',
    defaultTable: 'Localizations_enUS'
  },
  getCardById: jest.fn(),
  getCardByName: jest.fn(),
  getAbility: jest.fn(),
  getCardArtById: jest.fn(),
  resolveText: jest.fn(),
  getTranslation: jest.fn(),
  getEnums: jest.fn(),
  getEnumText: jest.fn(),
  getDiagnostics: jest.fn(),
  close: jest.fn()
});

const getResultText = (toolResult: ToolResult): string => toolResult.content[0]?.text ?? '';

describe('card data tools', () => {
  let reader: jest.Mocked<ICardReader>;
  let toolContext: ToolContext;

  beforeEach(() => {
    reader = createMockReader();
    const container = new Container();
    container.bind<ICardReader>('CardReader').toConstantValue(reader);
    toolContext = { logger: createMockLogger(), config: getConfigDefaults(), container };
  });

  describe('GetCardTool', () => {
    it('returns the card as JSON with art summarized', async () => {
      reader.getCardById.mockResolvedValue({
        GrpId: 1001,
        title: 'Lightning Bolt',
        abilities: [{ Id: 200, text: 'Deal 3 damage to any target.' }],
        art: { image: { width: 2, height: 3, channels: 3, data: Buffer.alloc(18) } },
        Rarity: BigInt(2)
      });
      const tool = new GetCardTool();

      const result = await tool.execute(tool.schema.parse({ grpId: 1001, includeArt: true }), toolContext);

      expect(reader.getCardById).toHaveBeenCalledWith(1001, { includeArt: true });
      expect(JSON.parse(getResultText(result))).toEqual({
        GrpId: 1001,
        title: 'Lightning Bolt',
        abilities: [{ Id: 200, text: 'Deal 3 damage to any target.' }],
        art: { image: { width: 2, height: 3, channels: 3, bytes: 18 } },
        Rarity: 2
      });
    });

    it('says so when the card does not exist', async () => {
      reader.getCardById.mockResolvedValue(null);
      const tool = new GetCardTool();

      const result = await tool.execute(tool.schema.parse({ grpId: 5 }), toolContext);

      expect(reader.getCardById).toHaveBeenCalledWith(5, { includeArt: false });
      expect(getResultText(result)).toBe('No card with GrpId 5');
    });

    it('rejects a non-integer id', () => {
      expect(new GetCardTool().schema.safeParse({ grpId: 1.5 }).success).toBe(false);
    });
  });

  describe('FindCardsTool', () => {
    it('passes the pattern and limit through', async () => {
      reader.getCardByName.mockResolvedValue([{ GrpId: 1 }, { GrpId: 2 }]);
      const tool = new FindCardsTool();

      const result = await tool.execute(tool.schema.parse({ name: 'Bolt%', limit: 2 }), toolContext);

      expect(reader.getCardByName).toHaveBeenCalledWith('Bolt%', { limit: 2, includeArt: false });
      expect(JSON.parse(getResultText(result))).toEqual({
        query: 'Bolt%',
        count: 2,
        cards: [{ GrpId: 1 }, { GrpId: 2 }]
      });
    });

    it('rejects an empty name and a non-positive limit', () => {
      const tool = new FindCardsTool();
      expect(tool.schema.safeParse({ name: '' }).success).toBe(false);
      expect(tool.schema.safeParse({ name: 'Bolt', limit: 0 }).success).toBe(false);
    });
  });

  describe('TranslateTextTool', () => {
    it('names the table a fallback came from', async () => {
      reader.resolveText.mockReturnValue({ status: 'resolved', text: 'Flying', source: 'default' });

      const result = await new TranslateTextTool().execute({ textId: 31 }, toolContext);

      expect(JSON.parse(getResultText(result))).toEqual({
        textId: 31,
        language: 'jaJP',
        status: 'resolved',
        text: 'Flying',
        source: 'Localizations_enUS'
      });
    });

    it('reports unresolved text', async () => {
      reader.resolveText.mockReturnValue({ status: 'not-found' });

      const result = await new TranslateTextTool().execute({ textId: 9 }, toolContext);

      expect(JSON.parse(getResultText(result))).toEqual({ textId: 9, language: 'jaJP', status: 'not-found' });
    });

    it('logs lookup errors', async () => {
      reader.resolveText.mockReturnValue({ status: 'error', error: new Error('disk I/O error') });

      const result = await new TranslateTextTool().execute({ textId: 9 }, toolContext);

      expect(JSON.parse(getResultText(result)).status).toBe('error');
      expect(toolContext.logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('ListEnumsTool', () => {
    beforeEach(() => {
      const color = new Map<EnumValue, TextRef>([
        [1, 'Red'],
        [2, 41]
      ]);
      const rarity = new Map<EnumValue, TextRef>([[2, 77]]);
      reader.getEnums.mockReturnValue(
        new Map([
          ['Color', color],
          ['Rarity', rarity]
        ])
      );
    });

    it('lists every category', async () => {
      const result = await new ListEnumsTool().execute({}, toolContext);
      expect(JSON.parse(getResultText(result))).toEqual({ Color: { '1': 'Red', '2': 41 }, Rarity: { '2': 77 } });
    });

    it('filters to one category', async () => {
      const result = await new ListEnumsTool().execute({ category: 'Rarity' }, toolContext);
      expect(JSON.parse(getResultText(result))).toEqual({ Rarity: { '2': 77 } });
    });

    it('reports an unknown category', async () => {
      const result = await new ListEnumsTool().execute({ category: 'Nope' }, toolContext);
      expect(getResultText(result)).toBe('Unknown enum category: Nope');
    });
  });

  describe('ReaderDiagnosticsTool', () => {
    it('reports the selection, counters and error counts', async () => {
      MCPErrorHandler.resetCounts();
      reader.getDiagnostics.mockReturnValue({ resolved: 4, fallbackHits: 1, notFound: 2, errors: 0, abilityErrors: 0 });
      reader.getEnums.mockReturnValue(new Map());

      const result = await new ReaderDiagnosticsTool().execute({}, toolContext);

      expect(JSON.parse(getResultText(result))).toEqual({
        localization: reader.localization,
        resolver: { resolved: 4, fallbackHits: 1, notFound: 2, errors: 0, abilityErrors: 0 },
        enumCategories: 0,
        errorCounts: {}
      });
    });
  });
});
