import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Container } from 'inversify';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { IMCPTool, IToolRegistry, ToolContext } from '../core/interfaces/tool-registry.interface.js';
import type { AppConfig } from '../infrastructure/config/schema.js';
import { MCPErrorHandler } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface ToolInputSchema {
  type: 'object';
  [key: string]: unknown;
}

export function toInputSchema(tool: IMCPTool): ToolInputSchema {
  return { ...zodToJsonSchema(tool.schema, { target: 'jsonSchema7' }), type: 'object' };
}

export class CardDataServer {
  private mcpServer: Server;
  private transport: StdioServerTransport | null = null;

  constructor(
    private container: Container,
    private config: AppConfig
  ) {
    this.mcpServer = new Server(
      {
        name: config.server.name,
        version: config.server.version
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );
  }

  async start(): Promise<void> {
    logger.info('Starting card data server...');

    await this.registerTools();

    this.transport = new StdioServerTransport();
    await this.mcpServer.connect(this.transport);

    logger.info('Card data server started');
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down card data server...');
    if (this.transport) {
      await this.transport.close();
    }
    logger.info('Card data server shut down');
  }

  private async registerTools(): Promise<void> {
    const toolRegistry = this.container.get<IToolRegistry>('ToolRegistry');
    const tools = await toolRegistry.getAllTools();

    this.mcpServer.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: tools.map(tool => ({
          name: tool.name,
          description: tool.description,
          inputSchema: toInputSchema(tool)
        }))
      };
    });

    this.mcpServer.setRequestHandler(CallToolRequestSchema, async request => {
      const toolName = request.params.name;
      const tool = toolRegistry.get(toolName);

      if (!tool) {
        throw new Error(`Unknown tool: ${toolName}`);
      }

      try {
        const params = tool.schema.parse(request.params.arguments ?? {});
        const result = await tool.execute(params, this.createToolContext());
        return { content: result.content, isError: false };
      } catch (error) {
        const mcpError = MCPErrorHandler.handle(error, { operation: 'tools/call', toolName });
        return {
          content: [{ type: 'text', text: JSON.stringify(mcpError, null, 2) }],
          isError: true
        };
      }
    });

    logger.debug(`Registered ${tools.length} tools`);
  }

  private createToolContext(): ToolContext {
    return {
      config: this.config,
      logger: logger.child({ component: 'tool' }),
      container: this.container
    };
  }
}
