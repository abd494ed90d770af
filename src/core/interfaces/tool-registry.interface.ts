import type { z } from 'zod';
import type { AppConfig } from '../../infrastructure/config/schema.js';
import type { Logger } from '../../utils/logger.js';

export interface ToolContext {
  config: AppConfig;
  logger: Pick<Logger, 'error' | 'debug' | 'info' | 'warn'>;
  container: {
    get: <T>(identifier: string) => T;
  };
}

export interface ToolResult {
  content: Array<{
    type: 'text';
    text: string;
  }>;
}

export interface IMCPTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  schema: TSchema;
  execute(params: z.infer<TSchema>, context: ToolContext): Promise<ToolResult>;
}

export interface IToolRegistry {
  register(tool: IMCPTool): void;
  get(name: string): IMCPTool | undefined;
  getAllTools(): Promise<IMCPTool[]>;
}
