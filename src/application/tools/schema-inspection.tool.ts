// SQLite schema inspection tool
// File: src/application/tools/schema-inspection.tool.ts

import { injectable } from 'inversify';
import { z } from 'zod';
import { NoDatabaseFilesError } from '../../core/errors.js';
import type { ISchemaInspector } from '../../core/interfaces/schema-inspector.interface.js';
import type { IMCPTool, ToolContext, ToolResult } from '../../core/interfaces/tool-registry.interface.js';
import { bigintReplacer } from '../../utils/json.js';

const inspectDatabaseSchema = z.object({
  targets: z.array(z.string().min(1)).min(1).describe('Database files, directories or glob patterns'),
  recursive: z.boolean().optional().describe('Search directories recursively'),
  includeRowCount: z.boolean().optional().describe('Count the rows of every table')
});

@injectable()
export class InspectDatabaseTool implements IMCPTool<typeof inspectDatabaseSchema> {
  name = 'inspect_database';
  description = 'Summarize the schema of SQLite database files: pragmas, tables, columns, indexes and views';
  schema = inspectDatabaseSchema;

  async execute(params: z.infer<typeof inspectDatabaseSchema>, context: ToolContext): Promise<ToolResult> {
    const inspector = context.container.get<ISchemaInspector>('SchemaInspector');
    const defaults = context.config.inspector;

    const files = await inspector.discover(params.targets, {
      recursive: params.recursive ?? defaults.recursive,
      extension: defaults.extension
    });
    if (files.length === 0) {
      throw new NoDatabaseFilesError(defaults.extension);
    }

    const summaries = inspector.inspectMany(files, {
      includeRowCount: params.includeRowCount ?? defaults.includeRowCount
    });
    context.logger.info({ files: files.length }, 'Inspected databases');

    return { content: [{ type: 'text', text: JSON.stringify(summaries, bigintReplacer, defaults.indent) }] };
  }
}
