// Command-line front end: `inspect` for SQLite schema summaries, `card` for card lookups
// File: src/presentation/cli.ts

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { CardDataError, NoDatabaseFilesError } from '../core/errors.js';
import type { ICardReader } from '../core/interfaces/card-reader.interface.js';
import type { ISchemaInspector } from '../core/interfaces/schema-inspector.interface.js';
import { ConfigurationLoader } from '../infrastructure/config/loader.js';
import type { AppConfig } from '../infrastructure/config/schema.js';
import { createContainer } from '../infrastructure/di/container.js';
import { errorCode, errorMessage } from '../utils/error-like.js';
import { bigintReplacer, cardToJson } from '../utils/json.js';
import { logger, setLogLevel } from '../utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export const USAGE = `Usage:
  card-data inspect <targets...> [-r|--recursive] [--include-row-count] [-o|--output <file>] [--indent <n>]
  card-data card <name> [--root <dir>] [--lang <language>] [--limit <n>] [--art]
  card-data card --id <grpId> [--root <dir>] [--lang <language>] [--art]

Card options:
  --art             extract card art; needs an AssetBundleUnpacker bound by the host,
                    without one the command fails for cards that have art bundles

Common options:
  --config <file>   configuration file (YAML or JSON)
  -h, --help        show this help`;

class UsageError extends Error {}

const indentSchema = z.coerce.number().int().min(0).max(10);
const positiveIntSchema = z.coerce.number().int().positive();
const idSchema = z.coerce.number().int();

function parseNumber(schema: z.ZodNumber, raw: string, option: string): number {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid value for ${option}: ${raw}`);
  }
  return parsed.data;
}

async function loadCliConfig(configPath: string | undefined, io: CliIO): Promise<AppConfig> {
  const config = await new ConfigurationLoader().loadConfiguration(
    configPath === undefined ? undefined : path.resolve(io.cwd, configPath),
    io.env
  );
  setLogLevel(config.logging.level);
  return config;
}

async function runInspect(args: string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      recursive: { type: 'boolean', short: 'r', default: false },
      'include-row-count': { type: 'boolean', default: false },
      output: { type: 'string', short: 'o' },
      indent: { type: 'string' },
      config: { type: 'string' }
    }
  });

  if (positionals.length === 0) {
    throw new UsageError('inspect needs at least one file, directory or glob pattern');
  }

  const config = await loadCliConfig(values.config, io);
  const indent =
    values.indent === undefined ? config.inspector.indent : parseNumber(indentSchema, values.indent, '--indent');
  const inspector = createContainer(config).get<ISchemaInspector>('SchemaInspector');

  const files = await inspector.discover(positionals, {
    recursive: values.recursive || config.inspector.recursive,
    extension: config.inspector.extension,
    cwd: io.cwd
  });
  if (files.length === 0) {
    throw new NoDatabaseFilesError(config.inspector.extension);
  }

  const summaries = inspector.inspectMany(files, {
    includeRowCount: values['include-row-count'] || config.inspector.includeRowCount
  });
  const text = JSON.stringify(summaries, bigintReplacer, indent);

  if (values.output !== undefined) {
    const outputPath = path.resolve(io.cwd, values.output);
    await fs.writeFile(outputPath, `${text}\n`, 'utf-8');
    logger.info({ outputPath, files: files.length }, 'Wrote schema summary');
  } else {
    io.stdout(text);
  }
  return EXIT_OK;
}

async function runCard(args: string[], io: CliIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      id: { type: 'string' },
      root: { type: 'string' },
      lang: { type: 'string' },
      limit: { type: 'string' },
      art: { type: 'boolean', default: false },
      config: { type: 'string' }
    }
  });

  const name = positionals.join(' ');
  if (values.id === undefined && name === '') {
    throw new UsageError('card needs a card name or --id <grpId>');
  }
  const grpId = values.id === undefined ? undefined : parseNumber(idSchema, values.id, '--id');
  const limit = values.limit === undefined ? undefined : parseNumber(positiveIntSchema, values.limit, '--limit');

  const loaded = await loadCliConfig(values.config, io);
  const config: AppConfig = {
    ...loaded,
    reader: {
      ...loaded.reader,
      rootDir: path.resolve(io.cwd, values.root ?? loaded.reader.rootDir),
      language: values.lang ?? loaded.reader.language
    }
  };

  const includeArt = values.art;
  const reader = createContainer(config).get<ICardReader>('CardReader');
  try {
    if (grpId !== undefined) {
      const card = await reader.getCardById(grpId, { includeArt });
      if (!card) {
        io.stderr(`No card with GrpId ${grpId}`);
        return EXIT_FAILURE;
      }
      io.stdout(JSON.stringify(cardToJson(card), null, 2));
      return EXIT_OK;
    }

    const cards = await reader.getCardByName(name, { limit, includeArt });
    io.stdout(JSON.stringify(cards.map(cardToJson), null, 2));
    return EXIT_OK;
  } finally {
    reader.close();
  }
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'inspect':
        return await runInspect(rest, io);
      case 'card':
        return await runCard(rest, io);
      case undefined:
      case '-h':
      case '--help':
        io.stdout(USAGE);
        return command === undefined ? EXIT_USAGE : EXIT_OK;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    // parseArgs rejects unknown or malformed options with ERR_PARSE_ARGS_* codes
    if (errorCode(error)?.startsWith('ERR_PARSE_ARGS')) {
      io.stderr(`${errorMessage(error)}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof CardDataError) {
      io.stderr(error.message);
      return EXIT_FAILURE;
    }
    logger.error({ error, command }, 'Command failed');
    io.stderr(errorMessage(error));
    return EXIT_FAILURE;
  }
}
