import { z } from 'zod';

export const LOGICAL_DATABASES = [
  'ArtCropDatabase',
  'CardDatabase',
  'ClientLocalization',
  'altArtCredits',
  'altFlavorTexts',
  'credits'
] as const;

const serverDetailsSchema = z
  .object({
    name: z.string().default('card-data-server'),
    version: z.string().default('0.1.0')
  })
  .default({});

const readerConfigSchema = z
  .object({
    rootDir: z.string().default('.'),
    language: z.string().min(1).default('enUS'),
    defaultLanguage: z.string().min(1).default('enUS'),
    dataDir: z.string().default('MTGA_Data'),
    rawDir: z.string().default('Downloads/Raw'),
    assetsDir: z.string().default('Downloads/AssetBundle'),
    fileExtension: z
      .string()
      .regex(/^\.[\w-]+$/, 'must start with a dot')
      .default('.mtga'),
    databases: z.array(z.string().min(1)).min(1).default([...LOGICAL_DATABASES]),
    requiredDatabases: z.array(z.string().min(1)).default(['CardDatabase']),
    localizationPrefix: z.string().min(1).default('Localizations_')
  })
  .default({});

const inspectorConfigSchema = z
  .object({
    extension: z
      .string()
      .regex(/^\.[\w-]+$/, 'must start with a dot')
      .default('.mtga'),
    indent: z.number().int().min(0).max(10).default(2),
    includeRowCount: z.boolean().default(false),
    recursive: z.boolean().default(false)
  })
  .default({});

const loggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info')
  })
  .default({});

export const appConfigSchema = z.object({
  server: serverDetailsSchema,
  reader: readerConfigSchema,
  inspector: inspectorConfigSchema,
  logging: loggingConfigSchema
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ReaderConfig = AppConfig['reader'];

export function getConfigDefaults(): AppConfig {
  return appConfigSchema.parse({});
}
