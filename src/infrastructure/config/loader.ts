// Configuration loader: YAML/JSON file, then environment overrides, then zod defaults
// File: src/infrastructure/config/loader.ts

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { appConfigSchema, type AppConfig } from './schema.js';
import { errorCode } from '../../utils/error-like.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_CONFIG_PATH = './config/reader.yaml';

export const ENV_MAPPINGS = {
  CARD_DATA_ROOT: 'reader.rootDir',
  CARD_DATA_LANGUAGE: 'reader.language',
  CARD_DATA_LOG_LEVEL: 'logging.level'
} as const;

type ConfigTree = Record<string, unknown>;

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigurationLoader {
  private static instance: ConfigurationLoader | undefined;
  private loadedConfig: AppConfig | null = null;

  static getInstance(): ConfigurationLoader {
    if (!ConfigurationLoader.instance) {
      ConfigurationLoader.instance = new ConfigurationLoader();
    }
    return ConfigurationLoader.instance;
  }

  async loadConfiguration(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
    if (this.loadedConfig && !configPath) {
      return this.loadedConfig;
    }

    let configFile: string;
    let source: string;
    if (configPath) {
      configFile = configPath;
      source = 'direct argument';
    } else if (env.CARD_DATA_CONFIG_PATH) {
      configFile = env.CARD_DATA_CONFIG_PATH;
      source = 'CARD_DATA_CONFIG_PATH';
    } else {
      configFile = DEFAULT_CONFIG_PATH;
      source = 'default path';
    }

    const absoluteConfigFile = path.resolve(configFile);
    logger.debug({ source, path: absoluteConfigFile }, '[ConfigLoader] Loading configuration');

    const rawConfig = await this.loadFromFile(absoluteConfigFile);
    if (Object.keys(rawConfig).length === 0) {
      logger.debug(`[ConfigLoader] No settings in "${absoluteConfigFile}", using defaults`);
    }

    const configWithEnv = this.mergeEnvironmentVariables(rawConfig, env);
    const parsed = appConfigSchema.safeParse(configWithEnv);
    if (!parsed.success) {
      const issues = parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
      logger.error({ issues, path: absoluteConfigFile }, '[ConfigLoader] Invalid configuration');
      throw new Error(`Invalid configuration in ${absoluteConfigFile}: ${issues.join('; ')}`);
    }

    this.loadedConfig = parsed.data;
    logger.debug(
      { rootDir: parsed.data.reader.rootDir, language: parsed.data.reader.language },
      '[ConfigLoader] Configuration loaded'
    );
    return this.loadedConfig;
  }

  private async loadFromFile(filePath: string): Promise<ConfigTree> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        logger.debug(`[ConfigLoader] Configuration file not found at: "${filePath}"`);
        return {};
      }
      throw error;
    }

    if (content.trim() === '') {
      return {};
    }

    let parsed: unknown;
    if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
      parsed = parseYaml(content);
    } else if (filePath.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      throw new Error(`Unsupported config file format: ${filePath}`);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isConfigTree(parsed)) {
      throw new Error(`Configuration root must be a mapping: ${filePath}`);
    }
    return parsed;
  }

  private mergeEnvironmentVariables(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
    const result: ConfigTree = { ...config };

    for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
      const envValue = env[envVar];
      if (envValue !== undefined && envValue !== '') {
        logger.debug(`[ConfigLoader] Applying env var ${envVar} to "${configPath}"`);
        this.setNestedProperty(result, configPath, envValue);
      }
    }
    return result;
  }

  private setNestedProperty(obj: ConfigTree, pathStr: string, value: unknown): void {
    const keys = pathStr.split('.');
    const lastKey = keys.pop();
    if (!lastKey) return;

    let current = obj;
    for (const key of keys) {
      const next = current[key];
      const branch: ConfigTree = isConfigTree(next) ? { ...next } : {};
      current[key] = branch;
      current = branch;
    }
    current[lastKey] = value;
  }
}

export const configLoader = ConfigurationLoader.getInstance();

export async function loadConfig(configPath?: string): Promise<AppConfig> {
  return configLoader.loadConfiguration(configPath);
}
