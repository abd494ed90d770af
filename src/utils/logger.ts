/* eslint-disable no-console */
// Stderr-only logger: stdout carries JSON summaries and the MCP stdio transport

import { toErrorLike } from './error-like.js';

const levels = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5
} as const;

export type LogLevel = keyof typeof levels;

function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

let currentLevel: number = levels.info;

export function setLogLevel(level: string): void {
  const normalized = level.toLowerCase();
  currentLevel = isLogLevel(normalized) ? levels[normalized] : levels.info;
}

setLogLevel(process.env.CARD_DATA_LOG_LEVEL || 'info');

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= currentLevel;
}

function serialize(obj: object): string {
  return JSON.stringify(
    obj,
    (_key, value: unknown) => {
      const errorLike = toErrorLike(value);
      if (errorLike?.stack !== undefined) {
        return { name: errorLike.name, message: errorLike.message, code: errorLike.code };
      }
      if (typeof value === 'bigint') {
        return value.toString();
      }
      return value;
    },
    2
  );
}

function formatMessage(level: LogLevel, obj: unknown, msg?: string, childContext?: string): string {
  const timestamp = new Date().toISOString();
  const message = msg || (typeof obj === 'string' ? obj : '');
  const data = typeof obj === 'object' && obj !== null ? serialize(obj) : '';
  const context = childContext ? `[${childContext}] ` : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${context}${message}${data ? `\n${data}` : ''}`;
}

export interface Logger {
  trace: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  fatal: (obj: unknown, msg?: string) => void;
  child: (obj: unknown) => Logger;
}

function createLogger(context?: string): Logger {
  const write = (level: LogLevel) => (obj: unknown, msg?: string) => {
    if (shouldLog(level)) {
      console.error(formatMessage(level, obj, msg, context));
    }
  };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
    child: (obj: unknown) => {
      const childContext =
        typeof obj === 'object' && obj !== null && 'component' in obj ? String(obj.component) : String(obj);
      return createLogger(context ? `${context}:${childContext}` : childContext);
    }
  };
}

export const logger = createLogger();
