// Error handler for the MCP boundary: maps thrown values to MCP error records
// File: src/utils/error-handler.ts

import { CardDataError, type ErrorCategory } from '../core/errors.js';
import { toErrorLike } from './error-like.js';
import { logger } from './logger.js';

export interface MCPError {
  code: number;
  message: string;
  data?: unknown;
  timestamp?: string;
  severity?: 'low' | 'medium' | 'high' | 'critical';
  category?: ErrorCategory;
}

export interface ErrorContext {
  operation?: string;
  toolName?: string;
  resourcePath?: string;
}

export class MCPErrorHandler {
  private static errorCounts: Map<number, number> = new Map();

  static handle(error: unknown, context?: ErrorContext): MCPError {
    const timestamp = new Date().toISOString();
    const mcpError = { ...this.mapErrorToMCP(error, context), timestamp };

    logger.error({ error, context, code: mcpError.code }, 'MCP Error occurred');
    this.errorCounts.set(mcpError.code, (this.errorCounts.get(mcpError.code) ?? 0) + 1);
    return mcpError;
  }

  static getErrorCounts(): Record<string, number> {
    return Object.fromEntries(this.errorCounts);
  }

  static resetCounts(): void {
    this.errorCounts.clear();
  }

  private static mapErrorToMCP(error: unknown, context?: ErrorContext): MCPError {
    if (error instanceof CardDataError) {
      return {
        code: error.code,
        message: error.message,
        data: { error: error.name, operation: context?.operation },
        severity: error.category === 'validation' ? 'low' : 'medium',
        category: error.category
      };
    }

    const errorLike = toErrorLike(error);
    if (!errorLike) {
      return {
        code: -32603,
        message: 'Internal error',
        data: { value: String(error), operation: context?.operation },
        severity: 'high',
        category: 'system'
      };
    }

    if (errorLike.code === 'ENOENT') {
      return {
        code: -32001,
        message: 'File or directory not found',
        data: { path: errorLike.path, operation: context?.operation },
        severity: 'medium',
        category: 'resource'
      };
    }

    if (errorLike.name === 'ZodError' || errorLike.issues) {
      return {
        code: -32602,
        message: 'Invalid parameters',
        data: {
          issues: (errorLike.issues ?? []).map(issue => ({
            path: issue.path.join('.'),
            message: issue.message,
            code: issue.code
          }))
        },
        severity: 'low',
        category: 'validation'
      };
    }

    // better-sqlite3 raises SqliteError with SQLITE_* codes
    if (errorLike.name === 'SqliteError' || errorLike.code?.startsWith('SQLITE_')) {
      return {
        code: -32008,
        message: 'Database operation failed',
        data: { originalError: errorLike.message, sqliteCode: errorLike.code, operation: context?.operation },
        severity: 'high',
        category: 'system'
      };
    }

    return {
      code: -32603,
      message: errorLike.message || 'Internal error',
      data: { operation: context?.operation },
      severity: 'high',
      category: 'system'
    };
  }
}
