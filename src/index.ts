#!/usr/bin/env node
// src/index.ts - MCP server entry point
import 'reflect-metadata';
import process from 'node:process';
import { CardDataServer } from './presentation/server.js';
import { createContainer } from './infrastructure/di/container.js';
import { ContainerInitializer } from './infrastructure/di/container-initializer.js';
import { loadConfig } from './infrastructure/config/loader.js';
import type { ICardReader } from './core/interfaces/card-reader.interface.js';
import { toErrorLike } from './utils/error-like.js';
import { logger, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  process.on('uncaughtException', error => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', reason => {
    const errorLike = toErrorLike(reason);
    logger.fatal(errorLike ? { reason: errorLike.message, stack: errorLike.stack } : { reason }, 'Unhandled rejection');
    process.exit(1);
  });

  const config = await loadConfig();
  setLogLevel(config.logging.level);

  const container = createContainer(config);
  await ContainerInitializer.initialize(container);

  const server = new CardDataServer(container, config);
  await server.start();

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down gracefully...');
    try {
      await server.shutdown();
    } catch (err) {
      logger.error({ error: err }, 'Error shutting down server');
    }
    if (container.isBound('CardReader')) {
      try {
        container.get<ICardReader>('CardReader').close();
      } catch (err) {
        logger.error({ error: err }, 'Error closing card databases during shutdown');
      }
    }
    logger.info('Graceful shutdown complete.');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start card data server');
  process.exit(1);
});
