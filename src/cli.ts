#!/usr/bin/env node
import 'reflect-metadata';
import process from 'node:process';
import { runCli } from './presentation/cli.js';
import { logger } from './utils/logger.js';

runCli(process.argv.slice(2), {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
  cwd: process.cwd(),
  env: process.env
})
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Unexpected failure');
    process.exitCode = 1;
  });
