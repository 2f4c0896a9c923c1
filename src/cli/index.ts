#!/usr/bin/env node

import { realpathSync } from 'fs';
import { loadConfig, type AppConfig } from '../config/index.js';
import { createLogger, type Logger } from '../infra/logger.js';
import { convertCommand, CONVERT_USAGE } from './commands/convert.js';
import { infoCommand, INFO_USAGE } from './commands/info.js';
import { presetsCommand } from './commands/presets.js';

export const USAGE = [
  'ansiloom - ANSI art codec',
  '',
  CONVERT_USAGE,
  INFO_USAGE,
  'Usage: ansiloom presets',
].join('\n');

export function runCli(argv: readonly string[], config: AppConfig = loadConfig(), logger: Logger = createLogger(config.logLevel)): number {
  const [command, ...rest] = argv;
  switch (command) {
    case 'convert':
      return convertCommand(rest, config, logger);
    case 'info':
      return infoCommand(rest, config, logger);
    case 'presets':
      return presetsCommand(logger);
    case '--help':
    case '-h':
      logger.info(USAGE);
      return 0;
    default:
      logger.error(command ? `Unknown command: ${command}` : 'Missing command');
      logger.info(USAGE);
      return 1;
  }
}

function isDirectExecution(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  try {
    return import.meta.url === `file://${realpathSync(argv1)}`;
  } catch {
    return import.meta.url === `file://${argv1}`;
  }
}

if (isDirectExecution()) {
  process.exitCode = runCli(process.argv.slice(2));
}
