#!/usr/bin/env node
/**
 * Model Block Generator - Main Entry Point
 *
 * Lists models from the configured API (or a local JSON file), classifies
 * them, and writes versioned model block YAML files.
 */
import 'dotenv/config';
import { createProgram, runGenerator } from './cli';
import { CliOptions, ConfigError, loadConfig } from './config';
import { createModuleLogger, errorMessage } from './common/logger';

const logger = createModuleLogger('model-blocks');

async function main(argv: string[]): Promise<number> {
  const program = createProgram();
  program.parse(argv);

  const config = loadConfig(program.opts<CliOptions>());
  const { exitCode } = await runGenerator(config);
  return exitCode;
}

main(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Model block generation failed', { error: errorMessage(error) });
    }
    process.exitCode = 1;
  });
