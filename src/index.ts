#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { errorMessage, exitCodeForError } from './utils/errors.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exitCode = exitCodeForError(error);
});
