#!/usr/bin/env node

// Load environment variables from a .env file if present
import 'dotenv/config';

import { BudgetMCPServer } from './server/BudgetMCPServer.js';
import { loadConfig } from './server/config.js';
import { globalRequestLogger as logger } from './server/requestLogger.js';
import { AuthenticationError, ConfigurationError, ValidationError } from './utils/errors.js';

let serverInstance: BudgetMCPServer | null = null;

function gracefulShutdown(signal: string): void {
  logger.info('Shutting down', { signal, stats: logger.getStats() });
  serverInstance = null;
  process.exit(0);
}

function reportError(error: unknown): never {
  if (error instanceof ValidationError) {
    logger.error('Validation error', { error: error.message, details: error.details });
  } else if (error instanceof AuthenticationError) {
    logger.error('Authentication error. Verify the YNAB access token.', { error: error.message });
  } else if (error instanceof ConfigurationError) {
    logger.error('Configuration error. Check the environment variables.', {
      error: error.message,
    });
  } else if (error instanceof Error) {
    logger.error('Server error', {
      error: error.message,
      ...(process.env['NODE_ENV'] === 'development' ? { stack: error.stack } : {}),
    });
  } else {
    logger.error('Unknown error', { error: String(error) });
  }
  process.exit(1);
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.configure({ level: config.logLevel });

  serverInstance = new BudgetMCPServer(config);
  await serverInstance.run();
}

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    error: reason instanceof Error ? reason.message : String(reason),
  });
  process.exit(1);
});

main().catch(reportError);
