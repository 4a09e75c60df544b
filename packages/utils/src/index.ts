/**
 * @windmill/utils - Shared utilities package
 *
 * Logger, configuration loading and error classes used by the client and
 * the CLI.
 */

// Logger
export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';

// Deprecation notices
export { warnDeprecated } from './deprecation.js';
