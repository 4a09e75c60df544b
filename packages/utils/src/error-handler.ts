/**
 * Error Handler
 * =============
 * Centralized error logging. Callers still re-throw or exit; this only records.
 */

import { AppError, isOperationalError } from './errors.js';
import { logger } from './logger.js';

export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  code?: string;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError && isOperationalError(err)) {
    // Operational errors - expected failures such as rejected requests
    logger.warn('Operational error occurred', {
      ...err.context,
      ...context,
      error: {
        name: err.name,
        message: err.message,
        code: err.code,
        statusCode: err.statusCode,
      },
    });
  } else if (err instanceof AppError) {
    logger.error('Application error occurred', err, { ...err.context, ...context });
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    code: err instanceof AppError ? err.code : undefined,
  };
}
