import { logger } from './logger.js';

const warned = new Set<string>();

/**
 * Log a deprecation notice for `name`, once per process.
 */
export function warnDeprecated(name: string, replacement: string): void {
  if (warned.has(name)) return;
  warned.add(name);
  logger.warn(`${name} is deprecated, use ${replacement} instead`, { deprecated: name, replacement });
}
