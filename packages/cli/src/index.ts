/**
 * @windmill/cli - Windmill command line
 *
 * Public API exports for the CLI package
 */

export { createProgram, CLI_VERSION } from './program.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/defineCommand.js';
export * from './types/index.js';
