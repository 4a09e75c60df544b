#!/usr/bin/env node
/**
 * windmill - command line entry point
 */

import 'dotenv/config';
import { CommandContext } from '../core/command-context.js';
import { reportCliError } from '../core/error-handler.js';
import { createProgram } from '../program.js';

const ctx = new CommandContext();

createProgram(ctx)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportCliError(error, ctx);
  });
