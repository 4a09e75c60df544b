/**
 * Artifact Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import type { CommandContext } from '../core/command-context.js';
import { uploadArtifactSchema } from '../command-defs/artifacts.js';
import { uploadArtifactHandler } from '../handlers/artifacts/upload-artifact.js';
import { workUnitOptions } from './work-units.js';

/**
 * Register artifact commands
 */
export function registerArtifactCommands(program: Command, ctx: CommandContext): void {
  const artifactCmd = program.command('artifact').description('Upload artifacts');

  defineCommand(
    workUnitOptions(
      artifactCmd.command('upload').description('Upload a file, or a directory as a gzip tar archive')
    )
      .option('--filename <name>', 'Name of the artifact on the server')
      .option('--path <path>', 'Local file or directory'),
    ctx,
    { schema: uploadArtifactSchema, handler: uploadArtifactHandler }
  );
}
