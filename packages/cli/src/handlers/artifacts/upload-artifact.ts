/**
 * Upload Artifact Handler
 *
 * A directory is sent as a gzip tar archive, anything else byte for byte.
 */

import { stat } from 'fs/promises';
import type { CommandContext } from '../../core/command-context.js';
import type { UploadArtifactArgs } from '../../command-defs/artifacts.js';

export async function uploadArtifactHandler(args: UploadArtifactArgs, ctx: CommandContext) {
  const info = await stat(args.path);
  const workUnit = await ctx.workUnit(args.xid, args.wid);

  if (info.isDirectory()) {
    await workUnit.createArtifactFromDirectory(args.filename, args.path);
  } else {
    await workUnit.createArtifactFromFile(args.filename, args.path);
  }

  return {
    ok: true,
    xid: args.xid,
    wid: args.wid,
    filename: args.filename,
    source: info.isDirectory() ? 'directory' : 'file',
  };
}
