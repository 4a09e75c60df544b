import { stat } from 'fs/promises';
import { create } from 'tar';
import { ValidationError } from '@windmill/utils';

/**
 * Pack a directory into a gzip-compressed tar held in memory.
 *
 * Entries are relative to the directory root (the directory itself is
 * archived as `.`), so extracting recreates its contents in place. Nothing is
 * written to disk.
 */
export async function createDirectoryArchive(directory: string): Promise<Buffer> {
  const info = await stat(directory);
  if (!info.isDirectory()) {
    throw new ValidationError(`${directory} is not a directory`, { directory });
  }

  const chunks: Buffer[] = [];
  const pack = create({ gzip: true, portable: true, cwd: directory }, ['.']);
  for await (const chunk of pack) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}
