/**
 * Copy primitives. Failures surface as ExternalToolError so they abort the run
 * the same way a failed rsync or createrepo_c does.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ExternalToolError, errorMessage, hasErrorCode } from './errors.js';

/**
 * Copy a file into `destDir`, keeping its basename. Symlinks are followed.
 */
export async function copyInto(src: string, destDir: string): Promise<string> {
  const dest = path.join(destDir, path.basename(src));
  try {
    await fs.copyFile(src, dest);
  } catch (err) {
    throw new ExternalToolError('cp', [src, dest], null, errorMessage(err));
  }
  return dest;
}

/**
 * Copy `src` to `dest` unless `dest` already has identical bytes.
 */
export async function copyIfChanged(src: string, dest: string): Promise<'copied' | 'unchanged'> {
  let srcContent: Buffer;
  try {
    srcContent = await fs.readFile(src);
  } catch (err) {
    throw new ExternalToolError('cp', [src, dest], null, errorMessage(err));
  }

  const destContent = await fs.readFile(dest).catch((err: unknown) => {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw err;
  });
  if (destContent && destContent.equals(srcContent)) {
    return 'unchanged';
  }

  try {
    await fs.writeFile(dest, srcContent);
  } catch (err) {
    throw new ExternalToolError('cp', [src, dest], null, errorMessage(err));
  }
  return 'copied';
}
