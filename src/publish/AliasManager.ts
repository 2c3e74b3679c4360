/**
 * AliasManager: relative symlinks plus their web redirect rules.
 *
 * Every alias in the tree (per-release image links, latest-*, stable-*, the
 * latest/ and stable/ package pools) goes through ensureLink, so first runs and
 * re-runs behave the same way.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { REDIRECT_FILE } from '../config/layout.js';
import { pathExists } from './discovery.js';
import { AlreadyPublishedError, BrokenTargetError, hasErrorCode } from './errors.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('alias-manager', 'Symlinks and redirect rules');

export interface AliasResult {
  /** Absolute path of the link */
  linkPath: string;
  /** What the link reads, relative to its own directory */
  relativeTarget: string;
  /** Whether the filesystem was touched */
  changed: boolean;
  /** One redirect line, newline-terminated */
  rule: string;
}

export function makeRedirect(root: string, from: string, to: string): string {
  return `redirect permanent ${root}/${from} ${root}/${to}\n`;
}

async function readLinkIfAny(linkPath: string): Promise<string | null> {
  try {
    return await fs.readlink(linkPath);
  } catch (err) {
    // ENOENT: nothing there; EINVAL: a regular file or directory
    if (hasErrorCode(err, 'ENOENT', 'EINVAL')) return null;
    throw err;
  }
}

async function entryKind(p: string): Promise<'none' | 'directory' | 'other'> {
  try {
    const stat = await fs.lstat(p);
    return stat.isDirectory() ? 'directory' : 'other';
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return 'none';
    throw err;
  }
}

export class AliasManager {
  private logger = getLogger('alias-manager');

  /**
   * Point `<baseDir>/<linkName>` at `<baseDir>/<targetRelPath>` with a relative link.
   *
   * A link that already reads the right relative path is left alone. Anything else
   * at the link path is replaced. The target must exist.
   */
  async ensureLink(
    baseDir: string,
    targetRelPath: string,
    linkName: string,
    redirectRoot = ''
  ): Promise<AliasResult> {
    const targetPath = path.join(baseDir, targetRelPath);
    const linkPath = path.join(baseDir, linkName);
    const relativeTarget = path.relative(path.dirname(linkName), targetRelPath);
    const rule = makeRedirect(redirectRoot, linkName, targetRelPath);

    // Follows links: a target that is itself a dangling link does not count
    if (!(await pathExists(targetPath))) {
      throw new BrokenTargetError(targetPath, linkPath);
    }

    const current = await readLinkIfAny(linkPath);
    if (current === relativeTarget) {
      this.logger.debug(`${linkPath} already points to ${relativeTarget}, nothing to do`);
      return { linkPath, relativeTarget, changed: false, rule };
    }

    const existing = await entryKind(linkPath);
    if (existing === 'directory') {
      // A real directory at an alias name is content, not a stale link.
      throw new AlreadyPublishedError(linkPath);
    }
    if (existing === 'other') {
      await fs.unlink(linkPath);
    }

    await fs.mkdir(path.dirname(linkPath), { recursive: true });
    await fs.symlink(relativeTarget, linkPath);
    this.logger.info(`Linked ${linkName} -> ${relativeTarget}`);
    return { linkPath, relativeTarget, changed: true, rule };
  }
}

/**
 * Write accumulated rules as the redirect file of `dir`. Returns the file path.
 */
export async function writeRedirectFile(dir: string, rules: readonly string[]): Promise<string> {
  const file = path.join(dir, REDIRECT_FILE);
  await fs.writeFile(file, rules.join(''), 'utf-8');
  return file;
}
