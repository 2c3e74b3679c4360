/**
 * ArtifactCollector: finds everything a release publishes.
 *
 * Reads `<extractDir>/usr/share/virtio-win` for installers and disk images and
 * walks the RPM output directory for packages. Every disk-image alias must be a
 * symlink that resolves to an existing version-stamped file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DISK_IMAGE_NAMES, PACKAGE_NAME } from '../config/layout.js';
import { findFilesRecursive, listRequired, pathExists } from './discovery.js';
import { BrokenTargetError, DiscoveryError, NotFoundError, hasErrorCode } from './errors.js';
import type { ArtifactSet, DiskImagePair } from './types.js';

export function shareDirOf(extractDir: string): string {
  return path.join(extractDir, 'usr', 'share', PACKAGE_NAME);
}

/**
 * Resolve one unversioned image link to its versioned file.
 */
export async function resolveDiskImage(shareDir: string, name: string): Promise<DiskImagePair> {
  const aliasLink = path.join(shareDir, name);

  const stat = await fs.lstat(aliasLink).catch((err: unknown) => {
    if (hasErrorCode(err, 'ENOENT')) throw new NotFoundError(aliasLink, 'disk images');
    throw err;
  });
  if (!stat.isSymbolicLink()) {
    throw new DiscoveryError(`Expected ${aliasLink} to be a symlink`, aliasLink, 1, 'NOT_FOUND');
  }

  let versionedFile: string;
  try {
    versionedFile = await fs.realpath(aliasLink);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ELOOP')) throw new BrokenTargetError(await fs.readlink(aliasLink), aliasLink);
    throw err;
  }
  if (!(await fs.stat(versionedFile)).isFile()) {
    throw new BrokenTargetError(versionedFile, aliasLink);
  }
  return { versionedFile, aliasLink };
}

export async function collectArtifacts(extractDir: string, rpmOutputDir: string): Promise<ArtifactSet> {
  const shareDir = shareDirOf(extractDir);
  if (!(await pathExists(shareDir))) {
    throw new NotFoundError(shareDir, 'share directories');
  }

  const companionInstallers = await listRequired(path.join(shareDir, 'guest-agent'));
  const supplementaryInstallers = await listRequired(path.join(shareDir, 'installer'));

  const diskImages: DiskImagePair[] = [];
  for (const name of DISK_IMAGE_NAMES) {
    diskImages.push(await resolveDiskImage(shareDir, name));
  }

  const rpmPattern = path.join(path.resolve(rpmOutputDir), '**', '*.rpm');
  if (!(await pathExists(rpmOutputDir))) {
    throw new NotFoundError(rpmPattern, 'RPMs');
  }
  const packages = await findFilesRecursive(path.resolve(rpmOutputDir), '.rpm');
  if (packages.length === 0) {
    throw new NotFoundError(rpmPattern, 'RPMs');
  }

  return { packages, companionInstallers, supplementaryInstallers, diskImages };
}
