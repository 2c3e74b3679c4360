/**
 * VersionExtractor: derives the Release from an RPM buildroot.
 *
 * The buildroot holds exactly one extracted tree named like
 * `virtio-win-0.1.171-6.x86_64`, with the guest agent release directory
 * (`qemu-ga-win-100.0.0.0-3.el7ev`) one level below one of its entries.
 * Pure derivation: nothing is written.
 */

import * as path from 'path';
import { COMPANION_NAME, PACKAGE_NAME } from '../config/layout.js';
import { expectOne, listMatches, listNestedMatches } from './discovery.js';
import { MalformedVersionError } from './errors.js';
import type { Release } from './types.js';

export const EXTRACT_DIR_PATTERN = `${PACKAGE_NAME}*.x86_64`;
export const COMPANION_DIR_PATTERN = `${COMPANION_NAME}*`;

const VERSION_RE = new RegExp(`^${PACKAGE_NAME}-\\d+(\\.\\d+)+$`);
const RELEASE_RE = new RegExp(`^${PACKAGE_NAME}-\\d+(\\.\\d+)+-\\d+$`);

/**
 * Split an extracted-tree basename into release tag and distribution version.
 *
 *   parseReleaseTag('virtio-win-1.2.3-7.x86_64')
 *   // { releaseTag: 'virtio-win-1.2.3-7', distributionVersion: 'virtio-win-1.2.3' }
 */
export function parseReleaseTag(basename: string): Pick<Release, 'releaseTag' | 'distributionVersion'> {
  const archDot = basename.lastIndexOf('.');
  const releaseTag = archDot > 0 ? basename.slice(0, archDot) : basename;
  const buildDash = releaseTag.lastIndexOf('-');
  const distributionVersion = buildDash > 0 ? releaseTag.slice(0, buildDash) : releaseTag;

  if (!VERSION_RE.test(distributionVersion)) {
    throw new MalformedVersionError(distributionVersion, `${PACKAGE_NAME}-<digits and dots>`);
  }
  if (!RELEASE_RE.test(releaseTag)) {
    throw new MalformedVersionError(releaseTag, `${PACKAGE_NAME}-<version>-<integer>`);
  }
  return { releaseTag, distributionVersion };
}

/**
 * The single extracted tree under the buildroot.
 */
export async function findExtractDir(buildroot: string): Promise<string> {
  const pattern = path.join(buildroot, EXTRACT_DIR_PATTERN);
  return expectOne(await listMatches(buildroot, EXTRACT_DIR_PATTERN), pattern, 'extracted RPM trees');
}

export async function extractRelease(buildroot: string): Promise<{ release: Release; extractDir: string }> {
  const root = path.resolve(buildroot);
  const extractDir = await findExtractDir(root);
  const { releaseTag, distributionVersion } = parseReleaseTag(path.basename(extractDir));

  const companionPattern = path.join(root, '*', COMPANION_DIR_PATTERN);
  const companionDir = expectOne(
    await listNestedMatches(root, COMPANION_DIR_PATTERN),
    companionPattern,
    'guest agent release directories'
  );

  const release: Release = Object.freeze({
    distributionVersion,
    releaseTag,
    companionReleaseTag: path.basename(companionDir),
  });
  return { release, extractDir };
}
