/**
 * Fixed mirror tree layout. Names here are part of the public URL space and
 * are not configurable per run.
 */

export const PACKAGE_NAME = 'virtio-win';
export const COMPANION_NAME = 'qemu-ga-win';

export const REPO_DIR = 'repo';
export const DIRECT_DIR = 'direct-downloads';

/** Package pools under the repository area */
export const BINARY_POOL = 'rpms';
export const SOURCE_POOL = 'srpms';
export const LATEST_POOL = 'latest';
export const STABLE_POOL = 'stable';
/** Pools that get their own generated metadata, in indexing order */
export const INDEXED_POOLS = [LATEST_POOL, STABLE_POOL, SOURCE_POOL] as const;
export const METADATA_DIR = 'repodata';

/** Direct-download area */
export const RELEASE_ARCHIVE_DIR = 'archive-virtio';
export const COMPANION_ARCHIVE_DIR = 'archive-qemu-ga';
export const BUILD_INPUT_DIR = 'virtio-win-pkg-scripts-input';
export const LATEST_BUILD_ALIAS = 'latest-build';
export const LATEST_RELEASE_ALIAS = 'latest-virtio';
export const LATEST_COMPANION_ALIAS = 'latest-qemu-ga';
export const STABLE_RELEASE_ALIAS = 'stable-virtio';
export const REDIRECT_FILE = '.htaccess';

/** Disk images shipped under usr/share/virtio-win, each an unversioned symlink */
export const DISK_IMAGE_NAMES = ['virtio-win_x86.vfd', 'virtio-win_amd64.vfd', 'virtio-win.iso'] as const;

/** Root-level site files: source name under the data dir -> name in the mirror root */
export const SITE_FILES: ReadonlyArray<{ source: string; dest: string }> = [
  { source: 'virtio-win.repo', dest: 'virtio-win.repo' },
  { source: 'rpm_changelog', dest: 'CHANGELOG' },
];

export function stablePackageFile(release: string): string {
  return `${PACKAGE_NAME}-${release}.noarch.rpm`;
}
