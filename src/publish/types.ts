/**
 * Publish pipeline data model.
 */

/**
 * One versioned publish unit. Derived once per run and never mutated.
 */
export interface Release {
  /** e.g. virtio-win-0.1.171 */
  readonly distributionVersion: string;
  /** e.g. virtio-win-0.1.171-6 */
  readonly releaseTag: string;
  /** e.g. qemu-ga-win-100.0.0.0-3.el7ev */
  readonly companionReleaseTag: string;
}

/**
 * An unversioned disk-image symlink and the version-stamped file it resolves to.
 */
export interface DiskImagePair {
  readonly versionedFile: string;
  readonly aliasLink: string;
}

export interface ArtifactSet {
  /** Built .rpm and .src.rpm files */
  readonly packages: readonly string[];
  /** Guest agent installers, published under their own release directory */
  readonly companionInstallers: readonly string[];
  /** Extra installers published beside the disk images */
  readonly supplementaryInstallers: readonly string[];
  readonly diskImages: readonly DiskImagePair[];
}

export type CopyOutcome = 'copied' | 'skipped';
export type SiteFileOutcome = 'copied' | 'unchanged';
