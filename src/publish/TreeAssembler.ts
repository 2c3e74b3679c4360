/**
 * TreeAssembler: populates the local mirror tree for one release.
 *
 * Each step guards against double publication in its own way:
 *
 * - guest agent installers: skipped when their release directory exists, so a
 *   run can be repeated after a partial failure;
 * - disk images: an existing release directory is fatal. Images define the
 *   release and must never be written twice or partially;
 * - supplementary installers and packages: always copied, they may be added
 *   incrementally.
 *
 * The first two policies differ on purpose.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { PublishConfig } from '../config/PublishConfig.js';
import type { StableList } from '../config/StableList.js';
import {
  BINARY_POOL,
  BUILD_INPUT_DIR,
  COMPANION_ARCHIVE_DIR,
  LATEST_BUILD_ALIAS,
  LATEST_COMPANION_ALIAS,
  LATEST_RELEASE_ALIAS,
  PACKAGE_NAME,
  RELEASE_ARCHIVE_DIR,
  SOURCE_POOL,
  STABLE_RELEASE_ALIAS,
} from '../config/layout.js';
import { AliasManager, makeRedirect, writeRedirectFile } from './AliasManager.js';
import { listMatches, pathExists } from './discovery.js';
import { AlreadyPublishedError } from './errors.js';
import { copyInto } from './fileops.js';
import type { CopyOutcome, DiskImagePair, Release } from './types.js';
import type { Logger } from '../logging/index.js';

export interface DiskImageResult {
  /** Version-stamped files written into the release directory */
  files: string[];
  /** Redirect rules written to the release's redirect file */
  rules: string[];
  redirectFile: string;
}

export interface PackageResult {
  binary: string[];
  source: string[];
}

export function isSourcePackage(file: string): boolean {
  return file.endsWith('.src.rpm');
}

export class TreeAssembler {
  private readonly companionDir: string;
  private readonly releaseDir: string;

  constructor(
    private readonly config: PublishConfig,
    private readonly release: Release,
    private readonly aliases: AliasManager,
    private readonly logger: Logger
  ) {
    this.companionDir = path.join(COMPANION_ARCHIVE_DIR, release.companionReleaseTag);
    this.releaseDir = path.join(RELEASE_ARCHIVE_DIR, release.releaseTag);
  }

  /** Absolute release directory for the disk images */
  get releasePath(): string {
    return path.join(this.config.directDir, this.releaseDir);
  }

  get companionPath(): string {
    return path.join(this.config.directDir, this.companionDir);
  }

  async addCompanionInstallers(paths: readonly string[]): Promise<CopyOutcome> {
    const dest = this.companionPath;
    if (await pathExists(dest)) {
      this.logger.warn(`Guest agent has already been uploaded, skipping: ${path.basename(dest)}`);
      return 'skipped';
    }

    await fs.mkdir(dest, { recursive: true });
    for (const p of paths) {
      await copyInto(p, dest);
    }
    this.logger.info(`Copied ${paths.length} guest agent installer(s) to ${this.companionDir}`);
    return 'copied';
  }

  /**
   * Copy each versioned image and recreate its unversioned alias as a link. The
   * release redirect file maps every alias to its versioned name, so downloads
   * always land on a file whose name carries the version.
   */
  async addDiskImages(pairs: readonly DiskImagePair[]): Promise<DiskImageResult> {
    const dest = this.releasePath;
    if (await pathExists(dest)) {
      throw new AlreadyPublishedError(dest);
    }

    await fs.mkdir(dest, { recursive: true });
    const redirectRoot = `${this.config.httpDirectDir}/${this.releaseDir}`;
    const files: string[] = [];
    const rules: string[] = [];

    for (const { versionedFile, aliasLink } of pairs) {
      const versionedName = path.basename(versionedFile);
      const aliasName = path.basename(aliasLink);
      files.push(await copyInto(versionedFile, dest));
      await fs.symlink(versionedName, path.join(dest, aliasName));
      rules.push(makeRedirect(redirectRoot, aliasName, versionedName));
    }

    const redirectFile = await writeRedirectFile(dest, rules);
    this.logger.info(`Copied ${files.length} disk image(s) to ${this.releaseDir}`);
    return { files, rules, redirectFile };
  }

  async addSupplementaryInstallers(paths: readonly string[]): Promise<string[]> {
    const dest = this.releasePath;
    await fs.mkdir(dest, { recursive: true });
    const copied: string[] = [];
    for (const p of paths) {
      copied.push(await copyInto(p, dest));
    }
    this.logger.info(`Copied ${copied.length} installer(s) to ${this.releaseDir}`);
    return copied;
  }

  /**
   * latest-qemu-ga, latest-virtio and stable-virtio in the direct-download root,
   * plus the root redirect file listing them.
   */
  async linkReleaseAliases(stableList: StableList): Promise<string[]> {
    const directDir = this.config.directDir;
    const root = this.config.httpDirectDir;
    const stableDir = path.join(RELEASE_ARCHIVE_DIR, `${PACKAGE_NAME}-${stableList.current}`);

    const rules = [
      (await this.aliases.ensureLink(directDir, this.companionDir, LATEST_COMPANION_ALIAS, root)).rule,
      (await this.aliases.ensureLink(directDir, this.releaseDir, LATEST_RELEASE_ALIAS, root)).rule,
      (await this.aliases.ensureLink(directDir, stableDir, STABLE_RELEASE_ALIAS, root)).rule,
    ];
    await writeRedirectFile(directDir, rules);
    return rules;
  }

  /**
   * Snapshot the build input so the build can be reproduced, then point
   * latest-build at it.
   */
  async addBuildInput(inputDir: string): Promise<CopyOutcome> {
    const topDir = path.join(this.config.directDir, BUILD_INPUT_DIR);
    const dest = path.join(topDir, this.release.releaseTag);
    let outcome: CopyOutcome = 'skipped';

    if (await pathExists(dest)) {
      this.logger.info(`${dest} exists, not changing content.`);
    } else {
      await fs.mkdir(dest, { recursive: true });
      for (const file of await listMatches(inputDir, '*')) {
        await copyInto(file, dest);
      }
      outcome = 'copied';
    }

    await this.aliases.ensureLink(topDir, this.release.releaseTag, LATEST_BUILD_ALIAS);
    return outcome;
  }

  async addPackages(paths: readonly string[]): Promise<PackageResult> {
    const result: PackageResult = { binary: [], source: [] };
    for (const p of paths) {
      const source = isSourcePackage(p);
      const pool = path.join(this.config.repoDir, source ? SOURCE_POOL : BINARY_POOL);
      await fs.mkdir(pool, { recursive: true });
      (source ? result.source : result.binary).push(await copyInto(p, pool));
    }
    this.logger.info(`Copied ${result.binary.length} binary and ${result.source.length} source package(s)`);
    return result;
  }
}
