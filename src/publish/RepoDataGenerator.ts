/**
 * RepoDataGenerator: the latest/ and stable/ package pools, their metadata,
 * and the root site files.
 *
 * latest/ is re-derived from the whole binary pool on every run, not just the
 * current release, so older entries stay valid and new ones are added.
 */

import * as path from 'path';
import type { PublishConfig } from '../config/PublishConfig.js';
import type { StableList } from '../config/StableList.js';
import {
  BINARY_POOL,
  INDEXED_POOLS,
  LATEST_POOL,
  SITE_FILES,
  STABLE_POOL,
  stablePackageFile,
} from '../config/layout.js';
import type { AliasManager } from './AliasManager.js';
import type { CommandRunner } from './CommandRunner.js';
import { listMatches } from './discovery.js';
import { copyIfChanged } from './fileops.js';
import type { SiteFileOutcome } from './types.js';
import type { Logger } from '../logging/index.js';

/**
 * External repository-metadata generator.
 */
export interface MetadataIndexer {
  /** Incrementally (re)index the packages in `dir` */
  update(dir: string): Promise<void>;
}

export class CreaterepoIndexer implements MetadataIndexer {
  constructor(
    private readonly run: CommandRunner,
    private readonly command = 'createrepo_c'
  ) {}

  async update(dir: string): Promise<void> {
    await this.run(this.command, [dir, '--update']);
  }
}

export interface RepoDataResult {
  stableLinks: number;
  latestLinks: number;
  /** Links created or replaced during this run */
  changedLinks: number;
  indexed: string[];
  siteFiles: Record<string, SiteFileOutcome>;
}

export class RepoDataGenerator {
  constructor(
    private readonly config: PublishConfig,
    private readonly aliases: AliasManager,
    private readonly indexer: MetadataIndexer,
    private readonly logger: Logger
  ) {}

  async generate(stableList: StableList): Promise<RepoDataResult> {
    const repoDir = this.config.repoDir;
    let changedLinks = 0;

    for (const entry of stableList.entries) {
      const filename = stablePackageFile(entry.release);
      const link = await this.aliases.ensureLink(
        repoDir,
        path.join(BINARY_POOL, filename),
        path.join(STABLE_POOL, filename)
      );
      if (link.changed) changedLinks++;
    }

    const pool = await listMatches(path.join(repoDir, BINARY_POOL), '*.rpm');
    for (const fullPath of pool) {
      const filename = path.basename(fullPath);
      const link = await this.aliases.ensureLink(
        repoDir,
        path.join(BINARY_POOL, filename),
        path.join(LATEST_POOL, filename)
      );
      if (link.changed) changedLinks++;
    }
    this.logger.info(
      `Pools linked: ${stableList.entries.length} stable, ${pool.length} latest (${changedLinks} changed)`
    );

    const indexed: string[] = [];
    for (const name of INDEXED_POOLS) {
      const dir = path.join(repoDir, name);
      this.logger.debug(`Indexing ${dir}`);
      await this.indexer.update(dir);
      indexed.push(dir);
    }

    const siteFiles = await this.publishSiteFiles();
    return {
      stableLinks: stableList.entries.length,
      latestLinks: pool.length,
      changedLinks,
      indexed,
      siteFiles,
    };
  }

  /**
   * Copy the repo definition and changelog into the mirror root. Unchanged files
   * are left alone so their modification times stay put.
   */
  async publishSiteFiles(): Promise<Record<string, SiteFileOutcome>> {
    const outcomes: Record<string, SiteFileOutcome> = {};
    for (const { source, dest } of SITE_FILES) {
      const destPath = path.join(this.config.localRoot, dest);
      const outcome = await copyIfChanged(path.join(this.config.dataDir, source), destPath);
      if (outcome === 'unchanged') {
        this.logger.info(`${destPath} is up to date, skipping.`);
      }
      outcomes[dest] = outcome;
    }
    return outcomes;
  }
}
