/**
 * Sequences one publish run.
 *
 *   populate:   extract release -> assemble tree -> regenerate repo data -> push
 *   regenerate: regenerate repo data -> push
 *   resync:     pull the remote mirror over the local one
 *
 * Strictly sequential. There is no rollback: a failure leaves whatever was written
 * so far, and a re-run either skips the idempotent steps or stops at the disk
 * images.
 */

import type { PublishConfig } from '../config/PublishConfig.js';
import type { StableList } from '../config/StableList.js';
import { AliasManager } from './AliasManager.js';
import { collectArtifacts } from './ArtifactCollector.js';
import { CreaterepoIndexer, RepoDataGenerator } from './RepoDataGenerator.js';
import type { MetadataIndexer, RepoDataResult } from './RepoDataGenerator.js';
import { SyncEngine } from './SyncEngine.js';
import type { ConfirmationGate, SyncOutcome } from './SyncEngine.js';
import { TreeAssembler } from './TreeAssembler.js';
import type { CommandRunner } from './CommandRunner.js';
import { extractRelease } from './VersionExtractor.js';
import { isDirectory } from './discovery.js';
import { UsageError } from './errors.js';
import type { Release } from './types.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('publish', 'Publish pipeline');
registerComponent('tree-assembler', 'Local mirror tree population');
registerComponent('repo-data', 'Package pools and metadata');
registerComponent('sync-engine', 'Remote synchronization');

export type PublishMode = 'populate' | 'regenerate' | 'resync';

export interface BuildInputs {
  rpmOutput: string;
  rpmBuildroot: string;
  buildInput: string;
}

export interface PublishRequest {
  mode: PublishMode;
  /** Required for populate */
  build?: BuildInputs;
}

export interface PublishDependencies {
  config: PublishConfig;
  stableList: StableList;
  runner: CommandRunner;
  gate: ConfirmationGate;
  /** Defaults to createrepo_c over `runner` */
  indexer?: MetadataIndexer;
  /** Called as each step starts, for progress display */
  onStep?: (step: string) => void;
}

export interface PublishResult {
  mode: PublishMode;
  release?: Release;
  repoData?: RepoDataResult;
  sync: SyncOutcome;
}

export function resolveMode(options: { regenerateOnly?: boolean; resync?: boolean }): PublishMode {
  if (options.regenerateOnly && options.resync) {
    throw new UsageError('--regenerate-only and --resync cannot be combined');
  }
  if (options.resync) return 'resync';
  if (options.regenerateOnly) return 'regenerate';
  return 'populate';
}

/**
 * Every build directory must exist before anything is written. A mistyped
 * --build-input would otherwise snapshot an empty directory that later runs skip.
 */
export async function checkBuildInputs(build: BuildInputs): Promise<void> {
  const flags: Array<[string, string]> = [
    ['--rpm-output', build.rpmOutput],
    ['--rpm-buildroot', build.rpmBuildroot],
    ['--build-input', build.buildInput],
  ];
  for (const [flag, dir] of flags) {
    if (!(await isDirectory(dir))) {
      throw new UsageError(`${flag} directory does not exist: ${dir}`);
    }
  }
}

async function populate(build: BuildInputs, deps: PublishDependencies, aliases: AliasManager): Promise<Release> {
  const step = deps.onStep ?? (() => undefined);
  await checkBuildInputs(build);

  step('Reading build output');
  const { release, extractDir } = await extractRelease(build.rpmBuildroot);
  const artifacts = await collectArtifacts(extractDir, build.rpmOutput);

  const assembler = new TreeAssembler(deps.config, release, aliases, getLogger('tree-assembler'));
  step(`Populating ${release.releaseTag}`);
  await assembler.addCompanionInstallers(artifacts.companionInstallers);
  await assembler.addDiskImages(artifacts.diskImages);
  await assembler.addSupplementaryInstallers(artifacts.supplementaryInstallers);
  await assembler.linkReleaseAliases(deps.stableList);
  await assembler.addBuildInput(build.buildInput);
  await assembler.addPackages(artifacts.packages);
  return release;
}

export async function runPublish(request: PublishRequest, deps: PublishDependencies): Promise<PublishResult> {
  const logger = getLogger('publish');
  const step = deps.onStep ?? (() => undefined);
  const aliases = new AliasManager();
  let release: Release | undefined;
  let repoData: RepoDataResult | undefined;

  if (request.mode === 'populate') {
    if (!request.build) {
      throw new UsageError(
        '--rpm-output, --rpm-buildroot and --build-input must all be specified, ' +
          'or pass --regenerate-only to regen just the repo.'
      );
    }
    release = await populate(request.build, deps, aliases);
    logger.info(`Populated local tree for ${release.releaseTag}`);
  }

  if (request.mode !== 'resync') {
    step('Generating repo data');
    const generator = new RepoDataGenerator(
      deps.config,
      aliases,
      deps.indexer ?? new CreaterepoIndexer(deps.runner),
      getLogger('repo-data')
    );
    repoData = await generator.generate(deps.stableList);
  }

  step('Syncing');
  const engine = new SyncEngine(deps.config, deps.runner, getLogger('sync-engine'));
  const sync = await engine.publish(request.mode === 'resync' ? 'pull' : 'push', deps.gate);

  return { mode: request.mode, release, repoData, sync };
}
