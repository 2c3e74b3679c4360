/**
 * Publish Configuration
 *
 * Built once at process entry from environment variables and passed explicitly
 * into every component. Nothing below the CLI reads process.env.
 */

import * as os from 'os';
import * as path from 'path';
import { isDirectory } from '../publish/discovery.js';
import { ConfigurationError } from '../publish/errors.js';
import { DIRECT_DIR, REPO_DIR } from './layout.js';

export interface PublishConfig {
  /** Remote account name, used for ownership and the remote path (FAS_USERNAME, required) */
  readonly account: string;
  /** Local mirror root (MIRROR_LOCAL_ROOT, default ~/src/fedora/virt-group-repos/virtio-win) */
  readonly localRoot: string;
  /** <localRoot>/repo */
  readonly repoDir: string;
  /** <localRoot>/direct-downloads */
  readonly directDir: string;
  /** MIRROR_REMOTE_HOST, default fedorapeople.org */
  readonly remoteHost: string;
  /** MIRROR_REMOTE_ROOT, default /srv/groups/virt/virtio-win */
  readonly remoteRoot: string;
  /** Group given to pushed files (MIRROR_REMOTE_GROUP, default virtmaint-sig) */
  readonly remoteGroup: string;
  /** URL path of the direct-download area, used in redirect rules (MIRROR_HTTP_DIRECT_DIR) */
  readonly httpDirectDir: string;
  /** Directory holding the root site files (MIRROR_DATA_DIR, default ./data) */
  readonly dataDir: string;
}

export const DEFAULT_LOCAL_ROOT = path.join('src', 'fedora', 'virt-group-repos', 'virtio-win');

function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

export interface LoadConfigOptions {
  homeDir?: string;
  cwd?: string;
}

/**
 * Build the configuration. Fails with ConfigurationError when FAS_USERNAME is unset
 * or the local mirror root does not exist.
 */
export async function loadPublishConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): Promise<PublishConfig> {
  const homeDir = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  const account = env['FAS_USERNAME']?.trim();
  if (!account) {
    throw new ConfigurationError(
      'You must set FAS_USERNAME environment variable to your fedorapeople account name'
    );
  }

  const localRoot = path.resolve(
    cwd,
    expandHome(env['MIRROR_LOCAL_ROOT'] || path.join(homeDir, DEFAULT_LOCAL_ROOT), homeDir)
  );
  if (!(await isDirectory(localRoot))) {
    throw new ConfigurationError(`Expected local mirror does not exist: ${localRoot}`);
  }

  return Object.freeze({
    account,
    localRoot,
    repoDir: path.join(localRoot, REPO_DIR),
    directDir: path.join(localRoot, DIRECT_DIR),
    remoteHost: env['MIRROR_REMOTE_HOST'] || 'fedorapeople.org',
    remoteRoot: env['MIRROR_REMOTE_ROOT'] || '/srv/groups/virt/virtio-win',
    remoteGroup: env['MIRROR_REMOTE_GROUP'] || 'virtmaint-sig',
    httpDirectDir: (env['MIRROR_HTTP_DIRECT_DIR'] || '/groups/virt/virtio-win/direct-downloads').replace(/\/+$/, ''),
    dataDir: path.resolve(cwd, env['MIRROR_DATA_DIR'] || 'data'),
  });
}

/**
 * user@host:/path, the rsync address of the remote mirror.
 */
export function remoteAddress(config: PublishConfig): string {
  return `${config.account}@${config.remoteHost}:${config.remoteRoot}`;
}
