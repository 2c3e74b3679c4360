/**
 * Filesystem fixtures: a fake RPM buildroot, RPM output, build input and
 * local mirror, all under a temp directory.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { PublishConfig } from '../../src/config/PublishConfig.js';
import { parseStableList } from '../../src/config/StableList.js';
import type { StableList } from '../../src/config/StableList.js';
import type { CommandResult, CommandRunner } from '../../src/publish/CommandRunner.js';

export async function makeTempDir(prefix = 'mirror-publish-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(file: string, content = 'x'): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
  return file;
}

export interface BuildFixture {
  buildroot: string;
  extractDir: string;
  shareDir: string;
  rpmOutput: string;
  buildInput: string;
}

export const COMPANION_TAG = 'qemu-ga-win-100.0.0.0-3.el7ev';

/**
 * Lay out build output for virtio-win-<version>-<release>.
 */
export async function createBuild(root: string, version = '0.1.200', release = '1'): Promise<BuildFixture> {
  const buildroot = path.join(root, 'buildroot');
  const extractDir = path.join(buildroot, `virtio-win-${version}-${release}.x86_64`);
  const shareDir = path.join(extractDir, 'usr', 'share', 'virtio-win');

  await writeFile(path.join(shareDir, 'guest-agent', 'qemu-ga-i386.msi'), 'ga-i386');
  await writeFile(path.join(shareDir, 'guest-agent', 'qemu-ga-x86_64.msi'), 'ga-x86_64');
  await writeFile(path.join(shareDir, 'installer', 'virtio-win-gt-x64.msi'), 'gt-x64');
  await writeFile(path.join(shareDir, 'installer', 'virtio-win-gt-x86.msi'), 'gt-x86');

  const images: Array<[string, string]> = [
    ['virtio-win_x86.vfd', `virtio-win-${version}_x86.vfd`],
    ['virtio-win_amd64.vfd', `virtio-win-${version}_amd64.vfd`],
    ['virtio-win.iso', `virtio-win-${version}.iso`],
  ];
  for (const [alias, versioned] of images) {
    await writeFile(path.join(shareDir, versioned), `image ${versioned}`);
    await fs.symlink(versioned, path.join(shareDir, alias));
  }

  await fs.mkdir(path.join(buildroot, `virtio-win-${version}`, COMPANION_TAG), { recursive: true });

  const rpmOutput = path.join(root, 'rpm-output');
  await writeFile(path.join(rpmOutput, 'noarch', `virtio-win-${version}-${release}.noarch.rpm`), 'rpm');
  await writeFile(path.join(rpmOutput, `virtio-win-${version}-${release}.src.rpm`), 'srpm');

  const buildInput = path.join(root, 'build-input');
  await writeFile(path.join(buildInput, 'versions.txt'), `virtio-win ${version}`);

  return { buildroot, extractDir, shareDir, rpmOutput, buildInput };
}

/**
 * An existing local mirror plus the data dir holding the root site files.
 */
export async function createMirror(root: string, overrides: Partial<PublishConfig> = {}): Promise<PublishConfig> {
  const localRoot = path.join(root, 'mirror');
  await fs.mkdir(path.join(localRoot, 'repo', 'rpms'), { recursive: true });
  await fs.mkdir(path.join(localRoot, 'direct-downloads'), { recursive: true });

  const dataDir = path.join(root, 'data');
  await writeFile(path.join(dataDir, 'virtio-win.repo'), '[virtio-win-stable]\n');
  await writeFile(path.join(dataDir, 'rpm_changelog'), '* Mon Oct 12 2026 - 0.1.200-1\n');

  return {
    account: 'tester',
    localRoot,
    repoDir: path.join(localRoot, 'repo'),
    directDir: path.join(localRoot, 'direct-downloads'),
    remoteHost: 'mirror.example.org',
    remoteRoot: '/srv/mirror',
    remoteGroup: 'mirror-group',
    httpDirectDir: '/mirror/direct-downloads',
    dataDir,
    ...overrides,
  };
}

export function stableList(...releases: string[]): StableList {
  return parseStableList(`stable:\n${releases.map((r) => `  - release: ${r}\n`).join('')}`);
}

export interface RecordedCall {
  command: string;
  args: string[];
  event: 'start' | 'end';
}

/**
 * CommandRunner stand-in recording start/end of every call.
 */
export function fakeRunner(
  respond: (command: string, args: readonly string[]) => Partial<CommandResult> | Error = () => ({})
): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args: [...args], event: 'start' });
    await new Promise((resolve) => setImmediate(resolve));
    const response = respond(command, args);
    calls.push({ command, args: [...args], event: 'end' });
    if (response instanceof Error) throw response;
    return { stdout: response.stdout ?? '', stderr: response.stderr ?? '' };
  };
  return { run, calls };
}

export async function isSymlink(p: string): Promise<boolean> {
  return (await fs.lstat(p)).isSymbolicLink();
}
