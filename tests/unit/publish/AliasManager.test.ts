import * as fs from 'fs/promises';
import { promises as fsModule } from 'fs';
import * as path from 'path';
import { AliasManager, makeRedirect, writeRedirectFile } from '../../../src/publish/AliasManager.js';
import { AlreadyPublishedError, BrokenTargetError } from '../../../src/publish/errors.js';
import { makeTempDir, removeDir, writeFile } from '../../helpers/fixtures.js';

describe('makeRedirect', () => {
  it('should format one permanent redirect line', () => {
    expect(makeRedirect('/dl', 'latest-virtio', 'archive-virtio/virtio-win-0.1.200-1')).toBe(
      'redirect permanent /dl/latest-virtio /dl/archive-virtio/virtio-win-0.1.200-1\n'
    );
  });
});

describe('AliasManager', () => {
  let tmpDir: string;
  let aliases: AliasManager;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    aliases = new AliasManager();
    await writeFile(path.join(tmpDir, 'rpms', 'pkg-1.0-1.noarch.rpm'), 'one');
    await writeFile(path.join(tmpDir, 'rpms', 'pkg-2.0-1.noarch.rpm'), 'two');
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  it('should create a relative link and return its redirect rule', async () => {
    const result = await aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'latest/pkg.rpm', '/repo');

    expect(result.changed).toBe(true);
    expect(result.relativeTarget).toBe(path.join('..', 'rpms', 'pkg-1.0-1.noarch.rpm'));
    expect(await fs.readlink(path.join(tmpDir, 'latest', 'pkg.rpm'))).toBe('../rpms/pkg-1.0-1.noarch.rpm');
    expect(await fs.readFile(path.join(tmpDir, 'latest', 'pkg.rpm'), 'utf-8')).toBe('one');
    expect(result.rule).toBe('redirect permanent /repo/latest/pkg.rpm /repo/rpms/pkg-1.0-1.noarch.rpm\n');
  });

  it('should use the target basename for a link beside its target', async () => {
    await fs.mkdir(path.join(tmpDir, 'archive', 'rel-1'), { recursive: true });

    const result = await aliases.ensureLink(path.join(tmpDir, 'archive'), 'rel-1', 'latest', '/dl/archive');

    expect(result.relativeTarget).toBe('rel-1');
    expect(result.rule).toBe('redirect permanent /dl/archive/latest /dl/archive/rel-1\n');
  });

  it('should be idempotent and not touch the filesystem on the second call', async () => {
    const first = await aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'latest/pkg.rpm', '/repo');
    // Spy on the module object itself so the source module's namespace sees the spies
    const symlinkSpy = jest.spyOn(fsModule, 'symlink');
    const unlinkSpy = jest.spyOn(fsModule, 'unlink');
    const mkdirSpy = jest.spyOn(fsModule, 'mkdir');

    try {
      const second = await aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'latest/pkg.rpm', '/repo');

      expect(second.changed).toBe(false);
      expect(second.rule).toBe(first.rule);
      expect(second.relativeTarget).toBe(first.relativeTarget);
      expect(symlinkSpy).not.toHaveBeenCalled();
      expect(unlinkSpy).not.toHaveBeenCalled();
      expect(mkdirSpy).not.toHaveBeenCalled();
    } finally {
      jest.restoreAllMocks();
    }
    expect(await fs.readlink(path.join(tmpDir, 'latest', 'pkg.rpm'))).toBe('../rpms/pkg-1.0-1.noarch.rpm');
  });

  it('should replace a link that points elsewhere', async () => {
    await aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'current.rpm', '/repo');

    const result = await aliases.ensureLink(tmpDir, 'rpms/pkg-2.0-1.noarch.rpm', 'current.rpm', '/repo');

    expect(result.changed).toBe(true);
    expect(await fs.readlink(path.join(tmpDir, 'current.rpm'))).toBe('rpms/pkg-2.0-1.noarch.rpm');
    expect(result.rule).toBe('redirect permanent /repo/current.rpm /repo/rpms/pkg-2.0-1.noarch.rpm\n');
  });

  it('should replace a dangling link', async () => {
    await fs.symlink('rpms/gone.rpm', path.join(tmpDir, 'current.rpm'));

    const result = await aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'current.rpm');

    expect(result.changed).toBe(true);
    expect(await fs.readlink(path.join(tmpDir, 'current.rpm'))).toBe('rpms/pkg-1.0-1.noarch.rpm');
  });

  it('should fail with BrokenTargetError when the target does not exist', async () => {
    await expect(aliases.ensureLink(tmpDir, 'rpms/missing.rpm', 'latest/missing.rpm')).rejects.toBeInstanceOf(
      BrokenTargetError
    );
    await expect(fs.lstat(path.join(tmpDir, 'latest', 'missing.rpm'))).rejects.toThrow();
  });

  it('should fail with BrokenTargetError when the target is itself a dangling link', async () => {
    await fs.symlink('rpms/nowhere.rpm', path.join(tmpDir, 'target.rpm'));

    await expect(aliases.ensureLink(tmpDir, 'target.rpm', 'alias.rpm')).rejects.toBeInstanceOf(BrokenTargetError);
    await expect(fs.lstat(path.join(tmpDir, 'alias.rpm'))).rejects.toThrow();
  });

  it('should accept a target reached through a link that resolves', async () => {
    await fs.symlink('rpms/pkg-1.0-1.noarch.rpm', path.join(tmpDir, 'target.rpm'));

    const result = await aliases.ensureLink(tmpDir, 'target.rpm', 'alias.rpm');

    expect(result.changed).toBe(true);
    expect(await fs.readFile(path.join(tmpDir, 'alias.rpm'), 'utf-8')).toBe('one');
  });

  it('should refuse to replace a real directory at the link path', async () => {
    await fs.mkdir(path.join(tmpDir, 'stable-dir'));

    await expect(
      aliases.ensureLink(tmpDir, 'rpms/pkg-1.0-1.noarch.rpm', 'stable-dir')
    ).rejects.toBeInstanceOf(AlreadyPublishedError);
  });
});

describe('writeRedirectFile', () => {
  it('should write the rules in order as .htaccess', async () => {
    const dir = await makeTempDir();
    try {
      const file = await writeRedirectFile(dir, [makeRedirect('/a', 'x', 'y'), makeRedirect('/a', 'z', 'w')]);

      expect(file).toBe(path.join(dir, '.htaccess'));
      expect(await fs.readFile(file, 'utf-8')).toBe(
        'redirect permanent /a/x /a/y\nredirect permanent /a/z /a/w\n'
      );
    } finally {
      await removeDir(dir);
    }
  });
});
