import { describe, it, expect, beforeAll, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import ora from 'ora';
import { PassThrough } from 'stream';
import { createProgram } from '../../../../src/cli/index.js';
import { createGate, resolveBuildInputs, toolOutputHandler } from '../../../../src/cli/commands/publish.js';
import type { SyncPlanSummary } from '../../../../src/publish/index.js';
import { UsageError } from '../../../../src/publish/errors.js';

describe('publish command', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
  });

  describe('resolveBuildInputs', () => {
    it('should require all three directories when populating', () => {
      expect(() =>
        resolveBuildInputs('populate', { rpmOutput: 'out', rpmBuildroot: 'root', stableList: 'stable.yaml' })
      ).toThrow(UsageError);
    });

    it('should return the directories when populating', () => {
      expect(
        resolveBuildInputs('populate', {
          rpmOutput: 'out',
          rpmBuildroot: 'root',
          buildInput: 'in',
          stableList: 'stable.yaml',
        })
      ).toEqual({ rpmOutput: 'out', rpmBuildroot: 'root', buildInput: 'in' });
    });

    it('should ignore build directories for the other modes', () => {
      expect(resolveBuildInputs('regenerate', { stableList: 'stable.yaml' })).toBeUndefined();
      expect(resolveBuildInputs('resync', { rpmOutput: 'out', stableList: 'stable.yaml' })).toBeUndefined();
    });
  });

  it('should reject conflicting mode flags before doing anything', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', 'mirror-publish', '--regenerate-only', '--resync']);

    expect(errors).toHaveBeenCalledWith('✖ --regenerate-only and --resync cannot be combined');
    expect(process.exitCode).toBe(1);
  });

  it('should reject a populate run without build directories', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await createProgram().parseAsync(['node', 'mirror-publish', 'publish', '--rpm-output', 'out']);

    expect(errors).toHaveBeenCalledWith(
      '✖ --rpm-output, --rpm-buildroot and --build-input must all be specified, ' +
        'or pass --regenerate-only to regen just the repo.'
    );
    expect(process.exitCode).toBe(1);
  });

  describe('createGate', () => {
    const plan: SyncPlanSummary = {
      direction: 'push',
      source: '/home/tester/mirror/',
      destination: 'tester@mirror.example.org:/srv/mirror',
      phases: [],
    };

    const flush = () => new Promise((resolve) => setImmediate(resolve));

    function streams() {
      const input = new PassThrough();
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      const written = { stdout: '', stderr: '' };
      stdout.on('data', (chunk: Buffer) => (written.stdout += chunk.toString()));
      stderr.on('data', (chunk: Buffer) => (written.stderr += chunk.toString()));
      return { input, stdout, stderr, written };
    }

    it('should ask on stdout in text mode', async () => {
      const io = streams();
      const gate = createGate({}, () => undefined, io);

      const decision = gate.decide(plan);
      io.input.end('y\n');

      await expect(decision).resolves.toBe('proceed');
      await flush();
      expect(io.written.stdout).toBe('Review the --dry-run changes. Do you want to push? (y/n): ');
      expect(io.written.stderr).toBe('');
    });

    it('should keep the question off stdout in JSON mode', async () => {
      const io = streams();
      const gate = createGate({ json: true }, () => undefined, io);

      const decision = gate.decide(plan);
      io.input.end('n\n');

      await expect(decision).resolves.toBe('abort');
      await flush();
      expect(io.written.stdout).toBe('');
      expect(io.written.stderr).toBe('Review the --dry-run changes. Do you want to push? (y/n): ');
    });

    it('should render and proceed without asking when --yes is given', async () => {
      const io = streams();
      const render = jest.fn<(p: SyncPlanSummary) => void>();

      await expect(createGate({ yes: true }, render, io).decide(plan)).resolves.toBe('proceed');
      expect(render).toHaveBeenCalledWith(plan);
      expect(io.written.stdout).toBe('');
    });
  });

  describe('toolOutputHandler', () => {
    it('should stop the spinner and forward tool output', async () => {
      const spinner = ora({ stream: new PassThrough(), isEnabled: true });
      const out = new PassThrough();
      const chunks: string[] = [];
      out.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
      spinner.start('Syncing');

      try {
        toolOutputHandler(spinner, out)('repo/rpms/virtio-win-0.1.200-1.noarch.rpm\n');

        expect(spinner.isSpinning).toBe(false);
        await new Promise((resolve) => setImmediate(resolve));
        expect(chunks.join('')).toBe('repo/rpms/virtio-win-0.1.200-1.noarch.rpm\n');
      } finally {
        spinner.stop();
      }
    });
  });
});
