import { describe, it, expect, jest } from '@jest/globals';
import { PassThrough } from 'stream';
import { PromptGate, askYesNo, parseYesNo } from '../../../../src/cli/lib/PromptGate.js';
import type { SyncPlanSummary } from '../../../../src/publish/index.js';

const plan: SyncPlanSummary = {
  direction: 'push',
  source: '/home/tester/mirror/',
  destination: 'tester@mirror.example.org:/srv/mirror',
  phases: [{ phase: 'content', changes: ['repo/rpms/virtio-win-0.1.200-1.noarch.rpm'] }],
};

function capture(stream: PassThrough): () => Promise<string> {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return async () => {
    await new Promise((resolve) => setImmediate(resolve));
    return chunks.join('');
  };
}

describe('parseYesNo', () => {
  it('should accept short and long answers in any case', () => {
    expect(parseYesNo('y')).toBe(true);
    expect(parseYesNo(' YES ')).toBe(true);
    expect(parseYesNo('n')).toBe(false);
    expect(parseYesNo('No')).toBe(false);
  });

  it('should reject anything else', () => {
    expect(parseYesNo('')).toBeNull();
    expect(parseYesNo('yep')).toBeNull();
  });
});

describe('askYesNo', () => {
  it('should ask again until it gets a valid answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = capture(output);

    const answer = askYesNo('Continue? ', input, output);
    input.end('maybe\ny\n');

    await expect(answer).resolves.toBe(true);
    expect(await written()).toBe('Continue? Continue? ');
  });

  it('should treat end of input as no', async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = askYesNo('Continue? ', input, output);
    input.end();

    await expect(answer).resolves.toBe(false);
  });
});

describe('PromptGate', () => {
  it('should render the plan before asking', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = capture(output);
    const render = jest.fn<(p: SyncPlanSummary) => void>();

    const decision = new PromptGate({ input, output, render }).decide(plan);
    input.end('y\n');

    await expect(decision).resolves.toBe('proceed');
    expect(render).toHaveBeenCalledWith(plan);
    expect(await written()).toBe('Review the --dry-run changes. Do you want to push? (y/n): ');
  });

  it('should ask about pulling on a resync and abort on no', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = capture(output);

    const decision = new PromptGate({ input, output, render: () => undefined }).decide({
      ...plan,
      direction: 'pull',
    });
    input.end('n\n');

    await expect(decision).resolves.toBe('abort');
    expect(await written()).toBe('Review the --dry-run changes. Do you want to pull? (y/n): ');
  });
});
