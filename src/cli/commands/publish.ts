/**
 * Publish Command
 *
 * Populate the local mirror from a finished build, regenerate repo data and
 * rsync the result, or pull the remote mirror back with --resync.
 */

import { Command } from 'commander';
import ora from 'ora';
import { loadPublishConfig } from '../../config/PublishConfig.js';
import { DEFAULT_STABLE_LIST_PATH, loadStableList } from '../../config/StableList.js';
import {
  UsageError,
  autoApproveGate,
  createExecRunner,
  errorMessage,
  isPublishError,
  resolveMode,
  runPublish,
} from '../../publish/index.js';
import type { BuildInputs, ConfirmationGate, PublishMode, SyncPlanSummary } from '../../publish/index.js';
import { OutputFormatter, formatPublishSummary, formatSyncPlan } from '../lib/OutputFormatter.js';
import { PromptGate } from '../lib/PromptGate.js';
import { shutdownLogging } from '../../logging/index.js';

export interface PublishOptions {
  rpmOutput?: string;
  rpmBuildroot?: string;
  buildInput?: string;
  regenerateOnly?: boolean;
  resync?: boolean;
  yes?: boolean;
  stableList: string;
  json?: boolean;
}

/**
 * Validate flags before anything touches the filesystem or the network.
 */
export function resolveBuildInputs(mode: PublishMode, options: PublishOptions): BuildInputs | undefined {
  if (mode !== 'populate') return undefined;
  const { rpmOutput, rpmBuildroot, buildInput } = options;
  if (!rpmOutput || !rpmBuildroot || !buildInput) {
    throw new UsageError(
      '--rpm-output, --rpm-buildroot and --build-input must all be specified, ' +
        'or pass --regenerate-only to regen just the repo.'
    );
  }
  return { rpmOutput, rpmBuildroot, buildInput };
}

export interface GateStreams {
  input?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

/**
 * Prompt unless --yes. Under --json the question goes to stderr so stdout
 * carries only JSON documents.
 */
export function createGate(
  options: Pick<PublishOptions, 'yes' | 'json'>,
  render: (plan: SyncPlanSummary) => void,
  streams: GateStreams = {}
): ConfirmationGate {
  const prompt = new PromptGate({
    input: streams.input,
    output: options.json ? (streams.stderr ?? process.stderr) : (streams.stdout ?? process.stdout),
    render,
  });
  return {
    decide: async (plan) => {
      if (!options.yes) return prompt.decide(plan);
      render(plan);
      return autoApproveGate.decide(plan);
    },
  };
}

/**
 * Forward rsync and createrepo_c output as it arrives, pausing the spinner so
 * the two do not interleave.
 */
export function toolOutputHandler(
  spinner: ReturnType<typeof ora>,
  out: NodeJS.WritableStream
): (chunk: string) => void {
  return (chunk) => {
    if (spinner.isSpinning) spinner.stop();
    out.write(chunk);
  };
}

async function publishAction(options: PublishOptions): Promise<void> {
  const formatter = new OutputFormatter(options.json);
  const spinner = ora();

  try {
    const mode = resolveMode(options);
    const build = resolveBuildInputs(mode, options);
    const config = await loadPublishConfig(process.env);
    const stableList = await loadStableList(options.stableList);

    const render = (plan: SyncPlanSummary): void => {
      spinner.stop();
      formatter.output(formatSyncPlan(plan), plan);
    };
    const gate = createGate(options, render);

    const result = await runPublish(
      { mode, build },
      {
        config,
        stableList,
        runner: createExecRunner(options.json ? {} : { onStdout: toolOutputHandler(spinner, process.stderr) }),
        gate,
        onStep: (step) => {
          if (!options.json) spinner.start(step);
        },
      }
    );
    spinner.stop();

    if (result.sync.status === 'aborted') {
      formatter.warn('Aborted at the review step; nothing was synced.');
      process.exitCode = 1;
      return;
    }
    formatter.output(formatPublishSummary(result), result);
    formatter.success(mode === 'resync' ? 'Local mirror resynced' : 'Mirror published');
  } catch (error) {
    spinner.stop();
    const details = isPublishError(error) ? undefined : error instanceof Error ? error.stack : undefined;
    formatter.error(errorMessage(error), details);
    process.exitCode = 1;
  } finally {
    await shutdownLogging();
  }
}

export function registerPublishCommand(program: Command): void {
  program
    .command('publish', { isDefault: true })
    .description('Populate the local mirror from a build, regenerate repo data, and rsync it')
    .option('--rpm-output <dir>', 'Directory containing built virtio-win* RPMs')
    .option('--rpm-buildroot <dir>', 'Directory containing RPM buildroot content')
    .option('--build-input <dir>', 'Build input directory to archive beside the release')
    .option('--regenerate-only', 'Only regenerate and push the repo contents')
    .option('--resync', 'rsync the remote contents back to the local machine, to reset the local mirror')
    .option('-y, --yes', 'Apply the sync without asking (the dry run is still shown)')
    .option('--stable-list <file>', 'Stable release list', DEFAULT_STABLE_LIST_PATH)
    .option('--json', 'Output as JSON')
    .action(publishAction);
}
