#!/usr/bin/env node
/**
 * mirror-publish CLI
 *
 * Usage: mirror-publish [publish] [options]
 *        mirror-publish stable
 *
 * Requires FAS_USERNAME in the environment (or a .env file).
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerPublishCommand } from './commands/publish.js';
import { registerStableCommand } from './commands/stable.js';
import { getRegisteredComponents } from '../logging/index.js';
import { errorMessage } from '../publish/errors.js';

const VERSION = '0.1.0';

/**
 * Component names accepted by PUBLISH_DEBUG_COMPONENTS.
 */
export function formatLogComponents(): string {
  const components = getRegisteredComponents();
  const width = Math.max(0, ...components.map((c) => c.name.length));
  const lines = components.map((c) => `  ${c.name.padEnd(width)}  ${c.description}`);
  return `\n${chalk.bold('Log components')} (PUBLISH_DEBUG_COMPONENTS=name[:LEVEL],...):\n${lines.join('\n')}\n`;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mirror-publish')
    .description('Publish virtio-win builds to the mirror tree and sync it to the public host')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerPublishCommand(program);
  registerStableCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Publish a new build')}
  $ mirror-publish --rpm-output ~/rpmbuild/RPMS --rpm-buildroot ~/rpmbuild/BUILDROOT --build-input ./new-builds

  ${chalk.gray('# Regenerate repo data and push')}
  $ mirror-publish --regenerate-only

  ${chalk.gray('# Reset the local mirror from the remote')}
  $ mirror-publish --resync
`
  );
  program.addHelpText('after', () => formatLogComponents());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), errorMessage(error));
    process.exit(1);
  });
}
