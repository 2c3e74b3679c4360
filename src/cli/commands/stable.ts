/**
 * Stable Command
 *
 * Show the curated stable release list and what the stable alias points at.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_STABLE_LIST_PATH, loadStableList } from '../../config/StableList.js';
import { stablePackageFile } from '../../config/layout.js';
import { errorMessage } from '../../publish/index.js';
import { OutputFormatter, createTable } from '../lib/OutputFormatter.js';

interface StableOptions {
  file: string;
  json?: boolean;
}

export function registerStableCommand(program: Command): void {
  program
    .command('stable')
    .description('List the stable releases, newest first')
    .option('--file <file>', 'Stable release list', DEFAULT_STABLE_LIST_PATH)
    .option('--json', 'Output as JSON')
    .action(async (options: StableOptions) => {
      const formatter = new OutputFormatter(options.json);
      try {
        const list = await loadStableList(options.file);
        const rows = list.entries.map((entry, i) => [
          i === 0 ? chalk.green(entry.release) : entry.release,
          stablePackageFile(entry.release),
          entry.note ?? '',
        ]);
        formatter.output(
          createTable(rows, [
            { header: 'Release', width: 10 },
            { header: 'Package', width: 20 },
            { header: 'Note', width: 4 },
          ]),
          list
        );
      } catch (error) {
        formatter.error(errorMessage(error));
        process.exitCode = 1;
      }
    });
}
