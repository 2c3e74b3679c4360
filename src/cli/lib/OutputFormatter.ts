/**
 * Output Formatter
 *
 * Operator-facing output for the publish CLI: status lines, the dry-run review
 * listing and the end-of-run summary. Supports plain and JSON output.
 */

import chalk from 'chalk';
import type { PublishResult, SyncPlanSummary } from '../../publish/index.js';

// =============================================================================
// Helpers
// =============================================================================

export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str;
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

/**
 * Simple borderless table: header, dashed separator, rows.
 */
export function createTable(data: string[][], columns: TableColumn[]): string {
  const widths = columns.map((col, i) => {
    const maxDataWidth = Math.max(0, ...data.map((row) => (row[i] ?? '').length));
    return Math.max(col.width, col.header.length, maxDataWidth);
  });

  const lines: string[] = [];
  lines.push(columns.map((col, i) => pad(col.header, widths[i] ?? 0, col.align)).join('  ').trimEnd());
  lines.push(widths.map((w) => '-'.repeat(w)).join('  '));
  for (const row of data) {
    lines.push(columns.map((col, i) => pad(row[i] ?? '', widths[i] ?? 0, col.align)).join('  ').trimEnd());
  }
  return lines.join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Publish formatters
// =============================================================================

/**
 * Dry-run listing shown before the confirmation prompt.
 */
export function formatSyncPlan(plan: SyncPlanSummary): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Planned ${plan.direction}: ${plan.source} -> ${plan.destination}`));
  for (const phase of plan.phases) {
    lines.push('');
    lines.push(chalk.cyan(`[${phase.phase}] ${phase.changes.length} line(s)`));
    for (const change of phase.changes) {
      lines.push(`  ${change}`);
    }
  }
  return lines.join('\n');
}

export function formatPublishSummary(result: PublishResult): string {
  const rows: string[][] = [['Mode', result.mode]];
  if (result.release) {
    rows.push(['Release', result.release.releaseTag]);
    rows.push(['Version', result.release.distributionVersion]);
    rows.push(['Guest agent', result.release.companionReleaseTag]);
  }
  if (result.repoData) {
    rows.push(['Latest packages', String(result.repoData.latestLinks)]);
    rows.push(['Stable packages', String(result.repoData.stableLinks)]);
    rows.push(['Links changed', String(result.repoData.changedLinks)]);
  }
  rows.push(['Sync', result.sync.status]);
  return createTable(rows, [
    { header: 'Item', width: 16 },
    { header: 'Value', width: 10 },
  ]);
}

// =============================================================================
// Output Formatter
// =============================================================================

export class OutputFormatter {
  constructor(private readonly jsonMode: boolean = false) {}

  output(text: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(text);
    }
  }

  success(message: string): void {
    if (this.jsonMode) return;
    console.log(chalk.green('✔') + ' ' + message);
  }

  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(typeof details === 'string' ? details : formatJson(details)));
      }
    }
  }

  warn(message: string): void {
    if (this.jsonMode) return;
    console.error(chalk.yellow('⚠') + ' ' + message);
  }

  info(message: string): void {
    if (this.jsonMode) return;
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}
