/**
 * SyncEngine: two-phase mirror synchronization over rsync.
 *
 *   1. content:  everything except metadata directories
 *   2. metadata: only metadata directories, deleting stale remote entries
 *
 * Content always lands first so a client fetching mid-sync never sees index
 * entries for packages that are not there yet. Both phases run as a dry run
 * first; the real run only happens if the confirmation gate says so.
 *
 * Pushing rewrites ownership and permissions (group-writable directories,
 * non-executable files). Pulling, used to rebuild the local mirror from the
 * remote, leaves them alone.
 */

import type { PublishConfig } from '../config/PublishConfig.js';
import { remoteAddress } from '../config/PublishConfig.js';
import { METADATA_DIR } from '../config/layout.js';
import type { CommandRunner } from './CommandRunner.js';
import { globToRegExp } from './discovery.js';
import type { Logger } from '../logging/index.js';

export type SyncDirection = 'push' | 'pull';
export type SyncPhaseName = 'content' | 'metadata';

export interface FilterRule {
  type: 'include' | 'exclude';
  pattern: string;
}

/**
 * Metadata phase selection: every directory (so rsync can descend), files directly
 * inside a metadata directory, nothing else.
 */
export const METADATA_FILTER: readonly FilterRule[] = [
  { type: 'include', pattern: '*/' },
  { type: 'include', pattern: `${METADATA_DIR}/*` },
  { type: 'exclude', pattern: '*' },
];

export const CONTENT_FILTER: readonly FilterRule[] = [{ type: 'exclude', pattern: METADATA_DIR }];

const BASE_ARGS = ['--archive', '--verbose', '--compress', '--progress'];
const PUSH_CHMOD = 'D775,F664';

export interface SyncPhasePlan {
  phase: SyncPhaseName;
  command: string;
  args: string[];
}

export interface SyncPhaseResult {
  phase: SyncPhaseName;
  dryRun: boolean;
  output: string;
}

export interface SyncPlanSummary {
  direction: SyncDirection;
  source: string;
  destination: string;
  phases: Array<{ phase: SyncPhaseName; changes: string[] }>;
}

export type GateDecision = 'proceed' | 'abort';

/**
 * Decides whether the planned changes get applied. Where the decision comes
 * from (a prompt, a flag, a policy) is up to the implementation.
 */
export interface ConfirmationGate {
  decide(summary: SyncPlanSummary): Promise<GateDecision>;
}

export const autoApproveGate: ConfirmationGate = {
  decide: async () => 'proceed',
};

export type SyncOutcome =
  | { status: 'aborted'; plan: SyncPlanSummary }
  | { status: 'applied'; plan: SyncPlanSummary; results: SyncPhaseResult[] };

function ruleMatches(rule: FilterRule, relPath: string, isDirectory: boolean): boolean {
  let pattern = rule.pattern;
  if (pattern.endsWith('/')) {
    if (!isDirectory) return false;
    pattern = pattern.slice(0, -1);
  }

  const anchored = pattern.startsWith('/');
  if (anchored) pattern = pattern.slice(1);
  const re = globToRegExp(pattern);
  const segments = relPath.split('/').filter(Boolean);

  if (anchored) {
    return re.test(segments.join('/'));
  }
  // Unanchored patterns match the trailing path components
  const depth = pattern.split('/').length;
  if (segments.length < depth) return false;
  return re.test(segments.slice(-depth).join('/'));
}

/**
 * rsync include/exclude evaluation: the first matching rule wins, unmatched paths
 * are included.
 */
export function evaluateFilter(rules: readonly FilterRule[], relPath: string, isDirectory: boolean): boolean {
  for (const rule of rules) {
    if (ruleMatches(rule, relPath, isDirectory)) {
      return rule.type === 'include';
    }
  }
  return true;
}

export function metadataFilterMatches(relPath: string, isDirectory: boolean): boolean {
  return evaluateFilter(METADATA_FILTER, relPath, isDirectory);
}

export function filterArgs(rules: readonly FilterRule[]): string[] {
  return rules.flatMap((rule) => [`--${rule.type}`, rule.pattern]);
}

/**
 * Drop the per-file metadata noise from dry-run output so the operator reviews
 * package and image changes.
 */
export function summarizeOutput(output: string): string[] {
  const noise = new RegExp(`${METADATA_DIR}/.+`);
  return output.split('\n').filter((line) => line.trim() !== '' && !noise.test(line));
}

export class SyncEngine {
  constructor(
    private readonly config: PublishConfig,
    private readonly run: CommandRunner,
    private readonly logger: Logger,
    private readonly command = 'rsync'
  ) {}

  endpoints(direction: SyncDirection): { source: string; destination: string } {
    const local = this.config.localRoot;
    const remote = remoteAddress(this.config);
    return direction === 'push'
      ? { source: `${local}/`, destination: remote }
      : { source: `${remote}/`, destination: local };
  }

  planPhases(direction: SyncDirection, dryRun: boolean): SyncPhasePlan[] {
    const { source, destination } = this.endpoints(direction);
    const common = [...BASE_ARGS];
    if (direction === 'push') {
      common.push(`--chown=${this.config.account}:${this.config.remoteGroup}`, `--chmod=${PUSH_CHMOD}`);
    }
    if (dryRun) {
      common.push('--dry-run');
    }

    return [
      {
        phase: 'content',
        command: this.command,
        args: [...common, ...filterArgs(CONTENT_FILTER), source, destination],
      },
      {
        phase: 'metadata',
        command: this.command,
        args: [...common, ...filterArgs(METADATA_FILTER), '--delete', source, destination],
      },
    ];
  }

  /**
   * Run both phases in order. A failing phase throws and the next never starts.
   */
  async runPhases(direction: SyncDirection, dryRun: boolean): Promise<SyncPhaseResult[]> {
    const results: SyncPhaseResult[] = [];
    for (const plan of this.planPhases(direction, dryRun)) {
      this.logger.info(`${dryRun ? 'Dry run' : 'Running'}: ${plan.phase} phase (${direction})`);
      this.logger.debug(`${plan.command} ${plan.args.join(' ')}`);
      const { stdout } = await this.run(plan.command, plan.args);
      results.push({ phase: plan.phase, dryRun, output: stdout });
    }
    return results;
  }

  async publish(direction: SyncDirection, gate: ConfirmationGate): Promise<SyncOutcome> {
    const dry = await this.runPhases(direction, true);
    const plan: SyncPlanSummary = {
      direction,
      ...this.endpoints(direction),
      phases: dry.map((r) => ({ phase: r.phase, changes: summarizeOutput(r.output) })),
    };

    const decision = await gate.decide(plan);
    if (decision === 'abort') {
      this.logger.warn('Sync declined, nothing was changed');
      return { status: 'aborted', plan };
    }

    const results = await this.runPhases(direction, false);
    this.logger.info(`Sync ${direction} complete`);
    return { status: 'applied', plan, results };
  }
}
