/**
 * Interactive confirmation gate: shows the dry-run listing and asks the
 * operator whether to apply it.
 */

import * as readline from 'readline';
import type { ConfirmationGate, GateDecision, SyncPlanSummary } from '../../publish/index.js';

export interface PromptGateOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Renders the plan before the question is asked */
  render: (plan: SyncPlanSummary) => void;
}

export function parseYesNo(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'y' || normalized === 'yes') return true;
  if (normalized === 'n' || normalized === 'no') return false;
  return null;
}

/**
 * Ask until the answer is yes or no. End of input counts as no.
 */
export function askYesNo(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output, terminal: false });
    let answered = false;

    const ask = (): void => {
      rl.question(question, (answer) => {
        const parsed = parseYesNo(answer);
        if (parsed === null) {
          ask();
          return;
        }
        answered = true;
        rl.close();
        resolve(parsed);
      });
    };

    rl.on('close', () => {
      if (!answered) resolve(false);
    });
    ask();
  });
}

export class PromptGate implements ConfirmationGate {
  constructor(private readonly options: PromptGateOptions) {}

  async decide(plan: SyncPlanSummary): Promise<GateDecision> {
    this.options.render(plan);
    const verb = plan.direction === 'push' ? 'push' : 'pull';
    const yes = await askYesNo(
      `Review the --dry-run changes. Do you want to ${verb}? (y/n): `,
      this.options.input,
      this.options.output
    );
    return yes ? 'proceed' : 'abort';
  }
}
