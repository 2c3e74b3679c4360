/**
 * Runs external tools (rsync, createrepo_c).
 *
 * Uses child_process.execFile so arguments are never passed through a shell.
 * A non-zero exit becomes an ExternalToolError carrying the tool's stderr.
 */

import { execFile } from 'child_process';
import { ExternalToolError } from './errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export interface ExecRunnerOptions {
  cwd?: string;
  /** Stream output for long-running commands instead of buffering silently */
  onStdout?: (chunk: string) => void;
}

export function createExecRunner(options: ExecRunnerOptions = {}): CommandRunner {
  return (command, args) =>
    new Promise<CommandResult>((resolve, reject) => {
      const child = execFile(
        command,
        [...args],
        {
          cwd: options.cwd,
          encoding: 'utf-8',
          maxBuffer: 64 * 1024 * 1024, // rsync --verbose over a full mirror is large
        },
        (error, stdout, stderr) => {
          if (error) {
            const exitCode = typeof error.code === 'number' ? error.code : null;
            reject(new ExternalToolError(command, args, exitCode, stderr || error.message));
            return;
          }
          resolve({ stdout, stderr });
        }
      );
      const onStdout = options.onStdout;
      if (onStdout) {
        child.stdout?.on('data', (chunk: string | Buffer) => onStdout(chunk.toString()));
      }
    });
}
