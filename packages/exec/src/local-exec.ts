/**
 * @stackwright/exec - Local Execution
 *
 * Runs external tools (compose, git) as child processes on this host.
 * Non-zero exits resolve with their code; only cancellation rejects.
 */

import { spawn } from 'node:child_process';
import { CancelledError, type CommandResult, type CommandRunner, type ExecOptions } from '@stackwright/shared';

/** Exit code reported when a command exceeds its timeout. */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when the executable cannot be started. */
export const SPAWN_FAILED_EXIT_CODE = 127;

export type OutputListener = (chunk: string, stream: 'stdout' | 'stderr') => void;

export interface LocalExecOptions extends ExecOptions {
  onOutput?: OutputListener;
}

// ============================================================================
// Local Execution Client
// ============================================================================

export class LocalExec implements CommandRunner {
  constructor(private readonly defaults: { timeout?: number; onOutput?: OutputListener } = {}) {}

  async run(file: string, args: string[], options: LocalExecOptions = {}): Promise<CommandResult> {
    const { cwd, env, signal } = options;
    const timeout = options.timeout ?? this.defaults.timeout ?? 60_000;
    const onOutput = options.onOutput ?? this.defaults.onOutput;
    const command = formatCommand(file, args);
    const startTime = Date.now();

    if (signal?.aborted) {
      throw new CancelledError(`Cancelled before running: ${command}`);
    }

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timedOut = false;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const child = spawn(file, args, {
        cwd,
        env: { ...process.env, ...env },
        signal,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const finish = (code: number) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve({ command, stdout, stderr, code, duration: Date.now() - startTime });
      };

      if (timeout > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}Command timed out after ${timeout}ms`;
          child.kill('SIGTERM');
        }, timeout);
      }

      child.stdout.on('data', (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        onOutput?.(text, 'stdout');
      });

      child.stderr.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        onOutput?.(text, 'stderr');
      });

      child.on('error', (error: Error) => {
        if (error.name === 'AbortError') {
          if (settled) return;
          settled = true;
          clearTimeout(timeoutId);
          reject(new CancelledError(`Cancelled while running: ${command}`));
          return;
        }
        stderr += error.message;
        finish(SPAWN_FAILED_EXIT_CODE);
      });

      child.on('close', (code: number | null) => {
        if (timedOut) {
          finish(TIMEOUT_EXIT_CODE);
          return;
        }
        finish(code ?? 1);
      });
    });
  }
}

/** Render argv the way an operator would type it. */
export function formatCommand(file: string, args: string[]): string {
  return [file, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
