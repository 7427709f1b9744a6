/**
 * ComposeService - docker compose as the stack orchestrator
 *
 * Each operation maps to one compose invocation run in the project
 * directory. Results are returned as-is; callers decide which exit
 * codes are fatal.
 */

import { ValidationError, type CommandResult, type CommandRunner } from '@stackwright/shared';
import type { Orchestrator } from './types.js';

export interface ComposeOptions {
  /** `docker-compose` or `docker compose`. */
  command: string;
  projectDir: string;
  timeoutMs: number;
}

export class ComposeOrchestrator implements Orchestrator {
  private readonly file: string;
  private readonly prefix: string[];

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ComposeOptions,
  ) {
    const [file, ...prefix] = options.command.trim().split(/\s+/);
    if (!file) {
      throw new ValidationError('Compose command must not be empty', { command: options.command });
    }
    this.file = file;
    this.prefix = prefix;
  }

  stop(signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(['down'], signal);
  }

  pull(signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(['pull'], signal);
  }

  build(options: { noCache: boolean }, signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(options.noCache ? ['build', '--no-cache'] : ['build'], signal);
  }

  start(options: { detached: boolean }, signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(options.detached ? ['up', '-d'] : ['up'], signal);
  }

  status(signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(['ps'], signal);
  }

  logs(options: { tail?: number; service?: string }, signal?: AbortSignal): Promise<CommandResult> {
    const args = ['logs'];
    if (options.tail !== undefined) args.push(`--tail=${options.tail}`);
    if (options.service) args.push(options.service);
    return this.compose(args, signal);
  }

  exec(service: string, argv: string[], signal?: AbortSignal): Promise<CommandResult> {
    return this.compose(['exec', '-T', service, ...argv], signal);
  }

  private compose(args: string[], signal?: AbortSignal): Promise<CommandResult> {
    return this.runner.run(this.file, [...this.prefix, ...args], {
      cwd: this.options.projectDir,
      timeout: this.options.timeoutMs,
      signal,
    });
  }
}
