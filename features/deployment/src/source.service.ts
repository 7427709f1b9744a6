/**
 * SourceService - fetch the latest revision of the deployable source
 */

import type { CommandResult, CommandRunner } from '@stackwright/shared';

export interface SourceOptions {
  projectDir: string;
  remote: string;
  branch: string;
  timeoutMs: number;
}

export class SourceService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: SourceOptions,
  ) {}

  update(signal?: AbortSignal): Promise<CommandResult> {
    return this.runner.run('git', ['pull', this.options.remote, this.options.branch], {
      cwd: this.options.projectDir,
      timeout: this.options.timeoutMs,
      signal,
    });
  }
}
