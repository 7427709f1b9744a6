/**
 * @stackwright/shared - Command Execution Types
 */

export interface CommandResult {
  command: string;
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export interface ExecOptions {
  cwd?: string;
  timeout?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

export interface CommandRunner {
  run(file: string, args: string[], options?: ExecOptions): Promise<CommandResult>;
}
