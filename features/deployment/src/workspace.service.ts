/**
 * WorkspaceService - preflight checks on the project directory
 */

import { access, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Workspace } from './types.js';

export class FsWorkspace implements Workspace {
  readonly envFilePath: string;

  constructor(
    private readonly projectDir: string,
    envFile: string,
    private readonly directories: readonly string[],
  ) {
    this.envFilePath = join(projectDir, envFile);
  }

  async envFileExists(): Promise<boolean> {
    try {
      const info = await stat(this.envFilePath);
      return info.isFile();
    } catch {
      return false;
    }
  }

  async ensureDirectories(): Promise<string[]> {
    const created: string[] = [];

    for (const dir of this.directories) {
      const path = join(this.projectDir, dir);
      try {
        await access(path);
      } catch {
        await mkdir(path, { recursive: true });
        created.push(dir);
      }
    }

    return created;
  }
}
