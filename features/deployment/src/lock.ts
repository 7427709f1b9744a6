/**
 * Advisory run lock
 *
 * A lock file created with O_EXCL holds the owner's pid. A lock whose
 * owner is no longer alive is reclaimed.
 */

import { open, readFile, unlink } from 'node:fs/promises';
import { DeploymentLockedError, errorCode } from '@stackwright/shared';
import type { RunLock } from './types.js';

interface LockRecord {
  pid: number;
  runId: string;
  acquiredAt: string;
}

export interface FileLockOptions {
  runId: string;
  pid?: number;
  isAlive?: (pid: number) => boolean;
  now?: () => Date;
}

export class FileLock implements RunLock {
  private held = false;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly now: () => Date;

  constructor(
    readonly path: string,
    private readonly options: FileLockOptions,
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.now = options.now ?? (() => new Date());
  }

  async acquire(): Promise<void> {
    if (this.held) return;

    if (await this.tryCreate()) {
      this.held = true;
      return;
    }

    const holder = await this.readHolder();
    if (holder && this.isAlive(holder.pid)) {
      throw new DeploymentLockedError(this.path, holder.pid);
    }

    // Stale or unreadable lock
    await unlink(this.path).catch(ignoreMissing);
    if (await this.tryCreate()) {
      this.held = true;
      return;
    }

    const racer = await this.readHolder();
    throw new DeploymentLockedError(this.path, racer?.pid);
  }

  async release(): Promise<void> {
    if (!this.held) return;
    this.held = false;

    const holder = await this.readHolder();
    if (holder && holder.pid === this.pid && holder.runId === this.options.runId) {
      await unlink(this.path).catch(ignoreMissing);
    }
  }

  private async tryCreate(): Promise<boolean> {
    const record: LockRecord = {
      pid: this.pid,
      runId: this.options.runId,
      acquiredAt: this.now().toISOString(),
    };

    try {
      const handle = await open(this.path, 'wx');
      try {
        await handle.writeFile(JSON.stringify(record) + '\n', 'utf-8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') return false;
      throw error;
    }
  }

  private async readHolder(): Promise<LockRecord | null> {
    try {
      const parsed: unknown = JSON.parse(await readFile(this.path, 'utf-8'));
      if (
        parsed &&
        typeof parsed === 'object' &&
        'pid' in parsed &&
        typeof parsed.pid === 'number' &&
        'runId' in parsed &&
        typeof parsed.runId === 'string'
      ) {
        const acquiredAt = 'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string' ? parsed.acquiredAt : '';
        return { pid: parsed.pid, runId: parsed.runId, acquiredAt };
      }
      return null;
    } catch {
      return null;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

function ignoreMissing(error: unknown): void {
  if (errorCode(error) !== 'ENOENT') throw error;
}
