/**
 * BackupService - database dump before an update
 *
 * Runs the data store's native dump inside its container, writing to a
 * timestamped directory under the backup volume.
 */

import type { CommandResult } from '@stackwright/shared';
import type { Orchestrator } from './types.js';

export interface BackupOptions {
  service: string;
  dir: string;
}

export class BackupService {
  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly options: BackupOptions,
  ) {}

  destinationFor(at: Date): string {
    return `${this.options.dir.replace(/\/+$/, '')}/${formatBackupTimestamp(at)}`;
  }

  backup(at: Date, signal?: AbortSignal): Promise<CommandResult> {
    return this.orchestrator.exec(
      this.options.service,
      ['mongodump', '--out', this.destinationFor(at)],
      signal,
    );
  }
}

/** YYYYMMDD_HHMMSS in local time. */
export function formatBackupTimestamp(at: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
    `_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  );
}
