/**
 * UpdateSequencer - back up, pull new source, rebuild
 *
 * Fire-and-forget by default: the run succeeds once services start.
 * `verifyAfterUpdate` appends the same verification tail as a deploy.
 */

import type { Outcome } from '@stackwright/shared';
import { BackupService } from './backup.service.js';
import { Sequencer } from './sequencer.js';
import { SourceService } from './source.service.js';
import type { SequencerDeps } from './types.js';

export interface UpdateSequencerDeps extends SequencerDeps {
  backup: BackupService;
  source: SourceService;
}

export class UpdateSequencer extends Sequencer {
  protected readonly kind = 'update';
  private readonly backup: BackupService;
  private readonly source: SourceService;

  constructor(deps: UpdateSequencerDeps) {
    super(deps);
    this.backup = deps.backup;
    this.source = deps.source;
  }

  protected async lifecycle(signal?: AbortSignal): Promise<{ outcome: Outcome; error?: Error }> {
    const { orchestrator, config } = this.deps;

    if (config.backup.skip) {
      this.skipStep('backup_database', 'Skipped (--skip-backup)');
    } else {
      await this.commandStep('backup_database', signal, () => this.backup.backup(this.startedAt, signal), {
        fatal: true,
        failOutcome: 'backup_failed',
      });
    }

    await this.commandStep('update_source', signal, () => this.source.update(signal), {
      fatal: true,
      failOutcome: 'source_update_failed',
      display: true,
    });

    // Nothing running, or a half-started stack: build still decides
    await this.commandStep('stop_existing', signal, () => orchestrator.stop(signal), { fatal: false });

    await this.commandStep('build_images', signal, () => orchestrator.build({ noCache: true }, signal), {
      fatal: true,
      failOutcome: 'build_failed',
    });

    await this.commandStep('start_services', signal, () => orchestrator.start({ detached: true }, signal), {
      fatal: true,
      failOutcome: 'start_failed',
    });

    if (!config.verifyAfterUpdate) {
      return { outcome: 'success' };
    }
    return this.verify(signal);
  }
}
