/**
 * DeploySequencer - full redeploy of the service stack
 *
 * validate → prepare_directories → lock → stop → pull → build → start →
 * readiness → status → logs → health probe. An unhealthy probe dumps the
 * primary service's logs and leaves the stack running.
 */

import type { Outcome } from '@stackwright/shared';
import { Sequencer } from './sequencer.js';

export class DeploySequencer extends Sequencer {
  protected readonly kind = 'deploy';

  protected async lifecycle(signal?: AbortSignal): Promise<{ outcome: Outcome; error?: Error }> {
    const { orchestrator } = this.deps;

    // Nothing running, or a half-started stack: build still decides
    await this.commandStep('stop_existing', signal, () => orchestrator.stop(signal), { fatal: false });

    // Stale images are still buildable from local layers
    await this.commandStep('pull_images', signal, () => orchestrator.pull(signal), { fatal: false });

    await this.commandStep('build_images', signal, () => orchestrator.build({ noCache: true }, signal), {
      fatal: true,
      failOutcome: 'build_failed',
    });

    await this.commandStep('start_services', signal, () => orchestrator.start({ detached: true }, signal), {
      fatal: true,
      failOutcome: 'start_failed',
    });

    return this.verify(signal);
  }
}
