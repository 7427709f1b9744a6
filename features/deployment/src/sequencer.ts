/**
 * Sequencer - shared step machinery for deploy and update
 *
 * Steps run strictly one after another. Each step is recorded with its
 * status and duration, reported to the progress sink, and logged. A
 * fatal step failure ends the run; a non-fatal one is recorded and the
 * run continues. Cancellation is checked before every step.
 */

import { randomBytes } from 'node:crypto';
import {
  CancelledError,
  ConfigurationMissingError,
  ExternalCommandError,
  HealthCheckError,
  toError,
  type CommandResult,
  type DeploymentRun,
  type Outcome,
  type RunKind,
  type StepName,
  type StepRecord,
} from '@stackwright/shared';
import type { ReadinessReport } from '@stackwright/feature-monitoring';
import type { LoggerLike, ProgressReporter, SequencerDeps, VerificationResult } from './types.js';

export const STEP_MESSAGES: Record<StepName, string> = {
  validate: 'Checking configuration...',
  prepare_directories: 'Creating necessary directories...',
  backup_database: 'Creating database backup...',
  update_source: 'Pulling latest changes...',
  stop_existing: 'Stopping existing containers...',
  pull_images: 'Pulling latest images...',
  build_images: 'Building images...',
  start_services: 'Starting services...',
  await_readiness: 'Waiting for services to be ready...',
  check_status: 'Checking service status...',
  collect_logs: 'Showing recent logs...',
  health_probe: 'Performing health check...',
  collect_service_logs: 'Collecting service logs...',
};

interface StepOutcome {
  ok: boolean;
  output?: string;
  /** Command output to show the operator. */
  display?: string;
  error?: Error;
}

export interface StepResult {
  record: StepRecord;
  error?: Error;
}

const silentLogger: LoggerLike = {
  info: () => undefined,
  error: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
  step: () => undefined,
};

/** Thrown inside a run to end it early with a given outcome. */
class RunHalt {
  constructor(
    readonly outcome: Outcome,
    readonly error: Error,
  ) {}
}

export abstract class Sequencer {
  protected abstract readonly kind: RunKind;

  protected readonly logger: LoggerLike;
  protected readonly reporter?: ProgressReporter;
  protected readonly now: () => Date;
  readonly runId: string;

  private steps: StepRecord[] = [];
  protected startedAt = new Date(0);

  constructor(protected readonly deps: SequencerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.reporter = deps.reporter;
    this.now = deps.now ?? (() => new Date());
    this.runId = deps.runId ?? randomBytes(8).toString('hex');
  }

  /** Run the whole lifecycle. Step failures never reject; they set the outcome. */
  async run(signal?: AbortSignal): Promise<DeploymentRun> {
    this.steps = [];
    this.startedAt = this.now();
    this.logger.info(`${this.kind} started`);

    try {
      await this.preflight(signal);
      await this.acquireLock();
      try {
        const result = await this.lifecycle(signal);
        return this.finish(result.outcome, result.error);
      } finally {
        await this.deps.lock.release();
      }
    } catch (error) {
      if (error instanceof RunHalt) {
        return this.finish(error.outcome, error.error);
      }
      if (error instanceof CancelledError) {
        return this.finish('cancelled', error);
      }
      throw error;
    }
  }

  /** Steps after preflight and lock acquisition. */
  protected abstract lifecycle(signal?: AbortSignal): Promise<{ outcome: Outcome; error?: Error }>;

  // ===========================================================================
  // Preflight
  // ===========================================================================

  private async preflight(signal?: AbortSignal): Promise<void> {
    const { workspace } = this.deps;

    const validate = await this.step('validate', signal, async () => {
      if (await workspace.envFileExists()) {
        return { ok: true, output: `Found ${workspace.envFilePath}` };
      }
      return { ok: false, error: new ConfigurationMissingError(workspace.envFilePath) };
    }, { fatal: true });
    this.haltOnFailure(validate, 'configuration_missing');

    await this.step('prepare_directories', signal, async () => {
      const created = await workspace.ensureDirectories();
      return {
        ok: true,
        output: created.length > 0 ? `Created ${created.join(', ')}` : 'Directories already present',
      };
    }, { fatal: false });
  }

  private async acquireLock(): Promise<void> {
    try {
      await this.deps.lock.acquire();
    } catch (error) {
      const lockError = toError(error);
      this.logger.error('Could not acquire deployment lock', { lock: this.deps.lock.path, error: lockError.message });
      throw new RunHalt('locked', lockError);
    }
  }

  // ===========================================================================
  // Verification tail (readiness → status → logs → probe → remediation)
  // ===========================================================================

  protected async verify(signal?: AbortSignal): Promise<VerificationResult> {
    const { orchestrator, readiness, probe, config } = this.deps;

    await this.step('await_readiness', signal, async () => {
      const report = await readiness.wait(signal);
      return { ok: true, output: describeReadiness(report) };
    }, { fatal: false });

    await this.commandStep('check_status', signal, () => orchestrator.status(signal), { fatal: false, display: true });

    await this.commandStep('collect_logs', signal, () => orchestrator.logs({ tail: config.logTail }, signal), {
      fatal: false,
      display: true,
    });

    const health = await this.step('health_probe', signal, async () => {
      const result = await probe.probe(signal);
      if (result.healthy) {
        return { ok: true, output: `${result.url} answered HTTP ${result.statusCode ?? 200}` };
      }
      return { ok: false, error: new HealthCheckError(result.url, result.error ?? 'unhealthy') };
    }, { fatal: false });

    if (!health.error) {
      return { outcome: 'success' };
    }

    await this.commandStep(
      'collect_service_logs',
      signal,
      () => orchestrator.logs({ service: config.primaryService }, signal),
      { fatal: false, display: true },
    );

    return { outcome: 'health_check_failed', error: health.error };
  }

  // ===========================================================================
  // Step helpers
  // ===========================================================================

  /**
   * Run an orchestrator call as a step. A non-zero exit becomes an
   * ExternalCommandError; when `fatal`, it ends the run with `failOutcome`.
   */
  protected async commandStep(
    name: StepName,
    signal: AbortSignal | undefined,
    call: () => Promise<CommandResult>,
    options: { fatal: boolean; display?: boolean; failOutcome?: Outcome },
  ): Promise<StepResult> {
    const result = await this.step(name, signal, async () => {
      const outcome = await call();
      const display = options.display ? joinOutput(outcome) : undefined;
      if (outcome.code !== 0) {
        return { ok: false, display, error: new ExternalCommandError(outcome) };
      }
      return { ok: true, display, output: `${outcome.command} (${outcome.duration}ms)` };
    }, { fatal: options.fatal });

    if (options.fatal && options.failOutcome) {
      this.haltOnFailure(result, options.failOutcome);
    }
    return result;
  }

  protected skipStep(name: StepName, reason: string): void {
    const record: StepRecord = {
      name,
      status: 'skipped',
      startedAt: this.now().toISOString(),
      duration: 0,
      output: reason,
    };
    this.steps.push(record);
    this.logger.step(name, { status: 'skipped', duration: 0 });
    this.reporter?.stepSucceeded(record);
  }

  protected async step(
    name: StepName,
    signal: AbortSignal | undefined,
    action: () => Promise<StepOutcome>,
    options: { fatal: boolean },
  ): Promise<StepResult> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const started = this.now();
    this.reporter?.stepStarted(name, STEP_MESSAGES[name]);

    let outcome: StepOutcome;
    try {
      outcome = await action();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      outcome = { ok: false, error: toError(error) };
    }

    const record: StepRecord = {
      name,
      status: outcome.ok ? 'success' : 'failed',
      startedAt: started.toISOString(),
      duration: this.now().getTime() - started.getTime(),
      output: outcome.output,
      error: outcome.ok ? undefined : outcome.error?.message,
    };
    this.steps.push(record);

    this.logger.step(name, {
      status: record.status,
      duration: record.duration,
      error: record.error,
      fatal: outcome.ok ? undefined : options.fatal,
    });
    if (outcome.ok) {
      this.reporter?.stepSucceeded(record);
    } else {
      this.reporter?.stepFailed(record, options.fatal);
    }

    if (outcome.display) {
      this.reporter?.output(name, outcome.display);
    }

    return { record, error: outcome.ok ? undefined : outcome.error ?? new Error(`${name} failed`) };
  }

  private haltOnFailure(result: StepResult, outcome: Outcome): void {
    if (result.error) {
      throw new RunHalt(outcome, result.error);
    }
  }

  private finish(outcome: Outcome, error?: Error): DeploymentRun {
    const finishedAt = this.now();
    const run: DeploymentRun = {
      id: this.runId,
      kind: this.kind,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      duration: finishedAt.getTime() - this.startedAt.getTime(),
      steps: [...this.steps],
      outcome,
      error,
    };

    const level = outcome === 'success' ? 'info' : 'error';
    this.logger[level](`${this.kind} finished`, {
      outcome,
      duration: run.duration,
      error: error?.message,
    });
    this.reporter?.finished(run);
    return run;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function joinOutput(result: CommandResult): string {
  return [result.stdout, result.stderr]
    .map((text) => text.trimEnd())
    .filter(Boolean)
    .join('\n');
}

function describeReadiness(report: ReadinessReport): string {
  if (report.mode === 'fixed') {
    return `Waited ${Math.round(report.waitedMs / 1000)}s`;
  }
  const seconds = (report.waitedMs / 1000).toFixed(1);
  return report.ready
    ? `Ready after ${report.attempts} probe(s) in ${seconds}s`
    : `Not ready after ${report.attempts} probe(s) in ${seconds}s, continuing to health check`;
}
