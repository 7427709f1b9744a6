/**
 * @stackwright/cli - Runtime wiring
 *
 * Builds sequencer dependencies from a validated configuration and
 * turns SIGINT/SIGTERM into run cancellation.
 */

import { join } from 'node:path';
import chalk from 'chalk';
import { LocalExec } from '@stackwright/exec';
import {
  BackupService,
  ComposeOrchestrator,
  FileLock,
  FsWorkspace,
  SourceService,
  type ProgressReporter,
  type SequencerDeps,
  type UpdateSequencerDeps,
} from '@stackwright/feature-deployment';
import {
  FixedDelayReadiness,
  HttpHealthProbe,
  PollingReadiness,
  type HealthProbe,
  type ReadinessStrategy,
} from '@stackwright/feature-monitoring';
import { createDeployLogger, enableFileLogging, generateRunId, logger } from '@stackwright/logger';
import type { RunKind, SequencerConfig } from '@stackwright/shared';
import { isTruthy } from './config.js';

export interface RuntimeOptions {
  kind: RunKind;
  reporter?: ProgressReporter;
  /** Stream compose and git output to stderr as it arrives. */
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Dependencies
// ============================================================================

export function createHealthProbe(config: SequencerConfig): HealthProbe {
  return new HttpHealthProbe({ url: config.healthUrl, timeoutMs: config.healthTimeoutMs });
}

export function createReadiness(config: SequencerConfig, probe: HealthProbe): ReadinessStrategy {
  const { mode, timeoutMs, intervalMs, maxIntervalMs } = config.readiness;
  if (mode === 'fixed') {
    return new FixedDelayReadiness(timeoutMs);
  }
  return new PollingReadiness(probe, { timeoutMs, initialIntervalMs: intervalMs, maxIntervalMs });
}

export function createSequencerDeps(config: SequencerConfig, options: RuntimeOptions): SequencerDeps & {
  runner: LocalExec;
} {
  const env = options.env ?? process.env;
  const runId = generateRunId();

  if (isTruthy(env.STACKWRIGHT_LOG_FILE)) {
    enableFileLogging(join(config.projectDir, 'logs'));
  }

  const runner = new LocalExec({
    timeout: config.commandTimeoutMs,
    onOutput: options.verbose ? (chunk) => process.stderr.write(chalk.gray(chunk)) : undefined,
  });
  const probe = createHealthProbe(config);

  return {
    config,
    runner,
    orchestrator: new ComposeOrchestrator(runner, {
      command: config.composeCommand,
      projectDir: config.projectDir,
      timeoutMs: config.commandTimeoutMs,
    }),
    workspace: new FsWorkspace(config.projectDir, config.envFile, config.directories),
    lock: new FileLock(join(config.projectDir, config.lockFile), { runId }),
    readiness: createReadiness(config, probe),
    probe,
    reporter: options.reporter,
    logger: createDeployLogger({ runId, kind: options.kind, projectDir: config.projectDir }),
    runId,
  };
}

export function createUpdateDeps(config: SequencerConfig, options: Omit<RuntimeOptions, 'kind'>): UpdateSequencerDeps {
  const deps = createSequencerDeps(config, { ...options, kind: 'update' });
  return {
    ...deps,
    backup: new BackupService(deps.orchestrator, { service: config.backup.service, dir: config.backup.dir }),
    source: new SourceService(deps.runner, {
      projectDir: config.projectDir,
      remote: config.source.remote,
      branch: config.source.branch,
      timeoutMs: config.commandTimeoutMs,
    }),
  };
}

// ============================================================================
// Cancellation
// ============================================================================

export interface Cancellation {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort on the first SIGINT/SIGTERM. The running child receives the
 * abort through its spawn signal; the sequencer ends the run as cancelled.
 */
export function watchSignals(): Cancellation {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, cancelling run`);
    console.error(chalk.yellow(`\nReceived ${signal}, cancelling...`));
    controller.abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}
