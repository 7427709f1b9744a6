/**
 * Deployment feature types
 */

import type {
  CommandResult,
  DeploymentRun,
  Outcome,
  SequencerConfig,
  StepName,
  StepRecord,
} from '@stackwright/shared';
import type { HealthProbe, ReadinessStrategy } from '@stackwright/feature-monitoring';

// ============================================================================
// Orchestrator capability
// ============================================================================

/**
 * Lifecycle operations over the service stack. `stop` and `start` must be
 * idempotent with respect to an already stopped or running stack.
 */
export interface Orchestrator {
  stop(signal?: AbortSignal): Promise<CommandResult>;
  pull(signal?: AbortSignal): Promise<CommandResult>;
  build(options: { noCache: boolean }, signal?: AbortSignal): Promise<CommandResult>;
  start(options: { detached: boolean }, signal?: AbortSignal): Promise<CommandResult>;
  status(signal?: AbortSignal): Promise<CommandResult>;
  logs(options: { tail?: number; service?: string }, signal?: AbortSignal): Promise<CommandResult>;
  exec(service: string, argv: string[], signal?: AbortSignal): Promise<CommandResult>;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface Workspace {
  readonly envFilePath: string;
  envFileExists(): Promise<boolean>;
  /** Returns the directories that had to be created. */
  ensureDirectories(): Promise<string[]>;
}

export interface RunLock {
  readonly path: string;
  acquire(): Promise<void>;
  release(): Promise<void>;
}

export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  step(
    name: StepName,
    meta: { status: StepRecord['status']; duration?: number; error?: string; fatal?: boolean },
  ): void;
}

/**
 * Human-facing progress sink. Every step reports start and end; command
 * output worth showing (status, logs) arrives through `output`.
 */
export interface ProgressReporter {
  stepStarted(step: StepName, message: string): void;
  stepSucceeded(record: StepRecord): void;
  stepFailed(record: StepRecord, fatal: boolean): void;
  output(step: StepName, text: string): void;
  finished(run: DeploymentRun): void;
}

// ============================================================================
// Sequencer dependencies
// ============================================================================

export interface SequencerDeps {
  config: SequencerConfig;
  orchestrator: Orchestrator;
  workspace: Workspace;
  lock: RunLock;
  readiness: ReadinessStrategy;
  probe: HealthProbe;
  reporter?: ProgressReporter;
  logger?: LoggerLike;
  runId?: string;
  now?: () => Date;
}

export interface VerificationResult {
  outcome: Extract<Outcome, 'success' | 'health_check_failed'>;
  error?: Error;
}
