/**
 * @stackwright/shared - Deployment Run & Step Types
 */

// ============================================================================
// Steps
// ============================================================================

export type StepName =
  | 'validate'
  | 'prepare_directories'
  | 'backup_database'
  | 'update_source'
  | 'stop_existing'
  | 'pull_images'
  | 'build_images'
  | 'start_services'
  | 'await_readiness'
  | 'check_status'
  | 'collect_logs'
  | 'health_probe'
  | 'collect_service_logs';

export type StepStatus = 'success' | 'failed' | 'skipped';

export interface StepRecord {
  name: StepName;
  status: StepStatus;
  startedAt: string;
  duration: number;
  output?: string;
  error?: string;
}

// ============================================================================
// Run
// ============================================================================

export type RunKind = 'deploy' | 'update';

export type Outcome =
  | 'success'
  | 'health_check_failed'
  | 'configuration_missing'
  | 'build_failed'
  | 'start_failed'
  | 'backup_failed'
  | 'source_update_failed'
  | 'locked'
  | 'cancelled';

export interface DeploymentRun {
  id: string;
  kind: RunKind;
  startedAt: string;
  finishedAt: string;
  duration: number;
  steps: StepRecord[];
  outcome: Outcome;
  /** Set for every outcome other than `success`. */
  error?: Error;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthProbeResult {
  healthy: boolean;
  url: string;
  statusCode?: number;
  error?: string;
  duration: number;
}
