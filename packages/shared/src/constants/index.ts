/**
 * @stackwright/shared - Constants
 */

import type { StepName } from '../types/deployment.js';

export const VERSION = '1.0.0';

/** Lifecycle order of `deploy`, after preflight. */
export const DEPLOY_LIFECYCLE: readonly StepName[] = [
  'stop_existing',
  'pull_images',
  'build_images',
  'start_services',
  'await_readiness',
  'check_status',
  'collect_logs',
  'health_probe',
] as const;

/** Lifecycle order of `update`, after preflight. */
export const UPDATE_LIFECYCLE: readonly StepName[] = [
  'backup_database',
  'update_source',
  'stop_existing',
  'build_images',
  'start_services',
] as const;

export const DEFAULTS = {
  envFile: '.env',
  directories: ['logs', 'ssl'],
  composeCommand: 'docker-compose',
  primaryService: 'bot',
  healthUrl: 'http://localhost/health',
  healthTimeoutMs: 3_000,
  readinessMode: 'poll',
  readinessTimeoutMs: 30_000,
  readinessIntervalMs: 1_000,
  readinessMaxIntervalMs: 5_000,
  logTail: 50,
  lockFile: '.stackwright.lock',
  commandTimeoutMs: 15 * 60 * 1000,
  backupService: 'mongodb',
  backupDir: '/backup',
  sourceRemote: 'origin',
  sourceBranch: 'main',
} as const;
