/**
 * @stackwright/cli - Output Formatters
 *
 * Run headers, summaries and exit codes for terminal output.
 */

import chalk from 'chalk';
import {
  EXIT_CODES,
  StackwrightError,
  type DeploymentRun,
  type HealthProbeResult,
  type Outcome,
  type RunKind,
  type SequencerConfig,
  type StepName,
} from '@stackwright/shared';

export const STEP_LABELS: Record<StepName, string> = {
  validate: 'Configuration',
  prepare_directories: 'Directories',
  backup_database: 'Database backup',
  update_source: 'Source update',
  stop_existing: 'Stop containers',
  pull_images: 'Pull images',
  build_images: 'Build images',
  start_services: 'Start services',
  await_readiness: 'Readiness',
  check_status: 'Service status',
  collect_logs: 'Recent logs',
  health_probe: 'Health check',
  collect_service_logs: 'Service logs',
};

const OUTCOME_LABELS: Record<Outcome, string> = {
  success: 'completed',
  health_check_failed: 'health check failed',
  configuration_missing: 'configuration missing',
  build_failed: 'build failed',
  start_failed: 'services failed to start',
  backup_failed: 'database backup failed',
  source_update_failed: 'source update failed',
  locked: 'another deployment is in progress',
  cancelled: 'cancelled',
};

// ============================================================================
// Exit Codes
// ============================================================================

export function exitCodeFor(run: DeploymentRun, strict: boolean): number {
  switch (run.outcome) {
    case 'success':
      return EXIT_CODES.success;
    case 'health_check_failed':
      return strict ? EXIT_CODES.healthCheckFailed : EXIT_CODES.success;
    case 'configuration_missing':
      return EXIT_CODES.configurationMissing;
    case 'locked':
      return EXIT_CODES.locked;
    case 'cancelled':
      return EXIT_CODES.cancelled;
    case 'build_failed':
    case 'start_failed':
    case 'backup_failed':
    case 'source_update_failed':
      return EXIT_CODES.commandFailed;
  }
}

// ============================================================================
// Run Header / Summary
// ============================================================================

export function formatRunHeader(kind: RunKind, config: SequencerConfig): string {
  const title = kind === 'deploy' ? 'Deploying service stack' : 'Updating service stack';
  const lines = [
    '',
    chalk.blue.bold(`-- ${title} --`),
    '',
    chalk.gray(`Project:    ${config.projectDir}`),
    chalk.gray(`Compose:    ${config.composeCommand}`),
  ];

  if (kind === 'deploy' || config.verifyAfterUpdate) {
    lines.push(chalk.gray(`Health:     ${config.healthUrl}`));
    lines.push(chalk.gray(`Readiness:  ${config.readiness.mode}`));
  }
  if (kind === 'update') {
    lines.push(chalk.gray(`Backup:     ${config.backup.skip ? 'skipped' : `${config.backup.service} → ${config.backup.dir}`}`));
    lines.push(chalk.gray(`Source:     ${config.source.remote}/${config.source.branch}`));
  }

  lines.push('');
  return lines.join('\n');
}

export function formatRunSummary(
  run: DeploymentRun,
  hints: { composeCommand: string; primaryService: string },
): string {
  const lines: string[] = [''];
  const subject = run.kind === 'deploy' ? 'Deployment' : 'Update';

  if (run.outcome === 'success') {
    lines.push(chalk.green.bold(`  [OK] ${subject} completed successfully!`));
    lines.push('');
    lines.push(chalk.cyan(`  Use '${hints.composeCommand} logs -f ${hints.primaryService}' to follow logs`));
    lines.push(chalk.cyan(`  Use '${hints.composeCommand} down' to stop services`));
  } else if (run.outcome === 'health_check_failed') {
    lines.push(chalk.red.bold(`  [XX] ${subject} finished but the ${OUTCOME_LABELS[run.outcome]}`));
    if (run.error) lines.push(chalk.red(`  ${run.error.message}`));
    lines.push(chalk.gray(`  Logs of '${hints.primaryService}' are shown above. Services were left running.`));
  } else {
    lines.push(chalk.red.bold(`  [XX] ${subject} aborted: ${OUTCOME_LABELS[run.outcome]}`));
    if (run.error) {
      for (const line of run.error.message.split('\n')) {
        lines.push(chalk.red(`  ${line}`));
      }
    }
  }

  lines.push('');
  lines.push(chalk.gray(`  Run ${run.id} - ${formatDuration(run.duration)}`));
  lines.push('');
  return lines.join('\n');
}

// ============================================================================
// Health
// ============================================================================

export function formatHealthResult(result: HealthProbeResult): string {
  if (result.healthy) {
    return chalk.green(`  [OK] ${result.url} answered HTTP ${result.statusCode ?? 200} in ${formatDuration(result.duration)}`);
  }
  return chalk.red(`  [XX] ${result.url} is unhealthy: ${result.error ?? 'unknown error'}`);
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/** First line of an error message, for single-line spinner text. */
export function firstLine(text: string | undefined): string {
  return (text ?? '').split('\n')[0] ?? '';
}

/** Print a configuration or startup error and return the exit code it maps to. */
export function reportError(error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  return error instanceof StackwrightError ? error.exitCode : EXIT_CODES.configurationMissing;
}
