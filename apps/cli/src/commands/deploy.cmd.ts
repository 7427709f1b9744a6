/**
 * @stackwright/cli - Deploy Command
 *
 * Full teardown and rebuild of the compose stack, followed by
 * readiness, status, recent logs and a health probe.
 */

import { Command } from 'commander';
import { DeploySequencer } from '@stackwright/feature-deployment';
import { loadConfig } from '../lib/config.js';
import { exitCodeFor, formatRunHeader, reportError } from '../lib/formatter.js';
import { SpinnerReporter } from '../lib/reporter.js';
import { createSequencerDeps, watchSignals } from '../lib/runtime.js';

interface DeployOptions {
  projectDir?: string;
  readiness?: string;
  strict?: boolean;
  verbose?: boolean;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createDeployCommand(): Command {
  return new Command('deploy')
    .description('Stop, rebuild and restart the service stack, then verify its health')
    .option('-p, --project-dir <dir>', 'Project directory containing docker-compose.yml and .env')
    .option('-r, --readiness <mode>', 'Readiness strategy: poll (probe until healthy) or fixed (blind wait)')
    .option('--strict', 'Exit with code 3 when the final health check fails')
    .option('-v, --verbose', 'Stream compose output while steps run')
    .action(async (options: DeployOptions) => {
      process.exitCode = await runDeploy(options);
    });
}

// ============================================================================
// Deploy Action
// ============================================================================

export async function runDeploy(options: DeployOptions): Promise<number> {
  let config;
  try {
    config = loadConfig({ projectDir: options.projectDir, readiness: options.readiness, strict: options.strict });
  } catch (error) {
    return reportError(error);
  }

  console.log(formatRunHeader('deploy', config));

  const reporter = new SpinnerReporter({
    composeCommand: config.composeCommand,
    primaryService: config.primaryService,
    animate: !options.verbose,
  });
  let deps;
  try {
    deps = createSequencerDeps(config, { kind: 'deploy', reporter, verbose: options.verbose });
  } catch (error) {
    return reportError(error);
  }
  const cancellation = watchSignals();

  try {
    const run = await new DeploySequencer(deps).run(cancellation.signal);
    return exitCodeFor(run, config.strictExit);
  } finally {
    cancellation.dispose();
  }
}
