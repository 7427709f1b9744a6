/**
 * @stackwright/cli - Update Command
 *
 * Database backup, git pull, then rebuild and restart.
 */

import { Command } from 'commander';
import { UpdateSequencer } from '@stackwright/feature-deployment';
import { loadConfig } from '../lib/config.js';
import { exitCodeFor, formatRunHeader, reportError } from '../lib/formatter.js';
import { SpinnerReporter } from '../lib/reporter.js';
import { createUpdateDeps, watchSignals } from '../lib/runtime.js';

interface UpdateOptions {
  projectDir?: string;
  skipBackup?: boolean;
  verify?: boolean;
  strict?: boolean;
  verbose?: boolean;
}

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Back up the database, pull the latest source, rebuild and restart')
    .option('-p, --project-dir <dir>', 'Project directory containing docker-compose.yml and .env')
    .option('--skip-backup', 'Do not dump the database before updating')
    .option('--verify', 'Wait for readiness and run the health check after restarting')
    .option('--strict', 'With --verify, exit with code 3 when the health check fails')
    .option('-v, --verbose', 'Stream compose and git output while steps run')
    .action(async (options: UpdateOptions) => {
      process.exitCode = await runUpdate(options);
    });
}

export async function runUpdate(options: UpdateOptions): Promise<number> {
  let config;
  try {
    config = loadConfig({
      projectDir: options.projectDir,
      skipBackup: options.skipBackup,
      verify: options.verify,
      strict: options.strict,
    });
  } catch (error) {
    return reportError(error);
  }

  console.log(formatRunHeader('update', config));

  const reporter = new SpinnerReporter({
    composeCommand: config.composeCommand,
    primaryService: config.primaryService,
    animate: !options.verbose,
  });
  let deps;
  try {
    deps = createUpdateDeps(config, { reporter, verbose: options.verbose });
  } catch (error) {
    return reportError(error);
  }
  const cancellation = watchSignals();

  try {
    const run = await new UpdateSequencer(deps).run(cancellation.signal);
    return exitCodeFor(run, config.strictExit);
  } finally {
    cancellation.dispose();
  }
}
