/**
 * @stackwright/cli - Health Command
 *
 * Runs the stack's health probe once, outside of a deployment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { EXIT_CODES } from '@stackwright/shared';
import { loadConfig } from '../lib/config.js';
import { formatHealthResult, reportError } from '../lib/formatter.js';
import { createHealthProbe } from '../lib/runtime.js';

interface HealthOptions {
  url?: string;
  timeout?: string;
  json?: boolean;
}

export function createHealthCommand(): Command {
  return new Command('health')
    .description('Probe the stack health endpoint once')
    .option('-u, --url <url>', 'Health endpoint (default: http://localhost/health)')
    .option('-t, --timeout <ms>', 'Probe timeout in milliseconds')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: HealthOptions) => {
      process.exitCode = await runHealth(options);
    });
}

export async function runHealth(options: HealthOptions): Promise<number> {
  let config;
  try {
    config = loadConfig({ healthUrl: options.url, healthTimeoutMs: options.timeout });
  } catch (error) {
    return reportError(error);
  }

  const probe = createHealthProbe(config);
  const spinner = ora(`Checking ${probe.url}...`).start();
  const result = await probe.probe();

  if (result.healthy) {
    spinner.succeed('Health check passed');
  } else {
    spinner.fail('Health check failed');
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatHealthResult(result));
    if (!result.healthy) {
      console.log(chalk.gray('\nTips:'));
      console.log(chalk.gray(`  - Are the services running? Try '${config.composeCommand} ps'`));
      console.log(chalk.gray(`  - Check logs: '${config.composeCommand} logs ${config.primaryService}'`));
    }
  }

  return result.healthy ? EXIT_CODES.success : EXIT_CODES.healthCheckFailed;
}
