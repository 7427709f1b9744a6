/**
 * @stackwright/cli - Commander Program Definition
 *
 * 4 commands:
 * 1. deploy - teardown, rebuild, restart, verify
 * 2. update - backup, git pull, rebuild, restart
 * 3. health - one-off health probe
 * 4. db     - database bootstrap
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from '@stackwright/shared';
import { createDbCommand } from './commands/db.cmd.js';
import { createDeployCommand } from './commands/deploy.cmd.js';
import { createHealthCommand } from './commands/health.cmd.js';
import { createUpdateCommand } from './commands/update.cmd.js';

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(argv: string[] = process.argv): Command {
  const program = new Command();

  if (!argv.includes('--json')) {
    console.log(chalk.cyan.bold(`\nstackwright v${VERSION} - compose stack deployer`));
  }

  program
    .name('stackwright')
    .description('Deploy, update and verify a docker compose service stack')
    .version(VERSION);

  program.addCommand(createDeployCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createDbCommand());

  program.on('--help', () => {
    console.log('');
    console.log(chalk.yellow('Exit codes:'));
    console.log(chalk.gray('  0    success (also a failed health check unless --strict)'));
    console.log(chalk.gray('  1    configuration missing or invalid'));
    console.log(chalk.gray('  2    a compose, git or backup command failed'));
    console.log(chalk.gray('  3    health check failed (--strict)'));
    console.log(chalk.gray('  4    another deployment holds the lock'));
    console.log(chalk.gray('  130  cancelled'));
    console.log('');
  });

  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(`\nError: ${str}`));
    },
  });

  return program;
}

export { loadConfig } from './lib/config.js';
export { exitCodeFor } from './lib/formatter.js';
