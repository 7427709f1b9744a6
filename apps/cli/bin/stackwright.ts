#!/usr/bin/env tsx
/**
 * @stackwright/cli - Entry Point
 */

import chalk from 'chalk';
import { createCLI } from '../src/index.js';

async function main(): Promise<void> {
  const program = createCLI(process.argv);

  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(chalk.red('Fatal:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
