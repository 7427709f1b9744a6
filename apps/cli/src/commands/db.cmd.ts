/**
 * @stackwright/cli - Database Command
 *
 * `db init` creates the collections' indexes and seeds the settings
 * document. Safe to run repeatedly.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { bootstrapDatabase, closeDatabase, getDatabase, parseOwnerId, resolveMongoConfig } from '@stackwright/db';
import { EXIT_CODES, errorCode, parseEnvContent } from '@stackwright/shared';

interface DbInitOptions {
  projectDir?: string;
  envFile?: string;
}

export function createDbCommand(): Command {
  const dbCmd = new Command('db').description('Database maintenance');

  dbCmd
    .command('init')
    .description('Create indexes and seed default settings (idempotent)')
    .option('-p, --project-dir <dir>', 'Project directory whose .env supplies MONGO_URI, DB_NAME and OWNER_ID')
    .option('--env-file <file>', 'Env file relative to the project directory', '.env')
    .action(async (options: DbInitOptions) => {
      process.exitCode = await runDbInit(options);
    });

  return dbCmd;
}

/**
 * Variables from the project's env file, overridden by the process
 * environment. A missing file contributes nothing.
 */
export async function readProjectEnv(
  projectDir: string,
  envFile: string,
  processEnv: NodeJS.ProcessEnv = process.env,
): Promise<Record<string, string | undefined>> {
  let fileEnv: Record<string, string> = {};
  try {
    fileEnv = parseEnvContent(await readFile(join(projectDir, envFile), 'utf-8'));
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') throw error;
  }
  return { ...fileEnv, ...processEnv };
}

export async function runDbInit(options: DbInitOptions): Promise<number> {
  const projectDir = resolve(options.projectDir ?? process.env.STACKWRIGHT_PROJECT_DIR ?? process.cwd());
  const env = await readProjectEnv(projectDir, options.envFile ?? '.env');
  const mongo = resolveMongoConfig(env);

  const spinner = ora(`Initializing database '${mongo.dbName}'...`).start();
  try {
    const db = await getDatabase(mongo);
    const result = await bootstrapDatabase(db, { ownerId: parseOwnerId(env.OWNER_ID) });

    spinner.succeed('Database initialized successfully');
    console.log(chalk.gray(`  Indexes:  ${result.indexes.join(', ')}`));
    console.log(chalk.gray(`  Settings: ${result.settingsSeeded ? 'seeded' : 'already present'}`));
    return EXIT_CODES.success;
  } catch (error) {
    spinner.fail('Database initialization failed');
    console.log(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    return EXIT_CODES.commandFailed;
  } finally {
    await closeDatabase();
  }
}
