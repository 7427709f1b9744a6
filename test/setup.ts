/**
 * Jest setup for all workspaces
 */

import chalk from 'chalk';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Plain strings in formatter assertions
chalk.level = 0;

jest.setTimeout(10_000);
