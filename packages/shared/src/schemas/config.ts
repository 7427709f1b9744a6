/**
 * @stackwright/shared - Sequencer Configuration Schema
 */

import { z } from 'zod';
import { DEFAULTS } from '../constants/index.js';

const relativeName = z
  .string()
  .min(1)
  .refine((value) => !value.split(/[\\/]/).includes('..'), { message: 'must not traverse upwards' });

export const readinessConfigSchema = z.object({
  mode: z.enum(['fixed', 'poll']).default(DEFAULTS.readinessMode),
  timeoutMs: z.coerce.number().int().nonnegative().default(DEFAULTS.readinessTimeoutMs),
  intervalMs: z.coerce.number().int().positive().default(DEFAULTS.readinessIntervalMs),
  maxIntervalMs: z.coerce.number().int().positive().default(DEFAULTS.readinessMaxIntervalMs),
});

export const sequencerConfigSchema = z.object({
  projectDir: z.string().min(1),
  envFile: relativeName.default(DEFAULTS.envFile),
  directories: z.array(relativeName).default([...DEFAULTS.directories]),
  composeCommand: z.string().trim().min(1).default(DEFAULTS.composeCommand),
  primaryService: z.string().trim().min(1).default(DEFAULTS.primaryService),
  healthUrl: z.string().url().default(DEFAULTS.healthUrl),
  healthTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.healthTimeoutMs),
  readiness: readinessConfigSchema.default({}),
  logTail: z.coerce.number().int().positive().default(DEFAULTS.logTail),
  strictExit: z.boolean().default(false),
  lockFile: relativeName.default(DEFAULTS.lockFile),
  commandTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.commandTimeoutMs),
  backup: z
    .object({
      service: z.string().trim().min(1).default(DEFAULTS.backupService),
      dir: z.string().min(1).default(DEFAULTS.backupDir),
      skip: z.boolean().default(false),
    })
    .default({}),
  source: z
    .object({
      remote: z.string().trim().min(1).default(DEFAULTS.sourceRemote),
      branch: z.string().trim().min(1).default(DEFAULTS.sourceBranch),
    })
    .default({}),
  verifyAfterUpdate: z.boolean().default(false),
});

export type SequencerConfigInput = z.input<typeof sequencerConfigSchema>;
export type SequencerConfig = z.infer<typeof sequencerConfigSchema>;
export type ReadinessConfig = z.infer<typeof readinessConfigSchema>;
