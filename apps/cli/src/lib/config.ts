/**
 * @stackwright/cli - Configuration Loader
 *
 * defaults ← environment (STACKWRIGHT_*) ← command-line flags,
 * validated by the shared zod schema.
 */

import { resolve } from 'node:path';
import { ValidationError, sequencerConfigSchema, type SequencerConfig } from '@stackwright/shared';

export interface ConfigOverrides {
  projectDir?: string;
  readiness?: string;
  strict?: boolean;
  skipBackup?: boolean;
  verify?: boolean;
  healthUrl?: string;
  healthTimeoutMs?: string;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): SequencerConfig {
  const input = {
    projectDir: resolve(overrides.projectDir ?? fromEnv(env.STACKWRIGHT_PROJECT_DIR) ?? process.cwd()),
    envFile: fromEnv(env.STACKWRIGHT_ENV_FILE),
    composeCommand: fromEnv(env.STACKWRIGHT_COMPOSE_COMMAND),
    primaryService: fromEnv(env.STACKWRIGHT_PRIMARY_SERVICE),
    healthUrl: overrides.healthUrl ?? fromEnv(env.STACKWRIGHT_HEALTH_URL),
    healthTimeoutMs: overrides.healthTimeoutMs ?? fromEnv(env.STACKWRIGHT_HEALTH_TIMEOUT_MS),
    readiness: {
      mode: overrides.readiness ?? fromEnv(env.STACKWRIGHT_READINESS_MODE),
      timeoutMs: fromEnv(env.STACKWRIGHT_READINESS_TIMEOUT_MS),
    },
    logTail: fromEnv(env.STACKWRIGHT_LOG_TAIL),
    strictExit: overrides.strict ?? isTruthy(env.STACKWRIGHT_STRICT_EXIT),
    commandTimeoutMs: fromEnv(env.STACKWRIGHT_COMMAND_TIMEOUT_MS),
    backup: { skip: overrides.skipBackup ?? false },
    verifyAfterUpdate: overrides.verify ?? false,
  };

  const parsed = sequencerConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/** Unset and empty variables both fall back to the default. */
function fromEnv(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export function isTruthy(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase());
}
