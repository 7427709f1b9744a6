/**
 * @stackwright/shared - Error Classes
 * Typed failures for the deploy and update sequencers
 */

import type { CommandResult } from '../types/exec.js';

export const EXIT_CODES = {
  success: 0,
  configurationMissing: 1,
  commandFailed: 2,
  healthCheckFailed: 3,
  locked: 4,
  cancelled: 130,
} as const;

export class StackwrightError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'StackwrightError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StackwrightError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      details: this.details,
    };
  }
}

export class ValidationError extends StackwrightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', EXIT_CODES.configurationMissing, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationMissingError extends StackwrightError {
  public readonly path: string;

  constructor(path: string) {
    super(
      `${path} not found. Create it from .env.example before deploying.`,
      'CONFIGURATION_MISSING',
      EXIT_CODES.configurationMissing,
      { path },
    );
    this.name = 'ConfigurationMissingError';
    this.path = path;
  }
}

export class ExternalCommandError extends StackwrightError {
  public readonly result: CommandResult;

  constructor(result: CommandResult) {
    const output = (result.stderr.trim() || result.stdout.trim()) || '(no output)';
    super(
      `Command failed with exit code ${result.code}: ${result.command}\n${output}`,
      'EXTERNAL_COMMAND_FAILED',
      EXIT_CODES.commandFailed,
      { command: result.command, code: result.code },
    );
    this.name = 'ExternalCommandError';
    this.result = result;
  }
}

export class HealthCheckError extends StackwrightError {
  constructor(url: string, reason: string) {
    super(`Health check failed for ${url}: ${reason}`, 'HEALTH_CHECK_FAILED', EXIT_CODES.healthCheckFailed, {
      url,
      reason,
    });
    this.name = 'HealthCheckError';
  }
}

export class DeploymentLockedError extends StackwrightError {
  constructor(lockPath: string, holderPid?: number) {
    const holder = holderPid ? ` (held by pid ${holderPid})` : '';
    super(`Another deployment is in progress${holder}: ${lockPath}`, 'DEPLOYMENT_LOCKED', EXIT_CODES.locked, {
      lockPath,
      holderPid,
    });
    this.name = 'DeploymentLockedError';
  }
}

export class CancelledError extends StackwrightError {
  constructor(message: string = 'Deployment cancelled') {
    super(message, 'CANCELLED', EXIT_CODES.cancelled);
    this.name = 'CancelledError';
  }
}
