/**
 * @stackwright/logger - Structured Logging
 *
 * - Winston logger, level from LOG_LEVEL
 * - Pretty console output in development, JSON in production
 * - Optional daily-rotated run log inside the project's logs directory
 * - Sensitive data masking
 */

import { createLogger, type Logger } from 'winston';
import { randomBytes } from 'node:crypto';
import { createConsoleTransport, createRunFileTransport } from './transports.js';

export { SENSITIVE_KEYS, maskSensitiveData } from './sanitizer.js';

const LOG_LEVEL = process.env.LOG_LEVEL || 'warn';

// ============================================================================
// Logger Instance (singleton)
// ============================================================================

const logger: Logger = createLogger({
  level: LOG_LEVEL,
  defaultMeta: { service: 'stackwright' },
  transports: [createConsoleTransport()],
});

let fileLoggingDir: string | null = null;

/**
 * Mirror every log entry into `<logDir>/stackwright-YYYY-MM-DD.log`.
 * Calling it again with the same directory is a no-op.
 */
export function enableFileLogging(logDir: string): void {
  if (fileLoggingDir === logDir) return;
  fileLoggingDir = logDir;
  logger.add(createRunFileTransport(logDir));
}

// ============================================================================
// Run ID
// ============================================================================

export function generateRunId(): string {
  return randomBytes(8).toString('hex');
}

// ============================================================================
// Contextual Logger
// ============================================================================

export interface RunContext {
  runId: string;
  kind: 'deploy' | 'update' | 'health' | 'db';
  projectDir?: string;
}

/** The part of a winston logger the contextual logger writes through. */
export interface LogSink {
  log(level: string, message: string, meta?: Record<string, unknown>): unknown;
}

export class DeployLogger {
  constructor(
    private readonly context: RunContext,
    private readonly base: LogSink = logger,
  ) {}

  log(level: string, message: string, meta?: Record<string, unknown>): void {
    this.base.log(level, message, { ...this.context, ...meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  /** Failed steps log at error level, or warn when marked non-fatal. */
  step(name: string, meta: {
    status: 'success' | 'failed' | 'skipped';
    duration?: number;
    error?: string;
    fatal?: boolean;
  }): void {
    const failedLevel = meta.fatal === false ? 'warn' : 'error';
    const level = meta.status === 'failed' ? failedLevel : 'info';
    this.base.log(level, `STEP: ${name}`, {
      ...this.context,
      ...meta,
      step: name,
      type: 'step',
    });
  }
}

export function createDeployLogger(context: RunContext, base?: LogSink): DeployLogger {
  return new DeployLogger(context, base);
}

export default logger;
export { logger };
