/**
 * @stackwright/logger - Winston Transports
 * Console + rotating file transports
 */

import { format, transports } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { maskValue } from './sanitizer.js';

const NODE_ENV = process.env.NODE_ENV || 'development';

// ============================================================================
// Custom Formats
// ============================================================================

const UNMASKED_KEYS = new Set(['level', 'message', 'timestamp']);

/** Every metadata entry goes through the sanitizer before it is written. */
const maskFormat = format((info) => {
  for (const key of Object.keys(info)) {
    if (!UNMASKED_KEYS.has(key)) {
      info[key] = maskValue(key, info[key]);
    }
  }
  return info;
});

const contextFormat = format((info) => {
  return {
    ...info,
    service: 'stackwright',
    env: NODE_ENV,
  };
});

// ============================================================================
// Transport Factories
// ============================================================================

export const jsonFormat: ReturnType<typeof format.combine> = format.combine(
  format.timestamp(),
  contextFormat(),
  maskFormat(),
  format.json(),
);

export const consoleFormat: ReturnType<typeof format.combine> = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  maskFormat(),
  format.colorize(),
  format.printf(({ timestamp, level, message, runId, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0
      ? `\n${JSON.stringify(meta, null, 2)}`
      : '';
    const run = runId ? ` [${String(runId)}]` : '';
    return `${String(timestamp)} ${level}${run}: ${String(message)}${metaStr}`;
  }),
);

/** Console transport on stderr, so progress output on stdout stays clean */
export function createConsoleTransport() {
  return new transports.Console({
    format: NODE_ENV === 'production' ? jsonFormat : consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  });
}

/** Run log with daily rotation (14-day retention) */
export function createRunFileTransport(logDir: string) {
  return new DailyRotateFile({
    dirname: logDir,
    filename: 'stackwright-%DATE%.log',
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '20m',
    format: jsonFormat,
  });
}
