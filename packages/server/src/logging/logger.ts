import type { LogLevel } from '../config/index.js';

/**
 * Structured logging
 * One JSON object per line on the console, gated by level.
 * Token values and secrets never go into a log record.
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
}

type Severity = Exclude<LogLevel, 'silent'>;

const SEVERITY_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  silent: -1,
};

const CONSOLE_METHOD: Record<Severity, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.log(line),
};

function serializeError(error: Error): LogFields {
  const fields: LogFields = { name: error.name, message: error.message };
  if (error.cause instanceof Error) {
    fields['cause'] = serializeError(error.cause);
  }
  return fields;
}

function normalizeFields(fields: LogFields): LogFields {
  const normalized: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    normalized[key] = value instanceof Error ? serializeError(value) : value;
  }
  return normalized;
}

/**
 * Create a logger writing JSON lines at or above the given level
 *
 * `write` replaces the console sink (tests capture records through it).
 */
export function createLogger(
  level: LogLevel = 'info',
  options: { component?: string; write?: (severity: Severity, line: string) => void } = {}
): Logger {
  const threshold = SEVERITY_RANK[level];
  const write = options.write ?? ((severity: Severity, line: string) => CONSOLE_METHOD[severity](line));

  const log = (severity: Severity, message: string, fields?: LogFields): void => {
    if (SEVERITY_RANK[severity] > threshold) {
      return;
    }
    write(
      severity,
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: severity,
        ...(options.component ? { component: options.component } : {}),
        message,
        ...(fields ? normalizeFields(fields) : {}),
      })
    );
  };

  return {
    error: (message, fields) => log('error', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    info: (message, fields) => log('info', message, fields),
    debug: (message, fields) => log('debug', message, fields),
  };
}

export const silentLogger: Logger = createLogger('silent');
