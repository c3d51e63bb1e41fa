/**
 * Structured logging for llvision
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  camera?: string;
  component?: string;
  [key: string]: unknown;
}

// Logs go to stderr so stdout stays free for the host program
const STDERR = 2;

function createBaseLogger(level: LogLevel = 'info') {
  const options: pino.LoggerOptions = {
    level,
    base: {
      service: 'llvision',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    });
  }

  return pino(options, pino.destination(STDERR));
}

function resolveLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

/**
 * Log a camera-side setting write
 */
export function logSettingWrite(camera: string, key: string, value: unknown): void {
  getLogger().debug(
    {
      event: 'setting_write',
      camera,
      key,
      value,
    },
    `Setting ${key} on ${camera}`
  );
}

/**
 * Log the time spent decoding a results blob
 */
export function logResultsParse(camera: string, durationMs: number, failed: boolean): void {
  getLogger().info(
    {
      event: 'results_parse',
      camera,
      durationMs,
      failed,
    },
    `lljson: ${durationMs.toFixed(2)}ms${failed ? ' (failed)' : ''}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
