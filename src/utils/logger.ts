import path from 'path';
import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for job context (job ID, input file, etc.)
 */
export const jobContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current job context
 */
export function getJobContext(): Record<string, unknown> {
  return jobContext.getStore() || {};
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].includes(value);
}

function logFileName(): string {
  // 2024-05-01T10-20-30 (filesystem-safe)
  return `${new Date().toISOString().slice(0, 19).replace(/:/g, '-')}.log`;
}

/**
 * Create logger instance based on environment.
 *
 * Development and production write pretty output to the console at `info` and a full
 * `debug` log to LOGS_DIR. Tests get a plain, silent-by-default logger with no transport
 * worker threads.
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isTest = nodeEnv === 'test';
  const requested = process.env.LOG_LEVEL || (isTest ? 'silent' : 'debug');
  const logLevel = isLevel(requested) ? requested : 'info';

  const base = {
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'survey-forge',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTest) {
    return pino({
      ...base,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    });
  }

  const logsDir = process.env.LOGS_DIR || 'logs';
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: logLevel === 'debug' || logLevel === 'trace' ? 'info' : logLevel,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env,service',
      },
    },
    {
      target: 'pino/file',
      level: logLevel,
      options: {
        destination: path.join(logsDir, logFileName()),
        mkdir: true,
      },
    },
  ];

  // Level formatters cannot be combined with multi-target transports
  return pino(base, pino.transport({ targets }));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getJobContext(), ...additionalContext };
  return logger.child(context);
}
