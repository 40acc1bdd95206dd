/**
 * Structured logging on pino. Output goes to stderr: the CLI keeps stdout
 * for its JSONL event stream.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'authorization',
  '*.authorization',
  'headers.authorization',
  '*.password',
  '*.token',
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createBaseLogger(level: LogLevel): Logger {
  const options: LoggerOptions = {
    level,
    base: { pid: process.pid, service: 'goal-runner' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
  return pino(options, process.stderr);
}

const envLevel = process.env.LOG_LEVEL;
let baseLogger = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');

export function setLogLevel(level: LogLevel): void {
  baseLogger = createBaseLogger(level);
}

/**
 * Component logger. Resolves the base logger on every call so that
 * setLogLevel() reaches loggers created at module load.
 */
export class ComponentLogger {
  constructor(
    private component: string,
    private bindings: Record<string, unknown> = {},
  ) {}

  child(bindings: Record<string, unknown>): ComponentLogger {
    return new ComponentLogger(this.component, { ...this.bindings, ...bindings });
  }

  debug(message: string, context: Record<string, unknown> = {}): void {
    this.logger.debug(context, message);
  }

  info(message: string, context: Record<string, unknown> = {}): void {
    this.logger.info(context, message);
  }

  warn(message: string, context: Record<string, unknown> = {}): void {
    this.logger.warn(context, message);
  }

  error(message: string, context: Record<string, unknown> = {}): void {
    this.logger.error(context, message);
  }

  private get logger(): Logger {
    return baseLogger.child({ component: this.component, ...this.bindings });
  }
}

export function createLogger(component: string): ComponentLogger {
  return new ComponentLogger(component);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
