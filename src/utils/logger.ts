/*
 * Structured JSON logger with request ID correlation.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const envLevel = process.env.LOG_LEVEL;
const threshold = isLogLevel(envLevel) ? levelPriority[envLevel] : levelPriority.info;

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const context = asyncLocalStorage.getStore() || {};

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
    ...meta
  };

  // stdout is reserved for CLI output; structured logs go to stderr
  console.error(JSON.stringify(payload));
};

/**
 * Set request context for correlation across async operations
 */
export const setRequestContext = (context: LogContext): void => {
  const store = asyncLocalStorage.getStore() || {};
  asyncLocalStorage.enterWith({ ...store, ...context });
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};

export const generateRequestId = (): string => {
  return randomUUID();
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta)
};
