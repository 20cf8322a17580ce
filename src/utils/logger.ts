import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Logs go to stderr so `inspect` output on stdout stays machine-readable.
 */
let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    const instance = jsonLogs
        ? pino({ level, base: { app: 'ontoresolve' } }, pino.destination(2))
        : pino({
              level,
              transport: {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'HH:MM:ss',
                      ignore: 'pid,hostname',
                      destination: 2,
                  },
              },
          });

    if (loggerInstance) {
        // Modules captured the old instance at import time; keep them in sync.
        loggerInstance.level = level;
    }
    loggerInstance = instance;

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger (silent under vitest).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const level = process.env['VITEST'] ? 'silent' : 'info';
        loggerInstance = initLogger({ level, jsonLogs: level === 'silent' });
    }
    return loggerInstance;
}
