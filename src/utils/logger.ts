import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export type Logger = pino.Logger;

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 * Logs go to stderr; stdout carries command output.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Narrow a flag or env value to a LogLevel (undefined when it is not one).
 */
export function parseLogLevel(value: unknown): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup, before the coordinator is created.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = parseLogLevel(process.env['SCIFETCH_LOG_LEVEL']) ?? 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
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
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger (info, or SCIFETCH_LOG_LEVEL).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({});
    }
    return loggerInstance;
}
