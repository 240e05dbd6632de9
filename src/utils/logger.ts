import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton, configured once at startup via `initLogger()`.
 * Human-readable output through pino-pretty unless JSON logs are requested.
 */
let loggerInstance: pino.Logger | null = null;

export function initLogger(options: {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    const base = { name: 'litalert' };

    loggerInstance = jsonLogs
        ? pino({ level, base })
        : pino({
            level,
            base,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });

    return loggerInstance;
}

/**
 * Get the logger instance.
 * Falls back to an info-level pretty logger when `initLogger()` has not run.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
