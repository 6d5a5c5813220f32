import pino from 'pino';
import type { LogLevel } from '../types/index.js';
import { ConfigError } from '../errors.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate a `--log-level` value. Undefined means "not given".
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    if (!isLogLevel(value)) {
        throw new ConfigError(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return value;
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `LOG_LEVEL` (or info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['LOG_LEVEL'];
        loggerInstance = initLogger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
    }
    return loggerInstance;
}
