import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;
let prettyOutput = false;

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup. Modules hold the instance they got at
 * import, so an existing instance with the same output mode only has its
 * level changed.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    const pretty = !jsonLogs && level !== 'silent';

    if (loggerInstance && (pretty === prettyOutput || level === 'silent')) {
        loggerInstance.level = level;
        return loggerInstance;
    }

    prettyOutput = pretty;
    if (!pretty) {
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
 * If not initialized, creates a default logger at FINKG_LOG_LEVEL (or info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: envLogLevel() ?? 'info' });
    }
    return loggerInstance;
}

function envLogLevel(): LogLevel | undefined {
    const raw = process.env['FINKG_LOG_LEVEL'];
    return LOG_LEVELS.find((level) => level === raw);
}
