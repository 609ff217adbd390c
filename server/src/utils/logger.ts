/**
 * Centralized logger using Pino
 * Structured logging for the pipeline daemon, the CLI and the workers
 */
import pino from 'pino';
import type { Logger, Level, LevelWithSilent, DestinationStream } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = process.env.NODE_ENV !== 'production' && !isTest;

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

// Stream configuration type
interface StreamConfig {
    level: Level;
    stream: DestinationStream;
}

/** LOG_LEVEL when it names a pino level, otherwise debug in development and info elsewhere */
export function resolveStreamLevel(configured: string | undefined, dev: boolean): Level {
    return LEVELS.find((level) => level === configured) ?? (dev ? 'debug' : 'info');
}

function streamLevel(): Level {
    return resolveStreamLevel(process.env.LOG_LEVEL, isDev);
}

function resolveLevel(): LevelWithSilent {
    return isTest ? 'silent' : streamLevel();
}

// Pretty output in development, JSON lines elsewhere. Tests log nothing.
const streams: StreamConfig[] = isDev
    ? [
        {
            level: streamLevel(), stream: pino.transport({
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                }
            })
        },
    ]
    : [
        { level: streamLevel(), stream: process.stdout },
    ];

// Create the logger instance
const logger: Logger = pino({
    level: resolveLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
}, pino.multistream(streams));

// Child loggers per pipeline area
export const erpLogger: Logger = logger.child({ module: 'erp' });
export const cacheLogger: Logger = logger.child({ module: 'erp-cache' });
export const validationLogger: Logger = logger.child({ module: 'validation' });
export const batchLogger: Logger = logger.child({ module: 'batch' });
export const schedulerLogger: Logger = logger.child({ module: 'scheduler' });
export const emailLogger: Logger = logger.child({ module: 'email' });
export const workerLogger: Logger = logger.child({ module: 'workers' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const shutdownLogger: Logger = logger.child({ module: 'shutdown' });

// Export the base logger as default
export default logger;

