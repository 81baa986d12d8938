/**
 * Logger Interface
 * 
 * Simple logging interface that subnet services use.
 * The evaluator and the worker both log through it; adapters receive a child logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface ILogger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    child?(additionalContext: string): ILogger;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Console Logger - Default implementation
 */
export class ConsoleLogger implements ILogger {
    constructor(
        private context: string = 'Subnet',
        private level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
    ) { }

    debug(message: string, meta?: LogMeta): void {
        if (this.enabled('debug')) {
            console.debug(`[DEBUG] [${this.context}] ${message}`, meta || '');
        }
    }

    info(message: string, meta?: LogMeta): void {
        if (this.enabled('info')) {
            console.log(`[INFO] [${this.context}] ${message}`, meta || '');
        }
    }

    warn(message: string, meta?: LogMeta): void {
        if (this.enabled('warn')) {
            console.warn(`[WARN] [${this.context}] ${message}`, meta || '');
        }
    }

    error(message: string, meta?: LogMeta): void {
        if (this.enabled('error')) {
            console.error(`[ERROR] [${this.context}] ${message}`, meta || '');
        }
    }

    child(additionalContext: string): ILogger {
        return new ConsoleLogger(`${this.context}:${additionalContext}`, this.level);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }
}
