/**
 * Severity levels, lowest first
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Logging abstraction interface for testability
 */
export interface ILogger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Default implementation writing through the console
 */
export class ConsoleLogger implements ILogger {
    private threshold: number;

    constructor(level: LogLevel = 'info') {
        this.threshold = LOG_LEVELS.indexOf(level);
    }

    debug(message: string, ...meta: unknown[]): void {
        if (this.enabled('debug')) console.debug(message, ...meta);
    }

    info(message: string, ...meta: unknown[]): void {
        if (this.enabled('info')) console.info(message, ...meta);
    }

    warn(message: string, ...meta: unknown[]): void {
        if (this.enabled('warn')) console.warn(message, ...meta);
    }

    error(message: string, ...meta: unknown[]): void {
        if (this.enabled('error')) console.error(message, ...meta);
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= this.threshold;
    }
}

/**
 * Discards everything; used when no logger is injected
 */
export class SilentLogger implements ILogger {
    debug(): void {}
    info(): void {}
    warn(): void {}
    error(): void {}
}
