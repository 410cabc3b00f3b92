import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelColours: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
};

export function formatContext(context?: LogContext): string {
    if (!context) return '';
    const pairs = Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${value}`);
    return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

/**
 * Writes "<time> [LEVEL] message key=value" lines to stderr so stdout stays
 * free for command output and the MCP stdio transport.
 */
export class ConsoleLogger implements Logger {
    private readonly threshold: number;

    constructor(
        level: LogLevel = 'info',
        private readonly write: (line: string) => void = (line) => console.error(line)
    ) {
        this.threshold = LOG_LEVELS.indexOf(level);
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (LOG_LEVELS.indexOf(level) < this.threshold) return;
        const label = levelColours[level](`[${level.toUpperCase()}]`);
        this.write(`${new Date().toISOString()} ${label} ${message}${formatContext(context)}`);
    }
}
