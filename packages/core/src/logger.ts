/**
 * @tokenpilot/core — Logger
 *
 * Scoped console logger: `[Scope] message {data}`.
 * Один глобальный уровень на процесс (AGENT_LOG_LEVEL).
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
};

let minLevel: LogLevel = 'INFO';

export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

export function getLogLevel(): LogLevel {
    return minLevel;
}

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export function formatLine(scope: string, message: string, data?: Record<string, unknown>): string {
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    return `[${scope}] ${message}${suffix}`;
}

export function createLogger(scope: string): Logger {
    const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
        const line = formatLine(scope, message, data);
        if (level === 'ERROR') console.error(line);
        else if (level === 'WARN') console.warn(line);
        else console.log(line);
    };

    return {
        debug: (msg, data) => log('DEBUG', msg, data),
        info: (msg, data) => log('INFO', msg, data),
        warn: (msg, data) => log('WARN', msg, data),
        error: (msg, data) => log('ERROR', msg, data),
    };
}
