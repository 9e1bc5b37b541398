/**
 * Leveled console logger shared by the engine modules. Each line reads
 * `[time] [LEVEL] [scope] message`; one process-wide threshold gates them all.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export const LOG_LEVEL_ENV = 'INPUTBOARD_LOG_LEVEL';

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(
    env: Readonly<Record<string, string | undefined>> = process.env,
    fallback: LogLevel = 'warn',
): LogLevel {
    const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    return isLogLevel(raw) ? raw : fallback;
}

let threshold: LogLevel = resolveLogLevel();

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

type Emittable = Exclude<LogLevel, 'silent'>;

const PAINT: Record<Emittable, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
};

export function formatLogLine(level: Emittable, scope: string, message: string, time = new Date()): string {
    return `[${time.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
}

function emit(level: Emittable, scope: string, message: string, detail?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const line = PAINT[level](formatLogLine(level, scope, message));
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (detail === undefined) {
        sink(line);
    } else {
        sink(line, detail);
    }
}

export interface Logger {
    debug(message: string, detail?: unknown): void;
    info(message: string, detail?: unknown): void;
    warn(message: string, detail?: unknown): void;
    error(message: string, detail?: unknown): void;
}

export function createLogger(scope: string): Logger {
    return {
        debug: (message, detail) => emit('debug', scope, message, detail),
        info: (message, detail) => emit('info', scope, message, detail),
        warn: (message, detail) => emit('warn', scope, message, detail),
        error: (message, detail) => emit('error', scope, message, detail),
    };
}
