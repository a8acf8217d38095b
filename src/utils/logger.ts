import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warning: 30,
    error: 40,
};

const PREFIX = '[text-plugins]';

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    minimumLevel = level;
}

export function getLogLevel(): LogLevel {
    return minimumLevel;
}

function formatArg(arg: unknown): string {
    if (arg instanceof Error) return arg.message;
    if (typeof arg === 'string') return arg;
    try {
        return JSON.stringify(arg);
    } catch {
        return String(arg);
    }
}

/**
 * Write a single log line to stderr.
 * stdout carries the JSON-RPC stream, so nothing here may ever touch it.
 */
export function logToStderr(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
    process.stderr.write(`${PREFIX} [${level.toUpperCase()}] ${message}\n`);
}

export const logger = {
    debug: (...args: unknown[]) => logToStderr('debug', args.map(formatArg).join(' ')),
    info: (...args: unknown[]) => logToStderr('info', args.map(formatArg).join(' ')),
    warning: (...args: unknown[]) => logToStderr('warning', args.map(formatArg).join(' ')),
    error: (...args: unknown[]) => logToStderr('error', args.map(formatArg).join(' ')),
};
