/**
 * Leveled console logger.
 *
 * The level comes from LOG_LEVEL (debug | info | warn | error | silent) and is
 * read on every call, so tests and the CLI can change it at runtime.
 *
 *   log.info('posters', 'Cached poster', { file: 'ab12.jpg' });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_PRIORITY;
}

function configuredLevel(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) return envLevel;
    return 'info';
}

function formatMessage(level: LogLevel, module: string, message: string, data?: Record<string, unknown>): string {
    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase().padEnd(5)}] [${module}]`;
    if (data && Object.keys(data).length > 0) {
        return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
}

function logAtLevel(level: Exclude<LogLevel, 'silent'>, module: string, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[configuredLevel()]) return;

    const formatted = formatMessage(level, module, message, data);
    switch (level) {
        case 'debug':
            console.debug(formatted);
            break;
        case 'info':
            console.info(formatted);
            break;
        case 'warn':
            console.warn(formatted);
            break;
        case 'error':
            console.error(formatted);
            break;
    }
}

/** Error → loggable message, for `catch (err: unknown)` blocks. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export const log = {
    debug: (module: string, message: string, data?: Record<string, unknown>) =>
        logAtLevel('debug', module, message, data),
    info: (module: string, message: string, data?: Record<string, unknown>) =>
        logAtLevel('info', module, message, data),
    warn: (module: string, message: string, data?: Record<string, unknown>) =>
        logAtLevel('warn', module, message, data),
    error: (module: string, message: string, data?: Record<string, unknown>) =>
        logAtLevel('error', module, message, data),
};
