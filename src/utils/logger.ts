/**
 * Console logger filtered by LOG_LEVEL (debug | info | warn | error | silent).
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL || 'info').trim().toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export function logDebug(message: string, ...details: unknown[]): void {
    if (enabled('debug')) console.debug(message, ...details);
}

export function logInfo(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.log(message, ...details);
}

export function logWarn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.warn(`⚠️ ${message}`, ...details);
}

export function logError(title: string, err?: unknown): void {
    if (!enabled('error')) return;
    if (err === undefined) {
        console.error(`❌ ${title}`);
        return;
    }
    console.error(`❌ ${title}:`, err instanceof Error ? err.message : err);
}
