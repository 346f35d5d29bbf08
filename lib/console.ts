type ConsoleMethods = 'debug' | 'log' | 'info' | 'warn' | 'error';
type LogLevel = ConsoleMethods | 'silent';

export type PrefixedConsole = Record<ConsoleMethods, (...args: unknown[]) => void>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 0,
    log: 1,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_WEIGHT, value);
}

function readLogLevel(): LogLevel {
    const level = process.env.RL_LOG_LEVEL;
    return level !== undefined && isLogLevel(level) ? level : 'info';
}

/**
 * Console bound to an actor prefix, e.g. `[TRAINER]` or `[WORKER|2]`.
 * Several actors may share one process, so the global console is left untouched.
 */
export function createConsole(prefix: string): PrefixedConsole {
    const threshold = LEVEL_WEIGHT[readLogLevel()];
    const bind = (method: ConsoleMethods) => (...args: unknown[]): void => {
        if (LEVEL_WEIGHT[method] < threshold) return;
        console[method](prefix, ...args);
    };

    return {
        debug: bind('debug'),
        log: bind('log'),
        info: bind('info'),
        warn: bind('warn'),
        error: bind('error'),
    };
}
