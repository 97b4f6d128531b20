// ========================================
// Smart Inspection - Logging Context
// ========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const LEVEL_TAG: Record<LogLevel, string> = {
    debug: '[DEBUG]',
    info: '[INFO]',
    warn: '[WARN]',
    error: '[FAIL]',
};

/** Where formatted lines end up. console satisfies it. */
export interface LogSink {
    log(line: string): void;
    error(line: string): void;
}

export interface Logger {
    readonly level: LogLevel;
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, err?: unknown): void;
    child(scope: string): Logger;
}

/**
 * Explicit per-process context handed to the engine and orchestrator at
 * construction instead of a module-level logger.
 */
export interface RunContext {
    logger: Logger;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_RANK;
}

export function createLogger(options: {
    level?: LogLevel;
    sink?: LogSink;
    scope?: string;
    clock?: () => Date;
} = {}): Logger {
    const level = options.level ?? 'info';
    const sink = options.sink ?? console;
    const clock = options.clock ?? (() => new Date());
    const scope = options.scope;

    function emit(msgLevel: LogLevel, message: string, err?: unknown) {
        if (LEVEL_RANK[msgLevel] < LEVEL_RANK[level]) return;

        const prefix = scope ? `[${scope}] ` : '';
        let line = `${clock().toISOString()} ${LEVEL_TAG[msgLevel]} ${prefix}${message}`;
        if (err !== undefined) {
            line += `: ${err instanceof Error ? err.message : String(err)}`;
        }

        if (msgLevel === 'error' || msgLevel === 'warn') sink.error(line);
        else sink.log(line);
    }

    return {
        level,
        debug: (message) => emit('debug', message),
        info: (message) => emit('info', message),
        warn: (message) => emit('warn', message),
        error: (message, err) => emit('error', message, err),
        child: (childScope) => createLogger({
            level,
            sink,
            clock,
            scope: scope ? `${scope}:${childScope}` : childScope,
        }),
    };
}
