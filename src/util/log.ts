export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    readonly level: LogLevel;
    readonly subsystem: string;
    readonly message: string;
    readonly timestamp: number;
    readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;
export type LogContext = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const hasContext = (context: LogContext | undefined): context is LogContext =>
    context !== undefined && Object.keys(context).length > 0;

/**
 * `2024-01-01T00:00:00.000Z [INFO][bounce:solve] message`
 */
export const formatLogLine = (entry: LogEntry): string =>
    `${new Date(entry.timestamp).toISOString()} [${entry.level.toUpperCase()}][${entry.subsystem}] ${entry.message}`;

// Looked up per call so a console swapped in later is honoured.
const consoleSink = (level: LogLevel): ((...parts: unknown[]) => void) => {
    const target = globalThis.console;
    const method = target[level];
    return typeof method === 'function' ? method.bind(target) : target.log.bind(target);
};

export const defaultLogWriter: LogWriter = (entry) => {
    const sink = consoleSink(entry.level);
    if (hasContext(entry.context)) {
        sink(formatLogLine(entry), entry.context);
        return;
    }
    sink(formatLogLine(entry));
};

/**
 * Writer for plain text sinks such as stderr. Context is appended as JSON.
 */
export const createLineLogWriter = (write: (line: string) => void): LogWriter => (entry) => {
    const line = formatLogLine(entry);
    write(hasContext(entry.context) ? `${line} ${JSON.stringify(entry.context)}` : line);
};

export interface Logger {
    readonly debug: (message: string, context?: LogContext) => void;
    readonly info: (message: string, context?: LogContext) => void;
    readonly warn: (message: string, context?: LogContext) => void;
    readonly error: (message: string, context?: LogContext) => void;
    readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
    readonly writer?: LogWriter;
    readonly now?: NowFn;
    /** Entries below this level are dropped. Defaults to `debug`. */
    readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
    const writer = options.writer ?? defaultLogWriter;
    const now = options.now ?? Date.now;
    const minLevel = options.minLevel ?? 'debug';
    const name = sanitizeSubsystem(subsystem);

    const emitter = (level: LogLevel) => (message: string, context?: LogContext): void => {
        if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
            return;
        }
        writer({ level, subsystem: name, message, context, timestamp: now() });
    };

    return {
        debug: emitter('debug'),
        info: emitter('info'),
        warn: emitter('warn'),
        error: emitter('error'),
        child: (suffix) => createLogger(`${name}:${sanitizeSubsystem(suffix)}`, { writer, now, minLevel }),
    };
};

export const rootLogger = createLogger('bounce');
