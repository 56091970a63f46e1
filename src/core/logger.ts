import { formatLogForConsole } from './log_formatter.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFields {
    component?: string;
    event?: string;
    runId?: string;
    [key: string]: unknown;
}

export interface LogEntry extends LogFields {
    ts: string;
    level: LogLevel;
    message: string;
    runId: string;
}

export type Logger = {
    info: (message: string, fields?: LogFields) => void;
    warn: (message: string, fields?: LogFields) => void;
    error: (message: string, fields?: LogFields) => void;
    debug: (message: string, fields?: LogFields) => void;
};

export interface LoggerOptions {
    /** Entries below this level are dropped. */
    level?: LogLevel;
    /** Render known entries through the console helpers. */
    pretty?: boolean;
    /** Write every entry as a JSON line to stderr. */
    json?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(runId: string, options: LoggerOptions = {}): Logger {
    const threshold = LEVEL_ORDER[options.level ?? 'info'];
    const pretty = options.pretty ?? true;
    const json = options.json ?? false;

    const log = (level: LogLevel, message: string, fields: LogFields = {}) => {
        if (LEVEL_ORDER[level] < threshold) return;

        const entry: LogEntry = {
            ts: new Date().toISOString(),
            level,
            message,
            runId,
            ...fields,
        };

        if (pretty) {
            formatLogForConsole(entry);
        }

        // stdout belongs to the interactive prompts
        if (json) {
            console.error(JSON.stringify(entry));
        }
    };

    return {
        info: (message: string, fields?: LogFields) => log('info', message, fields),
        warn: (message: string, fields?: LogFields) => log('warn', message, fields),
        error: (message: string, fields?: LogFields) => log('error', message, fields),
        debug: (message: string, fields?: LogFields) => log('debug', message, fields),
    };
}
