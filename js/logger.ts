/**
 * @fileoverview Structured Logging Module
 * Module-scoped loggers with levels, bound context fields and a pluggable
 * sink. Lines are plain text by default or one JSON object per line
 * (LOG_FORMAT=json) for log collectors. The starting level comes from the
 * environment (ENGINE_DEBUG, LOG_LEVEL, NODE_ENV).
 */

import { ENV_KEYS } from './constants.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

export type LogFormat = 'text' | 'json';

/**
 * Receives every line that passes the level filter.
 */
export interface LogSink {
    write(level: LogLevel, line: string, data: readonly unknown[]): void;
}

export interface LoggerConfig {
    minLevel: LogLevel;
    /** Prefix text lines with an ISO timestamp; JSON lines always carry `time` */
    timestamps: boolean;
    format: LogFormat;
    sink: LogSink;
}

/** Writes to console.log / console.warn / console.error by level. */
export const consoleSink: LogSink = {
    write(level, line, data) {
        if (level >= LogLevel.ERROR) {
            console.error(line, ...data);
        } else if (level === LogLevel.WARN) {
            console.warn(line, ...data);
        } else {
            // eslint-disable-next-line no-console
            console.log(line, ...data);
        }
    },
};

// ==================== CONFIGURATION ====================

/**
 * Parses a level name such as 'warn' or 'DEBUG'.
 */
export function parseLogLevel(name: string | undefined): LogLevel | null {
    if (!name) return null;
    const wanted = name.trim().toUpperCase();
    for (const [level, label] of Object.entries(LEVEL_NAMES)) {
        if (label === wanted) return Number(level);
    }
    return null;
}

/**
 * Logger settings for an environment. ENGINE_DEBUG=true wins over LOG_LEVEL,
 * which wins over the NODE_ENV default (WARN in production, INFO elsewhere).
 */
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
    let minLevel = parseLogLevel(env[ENV_KEYS.LOG_LEVEL]) ?? (env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO);
    if (env[ENV_KEYS.DEBUG] === 'true') minLevel = LogLevel.DEBUG;

    return {
        minLevel,
        timestamps: true,
        format: env[ENV_KEYS.LOG_FORMAT] === 'json' ? 'json' : 'text',
        sink: consoleSink,
    };
}

let config: LoggerConfig = getDefaultConfig();

export function configureLogger(changes: Partial<LoggerConfig>): void {
    config = { ...config, ...changes };
}

export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

// ==================== SANITIZING ====================

const REDACTED = '[REDACTED]';
const SENSITIVE_KEY = /token|password|secret|email|api_?key/i;
const SENSITIVE_EXACT_KEYS = new Set(['dsn', 'authorization']);
const OPAQUE_STRING = /[a-zA-Z0-9]{32,}/g;

function isSensitiveKey(key: string): boolean {
    return SENSITIVE_KEY.test(key) || SENSITIVE_EXACT_KEYS.has(key.toLowerCase());
}

/**
 * Masks credentials before they reach a log line: values under sensitive
 * keys, and long opaque strings anywhere.
 */
export function sanitize(data: unknown): unknown {
    if (typeof data === 'string') return data.replace(OPAQUE_STRING, REDACTED);
    if (Array.isArray(data)) return data.map(sanitize);
    if (data instanceof Error) return data;
    if (typeof data === 'object' && data !== null) {
        return Object.fromEntries(
            Object.entries(data).map(([key, value]) => [key, isSensitiveKey(key) ? REDACTED : sanitize(value)])
        );
    }
    return data;
}

// ==================== OUTPUT ====================

type LogContext = Readonly<Record<string, string | number | boolean>>;

function formatText(level: LogLevel, module: string | undefined, context: LogContext, message: string): string {
    const parts: string[] = [];
    if (config.timestamps) parts.push(`[${new Date().toISOString()}]`);
    parts.push(`[${LEVEL_NAMES[level]}]`);
    if (module) parts.push(`[${module}]`);
    for (const [key, value] of Object.entries(context)) {
        parts.push(`${key}=${String(value)}`);
    }
    parts.push(message);
    return parts.join(' ');
}

function formatJson(
    level: LogLevel,
    module: string | undefined,
    context: LogContext,
    message: string,
    data: readonly unknown[]
): string {
    return JSON.stringify({
        time: new Date().toISOString(),
        level: LEVEL_NAMES[level].toLowerCase(),
        module,
        ...context,
        msg: message,
        ...(data.length > 0 ? { data: data.map((item) => (item instanceof Error ? item.message : item)) } : {}),
    });
}

function emit(level: LogLevel, module: string | undefined, context: LogContext, message: string, data: unknown[]): void {
    if (level < config.minLevel || level === LogLevel.NONE) return;

    const safeData = data.map(sanitize);
    if (config.format === 'json') {
        config.sink.write(level, formatJson(level, module, context, message, safeData), []);
    } else {
        config.sink.write(level, formatText(level, module, context, message), safeData);
    }
}

// ==================== LOGGERS ====================

export interface Logger {
    debug(message: string, ...data: unknown[]): void;
    info(message: string, ...data: unknown[]): void;
    warn(message: string, ...data: unknown[]): void;
    error(message: string, ...data: unknown[]): void;
    log(level: LogLevel, message: string, ...data: unknown[]): void;
    /** Starts a timer; a later timeEnd(label) logs the elapsed ms at DEBUG */
    time(label: string): void;
    timeEnd(label: string): void;
    /** A logger that adds `context` to every line */
    child(context: LogContext): Logger;
}

/**
 * Create a scoped logger for a specific module
 *
 * @example
 * const log = createLogger('Ingest');
 * log.warn('Skipped rows', { rows: 3 });
 * // [2024-03-04T10:00:00.000Z] [WARN] [Ingest] Skipped rows { rows: 3 }
 */
export function createLogger(module?: string, context: LogContext = {}): Logger {
    const timers = new Map<string, number>();

    return {
        debug: (message, ...data) => emit(LogLevel.DEBUG, module, context, message, data),
        info: (message, ...data) => emit(LogLevel.INFO, module, context, message, data),
        warn: (message, ...data) => emit(LogLevel.WARN, module, context, message, data),
        error: (message, ...data) => emit(LogLevel.ERROR, module, context, message, data),
        log: (level, message, ...data) => emit(level, module, context, message, data),
        time: (label) => {
            if (isDebugEnabled()) timers.set(label, performance.now());
        },
        timeEnd: (label) => {
            const start = timers.get(label);
            if (start === undefined) return;
            timers.delete(label);
            emit(LogLevel.DEBUG, module, context, `${label}: ${(performance.now() - start).toFixed(1)}ms`, []);
        },
        child: (extra) => createLogger(module, { ...context, ...extra }),
    };
}

/**
 * Default logger instance (for general use without module scope)
 */
export const logger = createLogger();
