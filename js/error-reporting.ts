/**
 * @fileoverview Error Reporting Module
 * Sends engine failures to Sentry. Reporting stays off until a real DSN is
 * configured; every event, breadcrumb and extra passes through the redaction
 * rules below before it leaves the process.
 */

import * as Sentry from '@sentry/node';
import type { NodeOptions } from '@sentry/node';
import { ENV_KEYS, SENTRY_DSN } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('ErrorReporting');

// ==================== TYPES ====================

export interface SentryConfig {
    /** Project DSN; empty or the build placeholder disables reporting */
    dsn: string;
    environment: string;
    /** Engine version attached to every event */
    release: string;
    debug?: boolean;
    /** Share of error events sent, 0..1 */
    sampleRate?: number;
}

export type ReportLevel = 'fatal' | 'error' | 'warning' | 'info';

/**
 * Where a failure happened and what the engine was doing.
 */
export interface ErrorContext {
    module?: string;
    operation?: string;
    /** Sent as event extras after redaction */
    metadata?: Record<string, unknown>;
    level?: ReportLevel;
}

interface ReporterState {
    enabled: boolean;
    /** Hashed id of the dataset being analysed */
    datasetTag: string | null;
}

const state: ReporterState = { enabled: false, datasetTag: null };

// ==================== REDACTION ====================

const REDACTED = '[REDACTED]';

/** Text fragments replaced wherever they appear in a message */
const REDACTION_RULES: readonly RegExp[] = [
    /Bearer\s+\S*/gi,
    /(?:token|password|secret|api[_-]?key)["\s:=]+[^"'\s,}]*/gi,
    /[\w.%+-]+@[\w.-]+\.[a-z]{2,}/gi,
];

/** A key containing any of these has its whole value replaced */
const REDACTED_KEY_FRAGMENTS: readonly string[] = ['token', 'password', 'secret', 'key', 'email'];

/**
 * Replaces credentials and email addresses in free text.
 *
 * @example
 * scrubSensitiveData('retry with token=abc'); // 'retry with [REDACTED]'
 */
export function scrubSensitiveData(text: string): string {
    return REDACTION_RULES.reduce((current, rule) => current.replace(rule, REDACTED), text);
}

function hasRedactedKey(key: string): boolean {
    const lower = key.toLowerCase();
    return REDACTED_KEY_FRAGMENTS.some((fragment) => lower.includes(fragment));
}

function redactValue(value: unknown): unknown {
    if (typeof value === 'string') return scrubSensitiveData(value);
    if (Array.isArray(value)) return value.map(redactValue);
    if (typeof value === 'object' && value !== null) {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Copy of an object with sensitive keys blanked and all nested text redacted.
 */
export function scrubRecord(source: Readonly<Record<string, unknown>>): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(source).map(([key, value]) => [key, hasRedactedKey(key) ? REDACTED : redactValue(value)])
    );
}

// ==================== SENTRY HOOKS ====================

/**
 * `beforeSend` hook: redacts exception messages, stack frame paths,
 * breadcrumbs, request URLs and extras in place.
 */
export const scrubEvent: NonNullable<NodeOptions['beforeSend']> = (event) => {
    event.exception?.values?.forEach((exception) => {
        if (exception.value) exception.value = scrubSensitiveData(exception.value);
        exception.stacktrace?.frames?.forEach((frame) => {
            if (frame.filename) frame.filename = scrubSensitiveData(frame.filename);
        });
    });

    event.breadcrumbs?.forEach((breadcrumb) => {
        if (breadcrumb.message) breadcrumb.message = scrubSensitiveData(breadcrumb.message);
        if (breadcrumb.data) breadcrumb.data = scrubRecord(breadcrumb.data);
    });

    const request = event.request;
    if (request?.url) request.url = scrubSensitiveData(request.url);
    if (request && typeof request.query_string === 'string') {
        request.query_string = scrubSensitiveData(request.query_string);
    }

    if (event.extra) event.extra = scrubRecord(event.extra);
    return event;
};

/**
 * `beforeBreadcrumb` hook: debug console output stays local.
 */
export const filterBreadcrumb: NonNullable<NodeOptions['beforeBreadcrumb']> = (breadcrumb) =>
    breadcrumb.category === 'console' && breadcrumb.level === 'debug' ? null : breadcrumb;

// ==================== LIFECYCLE ====================

/**
 * Reporter settings for an environment. SENTRY_DSN replaces the DSN baked
 * into the build.
 */
export function sentryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SentryConfig {
    return {
        dsn: env[ENV_KEYS.SENTRY_DSN] ?? SENTRY_DSN,
        environment: env.NODE_ENV ?? 'development',
        release: env.npm_package_version ?? '0.0.0',
        debug: env[ENV_KEYS.DEBUG] === 'true',
    };
}

function isPlaceholderDsn(dsn: string): boolean {
    return dsn === '' || dsn.startsWith('__');
}

/**
 * Starts the Sentry client. Repeated calls after a successful start do nothing.
 *
 * @returns true when reports will be sent
 */
export function initErrorReporting(config: SentryConfig): boolean {
    if (state.enabled) return true;

    if (isPlaceholderDsn(config.dsn)) {
        log.info('No Sentry DSN configured; reports stay local');
        return false;
    }

    try {
        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1.0,
            beforeSend: scrubEvent,
            beforeBreadcrumb: filterBreadcrumb,
        });
    } catch (error) {
        log.warn('Sentry client failed to start', error);
        return false;
    }

    if (state.datasetTag) Sentry.setTag('dataset_id', state.datasetTag);
    state.enabled = true;
    log.info(`Sentry reporting enabled (${config.environment})`);
    return true;
}

export function isErrorReportingEnabled(): boolean {
    return state.enabled;
}

/**
 * Waits for queued events to be sent. Call before the process exits.
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!state.enabled) return true;
    try {
        return await Sentry.flush(timeout);
    } catch (error) {
        log.warn('Flushing Sentry events failed', error);
        return false;
    }
}

/**
 * Flushes, shuts the client down and forgets the dataset tag.
 * initErrorReporting may start it again afterwards.
 */
export async function closeErrorReporting(timeout = 2000): Promise<boolean> {
    if (!state.enabled) return true;

    state.enabled = false;
    state.datasetTag = null;
    try {
        return await Sentry.close(timeout);
    } catch (error) {
        log.warn('Closing the Sentry client failed', error);
        return false;
    }
}

// ==================== REPORTING ====================

/** The part of a Sentry scope the reporter writes to */
interface ReportScope {
    setTag(key: string, value: string): unknown;
    setExtras(extras: Record<string, unknown>): unknown;
    setLevel(level: ReportLevel): unknown;
}

function tagScope(scope: ReportScope, context: ErrorContext | undefined, level: ReportLevel | undefined): void {
    if (level) scope.setLevel(level);
    if (context?.module) scope.setTag('module', context.module);
    if (context?.operation) scope.setTag('operation', context.operation);
    if (state.datasetTag) scope.setTag('dataset_id', state.datasetTag);
    if (context?.metadata) scope.setExtras(scrubRecord(context.metadata));
}

function label(context: ErrorContext | undefined): string {
    return `[${context?.module ?? 'Engine'}]`;
}

/**
 * Logs an error and, when reporting is on, sends it with its context.
 *
 * @example
 * reportError(error, { module: 'ReportEngine', operation: 'buildDimensionReports' });
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const exception = error instanceof Error ? error : new Error(error);
    log.error(`${label(context)} ${context?.operation ?? 'failure'}`, exception);

    if (!state.enabled) return;
    try {
        Sentry.withScope((scope) => {
            tagScope(scope, context, context?.level);
            Sentry.captureException(exception);
        });
    } catch (sentryError) {
        log.warn('Sentry rejected an error report', sentryError);
    }
}

/**
 * Logs a message and, when reporting is on, sends it as a Sentry message event.
 */
export function reportMessage(
    message: string,
    level: ReportLevel = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const line = `${label(context)} ${message}`;
    if (level === 'fatal' || level === 'error') {
        log.error(line);
    } else {
        log.warn(line);
    }

    if (!state.enabled) return;
    try {
        Sentry.withScope((scope) => {
            tagScope(scope, context, level);
            Sentry.captureMessage(scrubSensitiveData(message));
        });
    } catch (sentryError) {
        log.warn('Sentry rejected a message report', sentryError);
    }
}

/**
 * Tags later reports with a hash of the caller's dataset id; null clears it.
 */
export function setDatasetContext(datasetId: string | null): void {
    state.datasetTag = datasetId ? hashString(datasetId) : null;
    if (state.enabled && state.datasetTag) Sentry.setTag('dataset_id', state.datasetTag);
}

/**
 * Records a step in the trail attached to later events. No-op while disabled.
 */
export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    if (!state.enabled) return;
    Sentry.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

/**
 * 32-bit FNV-1a of a string, as lowercase hex.
 */
export function hashString(text: string): string {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash = Math.imul(hash ^ text.charCodeAt(i), 0x01000193);
    }
    return (hash >>> 0).toString(16);
}
