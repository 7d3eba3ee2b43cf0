/**
 * @fileoverview Engine Constants
 * Contains global constants, configuration defaults, source column names and
 * error message tables used across the engine.
 */

import type { FriendlyError } from './types.js';

// ==================== ERROR TRACKING ====================

/**
 * Sentry DSN for error tracking.
 * Replace the placeholder (or set SENTRY_DSN in the environment) to enable reporting.
 * Set to empty string to disable error reporting.
 */
export const SENTRY_DSN = '__SENTRY_DSN__';

/**
 * Environment variables read by the engine.
 */
export const ENV_KEYS = {
    /** Forces DEBUG log level when 'true'. */
    DEBUG: 'ENGINE_DEBUG',
    /** Explicit log level name (DEBUG, INFO, WARN, ERROR, NONE). */
    LOG_LEVEL: 'LOG_LEVEL',
    /** 'json' for one JSON object per log line, text otherwise. */
    LOG_FORMAT: 'LOG_FORMAT',
    /** Aggregate cache TTL in milliseconds. */
    CACHE_TTL_MS: 'ENGINE_CACHE_TTL_MS',
    /** 'true' to run dimension aggregation on worker threads. */
    USE_WORKERS: 'ENGINE_USE_WORKERS',
    /** Number of worker threads in the pool. */
    WORKER_POOL_SIZE: 'ENGINE_WORKER_POOL_SIZE',
    /** 'include' or 'exclude' for absence ids missing from the capacity config. */
    UNLISTED_ABSENCE_POLICY: 'ENGINE_UNLISTED_ABSENCE_POLICY',
    /** Default billable target ratio, 0-1. */
    BILLABLE_TARGET: 'ENGINE_BILLABLE_TARGET',
    /** Sentry DSN override. */
    SENTRY_DSN: 'SENTRY_DSN',
} as const;

/**
 * Aggregate cache TTL in milliseconds (5 minutes).
 */
export const AGGREGATE_CACHE_TTL = 5 * 60 * 1000;

/**
 * Most aggregates the cache holds before the oldest are dropped.
 */
export const AGGREGATE_CACHE_MAX_ENTRIES = 256;

/**
 * How long a worker thread may take to report ready.
 */
export const WORKER_INIT_TIMEOUT_MS = 5000;

/**
 * Global engine constants.
 */
export const CONSTANTS = {
    /** Share of available capacity expected to be billable. */
    DEFAULT_BILLABLE_TARGET: 0.8,
    /** Potential hours per day worked, for utilization. */
    STANDARD_HOURS_PER_DAY: 8,
    /** Average year length used for "years spanned". */
    DAYS_PER_YEAR: 365.25,
    /** Default length of top-N lists. */
    DEFAULT_TOP_N: 10,
    /** Ids listed in a warning before it is truncated with '...'. */
    MAX_LISTED_IDS: 5,
    /** Default worker pool size. */
    DEFAULT_WORKER_POOL_SIZE: 2,
    /** Value used for blank descriptive fields. */
    UNKNOWN_LABEL: 'Unknown',
} as const;

/**
 * Fixed month abbreviations, independent of the platform locale.
 */
export const MONTH_NAMES = [
    'Jan',
    'Feb',
    'Mar',
    'Apr',
    'May',
    'Jun',
    'Jul',
    'Aug',
    'Sep',
    'Oct',
    'Nov',
    'Dec',
] as const;

// ==================== SOURCE COLUMNS ====================

/**
 * Column names of the time record export.
 */
export const TIME_RECORD_COLUMNS = {
    date: 'Date',
    customerNumber: 'Customer number',
    customerName: 'Customer name',
    projectNumber: 'Project number',
    projectName: 'Project',
    projectType: 'Project type',
    priceModel: 'Price model',
    phase: 'Phase',
    activity: 'Activity',
    person: 'Person',
    personType: 'Person type',
    hoursWorked: 'Hours worked',
    billableHours: 'Billable hours',
    hourlyRate: 'Hourly rate',
    fee: 'Fee per time record',
    cost: 'Cost per time record',
    profit: 'Profit per time record',
} as const;

/**
 * Column names of the planned hours export.
 */
export const PLANNED_RECORD_COLUMNS = {
    date: 'Date',
    person: 'Person',
    projectNumber: 'Project number',
    projectName: 'Project',
    plannedHours: 'Planned hours',
    plannedRate: 'Planned rate',
} as const;

/**
 * Column names of the weekly schedule/absence export.
 */
export const WEEKLY_COLUMNS = {
    PERIOD_FROM: 'Period from',
    PERSON: 'Person',
    TOTAL_AGREED_HOURS: 'Total agreed hours',
    ABSENCE_PREFIX: 'Absence ',
    ABSENCE_SUFFIX: ' hours',
} as const;

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    MISSING_KEY_COLUMN: 'MISSING_KEY_COLUMN',
    VALIDATION: 'VALIDATION_ERROR',
    CONFIG: 'CONFIG_ERROR',
    WORKER: 'WORKER_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: FriendlyError['action'];
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.MISSING_KEY_COLUMN]: {
        title: 'Missing Column',
        message: 'The record set is missing a column needed for this report. Add the column to the export and try again.',
        action: 'fix-input',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'The input contains values that could not be read. Please check the source data.',
        action: 'fix-input',
    },
    [ERROR_TYPES.CONFIG]: {
        title: 'Configuration Error',
        message: 'The capacity configuration could not be read. Check that it is valid YAML or JSON.',
        action: 'fix-input',
    },
    [ERROR_TYPES.WORKER]: {
        title: 'Worker Error',
        message: 'A background calculation failed. The report can be generated again.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred. Please try again or contact support if the issue persists.',
        action: 'none',
    },
};

// Re-export types for convenience
export type { FriendlyError };
