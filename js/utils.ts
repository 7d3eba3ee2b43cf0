/**
 * @fileoverview Utility Functions
 * Input checks, error classification, safe arithmetic and ISO date helpers
 * shared by the engine modules.
 */

import { ERROR_MESSAGES, ERROR_TYPES, type ErrorType, type FriendlyError } from './constants.js';
import { ValidationError, isEngineError } from './errors.js';

// ==================== INPUT CHECKS ====================

/**
 * Reads a required numeric argument; numeric strings are accepted.
 *
 * @throws ValidationError when the value is blank or not a number
 */
export function requireNumber(value: unknown, field: string): number {
    if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
        throw new ValidationError(field, `${field} is required`);
    }
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
        throw new ValidationError(field, `${field} must be a number, got '${String(value)}'`);
    }
    return parsed;
}

/**
 * Reads a required calendar date and returns it as YYYY-MM-DD.
 * Anything after the date part (a time, a zone) is dropped.
 *
 * @throws ValidationError when the value is not a real YYYY-MM-DD date
 */
export function requireIsoDate(value: unknown, field: string): string {
    const normalized = IsoUtils.normalizeDate(value);
    if (normalized === null) {
        throw new ValidationError(field, `${field} must be a date in YYYY-MM-DD form, got '${String(value)}'`);
    }
    return normalized;
}

/**
 * Checks an inclusive date range and returns its normalized bounds.
 *
 * @example
 * requireDateRange('2024-01-01', '2024-03-31T12:00:00Z'); // { start: '2024-01-01', end: '2024-03-31' }
 */
export function requireDateRange(start: unknown, end: unknown): { start: string; end: string } {
    const range = { start: requireIsoDate(start, 'start'), end: requireIsoDate(end, 'end') };
    // ISO dates compare correctly as strings
    if (range.start > range.end) {
        throw new ValidationError('start', `Range start ${range.start} is after its end ${range.end}`);
    }
    return range;
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Maps any thrown value onto one of the ERROR_TYPES.
 * Engine errors carry their own type; YAML and JSON parse failures count as
 * configuration errors.
 */
export function classifyError(error: unknown): ErrorType {
    if (isEngineError(error)) return error.type;
    if (error instanceof SyntaxError) return ERROR_TYPES.CONFIG;
    if (error instanceof Error && error.name === 'YAMLException') return ERROR_TYPES.CONFIG;
    return ERROR_TYPES.UNKNOWN;
}

/**
 * Wraps an error with the title, message and suggested action shown to users.
 *
 * @param type - Overrides the classified type
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const cause = error instanceof Error ? error : new Error(error);
    const resolved = type ?? classifyError(cause);
    const { title, message, action } = ERROR_MESSAGES[resolved];

    return {
        type: resolved,
        title,
        message,
        action,
        originalError: cause,
        timestamp: new Date().toISOString(),
        stack: cause.stack,
    };
}

// ==================== NUMERIC HELPERS ====================

/**
 * Half-up rounding at a fixed number of decimals. Non-finite input reads as 0.
 *
 * @example
 * round(2.345678, 2); // 2.35
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const scale = 10 ** decimals;
    return Math.round((num + Number.EPSILON) * scale) / scale;
}

/**
 * Division that never yields NaN or Infinity.
 *
 * @example
 * safeDivide(10, 0); // 0
 * safeDivide(10, 4); // 2.5
 */
export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
    if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
        return fallback;
    }
    return numerator / denominator;
}

/**
 * Percentage of part in whole, rounded, 0 when whole is 0.
 */
export function percentage(part: number, whole: number, decimals = 2): number {
    return round(safeDivide(part, whole) * 100, decimals);
}

/**
 * Reads a loosely typed cell as a number; blanks and unparseable values read as 0.
 */
export function toNumber(value: unknown): number {
    if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim().replace(',', '.'));
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

// ==================== DATE UTILITIES ====================

/**
 * ISO date helpers. All dates are handled at UTC midnight so results do not
 * depend on the host timezone.
 */
export const IsoUtils = {
    /**
     * Converts a Date to YYYY-MM-DD (UTC).
     */
    toISODate(date: Date | null): string {
        return date ? date.toISOString().slice(0, 10) : '';
    },

    /**
     * Parses YYYY-MM-DD (optionally followed by a time part) into a UTC-midnight Date.
     * Returns null when the string is not a real calendar date.
     */
    parseDate(dateStr: string | null | undefined): Date | null {
        if (!dateStr) return null;
        const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(dateStr.trim());
        if (!match) return null;
        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);
        const date = new Date(Date.UTC(year, month - 1, day));
        if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
        return date;
    },

    /**
     * Normalizes a date-like cell (Date or ISO string) to YYYY-MM-DD.
     */
    normalizeDate(value: unknown): string | null {
        if (value instanceof Date) {
            return isNaN(value.getTime()) ? null : IsoUtils.toISODate(value);
        }
        if (typeof value === 'string') {
            const parsed = IsoUtils.parseDate(value);
            return parsed ? IsoUtils.toISODate(parsed) : null;
        }
        return null;
    },

    /**
     * Returns the Monday (ISO week start) of the week containing dateStr.
     */
    getWeekStart(dateStr: string): string {
        const date = IsoUtils.parseDate(dateStr);
        if (!date) return '';
        const offset = (date.getUTCDay() + 6) % 7;
        date.setUTCDate(date.getUTCDate() - offset);
        return IsoUtils.toISODate(date);
    },

    /**
     * Whole days from start to end (negative if end is earlier).
     */
    daysBetween(start: string, end: string): number {
        const s = IsoUtils.parseDate(start);
        const e = IsoUtils.parseDate(end);
        if (!s || !e) return 0;
        return Math.round((e.getTime() - s.getTime()) / 86400000);
    },
};

/**
 * Formats a list of ids for a warning, truncated after `max` entries.
 *
 * @example
 * formatIdList(['a', 'b', 'c'], 2); // 'a, b...'
 */
export function formatIdList(ids: string[], max: number): string {
    const shown = ids.slice(0, max).join(', ');
    return ids.length > max ? `${shown}...` : shown;
}
