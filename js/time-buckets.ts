/**
 * @fileoverview Time-Bucketing
 * Derives calendar keys (Year, Month, Month name, YYYY-MM sort key) from a
 * record date. Every temporal aggregation goes through here.
 *
 * Month names come from the fixed MONTH_NAMES table, never from Intl, so the
 * output does not change with the host locale.
 */

import { MONTH_NAMES } from './constants.js';
import { IsoUtils } from './utils.js';
import type { TimeBucket } from './types.js';

/**
 * Builds the sortable month key.
 *
 * @example
 * toMonthKey(2024, 3); // '2024-03'
 */
export function toMonthKey(year: number, month: number): string {
    return `${year}-${String(month).padStart(2, '0')}`;
}

/**
 * Month abbreviation for a 1-based month number.
 */
export function monthNameOf(month: number): string {
    return MONTH_NAMES[month - 1] ?? '';
}

/**
 * Bucket for a year/month pair.
 */
export function bucketOf(year: number, month: number): TimeBucket {
    return {
        year,
        month,
        monthName: monthNameOf(month),
        monthKey: toMonthKey(year, month),
    };
}

/**
 * Derives the calendar bucket of a YYYY-MM-DD date.
 * Returns null for strings that are not real dates.
 */
export function bucketDate(date: string): TimeBucket | null {
    const parsed = IsoUtils.parseDate(date);
    if (!parsed) return null;
    return bucketOf(parsed.getUTCFullYear(), parsed.getUTCMonth() + 1);
}

/**
 * Annotates each record with its calendar bucket. Input records are not
 * mutated; records whose date does not parse are dropped (ingestion already
 * filters those out with a warning).
 */
export function annotateTimeBuckets<R extends { date: string }>(records: readonly R[]): (R & TimeBucket)[] {
    const annotated: (R & TimeBucket)[] = [];
    for (const record of records) {
        const bucket = bucketDate(record.date);
        if (bucket) {
            annotated.push({ ...record, ...bucket });
        }
    }
    return annotated;
}

/**
 * Chronological comparator on year then month.
 */
export function compareBuckets(
    a: { year: number; month: number },
    b: { year: number; month: number }
): number {
    return a.year - b.year || a.month - b.month;
}

/**
 * True when (year, month) lies strictly before the month of the reference date.
 */
export function isBeforeMonth(
    bucket: { year: number; month: number },
    reference: { year: number; month: number }
): boolean {
    return compareBuckets(bucket, reference) < 0;
}

/**
 * Display label such as 'Mar 2024'.
 */
export function bucketLabel(bucket: { year: number; month: number }): string {
    return `${monthNameOf(bucket.month)} ${bucket.year}`;
}
