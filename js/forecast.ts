/**
 * @fileoverview Forecast Accumulator
 * Builds the month-ordered hours forecast: actual hours for months before the
 * reference month, planned hours from the reference month on, and the
 * running total of both.
 *
 * The reference date is always passed in; nothing here reads the clock.
 */

import { ERROR_TYPES } from './constants.js';
import { EngineError } from './errors.js';
import { bucketLabel, bucketOf, compareBuckets, isBeforeMonth } from './time-buckets.js';
import { IsoUtils, round } from './utils.js';
import type { ForecastPoint, ForecastResult, MergedDimensionRow, MonthlyHours } from './types.js';

/**
 * Resolves the reference month from a Date or YYYY-MM-DD string.
 *
 * @throws EngineError (VALIDATION) when the value is not a calendar date.
 */
function referenceMonth(referenceDate: Date | string): { year: number; month: number } {
    const date = typeof referenceDate === 'string' ? IsoUtils.parseDate(referenceDate) : referenceDate;
    if (!date || isNaN(date.getTime())) {
        throw new EngineError(`Invalid forecast reference date: ${String(referenceDate)}`, ERROR_TYPES.VALIDATION);
    }
    return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/**
 * Splices actual and planned hours around the reference month and
 * accumulates them.
 *
 * @param monthlySeries - One entry per month, any order.
 * @param referenceDate - "Now" for the forecast; months strictly before its month are Actual.
 * @returns Chronological series with running totals, and the final total.
 *
 * @example
 * accumulateForecast(
 *   [{ year: 2024, month: 1, hoursWorked: 100, plannedHours: 90 },
 *    { year: 2024, month: 2, hoursWorked: 10, plannedHours: 80 }],
 *   '2024-02-15'
 * );
 * // series[0]: Actual, monthValue 100, accumulatedForecast 100
 * // series[1]: Planned, monthValue 80, accumulatedForecast 180
 */
export function accumulateForecast(
    monthlySeries: readonly MonthlyHours[],
    referenceDate: Date | string
): ForecastResult {
    const reference = referenceMonth(referenceDate);
    const ordered = [...monthlySeries].sort(compareBuckets);

    let runningTotal = 0;
    const series = ordered.map((entry): ForecastPoint => {
        const isActual = isBeforeMonth(entry, reference);
        const monthValue = isActual ? entry.hoursWorked : entry.plannedHours;
        runningTotal += monthValue;
        const bucket = bucketOf(entry.year, entry.month);

        return {
            year: entry.year,
            month: entry.month,
            hoursWorked: entry.hoursWorked,
            plannedHours: entry.plannedHours,
            monthName: bucket.monthName,
            monthKey: bucket.monthKey,
            label: bucketLabel(entry),
            timePeriod: isActual ? 'Actual' : 'Planned',
            monthValue,
            accumulatedForecast: round(runningTotal),
        };
    });

    return { series, runningTotal: round(runningTotal) };
}

/**
 * Extracts the monthly hours series from month-dimension merged rows.
 * Rows without numeric year/month keys are ignored.
 */
export function toMonthlySeries(rows: readonly MergedDimensionRow[]): MonthlyHours[] {
    const series: MonthlyHours[] = [];
    for (const row of rows) {
        const { year, month } = row.key;
        if (typeof year !== 'number' || typeof month !== 'number') continue;
        series.push({ year, month, hoursWorked: row.hoursWorked, plannedHours: row.plannedHours });
    }
    return series;
}
