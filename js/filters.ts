/**
 * @fileoverview Record Filters
 * Narrows a record set before it is reported on: a date range (given directly
 * or resolved from a year/quarter/month/week selection), include and exclude
 * lists per dimension value, project-level hour and effective-rate ranges,
 * and a billable/non-billable switch.
 *
 * Filters return a new record set with the same columns and capability; the
 * input set is never modified.
 */

import { createLogger } from './logger.js';
import { ValidationError } from './errors.js';
import { monthNameOf } from './time-buckets.js';
import { IsoUtils, requireDateRange, requireNumber, round, safeDivide } from './utils.js';
import type { EngineWarning, PlannedRecordSet, TimeRecord, TimeRecordSet } from './types.js';

const log = createLogger('Filters');

// ==================== DATE RANGES ====================

/** Inclusive range of YYYY-MM-DD dates */
export interface DateRange {
    start: string;
    end: string;
}

/**
 * A calendar period picked by a caller.
 * Weeks are numbered from the first Monday of the year; days before it belong
 * to no week of that year.
 */
export type PeriodSelection =
    | { period: 'years'; startYear: number; endYear: number }
    | { period: 'quarter'; year: number; quarter: number }
    | { period: 'month'; year: number; month: number }
    | { period: 'week'; year: number; week: number }
    | { period: 'days'; start: string; end: string };

function utcDate(year: number, month: number, day: number): Date {
    return new Date(Date.UTC(year, month - 1, day));
}

function lastDayOfMonth(year: number, month: number): string {
    // Day 0 of the next month
    return IsoUtils.toISODate(utcDate(year, month + 1, 0));
}

function requireInRange(value: number, field: string, min: number, max: number): number {
    const parsed = requireNumber(value, field);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        throw new ValidationError(field, `${field} must be a whole number from ${min} to ${max}, got ${parsed}`);
    }
    return parsed;
}

/**
 * Start and end date of a period selection.
 *
 * @example
 * resolveDateRange({ period: 'quarter', year: 2024, quarter: 1 });
 * // { start: '2024-01-01', end: '2024-03-31' }
 *
 * @throws ValidationError for out-of-range numbers or an inverted range
 */
export function resolveDateRange(selection: PeriodSelection): DateRange {
    switch (selection.period) {
        case 'years': {
            const startYear = requireInRange(selection.startYear, 'startYear', 1000, 9999);
            const endYear = requireInRange(selection.endYear, 'endYear', 1000, 9999);
            return requireDateRange(`${startYear}-01-01`, `${endYear}-12-31`);
        }
        case 'quarter': {
            const year = requireInRange(selection.year, 'year', 1000, 9999);
            const quarter = requireInRange(selection.quarter, 'quarter', 1, 4);
            const firstMonth = (quarter - 1) * 3 + 1;
            return {
                start: IsoUtils.toISODate(utcDate(year, firstMonth, 1)),
                end: lastDayOfMonth(year, firstMonth + 2),
            };
        }
        case 'month': {
            const year = requireInRange(selection.year, 'year', 1000, 9999);
            const month = requireInRange(selection.month, 'month', 1, 12);
            return { start: IsoUtils.toISODate(utcDate(year, month, 1)), end: lastDayOfMonth(year, month) };
        }
        case 'week': {
            const year = requireInRange(selection.year, 'year', 1000, 9999);
            const week = requireInRange(selection.week, 'week', 1, 53);
            const janFirst = utcDate(year, 1, 1);
            const daysToMonday = (8 - janFirst.getUTCDay()) % 7;
            const start = utcDate(year, 1, 1 + daysToMonday + (week - 1) * 7);
            const end = utcDate(year, 1, 1 + daysToMonday + (week - 1) * 7 + 6);
            return { start: IsoUtils.toISODate(start), end: IsoUtils.toISODate(end) };
        }
        case 'days':
            return requireDateRange(selection.start, selection.end);
    }
}

/**
 * Human-readable label of a selection, for report headers.
 *
 * @example
 * describeSelection({ period: 'years', startYear: 2023, endYear: 2024 }); // '2023 - 2024'
 */
export function describeSelection(selection: PeriodSelection): string {
    switch (selection.period) {
        case 'years':
            return selection.startYear === selection.endYear
                ? String(selection.startYear)
                : `${selection.startYear} - ${selection.endYear}`;
        case 'quarter':
            return `Q${selection.quarter} ${selection.year}`;
        case 'month':
            return `${monthNameOf(selection.month)} ${selection.year}`;
        case 'week': {
            const { start, end } = resolveDateRange(selection);
            return `Week ${selection.week} ${selection.year} (${start} to ${end})`;
        }
        case 'days': {
            const { start, end } = resolveDateRange(selection);
            return start === end ? start : `${start} to ${end}`;
        }
    }
}

// ==================== FILTER CRITERIA ====================

/**
 * Include and exclude lists for one dimension. An empty or missing include
 * list keeps every value.
 */
export interface ValueFilter {
    include?: readonly string[];
    exclude?: readonly string[];
}

/** Inclusive numeric bounds; a missing bound is open */
export interface NumericRange {
    min?: number;
    max?: number;
}

export type BillabilityFilter = 'all' | 'billable' | 'nonBillable';

type ValueFilterField = 'customerNumber' | 'projectNumber' | 'projectType' | 'priceModel' | 'activity' | 'person' | 'personType';

export interface TimeRecordFilter extends Partial<Record<ValueFilterField, ValueFilter>> {
    dateRange?: DateRange;
    /** Keeps projects whose total hours fall in the range */
    projectHours?: NumericRange;
    /**
     * Keeps projects whose billable hours × rate, divided by hours worked,
     * fall in the range. Ignored when the set carries no hourly rate.
     */
    projectEffectiveRate?: NumericRange;
    /** 'billable' keeps records with any billable hours; 'nonBillable' those with none */
    billability?: BillabilityFilter;
}

export interface PlannedRecordFilter {
    dateRange?: DateRange;
    projectNumber?: ValueFilter;
    person?: ValueFilter;
}

const VALUE_FILTER_FIELDS: readonly ValueFilterField[] = [
    'customerNumber',
    'projectNumber',
    'projectType',
    'priceModel',
    'activity',
    'person',
    'personType',
];

function valuePredicate(filter: ValueFilter | undefined): ((value: string) => boolean) | null {
    const include = filter?.include ?? [];
    const exclude = filter?.exclude ?? [];
    if (include.length === 0 && exclude.length === 0) return null;

    const included = new Set(include);
    const excluded = new Set(exclude);
    return (value) => (included.size === 0 || included.has(value)) && !excluded.has(value);
}

function inRange(value: number, range: NumericRange): boolean {
    return (range.min === undefined || value >= range.min) && (range.max === undefined || value <= range.max);
}

function checkedRange(range: DateRange | undefined): DateRange | null {
    return range ? requireDateRange(range.start, range.end) : null;
}

interface ProjectTotals {
    hours: number;
    rateRevenue: number;
}

function projectTotals(records: readonly TimeRecord[]): Map<string, ProjectTotals> {
    const totals = new Map<string, ProjectTotals>();
    for (const record of records) {
        const entry = totals.get(record.projectNumber) ?? { hours: 0, rateRevenue: 0 };
        entry.hours += record.hoursWorked;
        entry.rateRevenue += record.billableHours * (record.hourlyRate ?? 0);
        totals.set(record.projectNumber, entry);
    }
    return totals;
}

function projectsWhere(totals: Map<string, ProjectTotals>, keep: (entry: ProjectTotals) => boolean): Set<string> {
    const projects = new Set<string>();
    for (const [project, entry] of totals) {
        if (keep(entry)) projects.add(project);
    }
    return projects;
}

function noMatchWarning(kind: string, before: number): EngineWarning {
    return {
        code: 'NO_MATCHING_RECORDS',
        message: `No ${kind} records match the filter`,
        details: { recordsBefore: before },
    };
}

// ==================== APPLYING FILTERS ====================

/**
 * Applies a filter to time records. Steps run in order: date range, value
 * lists, project hours, project effective rate, billability. Project-level
 * ranges are measured on the records left by the earlier steps.
 *
 * @throws ValidationError when the date range is unreadable or inverted
 */
export function filterTimeRecords(recordSet: TimeRecordSet, filter: TimeRecordFilter): TimeRecordSet {
    const range = checkedRange(filter.dateRange);
    let records: readonly TimeRecord[] = recordSet.records;

    if (range) {
        records = records.filter((record) => record.date >= range.start && record.date <= range.end);
    }

    for (const field of VALUE_FILTER_FIELDS) {
        const keep = valuePredicate(filter[field]);
        if (keep) records = records.filter((record) => keep(record[field]));
    }

    const { projectHours, projectEffectiveRate } = filter;
    if (projectHours) {
        const kept = projectsWhere(projectTotals(records), (entry) => inRange(round(entry.hours, 2), projectHours));
        records = records.filter((record) => kept.has(record.projectNumber));
    }
    if (projectEffectiveRate) {
        if (recordSet.columns.has('hourlyRate')) {
            const kept = projectsWhere(projectTotals(records), (entry) =>
                inRange(round(safeDivide(entry.rateRevenue, entry.hours), 2), projectEffectiveRate)
            );
            records = records.filter((record) => kept.has(record.projectNumber));
        } else {
            log.debug('Effective rate filter ignored: no hourly rate column');
        }
    }

    if (filter.billability === 'billable') {
        records = records.filter((record) => record.billableHours > 0);
    } else if (filter.billability === 'nonBillable') {
        records = records.filter((record) => record.billableHours === 0);
    }

    const warnings = [...recordSet.warnings];
    if (records.length === 0 && recordSet.records.length > 0) {
        warnings.push(noMatchWarning('time', recordSet.records.length));
    }
    log.debug(`Kept ${records.length} of ${recordSet.records.length} time records`);

    return { ...recordSet, records, warnings };
}

/**
 * Applies a date range and project/person lists to planned records.
 */
export function filterPlannedRecords(recordSet: PlannedRecordSet, filter: PlannedRecordFilter): PlannedRecordSet {
    const range = checkedRange(filter.dateRange);
    const keepProject = valuePredicate(filter.projectNumber);
    const keepPerson = valuePredicate(filter.person);

    const records = recordSet.records.filter(
        (record) =>
            (!range || (record.date >= range.start && record.date <= range.end)) &&
            (!keepProject || keepProject(record.projectNumber)) &&
            (!keepPerson || keepPerson(record.person))
    );

    const warnings = [...recordSet.warnings];
    if (records.length === 0 && recordSet.records.length > 0) {
        warnings.push(noMatchWarning('planned', recordSet.records.length));
    }

    return { ...recordSet, records, warnings };
}
