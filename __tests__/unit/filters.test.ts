import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '../../js/errors.js';
import { describeSelection, filterPlannedRecords, filterTimeRecords, resolveDateRange } from '../../js/filters.js';
import type { TimeRecordSet } from '../../js/types.js';
import { plannedSet, recordSet } from '../helpers/records.js';

const RECORDS = recordSet([
    { projectNumber: 'P1', customerNumber: 'C1', person: 'ann', date: '2024-01-10', hoursWorked: 10, billableHours: 10, hourlyRate: 100 },
    { projectNumber: 'P1', customerNumber: 'C1', person: 'bob', date: '2024-02-10', hoursWorked: 10, billableHours: 0, hourlyRate: 100 },
    { projectNumber: 'P2', customerNumber: 'C2', person: 'ann', date: '2024-02-20', hoursWorked: 5, billableHours: 5, hourlyRate: 50 },
    { projectNumber: 'P3', customerNumber: 'C2', person: 'bob', date: '2024-03-05', hoursWorked: 30, billableHours: 15, hourlyRate: 80 },
]);

function datesOf(set: TimeRecordSet): string[] {
    return set.records.map((record) => record.date);
}

describe('resolveDateRange', () => {
    it('resolves calendar periods to inclusive ranges', () => {
        expect(resolveDateRange({ period: 'years', startYear: 2023, endYear: 2024 })).toEqual({
            start: '2023-01-01',
            end: '2024-12-31',
        });
        expect(resolveDateRange({ period: 'quarter', year: 2024, quarter: 1 })).toEqual({
            start: '2024-01-01',
            end: '2024-03-31',
        });
        expect(resolveDateRange({ period: 'month', year: 2024, month: 2 })).toEqual({
            start: '2024-02-01',
            end: '2024-02-29',
        });
        expect(resolveDateRange({ period: 'days', start: '2024-03-01', end: '2024-03-05T08:00:00Z' })).toEqual({
            start: '2024-03-01',
            end: '2024-03-05',
        });
    });

    it('numbers weeks from the first Monday of the year', () => {
        expect(resolveDateRange({ period: 'week', year: 2024, week: 1 })).toEqual({
            start: '2024-01-01',
            end: '2024-01-07',
        });
        expect(resolveDateRange({ period: 'week', year: 2023, week: 2 })).toEqual({
            start: '2023-01-09',
            end: '2023-01-15',
        });
    });

    it('rejects impossible selections', () => {
        expect(() => resolveDateRange({ period: 'quarter', year: 2024, quarter: 5 })).toThrow(
            'quarter must be a whole number from 1 to 4, got 5'
        );
        expect(() => resolveDateRange({ period: 'days', start: '2024-03-05', end: '2024-03-01' })).toThrow(ValidationError);
        expect(() => resolveDateRange({ period: 'years', startYear: 2025, endYear: 2024 })).toThrow(ValidationError);
    });
});

describe('describeSelection', () => {
    it('labels selections', () => {
        expect(describeSelection({ period: 'years', startYear: 2024, endYear: 2024 })).toBe('2024');
        expect(describeSelection({ period: 'years', startYear: 2023, endYear: 2024 })).toBe('2023 - 2024');
        expect(describeSelection({ period: 'quarter', year: 2024, quarter: 3 })).toBe('Q3 2024');
        expect(describeSelection({ period: 'month', year: 2024, month: 2 })).toBe('Feb 2024');
        expect(describeSelection({ period: 'week', year: 2024, week: 1 })).toBe('Week 1 2024 (2024-01-01 to 2024-01-07)');
        expect(describeSelection({ period: 'days', start: '2024-03-05', end: '2024-03-05' })).toBe('2024-03-05');
    });
});

describe('filterTimeRecords', () => {
    it('keeps records inside the date range without touching the input', () => {
        const filtered = filterTimeRecords(RECORDS, { dateRange: { start: '2024-02-01', end: '2024-02-29' } });

        expect(datesOf(filtered)).toEqual(['2024-02-10', '2024-02-20']);
        expect(filtered.capability).toBe(RECORDS.capability);
        expect(filtered.columns).toBe(RECORDS.columns);
        expect(RECORDS.records).toHaveLength(4);
    });

    it('combines include and exclude lists', () => {
        const filtered = filterTimeRecords(RECORDS, {
            customerNumber: { include: ['C2'] },
            person: { exclude: ['bob'] },
            activity: { include: [] },
        });

        expect(datesOf(filtered)).toEqual(['2024-02-20']);
    });

    it('filters projects by total hours', () => {
        expect(datesOf(filterTimeRecords(RECORDS, { projectHours: { min: 10 } }))).toEqual([
            '2024-01-10',
            '2024-02-10',
            '2024-03-05',
        ]);
        expect(datesOf(filterTimeRecords(RECORDS, { projectHours: { min: 10, max: 25 } }))).toEqual([
            '2024-01-10',
            '2024-02-10',
        ]);
    });

    it('filters projects by effective rate', () => {
        // P1: 1000 / 20 = 50, P2: 250 / 5 = 50, P3: 1200 / 30 = 40
        expect(datesOf(filterTimeRecords(RECORDS, { projectEffectiveRate: { min: 45 } }))).toEqual([
            '2024-01-10',
            '2024-02-10',
            '2024-02-20',
        ]);
    });

    it('ignores the effective rate range without an hourly rate column', () => {
        const hoursOnly = recordSet([{ hoursWorked: 8 }, { hoursWorked: 4, date: '2024-03-05' }]);

        expect(filterTimeRecords(hoursOnly, { projectEffectiveRate: { min: 1000 } }).records).toHaveLength(2);
    });

    it('splits billable from non-billable records', () => {
        expect(datesOf(filterTimeRecords(RECORDS, { billability: 'nonBillable' }))).toEqual(['2024-02-10']);
        expect(datesOf(filterTimeRecords(RECORDS, { billability: 'billable' }))).toEqual([
            '2024-01-10',
            '2024-02-20',
            '2024-03-05',
        ]);
        expect(filterTimeRecords(RECORDS, { billability: 'all' }).records).toHaveLength(4);
    });

    it('warns when nothing matches', () => {
        const filtered = filterTimeRecords(RECORDS, { person: { include: ['zoe'] } });

        expect(filtered.records).toEqual([]);
        expect(filtered.warnings).toEqual([
            { code: 'NO_MATCHING_RECORDS', message: 'No time records match the filter', details: { recordsBefore: 4 } },
        ]);
        expect(RECORDS.warnings).toEqual([]);
    });

    it('rejects an inverted date range', () => {
        expect(() => filterTimeRecords(RECORDS, { dateRange: { start: '2024-03-01', end: '2024-01-01' } })).toThrow(
            ValidationError
        );
    });
});

describe('filterPlannedRecords', () => {
    it('applies date range, project and person lists', () => {
        const planned = plannedSet([
            { date: '2024-01-01', person: 'ann', projectNumber: 'P1' },
            { date: '2024-02-01', person: 'ann', projectNumber: 'P2' },
            { date: '2024-02-01', person: 'bob', projectNumber: 'P1' },
        ]);

        const filtered = filterPlannedRecords(planned, {
            dateRange: { start: '2024-02-01', end: '2024-12-31' },
            person: { include: ['ann'] },
        });

        expect(filtered.records.map((record) => record.projectNumber)).toEqual(['P2']);
        expect(filterPlannedRecords(planned, { projectNumber: { exclude: ['P1'] } }).records).toHaveLength(1);
        expect(filterPlannedRecords(planned, { person: { include: ['zoe'] } }).warnings[0].code).toBe(
            'NO_MATCHING_RECORDS'
        );
    });
});
