import { describe, it, expect } from '@jest/globals';
import { aggregate, aggregateDimension, orderRows, sortByMetric } from '../../js/aggregate.js';
import { MissingKeyColumnError } from '../../js/errors.js';
import { recordSet } from '../helpers/records.js';
import type { TimeRecordField } from '../../js/types.js';

const WITHOUT_PHASE: TimeRecordField[] = [
    'date',
    'customerNumber',
    'customerName',
    'projectNumber',
    'projectName',
    'person',
    'hoursWorked',
    'billableHours',
];

describe('aggregate', () => {
    it('sums hours and derives billability per key', () => {
        const rows = aggregate(
            recordSet([
                { projectNumber: 'P1', hoursWorked: 10, billableHours: 8 },
                { projectNumber: 'P1', hoursWorked: 5, billableHours: 0 },
                { projectNumber: 'P2', hoursWorked: 4, billableHours: 4 },
            ]),
            ['projectNumber']
        );

        expect(rows).toHaveLength(2);
        expect(rows[0]).toMatchObject({
            key: { projectNumber: 'P1' },
            recordCount: 2,
            hoursWorked: 15,
            billableHours: 8,
            nonBillableHours: 7,
            billabilityPct: 53.33,
        });
        expect(rows[1]).toMatchObject({ key: { projectNumber: 'P2' }, billabilityPct: 100 });
    });

    it('keeps groups with no billable hours', () => {
        const rows = aggregate(recordSet([{ activity: 'Admin', hoursWorked: 3, billableHours: 0 }]), ['activity']);
        expect(rows).toHaveLength(1);
        expect(rows[0].billabilityPct).toBe(0);
    });

    it('reports 0 billability when nothing was worked', () => {
        const rows = aggregate(recordSet([{ hoursWorked: 0, billableHours: 0 }]), ['person']);
        expect(rows[0].billabilityPct).toBe(0);
    });

    it('returns an empty list for an empty record set', () => {
        expect(aggregate(recordSet([]), ['projectNumber'])).toEqual([]);
    });

    it('returns one overall row for an empty key list', () => {
        const rows = aggregate(recordSet([{ hoursWorked: 2 }, { hoursWorked: 3 }]), []);
        expect(rows).toHaveLength(1);
        expect(rows[0].key).toEqual({});
        expect(rows[0].hoursWorked).toBe(5);
    });

    it('counts distinct secondary values', () => {
        const rows = aggregate(
            recordSet([
                { customerNumber: 'C1', projectNumber: 'P1' },
                { customerNumber: 'C1', projectNumber: 'P2' },
                { customerNumber: 'C1', projectNumber: 'P1' },
            ]),
            ['customerNumber'],
            { projects: 'projectNumber' }
        );
        expect(rows[0].counts).toEqual({ projects: 2 });
    });

    it('skips counts whose column is absent', () => {
        const rows = aggregate(
            recordSet([{ projectNumber: 'P1' }], WITHOUT_PHASE),
            ['projectNumber'],
            { projects: 'projectNumber', people: 'activity' }
        );
        expect(rows[0].counts).toEqual({ projects: 1 });
    });

    it('throws before aggregating when a key column is missing', () => {
        const set = recordSet([{ phase: 'Build' }], WITHOUT_PHASE);

        expect(() => aggregate(set, ['phase'], {}, { dimension: 'phase' })).toThrow(MissingKeyColumnError);
        expect(() => aggregate(set, ['phase'], {}, { dimension: 'phase' })).toThrow(
            "Column 'Phase' required by dimension 'phase' is missing (available: Date, Customer number,"
        );
    });

    it('throws for a missing key column even with no records', () => {
        expect(() => aggregate(recordSet([], WITHOUT_PHASE), ['phase'])).toThrow(MissingKeyColumnError);
    });

    it('groups blank values under Unknown', () => {
        const rows = aggregate(recordSet([{ phase: '' }]), ['phase']);
        expect(rows[0].key).toEqual({ phase: 'Unknown' });
    });

    it('fills attribute keys with Unknown when their column is absent', () => {
        const rows = aggregateDimension(recordSet([{ projectNumber: 'P1', projectName: 'Website' }], WITHOUT_PHASE), 'project');
        expect(rows[0].key).toEqual({ projectNumber: 'P1', projectName: 'Website', projectType: 'Unknown' });
    });

    it('keeps one project row when its records carry several project types', () => {
        const rows = aggregateDimension(
            recordSet([
                { projectType: '', hoursWorked: 2 },
                { projectType: 'Fixed', hoursWorked: 5 },
                { projectType: 'Hourly', hoursWorked: 5 },
            ]),
            'project'
        );

        expect(rows).toHaveLength(1);
        expect(rows[0].key).toEqual({ projectNumber: 'P1', projectName: 'Website', projectType: 'Fixed' });
        expect(rows[0].hoursWorked).toBe(12);
    });

    it('groups the month dimension on calendar keys', () => {
        const rows = aggregateDimension(
            recordSet([
                { date: '2024-01-10', hoursWorked: 2 },
                { date: '2024-01-20', hoursWorked: 3 },
                { date: '2024-02-01', hoursWorked: 4 },
            ]),
            'month'
        );
        expect(rows.map((row) => [row.key.monthKey, row.hoursWorked])).toEqual([
            ['2024-01', 5],
            ['2024-02', 4],
        ]);
        expect(rows[0].key.monthName).toBe('Jan');
    });

    it('does not mutate the source records', () => {
        const set = recordSet([{ date: '2024-01-10' }]);
        aggregateDimension(set, 'month');
        expect(Object.keys(set.records[0])).not.toContain('year');
    });
});

describe('ordering', () => {
    it('sorts by metric descending, keeping ties in input order', () => {
        const rows = [
            { id: 'a', hours: 1 },
            { id: 'b', hours: 3 },
            { id: 'c', hours: 1 },
        ];
        expect(sortByMetric(rows, (row) => row.hours).map((row) => row.id)).toEqual(['b', 'a', 'c']);
    });

    it('orders calendar dimensions chronologically', () => {
        const rows = aggregateDimension(
            recordSet([
                { date: '2024-02-01', hoursWorked: 9 },
                { date: '2023-12-01', hoursWorked: 1 },
            ]),
            'month'
        );
        expect(orderRows(rows, 'month').map((row) => row.key.monthKey)).toEqual(['2023-12', '2024-02']);
    });

    it('orders other dimensions by hours worked', () => {
        const rows = aggregateDimension(
            recordSet([
                { person: 'ann', hoursWorked: 2 },
                { person: 'bob', hoursWorked: 6 },
            ]),
            'person'
        );
        expect(orderRows(rows, 'person').map((row) => row.key.person)).toEqual(['bob', 'ann']);
    });
});
