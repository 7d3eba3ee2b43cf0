import { describe, it, expect } from '@jest/globals';
import { aggregateDimension } from '../../js/aggregate.js';
import { MissingKeyColumnError } from '../../js/errors.js';
import { enrichFinancials } from '../../js/financials.js';
import {
    aggregatePlanned,
    calculatePlannedSummary,
    compareActualVsPlanned,
    mergePlanned,
} from '../../js/planned.js';
import { plannedSet, recordSet } from '../helpers/records.js';
import type { PlannedAggregate } from '../../js/types.js';

const PROJECT_KEYS = ['projectNumber', 'projectName'] as const;

describe('aggregatePlanned', () => {
    it('weights the planned rate by planned hours', () => {
        const rows = aggregatePlanned(
            plannedSet([
                { person: 'ann', plannedHours: 30, plannedRate: 100 },
                { person: 'bob', plannedHours: 10, plannedRate: 140 },
            ]),
            ['year', 'month']
        );

        expect(rows).toEqual([
            {
                key: { year: 2024, month: 3 },
                plannedHours: 40,
                people: 2,
                plannedRate: 110,
                plannedRevenue: 4400,
                personIds: ['ann', 'bob'],
                rateHours: 4400,
            },
        ]);
    });

    it('leaves rate and revenue null without planned rates', () => {
        const [row] = aggregatePlanned(plannedSet([{ plannedHours: 12 }]), PROJECT_KEYS);
        expect(row.plannedRate).toBeNull();
        expect(row.plannedRevenue).toBeNull();
    });

    it('reports a zero rate when no hours are planned', () => {
        const [row] = aggregatePlanned(plannedSet([{ plannedHours: 0, plannedRate: 100 }]), PROJECT_KEYS);
        expect(row.plannedRate).toBe(0);
        expect(row.plannedRevenue).toBe(0);
    });

    it('rejects keys planned data does not carry', () => {
        expect(() => aggregatePlanned(plannedSet([{}]), ['phase'])).toThrow(MissingKeyColumnError);
    });
});

describe('mergePlanned', () => {
    it('guards the variance percentage when nothing was planned', () => {
        const actual = enrichFinancials(
            aggregateDimension(recordSet([{ projectNumber: 'P2', projectName: 'Portal', hoursWorked: 20 }]), 'project')
        );
        const planned = aggregatePlanned(
            plannedSet([{ projectNumber: 'P2', projectName: 'Portal', plannedHours: 0 }]),
            PROJECT_KEYS
        );

        const [row] = mergePlanned(actual, planned, PROJECT_KEYS);
        expect(row.source).toBe('both');
        expect(row.hoursVariance).toBe(20);
        expect(row.variancePct).toBe(0);
    });

    it('keeps keys from both sides of the join', () => {
        const actual = enrichFinancials(
            aggregateDimension(
                recordSet([
                    { projectNumber: 'P1', projectName: 'Website', hoursWorked: 12 },
                    { projectNumber: 'P3', projectName: 'Support', hoursWorked: 4 },
                ]),
                'project'
            )
        );
        const planned = aggregatePlanned(
            plannedSet([
                { projectNumber: 'P1', projectName: 'Website', plannedHours: 10 },
                { projectNumber: 'P9', projectName: 'Migration', plannedHours: 25 },
            ]),
            PROJECT_KEYS
        );

        const merged = mergePlanned(actual, planned, PROJECT_KEYS);
        expect(merged.map((row) => [row.key.projectNumber, row.source, row.hoursVariance, row.variancePct])).toEqual([
            ['P1', 'both', 2, 20],
            ['P3', 'actualOnly', 4, 0],
            ['P9', 'plannedOnly', -25, -100],
        ]);
        expect(merged[2].hoursWorked).toBe(0);
        expect(merged[2].key).toEqual({ projectNumber: 'P9', projectName: 'Migration' });
    });

    it('computes rate and revenue variances when both sides have money', () => {
        const actual = enrichFinancials(
            aggregateDimension(recordSet([{ hoursWorked: 10, billableHours: 10, hourlyRate: 120 }]), 'person')
        );
        const planned = aggregatePlanned(plannedSet([{ plannedHours: 8, plannedRate: 100 }]), ['person']);

        const [row] = mergePlanned(actual, planned, ['person']);
        expect(row).toMatchObject({
            revenue: 1200,
            effectiveRate: 120,
            plannedRate: 100,
            plannedRevenue: 800,
            rateVariance: 20,
            rateVariancePct: 20,
            revenueVariance: 400,
            revenueVariancePct: 50,
        });
    });

    it('leaves money variances null for hours-only actuals', () => {
        const actual = enrichFinancials(aggregateDimension(recordSet([{ hoursWorked: 5 }]), 'person'));
        const planned = aggregatePlanned(plannedSet([{ plannedHours: 5, plannedRate: 100 }]), ['person']);

        const [row] = mergePlanned(actual, planned, ['person']);
        expect(row.rateVariance).toBeNull();
        expect(row.revenueVariance).toBeNull();
        expect(row.plannedRate).toBe(100);
    });

    it('leaves hours unchanged and money percentages at 0 against an all-zero plan', () => {
        const actual = enrichFinancials(
            aggregateDimension(recordSet([{ hoursWorked: 6, billableHours: 6, fee: 600 }]), 'person')
        );
        const planned = aggregatePlanned(plannedSet([{ plannedHours: 0, plannedRate: 0 }]), ['person']);

        const [row] = mergePlanned(actual, planned, ['person']);
        expect(row.hoursVariance).toBe(6);
        expect(row.variancePct).toBe(0);
        expect(row.rateVariancePct).toBe(0);
        expect(row.revenueVariancePct).toBe(0);
    });

    it('folds planned rows that share a join key', () => {
        const actual = enrichFinancials(aggregateDimension(recordSet([{ date: '2024-03-10' }]), 'month'));
        const planned: PlannedAggregate[] = [
            {
                key: { year: 2024, month: 3, person: 'ann' },
                plannedHours: 10,
                people: 1,
                plannedRate: 100,
                plannedRevenue: 1000,
                personIds: ['ann'],
                rateHours: 1000,
            },
            {
                key: { year: 2024, month: 3, person: 'bob' },
                plannedHours: 30,
                people: 1,
                plannedRate: 80,
                plannedRevenue: 2400,
                personIds: ['bob'],
                rateHours: 2400,
            },
        ];

        const [row] = mergePlanned(actual, planned, ['year', 'month']);
        expect(row.plannedHours).toBe(40);
        expect(row.plannedPeople).toBe(2);
        expect(row.plannedRate).toBe(85);
        expect(row.plannedRevenue).toBe(3400);
    });

    it('counts a person once and weights the rate from unrounded sums when folding', () => {
        const actual = enrichFinancials(aggregateDimension(recordSet([{ date: '2024-03-10' }]), 'month'));
        // ann: 1h at 10.004 on P1 and 2h at 10.004 on P2; each row's rate rounds to 10
        const planned = aggregatePlanned(
            plannedSet([
                { person: 'ann', projectNumber: 'P1', plannedHours: 1, plannedRate: 10.004 },
                { person: 'ann', projectNumber: 'P2', plannedHours: 2, plannedRate: 10.004 },
            ]),
            ['year', 'month', 'projectNumber']
        );
        expect(planned.map((row) => row.people)).toEqual([1, 1]);

        const [row] = mergePlanned(actual, planned, ['year', 'month']);
        expect(row.plannedHours).toBe(3);
        expect(row.plannedPeople).toBe(1);
        expect(row.plannedRate).toBe(10);
        expect(row.plannedRevenue).toBe(30.01);
    });

    it('fills row keys the plan does not carry with Unknown on plan-only rows', () => {
        const actual = enrichFinancials(
            aggregateDimension(recordSet([{ projectNumber: 'P1', projectName: 'Website', projectType: 'Fixed' }]), 'project')
        );
        const planned = aggregatePlanned(
            plannedSet([{ projectNumber: 'P9', projectName: 'Migration', plannedHours: 8 }]),
            PROJECT_KEYS
        );

        const merged = mergePlanned(actual, planned, PROJECT_KEYS, {
            rowKeys: ['projectNumber', 'projectName', 'projectType'],
        });
        expect(merged.map((row) => row.key)).toEqual([
            { projectNumber: 'P1', projectName: 'Website', projectType: 'Fixed' },
            { projectNumber: 'P9', projectName: 'Migration', projectType: 'Unknown' },
        ]);
    });
});

describe('planned summaries', () => {
    it('totals a planned record set', () => {
        const summary = calculatePlannedSummary(
            plannedSet([
                { projectNumber: 'P1', person: 'ann', plannedHours: 10, plannedRate: 100 },
                { projectNumber: 'P2', person: 'bob', plannedHours: 30, plannedRate: 60 },
            ])
        );
        expect(summary).toEqual({
            totalPlannedHours: 40,
            projects: 2,
            people: 2,
            averagePlannedRate: 70,
            totalPlannedRevenue: 2800,
            hasPlannedRate: true,
        });
    });

    it('compares project totals', () => {
        const actual = enrichFinancials(
            aggregateDimension(
                recordSet([
                    { projectNumber: 'P1', hoursWorked: 30 },
                    { projectNumber: 'P2', projectName: 'Portal', hoursWorked: 10 },
                ]),
                'project'
            )
        );
        const planned = aggregatePlanned(
            plannedSet([
                { projectNumber: 'P1', plannedHours: 25 },
                { projectNumber: 'P4', projectName: 'Audit', plannedHours: 25 },
            ]),
            PROJECT_KEYS
        );

        expect(compareActualVsPlanned(actual, planned)).toEqual({
            totalActualHours: 40,
            totalPlannedHours: 50,
            hoursVariance: -10,
            variancePct: -20,
            commonProjects: 1,
            onlyActualProjects: 1,
            onlyPlannedProjects: 1,
            averageEffectiveRate: null,
            averagePlannedRate: null,
            rateVariance: null,
            rateVariancePct: null,
        });
    });
});
