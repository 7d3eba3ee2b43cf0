/**
 * @fileoverview Planned-vs-Actual Merger
 *
 * Aggregates planned hours and joins them onto actual aggregates.
 *
 * ## Business Rules
 * - The join is a full outer join: keys only in actual get planned fields = 0,
 *   keys only in planned get actual fields = 0, so budgeted-but-unworked
 *   projects still surface.
 * - Planned rate per group is duration weighted: Σ(rate × hours) / Σ hours,
 *   0 when no hours are planned. Records without a rate add hours but no
 *   weighted rate.
 * - Planned revenue = planned hours × planned rate.
 * - Hours variance = worked - planned; Variance % = variance / planned × 100.
 * - Rate variance needs both an effective rate (records carry financials) and
 *   a planned rate (planned set carries rates); otherwise it is null.
 * - Revenue variance likewise needs revenue on both sides.
 * - Every percentage is 0 when its denominator is 0.
 */

import { annotateTimeBuckets } from './time-buckets.js';
import { percentage, round, safeDivide } from './utils.js';
import { CONSTANTS, PLANNED_RECORD_COLUMNS } from './constants.js';
import { MissingKeyColumnError } from './errors.js';
import type {
    DimensionAggregate,
    FinancialCapability,
    GroupKey,
    GroupValue,
    GroupValues,
    MergedDimensionRow,
    PlannedAggregate,
    PlannedRecord,
    PlannedRecordField,
    PlannedRecordSet,
    TimeBucket,
} from './types.js';

type PlannedGroupKey = 'person' | 'projectNumber' | 'projectName' | 'date' | keyof TimeBucket;

/**
 * Keys planned data can be grouped on.
 */
export const PLANNED_GROUP_KEYS: readonly PlannedGroupKey[] = [
    'person',
    'projectNumber',
    'projectName',
    'date',
    'year',
    'month',
    'monthName',
    'monthKey',
];

export function isPlannedGroupKey(key: GroupKey): key is PlannedGroupKey {
    return PLANNED_GROUP_KEYS.some((candidate) => candidate === key);
}

type GroupablePlannedRecord = PlannedRecord & Partial<TimeBucket>;

interface PlannedAccumulator {
    key: GroupValues;
    plannedHours: number;
    weightedRate: number;
    people: Set<string>;
}

function plannedSourceField(key: PlannedGroupKey): PlannedRecordField {
    return key === 'year' || key === 'month' || key === 'monthName' || key === 'monthKey' ? 'date' : key;
}

// ==================== PLANNED AGGREGATION ====================

/**
 * Groups planned records and computes planned hours, people, weighted rate
 * and planned revenue per key tuple.
 *
 * @param plannedSet - Ingested planned records.
 * @param groupByKeys - Planned keys, e.g. ['projectNumber', 'projectName'] or ['year', 'month'].
 * @returns One row per key tuple in first-seen order.
 * @throws MissingKeyColumnError for keys planned data cannot provide.
 */
export function aggregatePlanned(
    plannedSet: PlannedRecordSet,
    groupByKeys: readonly GroupKey[]
): PlannedAggregate[] {
    const keys: PlannedGroupKey[] = [];
    for (const key of groupByKeys) {
        if (!isPlannedGroupKey(key) || !plannedSet.columns.has(plannedSourceField(key))) {
            throw new MissingKeyColumnError(
                key,
                'planned',
                Array.from(plannedSet.columns, (column) => PLANNED_RECORD_COLUMNS[column])
            );
        }
        keys.push(key);
    }

    if (plannedSet.records.length === 0) return [];

    const needsBuckets = keys.some((key) => plannedSourceField(key) === 'date' && key !== 'date');
    const records: readonly GroupablePlannedRecord[] = needsBuckets
        ? annotateTimeBuckets(plannedSet.records)
        : plannedSet.records;

    const groups = new Map<string, PlannedAccumulator>();
    for (const record of records) {
        const values = keys.map((key): GroupValue => record[key] ?? CONSTANTS.UNKNOWN_LABEL);
        const mapKey = JSON.stringify(values);
        let group = groups.get(mapKey);
        if (!group) {
            const key: GroupValues = {};
            keys.forEach((k, i) => {
                key[k] = values[i];
            });
            group = { key, plannedHours: 0, weightedRate: 0, people: new Set() };
            groups.set(mapKey, group);
        }
        group.plannedHours += record.plannedHours;
        group.weightedRate += (record.plannedRate ?? 0) * record.plannedHours;
        group.people.add(record.person);
    }

    return Array.from(groups.values(), (group): PlannedAggregate => {
        const base = {
            key: group.key,
            plannedHours: round(group.plannedHours),
            people: group.people.size,
            personIds: Array.from(group.people),
            rateHours: group.weightedRate,
        };
        if (!plannedSet.hasPlannedRate) {
            return { ...base, plannedRate: null, plannedRevenue: null };
        }
        return {
            ...base,
            plannedRate: round(safeDivide(group.weightedRate, group.plannedHours), 2),
            plannedRevenue: round(group.weightedRate, 2),
        };
    });
}

// ==================== MERGE ====================

function joinKeyOf(key: GroupValues, joinKeys: readonly GroupKey[]): string {
    return JSON.stringify(joinKeys.map((k) => key[k] ?? null));
}

/**
 * Actual-side row for a key that only exists in the plan. Row keys the plan
 * does not carry read 'Unknown', as they do on actual rows.
 */
function createEmptyActual(
    planKey: GroupValues,
    capability: FinancialCapability,
    rowKeys: readonly GroupKey[]
): DimensionAggregate {
    const key: GroupValues = {};
    for (const k of rowKeys) {
        key[k] = planKey[k] ?? CONSTANTS.UNKNOWN_LABEL;
    }
    return {
        key: { ...key, ...planKey },
        capability,
        recordCount: 0,
        hoursWorked: 0,
        billableHours: 0,
        nonBillableHours: 0,
        billabilityPct: 0,
        counts: {},
        sums: { fee: 0, cost: 0, profit: 0, rateRevenue: 0 },
        revenue: 0,
        totalCost: 0,
        totalProfit: 0,
        profitMarginPct: 0,
        billableRate: 0,
        effectiveRate: 0,
    };
}

export interface MergeOptions {
    /** Capability for rows that exist only in the plan; taken from the actual rows when omitted */
    capability?: FinancialCapability;
    /** Every key an actual row carries; plan-only rows get the missing ones as 'Unknown' */
    rowKeys?: readonly GroupKey[];
}

/**
 * Full outer join of actual and planned aggregates on `joinKeys`, with
 * hours, rate and revenue variances.
 *
 * @param actual - Financially enriched actual rows.
 * @param planned - Planned rows from aggregatePlanned().
 * @param joinKeys - Keys present in both sides' `key`.
 * @returns Actual rows (input order) followed by plan-only rows (plan order).
 *
 * @example
 * mergePlanned(projectRows, plannedRows, ['projectNumber', 'projectName']);
 */
export function mergePlanned(
    actual: readonly DimensionAggregate[],
    planned: readonly PlannedAggregate[],
    joinKeys: readonly GroupKey[],
    options: MergeOptions = {}
): MergedDimensionRow[] {
    const capability = options.capability ?? actual[0]?.capability ?? 'HoursOnly';
    const plannedByKey = new Map<string, PlannedAggregate>();
    for (const row of planned) {
        const joinKey = joinKeyOf(row.key, joinKeys);
        const existing = plannedByKey.get(joinKey);
        plannedByKey.set(joinKey, existing ? combinePlanned(existing, row) : row);
    }

    const merged: MergedDimensionRow[] = [];
    const matched = new Set<string>();

    for (const row of actual) {
        const joinKey = joinKeyOf(row.key, joinKeys);
        const plan = plannedByKey.get(joinKey);
        if (plan) matched.add(joinKey);
        merged.push(buildMergedRow(row, plan ?? null, plan ? 'both' : 'actualOnly'));
    }

    for (const [joinKey, plan] of plannedByKey) {
        if (matched.has(joinKey)) continue;
        merged.push(buildMergedRow(createEmptyActual(plan.key, capability, options.rowKeys ?? []), plan, 'plannedOnly'));
    }

    return merged;
}

/**
 * Folds two planned rows that share a join key (the plan was grouped finer
 * than the join). People are merged as sets and the rate is re-weighted from
 * the unrounded Σ(rate × hours) of both rows.
 */
function combinePlanned(a: PlannedAggregate, b: PlannedAggregate): PlannedAggregate {
    const plannedHours = round(a.plannedHours + b.plannedHours);
    const personIds = Array.from(new Set([...a.personIds, ...b.personIds]));
    const rateHours = a.rateHours + b.rateHours;
    const base = { key: a.key, plannedHours, people: personIds.length, personIds, rateHours };
    if (a.plannedRate === null || b.plannedRate === null) {
        return { ...base, plannedRate: null, plannedRevenue: null };
    }
    return {
        ...base,
        plannedRate: round(safeDivide(rateHours, plannedHours), 2),
        plannedRevenue: round(rateHours, 2),
    };
}

function buildMergedRow(
    row: DimensionAggregate,
    plan: PlannedAggregate | null,
    source: MergedDimensionRow['source']
): MergedDimensionRow {
    const plannedHours = plan?.plannedHours ?? 0;
    const plannedRate = plan ? plan.plannedRate : null;
    const plannedRevenue = plan ? plan.plannedRevenue : null;
    const hasActualRevenue = row.capability !== 'HoursOnly';

    const hoursVariance = round(row.hoursWorked - plannedHours);

    let rateVariance: number | null = null;
    let rateVariancePct: number | null = null;
    if (hasActualRevenue && plannedRate !== null) {
        rateVariance = round(row.effectiveRate - plannedRate, 2);
        rateVariancePct = percentage(rateVariance, plannedRate);
    }

    let revenueVariance: number | null = null;
    let revenueVariancePct: number | null = null;
    if (hasActualRevenue && plannedRevenue !== null) {
        revenueVariance = round(row.revenue - plannedRevenue, 2);
        revenueVariancePct = percentage(revenueVariance, plannedRevenue);
    }

    return {
        ...row,
        source,
        plannedHours,
        plannedPeople: plan?.people ?? 0,
        plannedRate,
        plannedRevenue,
        hoursVariance,
        variancePct: percentage(hoursVariance, plannedHours),
        rateVariance,
        rateVariancePct,
        revenueVariance,
        revenueVariancePct,
    };
}

// ==================== SUMMARIES ====================

export interface PlannedSummary {
    totalPlannedHours: number;
    projects: number;
    people: number;
    averagePlannedRate: number;
    totalPlannedRevenue: number;
    hasPlannedRate: boolean;
}

/**
 * Totals over a planned record set.
 */
export function calculatePlannedSummary(plannedSet: PlannedRecordSet): PlannedSummary {
    let hours = 0;
    let weighted = 0;
    const projects = new Set<string>();
    const people = new Set<string>();
    for (const record of plannedSet.records) {
        hours += record.plannedHours;
        weighted += (record.plannedRate ?? 0) * record.plannedHours;
        projects.add(record.projectNumber);
        people.add(record.person);
    }
    return {
        totalPlannedHours: round(hours),
        projects: projects.size,
        people: people.size,
        averagePlannedRate: plannedSet.hasPlannedRate ? round(safeDivide(weighted, hours), 2) : 0,
        totalPlannedRevenue: plannedSet.hasPlannedRate ? round(weighted, 2) : 0,
        hasPlannedRate: plannedSet.hasPlannedRate,
    };
}

export interface ActualVsPlannedComparison {
    totalActualHours: number;
    totalPlannedHours: number;
    hoursVariance: number;
    variancePct: number;
    commonProjects: number;
    onlyActualProjects: number;
    onlyPlannedProjects: number;
    /** Actual revenue per billable hour */
    averageEffectiveRate: number | null;
    averagePlannedRate: number | null;
    rateVariance: number | null;
    rateVariancePct: number | null;
}

/**
 * Compares project-level actual and planned aggregates.
 * Project identity is the project number key value.
 *
 * @param actual - Enriched project rows (key contains projectNumber).
 * @param planned - Planned project rows (key contains projectNumber).
 */
export function compareActualVsPlanned(
    actual: readonly DimensionAggregate[],
    planned: readonly PlannedAggregate[]
): ActualVsPlannedComparison {
    const actualProjects = new Set(actual.map((row) => String(row.key.projectNumber ?? '')));
    const plannedProjects = new Set(planned.map((row) => String(row.key.projectNumber ?? '')));
    const common = [...actualProjects].filter((project) => plannedProjects.has(project)).length;

    const totalActualHours = round(actual.reduce((sum, row) => sum + row.hoursWorked, 0));
    const totalPlannedHours = round(planned.reduce((sum, row) => sum + row.plannedHours, 0));
    const hoursVariance = round(totalActualHours - totalPlannedHours);

    const hasActualRevenue = actual.length > 0 && actual.every((row) => row.capability !== 'HoursOnly');
    const hasPlannedRate = planned.length > 0 && planned.every((row) => row.plannedRate !== null);

    let averageEffectiveRate: number | null = null;
    let averagePlannedRate: number | null = null;
    let rateVariance: number | null = null;
    let rateVariancePct: number | null = null;

    if (hasActualRevenue && hasPlannedRate) {
        const revenue = actual.reduce((sum, row) => sum + row.revenue, 0);
        const billable = actual.reduce((sum, row) => sum + row.billableHours, 0);
        const weighted = planned.reduce((sum, row) => sum + (row.plannedRate ?? 0) * row.plannedHours, 0);
        averageEffectiveRate = round(safeDivide(revenue, billable), 2);
        averagePlannedRate = round(safeDivide(weighted, totalPlannedHours), 2);
        rateVariance = round(averageEffectiveRate - averagePlannedRate, 2);
        rateVariancePct = percentage(rateVariance, averagePlannedRate);
    }

    return {
        totalActualHours,
        totalPlannedHours,
        hoursVariance,
        variancePct: percentage(hoursVariance, totalPlannedHours),
        commonProjects: common,
        onlyActualProjects: actualProjects.size - common,
        onlyPlannedProjects: plannedProjects.size - common,
        averageEffectiveRate,
        averagePlannedRate,
        rateVariance,
        rateVariancePct,
    };
}
