/**
 * @fileoverview Derived Reports
 * Record-set summaries and report shapes built on the aggregator: overall
 * summary metrics, time series, top-N lists, utilization and the
 * customer → project hierarchy.
 */

import { aggregate, aggregateDimension, sortByMetric, sortChronologically } from './aggregate.js';
import { CONSTANTS } from './constants.js';
import { enrichFinancials } from './financials.js';
import { aggregatePlanned, mergePlanned } from './planned.js';
import { IsoUtils, percentage, round, safeDivide } from './utils.js';
import type {
    DimensionAggregate,
    FinancialCapability,
    MergedDimensionRow,
    PlannedAggregate,
    PlannedRecordSet,
    TimeRecordSet,
} from './types.js';

// ==================== SUMMARY ====================

export interface SummaryMetrics {
    recordCount: number;
    totalHours: number;
    billableHours: number;
    nonBillableHours: number;
    billabilityPct: number;
    projects: number;
    customers: number;
    people: number;
    /** Earliest record date, or null for an empty set */
    firstDate: string | null;
    lastDate: string | null;
    /** (last - first) in days / 365.25 */
    yearsSpanned: number;
    revenue: number;
    totalCost: number;
    totalProfit: number;
    profitMarginPct: number;
    averageRevenuePerProject: number;
    billableRate: number;
    effectiveRate: number;
    capability: FinancialCapability;
}

/**
 * Headline metrics of a whole record set.
 */
export function calculateSummaryMetrics(recordSet: TimeRecordSet): SummaryMetrics {
    const rows = enrichFinancials(
        aggregate(
            recordSet,
            [],
            { projects: 'projectNumber', customers: 'customerNumber', people: 'person' },
            { dimension: 'summary' }
        )
    );
    const overall = rows.length > 0 ? rows[0] : null;

    let firstDate: string | null = null;
    let lastDate: string | null = null;
    for (const record of recordSet.records) {
        if (firstDate === null || record.date < firstDate) firstDate = record.date;
        if (lastDate === null || record.date > lastDate) lastDate = record.date;
    }
    const yearsSpanned =
        firstDate !== null && lastDate !== null
            ? round(IsoUtils.daysBetween(firstDate, lastDate) / CONSTANTS.DAYS_PER_YEAR, 2)
            : 0;

    if (!overall) {
        return {
            recordCount: 0,
            totalHours: 0,
            billableHours: 0,
            nonBillableHours: 0,
            billabilityPct: 0,
            projects: 0,
            customers: 0,
            people: 0,
            firstDate,
            lastDate,
            yearsSpanned,
            revenue: 0,
            totalCost: 0,
            totalProfit: 0,
            profitMarginPct: 0,
            averageRevenuePerProject: 0,
            billableRate: 0,
            effectiveRate: 0,
            capability: recordSet.capability,
        };
    }

    const projects = overall.counts.projects ?? 0;
    return {
        recordCount: overall.recordCount,
        totalHours: overall.hoursWorked,
        billableHours: overall.billableHours,
        nonBillableHours: overall.nonBillableHours,
        billabilityPct: overall.billabilityPct,
        projects,
        customers: overall.counts.customers ?? 0,
        people: overall.counts.people ?? 0,
        firstDate,
        lastDate,
        yearsSpanned,
        revenue: overall.revenue,
        totalCost: overall.totalCost,
        totalProfit: overall.totalProfit,
        profitMarginPct: overall.profitMarginPct,
        averageRevenuePerProject: round(safeDivide(overall.revenue, projects), 2),
        billableRate: overall.billableRate,
        effectiveRate: overall.effectiveRate,
        capability: overall.capability,
    };
}

// ==================== TIME SERIES ====================

export type TimePeriodGranularity = 'day' | 'week' | 'month' | 'year';

/**
 * Enriched aggregates per day, ISO week (keyed by its Monday), month or year,
 * oldest first.
 */
export function aggregateByTime(recordSet: TimeRecordSet, period: TimePeriodGranularity): DimensionAggregate[] {
    switch (period) {
        case 'year':
        case 'month':
            return sortChronologically(enrichFinancials(aggregateDimension(recordSet, period)));
        case 'week': {
            const weekly: TimeRecordSet = {
                ...recordSet,
                records: recordSet.records.map((record) => ({
                    ...record,
                    date: IsoUtils.getWeekStart(record.date),
                })),
            };
            return sortByDate(enrichFinancials(aggregate(weekly, ['date'], {}, { dimension: 'week' })));
        }
        case 'day':
            return sortByDate(enrichFinancials(aggregate(recordSet, ['date'], {}, { dimension: 'day' })));
    }
}

function sortByDate(rows: DimensionAggregate[]): DimensionAggregate[] {
    return rows.sort((a, b) => String(a.key.date).localeCompare(String(b.key.date)));
}

// ==================== TOP ITEMS ====================

export type RankingMetric = 'hoursWorked' | 'billableHours' | 'revenue' | 'totalCost' | 'totalProfit';

/**
 * The `n` rows with the highest value of `metric`; ties keep input order.
 */
export function findTopItems<R extends Pick<DimensionAggregate, RankingMetric>>(
    rows: readonly R[],
    metric: RankingMetric,
    n: number = CONSTANTS.DEFAULT_TOP_N
): R[] {
    return sortByMetric(rows, (row) => row[metric]).slice(0, Math.max(0, n));
}

// ==================== UTILIZATION ====================

export interface UtilizationRow {
    person: string;
    daysWorked: number;
    hoursWorked: number;
    billableHours: number;
    /** daysWorked × standard hours per day */
    potentialHours: number;
    utilizationPct: number;
    billableUtilizationPct: number;
}

/**
 * Per-person utilization against a standard day for each day with logged work.
 * Sorted by hours worked, descending.
 */
export function calculateUtilizationRates(recordSet: TimeRecordSet): UtilizationRow[] {
    const people = new Map<string, { days: Set<string>; hours: number; billable: number }>();
    for (const record of recordSet.records) {
        let person = people.get(record.person);
        if (!person) {
            person = { days: new Set(), hours: 0, billable: 0 };
            people.set(record.person, person);
        }
        person.days.add(record.date);
        person.hours += record.hoursWorked;
        person.billable += record.billableHours;
    }

    const rows = Array.from(people.entries(), ([person, totals]): UtilizationRow => {
        const potentialHours = totals.days.size * CONSTANTS.STANDARD_HOURS_PER_DAY;
        return {
            person,
            daysWorked: totals.days.size,
            hoursWorked: round(totals.hours),
            billableHours: round(totals.billable),
            potentialHours,
            utilizationPct: percentage(totals.hours, potentialHours),
            billableUtilizationPct: percentage(totals.billable, potentialHours),
        };
    });
    return sortByMetric(rows, (row) => row.hoursWorked);
}

// ==================== HIERARCHY ====================

export interface HierarchyRow extends DimensionAggregate {
    /** 'customerNumber' for customers, 'customerNumber-projectNumber' for projects */
    id: string;
    /** Customer id for project rows, '' for customer rows */
    parentId: string;
    /** Display label */
    label: string;
    level: 0 | 1;
}

/**
 * Customer rows (level 0) each followed by their project rows (level 1),
 * customers and projects ordered by hours worked.
 */
export function aggregateCustomerProjectHierarchy(recordSet: TimeRecordSet): HierarchyRow[] {
    const customers = sortByMetric(enrichFinancials(aggregateDimension(recordSet, 'customer')), (row) => row.hoursWorked);
    const projects = sortByMetric(
        enrichFinancials(
            aggregate(
                recordSet,
                ['customerNumber', 'customerName', 'projectNumber', 'projectName'],
                { people: 'person' },
                { dimension: 'customer-project' }
            )
        ),
        (row) => row.hoursWorked
    );

    const rows: HierarchyRow[] = [];
    for (const customer of customers) {
        const customerId = String(customer.key.customerNumber);
        rows.push({ ...customer, id: customerId, parentId: '', label: String(customer.key.customerName), level: 0 });
        for (const project of projects) {
            if (String(project.key.customerNumber) !== customerId) continue;
            rows.push({
                ...project,
                id: `${customerId}-${String(project.key.projectNumber)}`,
                parentId: customerId,
                label: String(project.key.projectName),
                level: 1,
            });
        }
    }
    return rows;
}

// ==================== PROJECT TIMELINE ====================

/**
 * Monthly series for one project, oldest first, merged with the project's
 * planned hours on Year + Month. Without a planned set every planned field
 * is 0 (rates and revenues null).
 *
 * @param recordSet - All time records.
 * @param projectNumber - Project to follow.
 * @param planned - Planned records (all projects); filtered to the project here.
 */
export function aggregateProjectByMonth(
    recordSet: TimeRecordSet,
    projectNumber: string,
    planned?: PlannedRecordSet
): MergedDimensionRow[] {
    const projectRecords: TimeRecordSet = {
        ...recordSet,
        records: recordSet.records.filter((record) => record.projectNumber === projectNumber),
    };
    const actual = enrichFinancials(aggregateDimension(projectRecords, 'month'));

    let plannedRows: PlannedAggregate[] = [];
    if (planned) {
        const projectPlan: PlannedRecordSet = {
            ...planned,
            records: planned.records.filter((record) => record.projectNumber === projectNumber),
        };
        plannedRows = aggregatePlanned(projectPlan, ['year', 'month', 'monthName', 'monthKey']);
    }
    return sortChronologically(
        mergePlanned(actual, plannedRows, ['year', 'month'], { capability: recordSet.capability })
    );
}
