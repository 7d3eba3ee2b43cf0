/**
 * @fileoverview Financial Metrics Calculator
 *
 * Enriches aggregate rows with revenue, cost, profit, margin and rates.
 *
 * ## Business Rules
 * The tier is the record set's capability, resolved once at ingestion; tiers
 * are never mixed within one run.
 * 1. FullFinancials: Revenue = Σ fee, Total cost = Σ cost, Total profit = Σ profit
 * 2. RateOnly: Revenue = Σ(billable hours × hourly rate); cost and profit are 0
 * 3. HoursOnly: every financial field is 0
 *
 * Derived for every tier:
 * - Billable rate = Revenue / billable hours (0 if no billable hours)
 * - Effective rate = Revenue / hours worked (0 if nothing worked)
 * - Profit margin % = Total profit / Revenue × 100 (0 if no revenue; may be negative)
 *
 * ### Rounding
 * Currency and rates: 2 decimals. Applied after summing.
 */

import { percentage, round, safeDivide } from './utils.js';
import type {
    BaseAggregate,
    FinancialCapability,
    FinancialMetrics,
    FinancialSums,
    TimeRecordField,
} from './types.js';

/**
 * Resolves the financial tier from the columns present in the source.
 *
 * @example
 * resolveCapability(new Set(['hoursWorked', 'hourlyRate'])); // 'RateOnly'
 */
export function resolveCapability(columns: ReadonlySet<TimeRecordField>): FinancialCapability {
    if (columns.has('fee')) return 'FullFinancials';
    if (columns.has('hourlyRate')) return 'RateOnly';
    return 'HoursOnly';
}

interface TierTotals {
    revenue: number;
    totalCost: number;
    totalProfit: number;
}

/**
 * Picks revenue/cost/profit from the raw sums according to the tier.
 */
function totalsForTier(capability: FinancialCapability, sums: FinancialSums): TierTotals {
    switch (capability) {
        case 'FullFinancials':
            return { revenue: sums.fee, totalCost: sums.cost, totalProfit: sums.profit };
        case 'RateOnly':
            return { revenue: sums.rateRevenue, totalCost: 0, totalProfit: 0 };
        case 'HoursOnly':
            return { revenue: 0, totalCost: 0, totalProfit: 0 };
    }
}

/**
 * Derives the financial metrics of one aggregate row.
 */
export function computeFinancials(
    row: Pick<BaseAggregate, 'capability' | 'sums' | 'hoursWorked' | 'billableHours'>
): FinancialMetrics {
    const totals = totalsForTier(row.capability, row.sums);
    const revenue = round(totals.revenue, 2);

    return {
        revenue,
        totalCost: round(totals.totalCost, 2),
        totalProfit: round(totals.totalProfit, 2),
        profitMarginPct: percentage(totals.totalProfit, totals.revenue),
        billableRate: round(safeDivide(totals.revenue, row.billableHours), 2),
        effectiveRate: round(safeDivide(totals.revenue, row.hoursWorked), 2),
    };
}

/**
 * Adds financial metrics to every row. Metrics are recomputed from the raw
 * sums, so enriching an already enriched list yields the same values.
 *
 * @param rows - Aggregate rows, enriched or not.
 * @returns New rows; the input is not modified.
 */
export function enrichFinancials<R extends BaseAggregate>(rows: readonly R[]): (R & FinancialMetrics)[] {
    return rows.map((row) => ({ ...row, ...computeFinancials(row) }));
}
