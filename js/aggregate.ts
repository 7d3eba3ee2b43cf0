/**
 * @fileoverview Dimensional Aggregator
 *
 * Groups time records by one or more keys and computes the base sums every
 * report shares. One generic function serves all dimensions; the per-dimension
 * differences live in the declarative table in dimensions.ts.
 *
 * ## Data Flow
 * Input: TimeRecordSet (records + present columns + capability), group keys,
 *        secondary count fields
 * Processing:
 *   1. Verify every group key's column exists (MissingKeyColumnError otherwise)
 *   2. Annotate calendar buckets when a calendar key is requested
 *   3. Accumulate hours, distinct counts and raw financial sums per key tuple,
 *      recording attribute keys without grouping on them
 *   4. Derive non-billable hours and billability %
 * Output: BaseAggregate[] in first-seen key order
 *
 * ## Business Rules
 * - Grouping never drops a key: zero-billable groups are still emitted
 * - billability % = billable / worked × 100, 0 when worked = 0
 * - Secondary counts are skipped when the counted column is absent
 * - Blank descriptive values group under 'Unknown'
 * - Source records are never mutated
 *
 * ## Edge Cases Handled
 * - Empty record set: returns []
 * - Empty key list: one overall row
 * - Attribute keys whose column is missing or blank in every record: 'Unknown'
 */

import { CONSTANTS, TIME_RECORD_COLUMNS } from './constants.js';
import { getDimension, type DimensionName } from './dimensions.js';
import { MissingKeyColumnError } from './errors.js';
import { annotateTimeBuckets, compareBuckets } from './time-buckets.js';
import { percentage, round } from './utils.js';
import type {
    BaseAggregate,
    CountName,
    FinancialSums,
    GroupKey,
    GroupValue,
    GroupValues,
    TimeBucket,
    TimeRecord,
    TimeRecordField,
    TimeRecordSet,
} from './types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

type GroupableRecord = TimeRecord & Partial<TimeBucket>;

/**
 * Extra behavior for a single aggregate() call.
 */
export interface AggregateOptions {
    /** Dimension name reported in MissingKeyColumnError */
    dimension?: string;
    /** Keys copied onto each row from its first non-blank record; not grouped on */
    attributes?: readonly TimeRecordField[];
}

/**
 * Running totals for one key tuple.
 */
interface GroupAccumulator {
    key: GroupValues;
    recordCount: number;
    hoursWorked: number;
    billableHours: number;
    distinct: Map<CountName, Set<GroupValue>>;
    sums: FinancialSums;
}

const CALENDAR_KEYS: ReadonlySet<GroupKey> = new Set<GroupKey>(['year', 'month', 'monthName', 'monthKey']);

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Source column backing a group key. Calendar keys derive from the date.
 */
function sourceFieldOf(key: GroupKey): TimeRecordField {
    switch (key) {
        case 'year':
        case 'month':
        case 'monthName':
        case 'monthKey':
            return 'date';
        default:
            return key;
    }
}

/**
 * Throws before any work if a required key column is missing.
 */
export function assertKeyColumns(
    recordSet: TimeRecordSet,
    keys: readonly GroupKey[],
    dimension: string
): void {
    for (const key of keys) {
        const field = sourceFieldOf(key);
        if (!recordSet.columns.has(field)) {
            throw new MissingKeyColumnError(
                TIME_RECORD_COLUMNS[field],
                dimension,
                Array.from(recordSet.columns, (column) => TIME_RECORD_COLUMNS[column])
            );
        }
    }
}

function createEmptySums(): FinancialSums {
    return { fee: 0, cost: 0, profit: 0, rateRevenue: 0 };
}

function readGroupValue(record: GroupableRecord, key: GroupKey): GroupValue {
    const value = record[key];
    if (value === undefined || value === '') return CONSTANTS.UNKNOWN_LABEL;
    return value;
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Groups records by `groupByKeys` and computes hours, billability, distinct
 * counts and raw financial sums per distinct key tuple.
 *
 * @param recordSet - Ingested records with their column set and capability.
 * @param groupByKeys - Keys whose columns must be present.
 * @param secondaryCounts - Count name → field to count distinct values of.
 * @param options - Dimension name for errors and attribute keys.
 * @returns One row per key tuple, in first-seen order.
 * @throws MissingKeyColumnError if a required key column is absent.
 *
 * @example
 * aggregate(recordSet, ['projectNumber', 'projectName'], { people: 'person' });
 */
export function aggregate(
    recordSet: TimeRecordSet,
    groupByKeys: readonly GroupKey[],
    secondaryCounts: Readonly<Partial<Record<CountName, TimeRecordField>>> = {},
    options: AggregateOptions = {}
): BaseAggregate[] {
    const dimension = options.dimension ?? groupByKeys.join('+');
    assertKeyColumns(recordSet, groupByKeys, dimension);

    if (recordSet.records.length === 0) {
        return [];
    }

    const attributes = options.attributes ?? [];
    const presentAttributes = attributes.filter((field) => recordSet.columns.has(field));

    const countEntries = Object.entries(secondaryCounts).filter(
        (entry): entry is [CountName, TimeRecordField] =>
            entry[1] !== undefined && recordSet.columns.has(entry[1])
    );

    const needsBuckets = groupByKeys.some((key) => CALENDAR_KEYS.has(key));
    const records: readonly GroupableRecord[] = needsBuckets
        ? annotateTimeBuckets(recordSet.records)
        : recordSet.records;

    const groups = new Map<string, GroupAccumulator>();

    for (const record of records) {
        const values = groupByKeys.map((key) => readGroupValue(record, key));
        const mapKey = JSON.stringify(values);

        let group = groups.get(mapKey);
        if (!group) {
            const key: GroupValues = {};
            groupByKeys.forEach((k, i) => {
                key[k] = values[i];
            });
            for (const field of attributes) {
                key[field] = CONSTANTS.UNKNOWN_LABEL;
            }
            group = {
                key,
                recordCount: 0,
                hoursWorked: 0,
                billableHours: 0,
                distinct: new Map(
                    countEntries.map(([name]): [CountName, Set<GroupValue>] => [name, new Set()])
                ),
                sums: createEmptySums(),
            };
            groups.set(mapKey, group);
        }

        for (const field of presentAttributes) {
            if (group.key[field] === CONSTANTS.UNKNOWN_LABEL) {
                group.key[field] = readGroupValue(record, field);
            }
        }

        group.recordCount++;
        group.hoursWorked += record.hoursWorked;
        group.billableHours += record.billableHours;

        for (const [name, field] of countEntries) {
            group.distinct.get(name)?.add(readGroupValue(record, field));
        }

        group.sums.fee += record.fee ?? 0;
        group.sums.cost += record.cost ?? 0;
        group.sums.profit += record.profit ?? 0;
        if (record.billableHours > 0) {
            group.sums.rateRevenue += record.billableHours * (record.hourlyRate ?? 0);
        }
    }

    return Array.from(groups.values(), (group) => finalizeGroup(group, recordSet));
}

/**
 * Converts an accumulator to its output row.
 */
function finalizeGroup(group: GroupAccumulator, recordSet: TimeRecordSet): BaseAggregate {
    const hoursWorked = round(group.hoursWorked);
    const billableHours = round(group.billableHours);
    const counts: Partial<Record<CountName, number>> = {};
    for (const [name, values] of group.distinct) {
        counts[name] = values.size;
    }

    return {
        key: group.key,
        capability: recordSet.capability,
        recordCount: group.recordCount,
        hoursWorked,
        billableHours,
        nonBillableHours: round(hoursWorked - billableHours),
        billabilityPct: percentage(billableHours, hoursWorked),
        counts,
        sums: {
            fee: round(group.sums.fee),
            cost: round(group.sums.cost),
            profit: round(group.sums.profit),
            rateRevenue: round(group.sums.rateRevenue),
        },
    };
}

/**
 * Aggregates by a named dimension from the dimension table.
 *
 * @example
 * aggregateDimension(recordSet, 'customer');
 */
export function aggregateDimension(recordSet: TimeRecordSet, dimension: DimensionName): BaseAggregate[] {
    const spec = getDimension(dimension);
    return aggregate(recordSet, spec.groupBy, spec.counts, {
        dimension,
        attributes: spec.attributes,
    });
}

// ============================================================================
// ORDERING
// ============================================================================

function numericKey(row: { key: GroupValues }, key: 'year' | 'month'): number {
    const value = row.key[key];
    return typeof value === 'number' ? value : 0;
}

/**
 * Sorts rows by a numeric metric, descending. Ties keep input order.
 */
export function sortByMetric<R>(rows: readonly R[], metric: (row: R) => number): R[] {
    return [...rows].sort((a, b) => metric(b) - metric(a));
}

/**
 * Sorts rows on their year/month key values, oldest first.
 */
export function sortChronologically<R extends { key: GroupValues }>(rows: readonly R[]): R[] {
    return [...rows].sort((a, b) =>
        compareBuckets(
            { year: numericKey(a, 'year'), month: numericKey(a, 'month') },
            { year: numericKey(b, 'year'), month: numericKey(b, 'month') }
        )
    );
}

/**
 * Applies the dimension's default ordering.
 */
export function orderRows<R extends { key: GroupValues; hoursWorked: number }>(
    rows: readonly R[],
    dimension: DimensionName
): R[] {
    return getDimension(dimension).order === 'chronological'
        ? sortChronologically(rows)
        : sortByMetric(rows, (row) => row.hoursWorked);
}
