/**
 * @fileoverview Capacity Normalizer
 *
 * Converts weekly schedule/absence export rows into per-person weekly
 * capacity records and summarizes them.
 *
 * ## Data Flow
 * Input: WeeklySourceRow[] ('Period from', 'Person', 'Total agreed hours',
 *        'Absence <id> hours'...), CapacityConfig
 * Processing:
 *   1. Check the schedule columns (MissingKeyColumnError) and compare absence
 *      ids in the data against the config (warnings)
 *   2. Per row, split absence hours into capacity-reducing and tracked-only
 *   3. available = max(0, scheduled - reducing absence); target = available × ratio
 * Output: CapacityRecord[] plus warnings
 *
 * ## Absence Rules
 * - Ids in the include set reduce capacity
 * - Ids in the exclude set are tracked but never subtracted
 * - Ids in neither set follow config.unlistedAbsencePolicy ('include' unless configured)
 */

import { CONSTANTS, WEEKLY_COLUMNS } from './constants.js';
import { configuredAbsenceIds } from './config.js';
import { MissingKeyColumnError } from './errors.js';
import { createLogger } from './logger.js';
import { IsoUtils, formatIdList, percentage, round, toNumber } from './utils.js';
import type {
    CapacityConfig,
    CapacityProcessingSummary,
    CapacityRecord,
    CapacityResult,
    CapacitySummary,
    EngineWarning,
    PersonCapacitySummary,
    TimeRecordSet,
    WeeklySourceRow,
} from './types.js';

const log = createLogger('Capacity');

const SCHEDULE_COLUMNS = [
    WEEKLY_COLUMNS.PERIOD_FROM,
    WEEKLY_COLUMNS.PERSON,
    WEEKLY_COLUMNS.TOTAL_AGREED_HOURS,
] as const;

/**
 * An absence column found in the export.
 */
interface AbsenceColumn {
    column: string;
    id: string;
}

// ==================== COLUMN HELPERS ====================

/**
 * Extracts the absence type id from a column name.
 *
 * @example
 * extractAbsenceId('Absence illness_676657139 hours'); // 'illness_676657139'
 * extractAbsenceId('Person'); // null
 */
export function extractAbsenceId(columnName: string): string | null {
    if (!columnName.startsWith(WEEKLY_COLUMNS.ABSENCE_PREFIX)) return null;
    let middle = columnName.slice(WEEKLY_COLUMNS.ABSENCE_PREFIX.length);
    if (middle.endsWith(WEEKLY_COLUMNS.ABSENCE_SUFFIX)) {
        middle = middle.slice(0, -WEEKLY_COLUMNS.ABSENCE_SUFFIX.length);
    }
    return middle === '' ? null : middle;
}

function collectHeader(rows: readonly WeeklySourceRow[]): string[] {
    const header = new Set<string>();
    for (const row of rows) {
        for (const column of Object.keys(row)) header.add(column);
    }
    return Array.from(header);
}

function absenceColumnsOf(header: readonly string[]): AbsenceColumn[] {
    const columns: AbsenceColumn[] = [];
    for (const column of header) {
        const id = extractAbsenceId(column);
        if (id) columns.push({ column, id });
    }
    return columns;
}

/**
 * Whether an absence id reduces capacity under the config.
 */
export function reducesCapacity(id: string, config: CapacityConfig): boolean {
    if (config.includeInCapacityReduction.includes(id)) return true;
    if (config.excludeFromCapacityReduction.includes(id)) return false;
    return config.unlistedAbsencePolicy === 'include';
}

// ==================== VALIDATION ====================

/**
 * Compares the weekly export against the capacity configuration.
 * Never throws; every finding is a warning.
 *
 * @param rows - Weekly export rows.
 * @param config - Capacity policy.
 * @returns Warnings for missing schedule columns, configured ids absent from
 *          the data, and data ids absent from the config.
 */
export function validateWeeklyCompleteness(
    rows: readonly WeeklySourceRow[],
    config: CapacityConfig
): EngineWarning[] {
    const warnings: EngineWarning[] = [];
    const header = collectHeader(rows);

    const missingSchedule = SCHEDULE_COLUMNS.filter((column) => !header.includes(column));
    if (missingSchedule.length > 0) {
        warnings.push({
            code: 'MISSING_SCHEDULE_COLUMNS',
            message: `Missing schedule columns: ${missingSchedule.join(', ')}`,
            details: { columns: [...missingSchedule] },
        });
    }

    const dataIds = absenceColumnsOf(header).map((column) => column.id);
    const configIds = configuredAbsenceIds(config);

    const missingInData = configIds.filter((id) => !dataIds.includes(id));
    if (missingInData.length > 0) {
        warnings.push({
            code: 'CONFIG_ABSENCE_NOT_IN_DATA',
            message: `Configuration references absence types not found in data: ${missingInData.join(', ')}`,
            details: { absenceIds: missingInData },
        });
    }

    const unused = dataIds.filter((id) => !configIds.includes(id));
    if (unused.length > 0) {
        warnings.push({
            code: 'DATA_ABSENCE_NOT_IN_CONFIG',
            message: `Data contains absence types not in configuration: ${formatIdList(unused, CONSTANTS.MAX_LISTED_IDS)}`,
            details: { absenceIds: unused },
        });
    }

    return warnings;
}

// ==================== NORMALIZATION ====================

/**
 * Human-readable absence description for one row.
 */
function describeAbsence(included: string[], excluded: string[]): string {
    if (included.length === 0) return 'No absence affecting capacity';
    let description = `Included: ${included.join(', ')}`;
    if (excluded.length > 0) {
        description += ` | Excluded: ${excluded.join(', ')}`;
    }
    return description;
}

/**
 * Converts weekly export rows into capacity records.
 *
 * @param rows - Weekly export rows, one per person and week.
 * @param config - Capacity policy.
 * @returns Capacity records in row order, plus data-quality warnings.
 * @throws MissingKeyColumnError when a schedule column is absent.
 *
 * @example
 * normalizeCapacity(
 *   [{ 'Period from': '2024-03-04', Person: 'ann', 'Total agreed hours': 40, 'Absence sick hours': 8 }],
 *   config
 * ).records[0].availableCapacity; // 32
 */
export function normalizeCapacity(rows: readonly WeeklySourceRow[], config: CapacityConfig): CapacityResult {
    if (rows.length === 0) {
        return { records: [], warnings: [{ code: 'EMPTY_INPUT', message: 'No weekly rows to process' }] };
    }

    const header = collectHeader(rows);
    for (const column of SCHEDULE_COLUMNS) {
        if (!header.includes(column)) {
            throw new MissingKeyColumnError(column, 'capacity', header);
        }
    }

    const warnings = validateWeeklyCompleteness(rows, config);
    const absenceColumns = absenceColumnsOf(header);
    const records: CapacityRecord[] = [];
    const skipped: number[] = [];

    rows.forEach((row, index) => {
        const date = IsoUtils.normalizeDate(row[WEEKLY_COLUMNS.PERIOD_FROM]);
        if (!date) {
            skipped.push(index);
            return;
        }

        const scheduledHours = toNumber(row[WEEKLY_COLUMNS.TOTAL_AGREED_HOURS]);
        let absenceHours = 0;
        let excludedAbsenceHours = 0;
        const included: string[] = [];
        const excluded: string[] = [];

        for (const { column, id } of absenceColumns) {
            const hours = toNumber(row[column]);
            if (hours === 0) continue;
            const label = config.absenceTypes[id] ?? id;
            if (reducesCapacity(id, config)) {
                absenceHours += hours;
                if (!included.includes(label)) included.push(label);
            } else {
                excludedAbsenceHours += hours;
                if (!excluded.includes(label)) excluded.push(label);
            }
        }

        const availableCapacity = Math.max(0, scheduledHours - absenceHours);
        records.push({
            date,
            person: String(row[WEEKLY_COLUMNS.PERSON] ?? CONSTANTS.UNKNOWN_LABEL),
            scheduledHours: round(scheduledHours),
            absenceHours: round(absenceHours),
            excludedAbsenceHours: round(excludedAbsenceHours),
            absenceType: describeAbsence(included, excluded),
            availableCapacity: round(availableCapacity),
            targetBillableHours: round(availableCapacity * config.billableTarget, 2),
        });
    });

    if (skipped.length > 0) {
        warnings.push({
            code: 'ROW_SKIPPED',
            message: `Skipped ${skipped.length} weekly row(s) with an unreadable 'Period from'`,
            details: { rows: skipped.slice(0, CONSTANTS.MAX_LISTED_IDS) },
        });
    }

    log.debug(`Normalized ${records.length} capacity records`, { warnings: warnings.length });
    return { records, warnings };
}

// ==================== SUMMARIES ====================

/**
 * Per-person totals over all weeks, sorted by person.
 * Available capacity sums the already floored weekly values.
 */
export function summarizePersonCapacity(records: readonly CapacityRecord[]): PersonCapacitySummary[] {
    const byPerson = new Map<string, CapacityRecord[]>();
    for (const record of records) {
        const list = byPerson.get(record.person);
        if (list) {
            list.push(record);
        } else {
            byPerson.set(record.person, [record]);
        }
    }

    return Array.from(byPerson.entries())
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([person, weeks]): PersonCapacitySummary => {
            const dates = weeks.map((week) => week.date).sort();
            const scheduledHours = round(weeks.reduce((sum, week) => sum + week.scheduledHours, 0), 2);
            const absenceHours = round(weeks.reduce((sum, week) => sum + week.absenceHours, 0), 2);
            const availableCapacity = round(weeks.reduce((sum, week) => sum + week.availableCapacity, 0), 2);
            return {
                person,
                scheduledHours,
                absenceHours,
                availableCapacity,
                targetBillableHours: round(weeks.reduce((sum, week) => sum + week.targetBillableHours, 0), 2),
                periodStart: dates[0],
                periodEnd: dates[dates.length - 1],
                periodCount: weeks.length,
                absenceRate: percentage(absenceHours, scheduledHours, 1),
                capacityUtilizationRate: percentage(availableCapacity, scheduledHours, 1),
            };
        });
}

/**
 * Totals across all people and weeks.
 */
export function calculateCapacitySummary(records: readonly CapacityRecord[]): CapacitySummary {
    const scheduled = records.reduce((sum, record) => sum + record.scheduledHours, 0);
    const absence = records.reduce((sum, record) => sum + record.absenceHours, 0);
    return {
        totalScheduledHours: round(scheduled, 2),
        totalAbsenceHours: round(absence, 2),
        totalAvailableCapacity: round(records.reduce((sum, record) => sum + record.availableCapacity, 0), 2),
        totalTargetBillableHours: round(records.reduce((sum, record) => sum + record.targetBillableHours, 0), 2),
        uniquePeople: new Set(records.map((record) => record.person)).size,
        weeks: new Set(records.map((record) => record.date)).size,
        overallAbsenceRate: percentage(absence, scheduled, 1),
    };
}

/**
 * Describes what a normalization run produced.
 *
 * @param records - Output of normalizeCapacity().
 * @param config - The policy that was applied, or null when none was.
 */
export function getCapacityProcessingSummary(
    records: readonly CapacityRecord[],
    config: CapacityConfig | null
): CapacityProcessingSummary {
    const dates = records.map((record) => record.date).sort();
    return {
        scheduleRecords: records.length,
        absenceRecords: records.filter((record) => record.absenceHours > 0 || record.excludedAbsenceHours > 0).length,
        uniquePeople: new Set(records.map((record) => record.person)).size,
        dateRange: dates.length > 0 ? { start: dates[0], end: dates[dates.length - 1] } : null,
        totalScheduledHours: round(records.reduce((sum, record) => sum + record.scheduledHours, 0), 2),
        totalAbsenceHours: round(records.reduce((sum, record) => sum + record.absenceHours, 0), 2),
        configApplied: config !== null,
    };
}

// ==================== WORKED VS CAPACITY ====================

export interface WeeklyWorkedHours {
    /** Monday of the week, YYYY-MM-DD */
    date: string;
    person: string;
    hoursWorked: number;
    billableHours: number;
}

/**
 * Sums time records per person and ISO week (Monday start), to line up with
 * weekly capacity records. Sorted by person, then week.
 */
export function aggregateTimeRecordsToWeekly(recordSet: TimeRecordSet): WeeklyWorkedHours[] {
    const weeks = new Map<string, WeeklyWorkedHours>();
    for (const record of recordSet.records) {
        const date = IsoUtils.getWeekStart(record.date);
        const mapKey = `${record.person}\u0000${date}`;
        const week = weeks.get(mapKey);
        if (week) {
            week.hoursWorked += record.hoursWorked;
            week.billableHours += record.billableHours;
        } else {
            weeks.set(mapKey, {
                date,
                person: record.person,
                hoursWorked: record.hoursWorked,
                billableHours: record.billableHours,
            });
        }
    }

    return Array.from(weeks.values(), (week) => ({
        ...week,
        hoursWorked: round(week.hoursWorked),
        billableHours: round(week.billableHours),
    })).sort((a, b) => a.person.localeCompare(b.person) || a.date.localeCompare(b.date));
}
