/**
 * @fileoverview Record Ingestion
 * Turns columnar export rows (keyed by source column name) into typed record
 * sets, validating required columns and resolving the financial capability
 * once for the whole set.
 */

import { CONSTANTS, PLANNED_RECORD_COLUMNS, TIME_RECORD_COLUMNS } from './constants.js';
import { MissingKeyColumnError } from './errors.js';
import { resolveCapability } from './financials.js';
import { createLogger } from './logger.js';
import { IsoUtils, toNumber } from './utils.js';
import type {
    EngineWarning,
    PlannedRecord,
    PlannedRecordField,
    PlannedRecordSet,
    TimeRecord,
    TimeRecordField,
    TimeRecordSet,
} from './types.js';

const log = createLogger('Ingest');

/**
 * A row of the source export: column name → cell value.
 */
export type SourceRow = Readonly<Record<string, unknown>>;

export interface IngestOptions {
    /** Header of the export; derived from the rows when omitted */
    columns?: Iterable<string>;
}

const REQUIRED_TIME_FIELDS: readonly TimeRecordField[] = [
    'date',
    'projectNumber',
    'projectName',
    'person',
    'hoursWorked',
    'billableHours',
];

const REQUIRED_PLANNED_FIELDS: readonly PlannedRecordField[] = [
    'date',
    'person',
    'projectNumber',
    'projectName',
    'plannedHours',
];

const TIME_FIELDS = Object.keys(TIME_RECORD_COLUMNS).filter(
    (field): field is TimeRecordField => field in TIME_RECORD_COLUMNS
);
const PLANNED_FIELDS = Object.keys(PLANNED_RECORD_COLUMNS).filter(
    (field): field is PlannedRecordField => field in PLANNED_RECORD_COLUMNS
);

// ==================== HELPERS ====================

/**
 * Header of the export: explicit columns, or every key seen in the rows.
 */
function collectHeader(rows: readonly SourceRow[], options: IngestOptions): Set<string> {
    if (options.columns) return new Set(options.columns);
    const header = new Set<string>();
    for (const row of rows) {
        for (const [column, value] of Object.entries(row)) {
            if (value !== undefined) header.add(column);
        }
    }
    return header;
}

/**
 * Maps the header to the fields it provides.
 */
function presentFields<F extends string>(
    header: ReadonlySet<string>,
    fields: readonly F[],
    columnOf: Readonly<Record<F, string>>
): Set<F> {
    return new Set(fields.filter((field) => header.has(columnOf[field])));
}

function assertRequired<F extends string>(
    present: ReadonlySet<F>,
    required: readonly F[],
    columnOf: Readonly<Record<F, string>>,
    header: ReadonlySet<string>,
    dimension: string
): void {
    for (const field of required) {
        if (!present.has(field)) {
            throw new MissingKeyColumnError(columnOf[field], dimension, header);
        }
    }
}

/**
 * Reads a text cell; blanks become 'Unknown'.
 */
function toText(value: unknown): string {
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    return CONSTANTS.UNKNOWN_LABEL;
}

function skippedRowsWarning(skipped: number[]): EngineWarning {
    return {
        code: 'ROW_SKIPPED',
        message: `Skipped ${skipped.length} row(s) with an unreadable date`,
        details: { rows: skipped.slice(0, CONSTANTS.MAX_LISTED_IDS) },
    };
}

function emptyInputWarning(kind: string): EngineWarning {
    return { code: 'EMPTY_INPUT', message: `No ${kind} rows to process` };
}

// ==================== TIME RECORDS ====================

/**
 * Converts export rows into a TimeRecordSet.
 *
 * @param rows - Rows keyed by the export's column names ('Date', 'Hours worked', ...).
 * @param options - Explicit header, for exports whose trailing cells may be blank.
 * @returns Records, present columns, capability and ingestion warnings.
 * @throws MissingKeyColumnError when a required column is absent.
 */
export function ingestTimeRecords(rows: readonly SourceRow[], options: IngestOptions = {}): TimeRecordSet {
    if (rows.length === 0 && !options.columns) {
        // Nothing to check a header against: an empty set aggregates to nothing.
        return {
            records: [],
            columns: new Set(TIME_FIELDS),
            capability: 'HoursOnly',
            warnings: [emptyInputWarning('time record')],
        };
    }

    const header = collectHeader(rows, options);
    const columns = presentFields(header, TIME_FIELDS, TIME_RECORD_COLUMNS);
    assertRequired(columns, REQUIRED_TIME_FIELDS, TIME_RECORD_COLUMNS, header, 'ingest');

    const capability = resolveCapability(columns);
    const records: TimeRecord[] = [];
    const skipped: number[] = [];

    rows.forEach((row, index) => {
        const date = IsoUtils.normalizeDate(row[TIME_RECORD_COLUMNS.date]);
        if (!date) {
            skipped.push(index);
            return;
        }

        const record: TimeRecord = {
            date,
            customerNumber: toText(row[TIME_RECORD_COLUMNS.customerNumber]),
            customerName: toText(row[TIME_RECORD_COLUMNS.customerName]),
            projectNumber: toText(row[TIME_RECORD_COLUMNS.projectNumber]),
            projectName: toText(row[TIME_RECORD_COLUMNS.projectName]),
            projectType: toText(row[TIME_RECORD_COLUMNS.projectType]),
            priceModel: toText(row[TIME_RECORD_COLUMNS.priceModel]),
            phase: toText(row[TIME_RECORD_COLUMNS.phase]),
            activity: toText(row[TIME_RECORD_COLUMNS.activity]),
            person: toText(row[TIME_RECORD_COLUMNS.person]),
            personType: toText(row[TIME_RECORD_COLUMNS.personType]),
            hoursWorked: toNumber(row[TIME_RECORD_COLUMNS.hoursWorked]),
            billableHours: toNumber(row[TIME_RECORD_COLUMNS.billableHours]),
        };
        if (columns.has('hourlyRate')) record.hourlyRate = toNumber(row[TIME_RECORD_COLUMNS.hourlyRate]);
        if (columns.has('fee')) record.fee = toNumber(row[TIME_RECORD_COLUMNS.fee]);
        if (columns.has('cost')) record.cost = toNumber(row[TIME_RECORD_COLUMNS.cost]);
        if (columns.has('profit')) record.profit = toNumber(row[TIME_RECORD_COLUMNS.profit]);

        records.push(record);
    });

    const warnings: EngineWarning[] = [];
    if (skipped.length > 0) {
        warnings.push(skippedRowsWarning(skipped));
        log.warn(`Skipped ${skipped.length} time record row(s) with unreadable dates`);
    }
    if (records.length === 0) {
        warnings.push(emptyInputWarning('time record'));
    }

    log.debug(`Ingested ${records.length} time records`, { capability, columns: columns.size });
    return { records, columns, capability, warnings };
}

/**
 * Wraps already typed records in a TimeRecordSet.
 * Optional numeric columns count as present when any record carries them.
 *
 * @param records - Typed records.
 * @param columns - Explicit column set; inferred when omitted.
 */
export function createTimeRecordSet(
    records: readonly TimeRecord[],
    columns?: Iterable<TimeRecordField>
): TimeRecordSet {
    let present: Set<TimeRecordField>;
    if (columns) {
        present = new Set(columns);
    } else {
        present = new Set(TIME_FIELDS.filter((field) => !isOptionalNumeric(field)));
        for (const record of records) {
            if (record.hourlyRate !== undefined) present.add('hourlyRate');
            if (record.fee !== undefined) present.add('fee');
            if (record.cost !== undefined) present.add('cost');
            if (record.profit !== undefined) present.add('profit');
        }
    }
    return {
        records,
        columns: present,
        capability: resolveCapability(present),
        warnings: records.length === 0 ? [emptyInputWarning('time record')] : [],
    };
}

function isOptionalNumeric(field: TimeRecordField): boolean {
    return field === 'hourlyRate' || field === 'fee' || field === 'cost' || field === 'profit';
}

// ==================== PLANNED RECORDS ====================

/**
 * Converts planned-hours export rows into a PlannedRecordSet.
 *
 * @throws MissingKeyColumnError when a required column is absent.
 */
export function ingestPlannedRecords(
    rows: readonly SourceRow[],
    options: IngestOptions = {}
): PlannedRecordSet {
    if (rows.length === 0 && !options.columns) {
        return {
            records: [],
            columns: new Set(PLANNED_FIELDS),
            hasPlannedRate: false,
            warnings: [emptyInputWarning('planned')],
        };
    }

    const header = collectHeader(rows, options);
    const columns = presentFields(header, PLANNED_FIELDS, PLANNED_RECORD_COLUMNS);
    assertRequired(columns, REQUIRED_PLANNED_FIELDS, PLANNED_RECORD_COLUMNS, header, 'planned-ingest');

    const hasPlannedRate = columns.has('plannedRate');
    const records: PlannedRecord[] = [];
    const skipped: number[] = [];

    rows.forEach((row, index) => {
        const date = IsoUtils.normalizeDate(row[PLANNED_RECORD_COLUMNS.date]);
        if (!date) {
            skipped.push(index);
            return;
        }
        const record: PlannedRecord = {
            date,
            person: toText(row[PLANNED_RECORD_COLUMNS.person]),
            projectNumber: toText(row[PLANNED_RECORD_COLUMNS.projectNumber]),
            projectName: toText(row[PLANNED_RECORD_COLUMNS.projectName]),
            plannedHours: toNumber(row[PLANNED_RECORD_COLUMNS.plannedHours]),
        };
        if (hasPlannedRate) record.plannedRate = toNumber(row[PLANNED_RECORD_COLUMNS.plannedRate]);
        records.push(record);
    });

    const warnings: EngineWarning[] = [];
    if (skipped.length > 0) {
        warnings.push(skippedRowsWarning(skipped));
        log.warn(`Skipped ${skipped.length} planned row(s) with unreadable dates`);
    }
    if (records.length === 0) {
        warnings.push(emptyInputWarning('planned'));
    }

    return { records, columns, hasPlannedRate, warnings };
}

/**
 * Wraps typed planned records in a PlannedRecordSet.
 */
export function createPlannedRecordSet(records: readonly PlannedRecord[]): PlannedRecordSet {
    const hasPlannedRate = records.some((record) => record.plannedRate !== undefined);
    const columns = new Set(PLANNED_FIELDS.filter((field) => field !== 'plannedRate' || hasPlannedRate));
    return {
        records,
        columns,
        hasPlannedRate,
        warnings: records.length === 0 ? [emptyInputWarning('planned')] : [],
    };
}
