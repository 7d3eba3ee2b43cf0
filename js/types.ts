/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the analytics engine.
 */

// ==================== RECORD TYPES ====================

/**
 * One logged work entry (one person, one project, one day).
 * Produced by ingestion and never mutated afterwards.
 */
export interface TimeRecord {
    /** Calendar date, YYYY-MM-DD */
    date: string;
    /** Customer identifier */
    customerNumber: string;
    /** Customer display name */
    customerName: string;
    /** Project identifier */
    projectNumber: string;
    /** Project display name */
    projectName: string;
    /** Project category (e.g., 'Fixed price', 'Internal') */
    projectType: string;
    /** Pricing model of the project */
    priceModel: string;
    /** Project phase */
    phase: string;
    /** Activity performed */
    activity: string;
    /** Person identifier */
    person: string;
    /** 'Internal' or 'External' */
    personType: string;
    /** Hours logged, >= 0 */
    hoursWorked: number;
    /** Billable share of hoursWorked */
    billableHours: number;
    /** Hourly rate, when the source carries one */
    hourlyRate?: number;
    /** Precomputed revenue for the record */
    fee?: number;
    /** Precomputed cost for the record */
    cost?: number;
    /** Precomputed profit for the record */
    profit?: number;
}

/**
 * One planned-hours entry.
 */
export interface PlannedRecord {
    /** Calendar date, YYYY-MM-DD */
    date: string;
    /** Person identifier */
    person: string;
    /** Project identifier */
    projectNumber: string;
    /** Project display name */
    projectName: string;
    /** Budgeted hours */
    plannedHours: number;
    /** Budgeted hourly rate */
    plannedRate?: number;
}

/**
 * Calendar keys derived from a record date.
 */
export interface TimeBucket {
    /** Four-digit year */
    year: number;
    /** Month number, 1-12 */
    month: number;
    /** Three-letter month abbreviation (Jan..Dec) */
    monthName: string;
    /** Lexicographically sortable key, YYYY-MM */
    monthKey: string;
}

/**
 * Which financial source fields the ingested record set carries.
 * Resolved once at ingestion; the metrics calculator dispatches on it.
 */
export type FinancialCapability = 'FullFinancials' | 'RateOnly' | 'HoursOnly';

/**
 * Field names a time record set can be grouped or counted by.
 */
export type TimeRecordField =
    | 'date'
    | 'customerNumber'
    | 'customerName'
    | 'projectNumber'
    | 'projectName'
    | 'projectType'
    | 'priceModel'
    | 'phase'
    | 'activity'
    | 'person'
    | 'personType'
    | 'hoursWorked'
    | 'billableHours'
    | 'hourlyRate'
    | 'fee'
    | 'cost'
    | 'profit';

export type PlannedRecordField =
    | 'date'
    | 'person'
    | 'projectNumber'
    | 'projectName'
    | 'plannedHours'
    | 'plannedRate';

/**
 * Keys usable in a group-by: source fields plus the derived calendar keys.
 */
export type GroupKey = TimeRecordField | keyof TimeBucket;

export type GroupValue = string | number;

/**
 * Composite grouping key of an aggregate row, keyed by GroupKey.
 */
export type GroupValues = Partial<Record<GroupKey, GroupValue>>;

/**
 * Ingested record set: typed records plus the schema facts resolved at ingestion.
 */
export interface RecordSet<R, F extends string> {
    /** The records, in source order */
    records: readonly R[];
    /** Source columns that were present */
    columns: ReadonlySet<F>;
    /** Data-quality notes raised during ingestion */
    warnings: EngineWarning[];
}

export interface TimeRecordSet extends RecordSet<TimeRecord, TimeRecordField> {
    /** Financial tier available for this record set */
    capability: FinancialCapability;
}

export interface PlannedRecordSet extends RecordSet<PlannedRecord, PlannedRecordField> {
    /** Whether planned rates are present */
    hasPlannedRate: boolean;
}

// ==================== AGGREGATE TYPES ====================

/**
 * Raw financial sums accumulated per group, before derivation.
 */
export interface FinancialSums {
    /** Σ fee per record */
    fee: number;
    /** Σ cost per record */
    cost: number;
    /** Σ profit per record */
    profit: number;
    /** Σ billable hours × hourly rate */
    rateRevenue: number;
}

/**
 * Output row of the dimensional aggregator.
 */
export interface BaseAggregate {
    /** Group values for the requested keys */
    key: GroupValues;
    /** Financial tier of the source records */
    capability: FinancialCapability;
    /** Number of source records in the group */
    recordCount: number;
    hoursWorked: number;
    billableHours: number;
    /** hoursWorked - billableHours */
    nonBillableHours: number;
    /** billable / worked × 100, 0 when nothing was worked */
    billabilityPct: number;
    /** Distinct counts of the secondary dimensions, by count name */
    counts: Partial<Record<CountName, number>>;
    sums: FinancialSums;
}

export type CountName = 'projects' | 'customers' | 'people';

/**
 * Financial metrics derived from the sums of a group.
 */
export interface FinancialMetrics {
    revenue: number;
    totalCost: number;
    totalProfit: number;
    /** totalProfit / revenue × 100; may be negative */
    profitMarginPct: number;
    /** revenue / billableHours */
    billableRate: number;
    /** revenue / hoursWorked */
    effectiveRate: number;
}

export interface DimensionAggregate extends BaseAggregate, FinancialMetrics {}

/**
 * Planned hours aggregated on a set of keys.
 */
export interface PlannedAggregate {
    key: GroupValues;
    plannedHours: number;
    /** Distinct people planned */
    people: number;
    /** Σ(rate × hours) / Σ hours; null when no rates were planned */
    plannedRate: number | null;
    /** plannedHours × plannedRate; null when no rates were planned */
    plannedRevenue: number | null;
    /** The people counted in `people`, first-seen order */
    personIds: string[];
    /** Unrounded Σ(rate × hours); 0 when no rates were planned */
    rateHours: number;
}

/**
 * Which side(s) of an outer join a merged row came from.
 */
export type MergeSource = 'both' | 'actualOnly' | 'plannedOnly';

/**
 * Actual aggregate joined with its planned counterpart.
 */
export interface MergedDimensionRow extends DimensionAggregate {
    source: MergeSource;
    plannedHours: number;
    plannedPeople: number;
    plannedRate: number | null;
    plannedRevenue: number | null;
    /** hoursWorked - plannedHours */
    hoursVariance: number;
    /** hoursVariance / plannedHours × 100, 0 when nothing was planned */
    variancePct: number;
    /** effectiveRate - plannedRate; null when either rate is unavailable */
    rateVariance: number | null;
    rateVariancePct: number | null;
    /** revenue - plannedRevenue; null when either revenue is unavailable */
    revenueVariance: number | null;
    revenueVariancePct: number | null;
}

// ==================== FORECAST TYPES ====================

/**
 * One month of actual and planned hours, input to the forecast accumulator.
 */
export interface MonthlyHours {
    year: number;
    month: number;
    hoursWorked: number;
    plannedHours: number;
}

export type TimePeriod = 'Actual' | 'Planned';

export interface ForecastPoint extends MonthlyHours {
    monthName: string;
    monthKey: string;
    /** "Jan 2024" */
    label: string;
    timePeriod: TimePeriod;
    /** hoursWorked for Actual months, plannedHours for Planned months */
    monthValue: number;
    /** Running sum of monthValue up to and including this month */
    accumulatedForecast: number;
}

export interface ForecastResult {
    series: ForecastPoint[];
    runningTotal: number;
}

// ==================== CAPACITY TYPES ====================

/**
 * How absence ids listed in neither configuration set are treated.
 */
export type UnlistedAbsencePolicy = 'include' | 'exclude';

/**
 * Client-specific absence policy.
 */
export interface CapacityConfig {
    /** Absence type id → human label */
    absenceTypes: Record<string, string>;
    /** Ids subtracted from scheduled hours */
    includeInCapacityReduction: string[];
    /** Ids tracked for display only */
    excludeFromCapacityReduction: string[];
    /** Share of available capacity expected to be billable */
    billableTarget: number;
    /** Treatment of ids in neither list */
    unlistedAbsencePolicy: UnlistedAbsencePolicy;
}

/**
 * Raw weekly source row as delivered by the schedule export.
 * Columns: 'Period from', 'Person', 'Total agreed hours', 'Absence <id> hours'...
 */
export type WeeklySourceRow = Record<string, string | number | null | undefined>;

/**
 * One person/week capacity entry.
 */
export interface CapacityRecord {
    /** Week start, YYYY-MM-DD */
    date: string;
    person: string;
    scheduledHours: number;
    /** Absence hours that reduce capacity */
    absenceHours: number;
    /** Absence hours tracked but not subtracted */
    excludedAbsenceHours: number;
    /** Human-readable breakdown of the absence */
    absenceType: string;
    /** max(0, scheduled - absence) */
    availableCapacity: number;
    /** availableCapacity × billable target */
    targetBillableHours: number;
}

export interface PersonCapacitySummary {
    person: string;
    scheduledHours: number;
    absenceHours: number;
    availableCapacity: number;
    targetBillableHours: number;
    periodStart: string;
    periodEnd: string;
    periodCount: number;
    /** absence / scheduled × 100, 1 decimal */
    absenceRate: number;
    /** available / scheduled × 100, 1 decimal */
    capacityUtilizationRate: number;
}

export interface CapacitySummary {
    totalScheduledHours: number;
    totalAbsenceHours: number;
    totalAvailableCapacity: number;
    totalTargetBillableHours: number;
    uniquePeople: number;
    weeks: number;
    overallAbsenceRate: number;
}

export interface CapacityProcessingSummary {
    scheduleRecords: number;
    absenceRecords: number;
    uniquePeople: number;
    dateRange: { start: string; end: string } | null;
    totalScheduledHours: number;
    totalAbsenceHours: number;
    configApplied: boolean;
}

export interface CapacityResult {
    records: CapacityRecord[];
    warnings: EngineWarning[];
}

// ==================== WARNINGS & ERRORS ====================

export type WarningCode =
    | 'CONFIG_ABSENCE_NOT_IN_DATA'
    | 'DATA_ABSENCE_NOT_IN_CONFIG'
    | 'MISSING_SCHEDULE_COLUMNS'
    | 'EMPTY_INPUT'
    | 'ROW_SKIPPED'
    | 'NO_MATCHING_RECORDS';

/**
 * Recoverable data-quality issue returned next to a result.
 */
export interface EngineWarning {
    code: WarningCode;
    message: string;
    details?: Record<string, unknown>;
}

/**
 * Structured error for user display
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    /** User-friendly error title */
    title: string;
    /** User-friendly error message */
    message: string;
    /** Suggested action */
    action: 'fix-input' | 'retry' | 'none';
    /** Original error object */
    originalError?: Error | string;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
