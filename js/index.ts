/**
 * @fileoverview Public API of the work-hours analytics engine.
 */

export * from './types.js';
export { CONSTANTS, ERROR_TYPES, ERROR_MESSAGES, MONTH_NAMES, TIME_RECORD_COLUMNS, PLANNED_RECORD_COLUMNS, WEEKLY_COLUMNS } from './constants.js';
export { EngineError, MissingKeyColumnError, ConfigError, ValidationError, WorkerError, isEngineError } from './errors.js';
export { createLogger, configureLogger, setLogLevel, LogLevel } from './logger.js';
export { classifyError, createUserFriendlyError, requireNumber, requireIsoDate, requireDateRange, round, safeDivide, percentage, IsoUtils } from './utils.js';

export { annotateTimeBuckets, bucketDate, bucketLabel, toMonthKey } from './time-buckets.js';
export { DIMENSIONS, DIMENSION_NAMES, isDimensionName, type DimensionName, type DimensionSpec } from './dimensions.js';
export { aggregate, aggregateDimension, orderRows, sortByMetric, sortChronologically } from './aggregate.js';
export { computeFinancials, enrichFinancials, resolveCapability } from './financials.js';
export { ingestTimeRecords, ingestPlannedRecords, createTimeRecordSet, createPlannedRecordSet, type SourceRow } from './ingest.js';
export {
    aggregatePlanned,
    mergePlanned,
    calculatePlannedSummary,
    compareActualVsPlanned,
    type PlannedSummary,
    type ActualVsPlannedComparison,
} from './planned.js';
export {
    filterTimeRecords,
    filterPlannedRecords,
    resolveDateRange,
    describeSelection,
    type DateRange,
    type PeriodSelection,
    type TimeRecordFilter,
    type PlannedRecordFilter,
    type ValueFilter,
} from './filters.js';
export { accumulateForecast, toMonthlySeries } from './forecast.js';
export {
    normalizeCapacity,
    validateWeeklyCompleteness,
    summarizePersonCapacity,
    calculateCapacitySummary,
    getCapacityProcessingSummary,
    aggregateTimeRecordsToWeekly,
    type WeeklyWorkedHours,
} from './capacity.js';
export { loadEngineConfig, parseCapacityConfig, toCapacityConfig, DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
export {
    calculateSummaryMetrics,
    aggregateByTime,
    findTopItems,
    calculateUtilizationRates,
    aggregateCustomerProjectHierarchy,
    aggregateProjectByMonth,
    type SummaryMetrics,
    type UtilizationRow,
    type HierarchyRow,
} from './reports.js';
export { AggregateCache } from './cache.js';
export { WorkerManager, type WorkerHandle, type WorkerFactory } from './worker-manager.js';
export {
    initErrorReporting,
    sentryConfigFromEnv,
    reportError,
    setDatasetContext,
    flushErrorReports,
    closeErrorReporting,
} from './error-reporting.js';
export { ReportEngine, type DimensionReport, type DimensionReportSet, type CapacityReport } from './engine.js';
