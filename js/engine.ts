/**
 * @fileoverview Report Engine
 *
 * Entry point for consumers: builds dimension reports, the hours forecast
 * and the capacity report from ingested record sets.
 *
 * ## Data Flow
 * ```
 * TimeRecordSet ──► AggregateCache ──► WorkerManager / aggregateDimension
 *                                         │
 *                         enrichFinancials ◄┘
 *                                │
 *          PlannedRecordSet ──► mergePlanned (dimensions with a planned join)
 *                                │
 *                            orderRows ──► DimensionReport
 * ```
 *
 * Every requested dimension's key columns are checked before any
 * aggregation starts; a MissingKeyColumnError goes straight back to the
 * caller. Any other failure is reported to Sentry, then rethrown.
 */

import { aggregateDimension, assertKeyColumns, orderRows } from './aggregate.js';
import { AggregateCache } from './cache.js';
import {
    calculateCapacitySummary,
    getCapacityProcessingSummary,
    normalizeCapacity,
    summarizePersonCapacity,
} from './capacity.js';
import { loadEngineConfig, parseCapacityConfig, type EngineConfig } from './config.js';
import { DIMENSION_NAMES, getDimension, type DimensionName } from './dimensions.js';
import { MissingKeyColumnError } from './errors.js';
import { addBreadcrumb, reportError } from './error-reporting.js';
import { enrichFinancials } from './financials.js';
import { accumulateForecast, toMonthlySeries } from './forecast.js';
import { createLogger } from './logger.js';
import { aggregatePlanned, isPlannedGroupKey, mergePlanned } from './planned.js';
import { WorkerManager } from './worker-manager.js';
import type {
    BaseAggregate,
    CapacityConfig,
    CapacityProcessingSummary,
    CapacityRecord,
    CapacitySummary,
    DimensionAggregate,
    EngineWarning,
    FinancialCapability,
    ForecastResult,
    MergedDimensionRow,
    PersonCapacitySummary,
    PlannedRecordSet,
    TimeRecordSet,
    WeeklySourceRow,
} from './types.js';

const log = createLogger('ReportEngine');

// ==================== TYPES ====================

interface DimensionReportBase {
    dimension: DimensionName;
    capability: FinancialCapability;
}

/**
 * Rows of one dimension. `planned` tells whether planned data was merged in.
 */
export type DimensionReport =
    | (DimensionReportBase & { planned: false; rows: DimensionAggregate[] })
    | (DimensionReportBase & { planned: true; rows: MergedDimensionRow[] });

export interface DimensionReportSet {
    reports: DimensionReport[];
    /** Ingestion warnings of the record sets involved */
    warnings: EngineWarning[];
}

export interface CapacityReport {
    records: CapacityRecord[];
    people: PersonCapacitySummary[];
    summary: CapacitySummary;
    processing: CapacityProcessingSummary;
    warnings: EngineWarning[];
}

export interface ReportEngineOptions {
    /** Defaults to loadEngineConfig() */
    config?: EngineConfig;
    cache?: AggregateCache<BaseAggregate[]>;
    /** Worker pool; created from config.useWorkers when omitted */
    workers?: WorkerManager | null;
}

// ==================== ENGINE ====================

export class ReportEngine {
    readonly config: EngineConfig;
    private readonly cache: AggregateCache<BaseAggregate[]>;
    private readonly workers: WorkerManager | null;

    constructor(options: ReportEngineOptions = {}) {
        this.config = options.config ?? loadEngineConfig();
        this.cache = options.cache ?? new AggregateCache<BaseAggregate[]>({ ttlMs: this.config.cacheTtlMs });
        this.workers =
            options.workers !== undefined
                ? options.workers
                : this.config.useWorkers
                  ? new WorkerManager({ poolSize: this.config.workerPoolSize })
                  : null;
    }

    /**
     * Base aggregates of one dimension, shared through the cache.
     */
    private getAggregates(recordSet: TimeRecordSet, dimension: DimensionName): Promise<BaseAggregate[]> {
        return this.cache.getOrCompute(recordSet, dimension, () =>
            this.workers ? this.workers.aggregateAsync(recordSet, dimension) : aggregateDimension(recordSet, dimension)
        );
    }

    private async buildDimensionReport(
        recordSet: TimeRecordSet,
        dimension: DimensionName,
        planned: PlannedRecordSet | undefined
    ): Promise<DimensionReport> {
        const spec = getDimension(dimension);
        const actual = enrichFinancials(await this.getAggregates(recordSet, dimension));
        const capability = recordSet.capability;

        const dimensionLog = log.child({ dimension });

        if (planned && spec.plannedJoin) {
            const plannedRows = aggregatePlanned(planned, spec.groupBy.filter(isPlannedGroupKey));
            const merged = mergePlanned(actual, plannedRows, spec.plannedJoin, {
                capability,
                rowKeys: [...spec.groupBy, ...(spec.attributes ?? [])],
            });
            dimensionLog.debug(`${actual.length} actual rows, ${plannedRows.length} planned rows`);
            return { dimension, capability, planned: true, rows: orderRows(merged, dimension) };
        }
        dimensionLog.debug(`${actual.length} rows`);
        return { dimension, capability, planned: false, rows: orderRows(actual, dimension) };
    }

    /**
     * Builds the reports of the requested dimensions.
     *
     * @param recordSet - Ingested time records.
     * @param dimensions - Dimensions to build; all of them by default.
     * @param planned - Planned records, merged into the dimensions that have a planned join.
     * @throws MissingKeyColumnError before any aggregation when a dimension's key column is absent.
     *
     * @example
     * const { reports } = await engine.buildDimensionReports(recordSet, ['project', 'month'], planned);
     */
    async buildDimensionReports(
        recordSet: TimeRecordSet,
        dimensions: readonly DimensionName[] = DIMENSION_NAMES,
        planned?: PlannedRecordSet
    ): Promise<DimensionReportSet> {
        for (const dimension of dimensions) {
            assertKeyColumns(recordSet, getDimension(dimension).groupBy, dimension);
        }

        addBreadcrumb('engine', 'Building dimension reports', {
            records: recordSet.records.length,
            dimensions: dimensions.join(','),
            planned: planned !== undefined,
        });

        try {
            log.time('buildDimensionReports');
            if (this.workers) {
                await this.workers.init();
            }
            const reports = await Promise.all(
                dimensions.map((dimension) => this.buildDimensionReport(recordSet, dimension, planned))
            );
            log.timeEnd('buildDimensionReports');
            return { reports, warnings: [...recordSet.warnings, ...(planned?.warnings ?? [])] };
        } catch (error) {
            if (!(error instanceof MissingKeyColumnError)) {
                reportError(error instanceof Error ? error : String(error), {
                    module: 'ReportEngine',
                    operation: 'buildDimensionReports',
                    metadata: { dimensions: dimensions.join(',') },
                });
            }
            throw error;
        }
    }

    /**
     * Hours forecast over the month dimension: actual hours before the
     * reference month, planned hours from it on.
     *
     * @param referenceDate - The forecast's "now"; never read from the clock.
     */
    async buildForecast(
        recordSet: TimeRecordSet,
        planned: PlannedRecordSet,
        referenceDate: Date | string
    ): Promise<ForecastResult> {
        const { reports } = await this.buildDimensionReports(recordSet, ['month'], planned);
        const monthly = reports.flatMap((report) => (report.planned ? toMonthlySeries(report.rows) : []));
        return accumulateForecast(monthly, referenceDate);
    }

    /**
     * Parses a capacity policy, filling omitted settings from the engine config.
     */
    loadCapacityConfig(content: string): CapacityConfig {
        return parseCapacityConfig(content, {
            billableTarget: this.config.billableTarget,
            unlistedAbsencePolicy: this.config.unlistedAbsencePolicy,
        });
    }

    /**
     * Normalizes weekly schedule rows and summarizes them.
     *
     * @throws MissingKeyColumnError when a schedule column is absent.
     */
    buildCapacityReport(rows: readonly WeeklySourceRow[], config: CapacityConfig): CapacityReport {
        addBreadcrumb('engine', 'Building capacity report', { rows: rows.length });
        const { records, warnings } = normalizeCapacity(rows, config);
        for (const warning of warnings) {
            log.warn(warning.message);
        }
        return {
            records,
            people: summarizePersonCapacity(records),
            summary: calculateCapacitySummary(records),
            processing: getCapacityProcessingSummary(records, config),
            warnings,
        };
    }

    /**
     * Forgets cached aggregates of a record set, or all of them.
     */
    invalidate(recordSet?: TimeRecordSet): void {
        this.cache.invalidate(recordSet);
    }

    /**
     * Stops the worker pool and clears the cache.
     */
    async dispose(): Promise<void> {
        this.cache.invalidate();
        if (this.workers) {
            await this.workers.terminate();
        }
    }
}
