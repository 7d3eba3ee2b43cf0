/**
 * @fileoverview Dimension Table
 * Declares, per reporting dimension, which keys it groups by, which secondary
 * distinct counts it carries, how its planned counterpart is joined, and how
 * its rows are ordered by default.
 */

import type { CountName, GroupKey, TimeRecordField } from './types.js';

/**
 * Definition of one reporting dimension.
 */
export interface DimensionSpec {
    /** Keys whose columns must be present */
    readonly groupBy: readonly GroupKey[];
    /**
     * Descriptive keys carried on each row without splitting it: the first
     * non-blank value seen in the group, 'Unknown' when there is none
     */
    readonly attributes?: readonly TimeRecordField[];
    /** Distinct counts to compute (count name → counted field); skipped when the field is absent */
    readonly counts: Readonly<Partial<Record<CountName, TimeRecordField>>>;
    /** Keys on which planned data joins, when planned data applies */
    readonly plannedJoin?: readonly GroupKey[];
    /** Default ordering of output rows */
    readonly order: 'chronological' | 'hoursDesc';
}

export const DIMENSIONS = {
    customer: {
        groupBy: ['customerNumber', 'customerName'],
        counts: { projects: 'projectNumber' },
        order: 'hoursDesc',
    },
    project: {
        groupBy: ['projectNumber', 'projectName'],
        attributes: ['projectType'],
        counts: { people: 'person' },
        plannedJoin: ['projectNumber', 'projectName'],
        order: 'hoursDesc',
    },
    projectType: {
        groupBy: ['projectType'],
        counts: { projects: 'projectNumber', people: 'person' },
        order: 'hoursDesc',
    },
    phase: {
        groupBy: ['phase'],
        counts: { projects: 'projectNumber', people: 'person' },
        order: 'hoursDesc',
    },
    activity: {
        groupBy: ['activity'],
        counts: { projects: 'projectNumber', people: 'person' },
        order: 'hoursDesc',
    },
    priceModel: {
        groupBy: ['priceModel'],
        counts: { projects: 'projectNumber', people: 'person' },
        order: 'hoursDesc',
    },
    person: {
        groupBy: ['person'],
        counts: { projects: 'projectNumber' },
        plannedJoin: ['person'],
        order: 'hoursDesc',
    },
    year: {
        groupBy: ['year'],
        counts: { projects: 'projectNumber', customers: 'customerNumber', people: 'person' },
        plannedJoin: ['year'],
        order: 'chronological',
    },
    month: {
        groupBy: ['year', 'month', 'monthName', 'monthKey'],
        counts: { projects: 'projectNumber', customers: 'customerNumber', people: 'person' },
        plannedJoin: ['year', 'month'],
        order: 'chronological',
    },
} as const satisfies Record<string, DimensionSpec>;

export type DimensionName = keyof typeof DIMENSIONS;

export const DIMENSION_NAMES = Object.keys(DIMENSIONS).filter(isDimensionName);

/**
 * Type guard for dimension names received from callers or worker messages.
 */
export function isDimensionName(value: unknown): value is DimensionName {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DIMENSIONS, value);
}

/**
 * Looks up a dimension definition with the widened DimensionSpec type.
 */
export function getDimension(name: DimensionName): DimensionSpec {
    const spec: DimensionSpec = DIMENSIONS[name];
    return spec;
}
