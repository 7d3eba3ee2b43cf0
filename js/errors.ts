/**
 * @fileoverview Engine Error Classes
 * Structural failures that stop a call before any aggregation work starts.
 * Data-quality problems are not errors; see EngineWarning in types.ts.
 */

import { ERROR_TYPES, type ErrorType } from './constants.js';

/**
 * Base class for errors raised by the engine.
 */
export class EngineError extends Error {
    readonly type: ErrorType;

    constructor(message: string, type: ErrorType = ERROR_TYPES.UNKNOWN) {
        super(message);
        this.name = 'EngineError';
        this.type = type;
    }
}

/**
 * A grouping, date or required value column is absent from the input.
 *
 * @example
 * throw new MissingKeyColumnError('phase', 'phase', ['date', 'person']);
 * // => "Column 'phase' required by dimension 'phase' is missing (available: date, person)"
 */
export class MissingKeyColumnError extends EngineError {
    /** The missing column */
    readonly column: string;
    /** Dimension or operation that needed it */
    readonly dimension: string;
    /** Columns that were present */
    readonly availableColumns: string[];

    constructor(column: string, dimension: string, availableColumns: Iterable<string> = []) {
        const available = Array.from(availableColumns);
        const suffix = available.length > 0 ? ` (available: ${available.join(', ')})` : '';
        super(
            `Column '${column}' required by dimension '${dimension}' is missing${suffix}`,
            ERROR_TYPES.MISSING_KEY_COLUMN
        );
        this.name = 'MissingKeyColumnError';
        this.column = column;
        this.dimension = dimension;
        this.availableColumns = available;
    }
}

/**
 * A capacity configuration document could not be parsed or has the wrong shape.
 */
export class ConfigError extends EngineError {
    constructor(message: string) {
        super(message, ERROR_TYPES.CONFIG);
        this.name = 'ConfigError';
    }
}

/**
 * A caller-supplied value (a date, a range bound, a number) is unusable.
 */
export class ValidationError extends EngineError {
    /** Name of the offending field */
    readonly field: string;

    constructor(field: string, message: string) {
        super(message, ERROR_TYPES.VALIDATION);
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * A worker thread failed or returned an unusable response.
 */
export class WorkerError extends EngineError {
    constructor(message: string) {
        super(message, ERROR_TYPES.WORKER);
        this.name = 'WorkerError';
    }
}

/**
 * Type guard for engine errors thrown across module boundaries.
 */
export function isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
}
