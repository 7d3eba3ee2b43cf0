/**
 * @fileoverview Worker Message Protocol
 * Messages exchanged between the WorkerManager and aggregate.worker.
 * Record sets travel by structured clone (the column Set included); errors
 * travel as plain objects and are rebuilt on the main thread.
 */

import type { DimensionName } from './dimensions.js';
import { EngineError, MissingKeyColumnError, WorkerError } from './errors.js';
import type { BaseAggregate, TimeRecordSet } from './types.js';

/**
 * Main thread → worker
 */
export interface AggregateRequest {
    type: 'aggregate';
    id: number;
    recordSet: TimeRecordSet;
    dimension: DimensionName;
}

/**
 * Error shape that survives postMessage
 */
export interface SerializedError {
    name: string;
    message: string;
    column?: string;
    dimension?: string;
    availableColumns?: string[];
}

/**
 * Worker → main thread
 */
export type WorkerResponse =
    | { type: 'ready' }
    | { type: 'result'; id: number; payload: BaseAggregate[] }
    | { type: 'error'; id: number; error: SerializedError };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

export function isAggregateRequest(value: unknown): value is AggregateRequest {
    return (
        isRecord(value) &&
        value.type === 'aggregate' &&
        typeof value.id === 'number' &&
        typeof value.dimension === 'string' &&
        isRecord(value.recordSet)
    );
}

export function isWorkerResponse(value: unknown): value is WorkerResponse {
    if (!isRecord(value)) return false;
    switch (value.type) {
        case 'ready':
            return true;
        case 'result':
            return typeof value.id === 'number' && Array.isArray(value.payload);
        case 'error':
            return typeof value.id === 'number' && isRecord(value.error);
        default:
            return false;
    }
}

export function serializeError(error: unknown): SerializedError {
    if (error instanceof MissingKeyColumnError) {
        return {
            name: error.name,
            message: error.message,
            column: error.column,
            dimension: error.dimension,
            availableColumns: error.availableColumns,
        };
    }
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    return { name: 'Error', message: String(error) };
}

/**
 * Rebuilds the engine error a worker reported, so callers can tell a
 * missing column apart from a worker failure.
 */
export function deserializeError(error: SerializedError): EngineError {
    if (error.name === 'MissingKeyColumnError' && error.column !== undefined && error.dimension !== undefined) {
        return new MissingKeyColumnError(error.column, error.dimension, error.availableColumns ?? []);
    }
    return new WorkerError(error.message);
}
