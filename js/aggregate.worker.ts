/**
 * @fileoverview Aggregation Worker Thread
 * Runs dimension aggregation off the main thread.
 * Receives AggregateRequest messages and answers with result or error.
 */

import { parentPort } from 'node:worker_threads';
import { aggregateDimension } from './aggregate.js';
import { isDimensionName } from './dimensions.js';
import { isAggregateRequest, serializeError, type WorkerResponse } from './worker-protocol.js';

const port = parentPort;

if (port) {
    const reply = (response: WorkerResponse): void => port.postMessage(response);

    port.on('message', (message: unknown) => {
        if (!isAggregateRequest(message)) {
            reply({ type: 'error', id: -1, error: { name: 'Error', message: 'Unknown message type' } });
            return;
        }

        if (!isDimensionName(message.dimension)) {
            reply({
                type: 'error',
                id: message.id,
                error: { name: 'Error', message: `Unknown dimension: ${String(message.dimension)}` },
            });
            return;
        }

        try {
            reply({ type: 'result', id: message.id, payload: aggregateDimension(message.recordSet, message.dimension) });
        } catch (error) {
            reply({ type: 'error', id: message.id, error: serializeError(error) });
        }
    });

    // Signal that worker is ready
    reply({ type: 'ready' });
}
