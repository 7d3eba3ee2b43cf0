/**
 * @fileoverview Worker Manager Module
 * Manages a pool of worker threads that run dimension aggregation off the
 * main thread.
 *
 * ## Worker Lifecycle
 *
 * ```
 * ┌─────────────────┐
 * │   init()        │──► Starts poolSize workers from aggregate.worker.js
 * └────────┬────────┘    Waits for each 'ready' message (5s timeout)
 *          │
 *          ▼
 * ┌──────────────────┐
 * │ aggregateAsync() │──► Queues the job, posts it to the first idle worker
 * └────────┬─────────┘    Returns Promise awaiting result
 *          │
 *          ▼
 * ┌─────────────────┐
 * │ handleMessage() │──► Resolves or rejects the worker's job,
 * └────────┬────────┘    hands it the next queued one
 *          │
 *          ▼
 * ┌─────────────────┐
 * │  terminate()    │──► Stops every worker, rejects unfinished jobs
 * └─────────────────┘
 * ```
 *
 * ## Fallback Behavior
 * When the worker script is not on disk (running from TypeScript sources),
 * a worker fails to start, or every worker has crashed, aggregation runs
 * synchronously on the main thread with aggregateDimension().
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { Worker } from 'node:worker_threads';
import { aggregateDimension } from './aggregate.js';
import { CONSTANTS, WORKER_INIT_TIMEOUT_MS } from './constants.js';
import type { DimensionName } from './dimensions.js';
import { WorkerError } from './errors.js';
import { createLogger } from './logger.js';
import type { BaseAggregate, TimeRecordSet } from './types.js';
import { deserializeError, isWorkerResponse, type AggregateRequest } from './worker-protocol.js';

const log = createLogger('WorkerManager');

/**
 * The part of a worker thread the manager talks to.
 * node:worker_threads Worker satisfies it; tests pass fakes.
 */
export interface WorkerHandle {
    postMessage(message: AggregateRequest): void;
    on(event: 'message', listener: (message: unknown) => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
    on(event: 'exit', listener: (exitCode: number) => void): unknown;
    terminate(): Promise<number>;
}

export type WorkerFactory = (file: string) => WorkerHandle;

export interface WorkerManagerOptions {
    /** Worker threads to start */
    poolSize?: number;
    /** Creates a worker for the script path */
    factory?: WorkerFactory;
    /** Worker script; defaults to aggregate.worker.js beside this module */
    workerFile?: string;
    initTimeoutMs?: number;
}

interface PendingJob {
    request: AggregateRequest;
    resolve: (rows: BaseAggregate[]) => void;
    reject: (error: Error) => void;
}

interface PoolSlot {
    worker: WorkerHandle;
    ready: boolean;
    job: PendingJob | null;
    init: { resolve: () => void; reject: (error: Error) => void } | null;
}

const defaultFactory: WorkerFactory = (file) => new Worker(file);

/**
 * Runs a job on the calling thread, settling its promise.
 */
function runOnMainThread(job: PendingJob): void {
    try {
        job.resolve(aggregateDimension(job.request.recordSet, job.request.dimension));
    } catch (error) {
        job.reject(error instanceof Error ? error : new Error(String(error)));
    }
}

/**
 * Pool of aggregation workers with main-thread fallback.
 *
 * Usage:
 * ```typescript
 * const workers = new WorkerManager({ poolSize: 2 });
 * await workers.init();
 * const rows = await workers.aggregateAsync(recordSet, 'project');
 * await workers.terminate();
 * ```
 */
export class WorkerManager {
    private slots: PoolSlot[] = [];
    private queue: PendingJob[] = [];
    private nextId = 1;
    private initPromise: Promise<boolean> | null = null;
    private readonly poolSize: number;
    private readonly factory: WorkerFactory;
    private readonly customFactory: boolean;
    private readonly workerFile: string;
    private readonly initTimeoutMs: number;

    constructor(options: WorkerManagerOptions = {}) {
        this.poolSize = Math.max(1, options.poolSize ?? CONSTANTS.DEFAULT_WORKER_POOL_SIZE);
        this.factory = options.factory ?? defaultFactory;
        this.customFactory = options.factory !== undefined;
        this.workerFile = options.workerFile ?? path.join(__dirname, 'aggregate.worker.js');
        this.initTimeoutMs = options.initTimeoutMs ?? WORKER_INIT_TIMEOUT_MS;
    }

    /**
     * Starts the pool once. Resolves false when aggregation will run on
     * the main thread instead.
     *
     * @throws Never - start-up failures are logged and fall back.
     */
    init(): Promise<boolean> {
        if (!this.initPromise) {
            this.initPromise = this.startPool();
        }
        return this.initPromise;
    }

    /** Number of live workers */
    get size(): number {
        return this.slots.length;
    }

    isReady(): boolean {
        return this.slots.length > 0 && this.slots.every((slot) => slot.ready);
    }

    private async startPool(): Promise<boolean> {
        if (!this.customFactory && !existsSync(this.workerFile)) {
            log.info(`Worker script not found at ${this.workerFile}, aggregation will run on the main thread`);
            return false;
        }

        try {
            for (let i = 0; i < this.poolSize; i++) {
                this.slots.push(this.createSlot());
            }
            await Promise.all(this.slots.map((slot) => this.waitForReady(slot)));
            log.info(`Worker pool ready (${this.slots.length} threads)`);
            return true;
        } catch (error) {
            log.warn('Failed to initialize worker pool, falling back to main thread:', error);
            this.shutdown().forEach(runOnMainThread);
            return false;
        }
    }

    private createSlot(): PoolSlot {
        const worker = this.factory(this.workerFile);
        const slot: PoolSlot = { worker, ready: false, job: null, init: null };
        worker.on('message', (message: unknown) => this.handleMessage(slot, message));
        worker.on('error', (error: Error) => this.handleWorkerError(slot, error));
        worker.on('exit', (exitCode: number) => this.handleWorkerExit(slot, exitCode));
        return slot;
    }

    private waitForReady(slot: PoolSlot): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (slot.ready) {
                resolve();
                return;
            }
            const timeout = setTimeout(() => {
                slot.init = null;
                reject(new WorkerError('Worker initialization timeout'));
            }, this.initTimeoutMs);
            slot.init = {
                resolve: () => {
                    clearTimeout(timeout);
                    resolve();
                },
                reject: (error) => {
                    clearTimeout(timeout);
                    reject(error);
                },
            };
        });
    }

    /**
     * Handle messages from a worker.
     * 'ready' marks the slot usable; 'result' and 'error' settle its job.
     */
    private handleMessage(slot: PoolSlot, message: unknown): void {
        if (!isWorkerResponse(message)) {
            log.warn('Ignoring malformed worker message');
            return;
        }

        if (message.type === 'ready') {
            slot.ready = true;
            slot.init?.resolve();
            slot.init = null;
            this.dispatch();
            return;
        }

        const job = slot.job;
        if (!job || job.request.id !== message.id) {
            log.warn(`Discarding worker response for unknown job ${message.id}`);
            return;
        }
        slot.job = null;

        if (message.type === 'result') {
            job.resolve(message.payload);
        } else {
            job.reject(deserializeError(message.error));
        }
        this.dispatch();
    }

    /**
     * A crashed worker leaves the pool; its job fails. With no workers left,
     * queued jobs run on the main thread.
     */
    private handleWorkerError(slot: PoolSlot, error: Error): void {
        log.error('Worker error:', error);
        const failure = new WorkerError(`Worker error: ${error.message}`);

        slot.init?.reject(failure);
        slot.init = null;
        slot.job?.reject(failure);
        slot.job = null;

        this.slots = this.slots.filter((candidate) => candidate !== slot);
        this.stopWorker(slot);

        if (this.slots.length === 0) {
            const queued = this.queue;
            this.queue = [];
            queued.forEach(runOnMainThread);
        }
    }

    /**
     * A worker that stops without an 'error' event (process.exit in the
     * script, an out-of-memory kill) is treated as a crash. Exits of workers
     * already out of the pool are ignored.
     */
    private handleWorkerExit(slot: PoolSlot, exitCode: number): void {
        if (!this.slots.includes(slot)) return;
        this.handleWorkerError(slot, new Error(`exited with code ${exitCode}`));
    }

    private dispatch(): void {
        for (const slot of this.slots) {
            if (!slot.ready || slot.job) continue;
            const job = this.queue.shift();
            if (!job) return;
            slot.job = job;
            slot.worker.postMessage(job.request);
        }
    }

    private stopWorker(slot: PoolSlot): void {
        slot.worker.terminate().catch((error: unknown) => {
            log.warn('Failed to terminate worker:', error);
        });
    }

    /**
     * Stops every worker and returns the jobs that had not finished.
     */
    private shutdown(): PendingJob[] {
        const unfinished: PendingJob[] = [];
        for (const slot of this.slots) {
            slot.init?.reject(new WorkerError('Worker pool stopped'));
            slot.init = null;
            if (slot.job) unfinished.push(slot.job);
            this.stopWorker(slot);
        }
        unfinished.push(...this.queue);
        this.slots = [];
        this.queue = [];
        return unfinished;
    }

    /**
     * Aggregates one dimension on a pool worker, or on the main thread
     * when the pool is not running.
     *
     * @throws MissingKeyColumnError when the dimension's key columns are absent.
     * @throws WorkerError when the worker running the job crashes.
     */
    async aggregateAsync(recordSet: TimeRecordSet, dimension: DimensionName): Promise<BaseAggregate[]> {
        if (this.slots.length === 0) {
            return aggregateDimension(recordSet, dimension);
        }

        return new Promise<BaseAggregate[]>((resolve, reject) => {
            const request: AggregateRequest = { type: 'aggregate', id: this.nextId++, recordSet, dimension };
            this.queue.push({ request, resolve, reject });
            this.dispatch();
        });
    }

    /**
     * Terminate every worker. Unfinished jobs are rejected.
     * After termination, init() starts a fresh pool.
     */
    async terminate(): Promise<void> {
        const unfinished = this.shutdown();
        for (const job of unfinished) {
            job.reject(new WorkerError('Worker pool terminated'));
        }
        this.initPromise = null;
    }
}
