/**
 * @fileoverview Engine & Capacity Configuration
 * Reads the engine settings from the environment and parses client capacity
 * policies from YAML or JSON documents.
 *
 * Capacity document shape:
 * ```yaml
 * absence_types:
 *   illness_101: Illness
 *   vacation_102: Vacation
 * absence_rules:
 *   include_in_capacity_reduction: [illness_101]
 *   exclude_from_capacity_reduction: [vacation_102]
 * billable_target: 0.8
 * unlisted_absence_policy: include   # optional
 * ```
 */

import yaml from 'js-yaml';
import { AGGREGATE_CACHE_TTL, CONSTANTS, ENV_KEYS } from './constants.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import type { CapacityConfig, UnlistedAbsencePolicy } from './types.js';

const log = createLogger('Config');

// ==================== ENGINE CONFIG ====================

/**
 * Runtime settings of the report engine.
 */
export interface EngineConfig {
    /** How long cached aggregates stay valid, ms */
    cacheTtlMs: number;
    /** Run dimension aggregation on worker threads */
    useWorkers: boolean;
    /** Worker threads in the pool */
    workerPoolSize: number;
    /** Default treatment of absence ids listed in neither config set */
    unlistedAbsencePolicy: UnlistedAbsencePolicy;
    /** Default billable target for capacity configs that omit one */
    billableTarget: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    cacheTtlMs: AGGREGATE_CACHE_TTL,
    useWorkers: false,
    workerPoolSize: CONSTANTS.DEFAULT_WORKER_POOL_SIZE,
    unlistedAbsencePolicy: 'include',
    billableTarget: CONSTANTS.DEFAULT_BILLABLE_TARGET,
};

function isUnlistedAbsencePolicy(value: unknown): value is UnlistedAbsencePolicy {
    return value === 'include' || value === 'exclude';
}

function isRatio(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Reads a numeric setting; logs and falls back when it is not acceptable.
 */
function readNumber(
    env: NodeJS.ProcessEnv,
    key: string,
    fallback: number,
    accept: (value: number) => boolean
): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!accept(value)) {
        log.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Builds the engine configuration from environment variables.
 *
 * @param env - Environment to read; defaults to process.env.
 * @returns Settings with defaults for anything unset or invalid.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const policy = env[ENV_KEYS.UNLISTED_ABSENCE_POLICY];
    let unlistedAbsencePolicy = DEFAULT_ENGINE_CONFIG.unlistedAbsencePolicy;
    if (policy !== undefined) {
        if (isUnlistedAbsencePolicy(policy)) {
            unlistedAbsencePolicy = policy;
        } else {
            log.warn(`Ignoring invalid ${ENV_KEYS.UNLISTED_ABSENCE_POLICY}="${policy}"`);
        }
    }

    return {
        cacheTtlMs: readNumber(env, ENV_KEYS.CACHE_TTL_MS, DEFAULT_ENGINE_CONFIG.cacheTtlMs, (v) => v >= 0),
        useWorkers: env[ENV_KEYS.USE_WORKERS] === 'true',
        workerPoolSize: readNumber(
            env,
            ENV_KEYS.WORKER_POOL_SIZE,
            DEFAULT_ENGINE_CONFIG.workerPoolSize,
            (v) => Number.isInteger(v) && v >= 1
        ),
        unlistedAbsencePolicy,
        billableTarget: readNumber(env, ENV_KEYS.BILLABLE_TARGET, DEFAULT_ENGINE_CONFIG.billableTarget, isRatio),
    };
}

// ==================== CAPACITY CONFIG ====================

export interface CapacityConfigDefaults {
    billableTarget?: number;
    unlistedAbsencePolicy?: UnlistedAbsencePolicy;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIdList(value: unknown, field: string): string[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new ConfigError(`${field} must be a list of absence type ids`);
    }
    return value.map((id) => {
        if (typeof id !== 'string' && typeof id !== 'number') {
            throw new ConfigError(`${field} contains a non-text absence type id`);
        }
        return String(id);
    });
}

/**
 * Validates a parsed capacity document and converts it to a CapacityConfig.
 *
 * @throws ConfigError on a malformed document or overlapping include/exclude sets.
 */
export function toCapacityConfig(document: unknown, defaults: CapacityConfigDefaults = {}): CapacityConfig {
    if (!isPlainObject(document)) {
        throw new ConfigError('Capacity configuration must be a mapping');
    }

    const absenceTypes: Record<string, string> = {};
    const rawTypes = document.absence_types;
    if (rawTypes !== undefined && rawTypes !== null) {
        if (!isPlainObject(rawTypes)) {
            throw new ConfigError('absence_types must map absence type ids to labels');
        }
        for (const [id, label] of Object.entries(rawTypes)) {
            absenceTypes[id] = typeof label === 'string' && label.trim() !== '' ? label : id;
        }
    }

    const rules = document.absence_rules ?? {};
    if (!isPlainObject(rules)) {
        throw new ConfigError('absence_rules must be a mapping');
    }
    const include = readIdList(rules.include_in_capacity_reduction, 'include_in_capacity_reduction');
    const exclude = readIdList(rules.exclude_from_capacity_reduction, 'exclude_from_capacity_reduction');

    const overlap = include.filter((id) => exclude.includes(id));
    if (overlap.length > 0) {
        throw new ConfigError(`Absence types listed as both included and excluded: ${overlap.join(', ')}`);
    }

    let billableTarget = defaults.billableTarget ?? CONSTANTS.DEFAULT_BILLABLE_TARGET;
    if (document.billable_target !== undefined && document.billable_target !== null) {
        const target = Number(document.billable_target);
        if (!isRatio(target)) {
            throw new ConfigError('billable_target must be a number between 0 and 1');
        }
        billableTarget = target;
    }

    let unlistedAbsencePolicy = defaults.unlistedAbsencePolicy ?? DEFAULT_ENGINE_CONFIG.unlistedAbsencePolicy;
    if (document.unlisted_absence_policy !== undefined && document.unlisted_absence_policy !== null) {
        if (!isUnlistedAbsencePolicy(document.unlisted_absence_policy)) {
            throw new ConfigError("unlisted_absence_policy must be 'include' or 'exclude'");
        }
        unlistedAbsencePolicy = document.unlisted_absence_policy;
    }

    return {
        absenceTypes,
        includeInCapacityReduction: include,
        excludeFromCapacityReduction: exclude,
        billableTarget,
        unlistedAbsencePolicy,
    };
}

/**
 * Parses a capacity policy written as YAML or JSON (JSON is valid YAML).
 *
 * @param content - Document text.
 * @param defaults - Values for settings the document leaves out.
 * @throws ConfigError when the text does not parse or has the wrong shape.
 */
export function parseCapacityConfig(content: string, defaults: CapacityConfigDefaults = {}): CapacityConfig {
    let document: unknown;
    try {
        document = yaml.load(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Configuration content is not valid YAML or JSON: ${reason}`);
    }
    return toCapacityConfig(document, defaults);
}

/**
 * Every absence type id the configuration mentions.
 */
export function configuredAbsenceIds(config: CapacityConfig): string[] {
    return Array.from(
        new Set([
            ...Object.keys(config.absenceTypes),
            ...config.includeInCapacityReduction,
            ...config.excludeFromCapacityReduction,
        ])
    );
}
