import { describe, it, expect } from '@jest/globals';
import {
    DEFAULT_ENGINE_CONFIG,
    configuredAbsenceIds,
    loadEngineConfig,
    parseCapacityConfig,
    toCapacityConfig,
} from '../../js/config.js';
import { ConfigError } from '../../js/errors.js';

const YAML_CONFIG = `
absence_types:
  illness_101: Illness
  vacation_102: Vacation
absence_rules:
  include_in_capacity_reduction: [illness_101]
  exclude_from_capacity_reduction:
    - vacation_102
billable_target: 0.75
`;

describe('parseCapacityConfig', () => {
    it('reads a YAML policy', () => {
        expect(parseCapacityConfig(YAML_CONFIG)).toEqual({
            absenceTypes: { illness_101: 'Illness', vacation_102: 'Vacation' },
            includeInCapacityReduction: ['illness_101'],
            excludeFromCapacityReduction: ['vacation_102'],
            billableTarget: 0.75,
            unlistedAbsencePolicy: 'include',
        });
    });

    it('reads the same policy written as JSON', () => {
        const json = JSON.stringify({
            absence_types: { illness_101: 'Illness' },
            absence_rules: { include_in_capacity_reduction: ['illness_101'] },
            unlisted_absence_policy: 'exclude',
        });
        expect(parseCapacityConfig(json)).toEqual({
            absenceTypes: { illness_101: 'Illness' },
            includeInCapacityReduction: ['illness_101'],
            excludeFromCapacityReduction: [],
            billableTarget: 0.8,
            unlistedAbsencePolicy: 'exclude',
        });
    });

    it('fills omitted settings from the defaults', () => {
        const config = parseCapacityConfig('absence_types: {}', {
            billableTarget: 0.6,
            unlistedAbsencePolicy: 'exclude',
        });
        expect(config.billableTarget).toBe(0.6);
        expect(config.unlistedAbsencePolicy).toBe('exclude');
    });

    it('treats settings left empty like omitted ones', () => {
        const config = parseCapacityConfig('billable_target:\nunlisted_absence_policy:\n', {
            billableTarget: 0.6,
            unlistedAbsencePolicy: 'exclude',
        });
        expect(config.billableTarget).toBe(0.6);
        expect(config.unlistedAbsencePolicy).toBe('exclude');
        expect(toCapacityConfig({ unlisted_absence_policy: null }).unlistedAbsencePolicy).toBe('include');
    });

    it('labels absence types without a label by their id', () => {
        expect(toCapacityConfig({ absence_types: { sick_1: '' } }).absenceTypes).toEqual({ sick_1: 'sick_1' });
    });

    it('rejects text that does not parse', () => {
        expect(() => parseCapacityConfig('absence_types: [unclosed')).toThrow(ConfigError);
        expect(() => parseCapacityConfig('absence_types: [unclosed')).toThrow(
            'Configuration content is not valid YAML or JSON'
        );
    });

    it('rejects ids listed in both sets', () => {
        const text = 'absence_rules:\n  include_in_capacity_reduction: [a]\n  exclude_from_capacity_reduction: [a, b]\n';
        expect(() => parseCapacityConfig(text)).toThrow('Absence types listed as both included and excluded: a');
    });

    it('rejects a billable target outside 0..1', () => {
        expect(() => parseCapacityConfig('billable_target: 1.5')).toThrow(
            'billable_target must be a number between 0 and 1'
        );
    });

    it('rejects a document that is not a mapping', () => {
        expect(() => parseCapacityConfig('- just\n- a list\n')).toThrow('Capacity configuration must be a mapping');
    });

    it('lists every id the policy mentions once', () => {
        expect(configuredAbsenceIds(parseCapacityConfig(YAML_CONFIG))).toEqual(['illness_101', 'vacation_102']);
    });
});

describe('loadEngineConfig', () => {
    it('uses the defaults for an empty environment', () => {
        expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('reads every setting from the environment', () => {
        expect(
            loadEngineConfig({
                ENGINE_CACHE_TTL_MS: '1000',
                ENGINE_USE_WORKERS: 'true',
                ENGINE_WORKER_POOL_SIZE: '4',
                ENGINE_UNLISTED_ABSENCE_POLICY: 'exclude',
                ENGINE_BILLABLE_TARGET: '0.7',
            })
        ).toEqual({
            cacheTtlMs: 1000,
            useWorkers: true,
            workerPoolSize: 4,
            unlistedAbsencePolicy: 'exclude',
            billableTarget: 0.7,
        });
    });

    it('keeps the default for invalid values', () => {
        const config = loadEngineConfig({
            ENGINE_WORKER_POOL_SIZE: '0',
            ENGINE_BILLABLE_TARGET: 'high',
            ENGINE_UNLISTED_ABSENCE_POLICY: 'sometimes',
        });
        expect(config.workerPoolSize).toBe(DEFAULT_ENGINE_CONFIG.workerPoolSize);
        expect(config.billableTarget).toBe(DEFAULT_ENGINE_CONFIG.billableTarget);
        expect(config.unlistedAbsencePolicy).toBe('include');
    });
});
