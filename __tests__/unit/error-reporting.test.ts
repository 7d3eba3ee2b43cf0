import { describe, it, expect, jest, afterEach } from '@jest/globals';
import * as Sentry from '@sentry/node';
import {
    addBreadcrumb,
    closeErrorReporting,
    filterBreadcrumb,
    hashString,
    initErrorReporting,
    isErrorReportingEnabled,
    reportError,
    reportMessage,
    scrubEvent,
    scrubRecord,
    scrubSensitiveData,
    sentryConfigFromEnv,
    setDatasetContext,
} from '../../js/error-reporting.js';

jest.mock('@sentry/node', () => {
    const mockScope = { setTag: jest.fn(), setExtras: jest.fn(), setLevel: jest.fn() };
    return {
        mockScope,
        init: jest.fn(),
        setTag: jest.fn(),
        withScope: jest.fn((callback: (scope: typeof mockScope) => void) => callback(mockScope)),
        captureException: jest.fn(),
        captureMessage: jest.fn(),
        addBreadcrumb: jest.fn(),
        flush: jest.fn(() => Promise.resolve(true)),
        close: jest.fn(() => Promise.resolve(true)),
    };
});

type MockFn = ReturnType<typeof jest.fn>;

interface MockScope {
    setTag: MockFn;
    setExtras: MockFn;
    setLevel: MockFn;
}

const scope = jest.requireMock<{ mockScope: MockScope }>('@sentry/node').mockScope;

const CONFIG = {
    dsn: 'https://test-key@sentry.invalid/1',
    environment: 'test',
    release: '1.0.0',
};

afterEach(async () => {
    await closeErrorReporting();
    setDatasetContext(null);
});

describe('scrubbing', () => {
    it('redacts credentials and email addresses in text', () => {
        expect(scrubSensitiveData('Bearer abc123 sent by ann@example.com')).toBe('[REDACTED] sent by [REDACTED]');
    });

    it('redacts sensitive keys and nested values', () => {
        expect(
            scrubRecord({
                apiKey: 'test-secret',
                nested: { password: 'test-secret', note: 'token=abc' },
                list: ['ann@example.com'],
                rows: 3,
            })
        ).toEqual({
            apiKey: '[REDACTED]',
            nested: { password: '[REDACTED]', note: '[REDACTED]' },
            list: ['[REDACTED]'],
            rows: 3,
        });
    });

    it('scrubs outgoing events in place', () => {
        const event: Parameters<typeof scrubEvent>[0] = {
            type: undefined,
            exception: { values: [{ value: 'failed with password=test-secret' }] },
            extra: { token: 'test-secret', rows: 3 },
        };

        scrubEvent(event, {});

        expect(event.exception?.values?.[0]?.value).toBe('failed with [REDACTED]');
        expect(event.extra).toEqual({ token: '[REDACTED]', rows: 3 });
    });

    it('drops debug console breadcrumbs only', () => {
        expect(filterBreadcrumb({ category: 'console', level: 'debug' })).toBeNull();
        expect(filterBreadcrumb({ category: 'engine', level: 'debug' })).toEqual({ category: 'engine', level: 'debug' });
    });
});

describe('initErrorReporting', () => {
    it('stays disabled with the placeholder DSN', () => {
        expect(initErrorReporting({ ...CONFIG, dsn: '__SENTRY_DSN__' })).toBe(false);
        expect(initErrorReporting({ ...CONFIG, dsn: '' })).toBe(false);
        expect(Sentry.init).not.toHaveBeenCalled();
        expect(isErrorReportingEnabled()).toBe(false);
    });

    it('installs the scrubbing hooks', () => {
        expect(initErrorReporting(CONFIG)).toBe(true);
        expect(initErrorReporting(CONFIG)).toBe(true);

        expect(Sentry.init).toHaveBeenCalledTimes(1);
        expect(Sentry.init).toHaveBeenCalledWith({
            dsn: CONFIG.dsn,
            environment: 'test',
            release: '1.0.0',
            debug: false,
            sampleRate: 1.0,
            beforeSend: scrubEvent,
            beforeBreadcrumb: filterBreadcrumb,
        });
        expect(isErrorReportingEnabled()).toBe(true);
    });

    it('reads its settings from the environment', () => {
        expect(sentryConfigFromEnv({})).toEqual({
            dsn: '__SENTRY_DSN__',
            environment: 'development',
            release: '0.0.0',
            debug: false,
        });
        expect(
            sentryConfigFromEnv({ SENTRY_DSN: CONFIG.dsn, NODE_ENV: 'production', npm_package_version: '2.1.0', ENGINE_DEBUG: 'true' })
        ).toEqual({ dsn: CONFIG.dsn, environment: 'production', release: '2.1.0', debug: true });
    });
});

describe('reporting', () => {
    it('only logs while disabled', () => {
        reportError(new Error('boom'));
        expect(Sentry.withScope).not.toHaveBeenCalled();
        expect(Sentry.captureException).not.toHaveBeenCalled();
    });

    it('captures errors with scrubbed context', () => {
        initErrorReporting(CONFIG);
        const error = new Error('boom');

        reportError(error, {
            module: 'ReportEngine',
            operation: 'buildDimensionReports',
            metadata: { secret: 'test-secret', rows: 2 },
            level: 'fatal',
        });

        expect(Sentry.captureException).toHaveBeenCalledWith(error);
        expect(scope.setLevel).toHaveBeenCalledWith('fatal');
        expect(scope.setTag).toHaveBeenCalledWith('module', 'ReportEngine');
        expect(scope.setTag).toHaveBeenCalledWith('operation', 'buildDimensionReports');
        expect(scope.setExtras).toHaveBeenCalledWith({ secret: '[REDACTED]', rows: 2 });
    });

    it('captures scrubbed messages', () => {
        initErrorReporting(CONFIG);

        reportMessage('Upload failed for ann@example.com', 'warning');

        expect(scope.setLevel).toHaveBeenCalledWith('warning');
        expect(Sentry.captureMessage).toHaveBeenCalledWith('Upload failed for [REDACTED]');
    });

    it('tags reports with the hashed dataset id', () => {
        setDatasetContext('dataset-1');
        initErrorReporting(CONFIG);

        expect(Sentry.setTag).toHaveBeenCalledWith('dataset_id', hashString('dataset-1'));

        reportError('failed');
        expect(scope.setTag).toHaveBeenCalledWith('dataset_id', hashString('dataset-1'));
    });

    it('records breadcrumbs only while enabled', () => {
        addBreadcrumb('engine', 'before init');
        expect(Sentry.addBreadcrumb).not.toHaveBeenCalled();

        initErrorReporting(CONFIG);
        addBreadcrumb('engine', 'Building reports', { apiKey: 'test-secret', records: 4 });

        expect(Sentry.addBreadcrumb).toHaveBeenCalledWith({
            category: 'engine',
            message: 'Building reports',
            data: { apiKey: '[REDACTED]', records: 4 },
            level: 'info',
        });
    });

    it('closes the client and allows re-initialization', async () => {
        initErrorReporting(CONFIG);

        expect(await closeErrorReporting()).toBe(true);
        expect(Sentry.close).toHaveBeenCalledTimes(1);
        expect(isErrorReportingEnabled()).toBe(false);

        expect(initErrorReporting(CONFIG)).toBe(true);
    });
});

describe('hashString', () => {
    it('computes 32-bit FNV-1a in hex', () => {
        expect(hashString('')).toBe('811c9dc5');
        expect(hashString('a')).toBe('e40c292c');
        expect(hashString('dataset-1')).not.toBe('dataset-1');
    });
});
