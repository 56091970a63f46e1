import { stripVTControlCharacters } from 'node:util';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../../src/core/logger.js';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes structured JSON to stderr', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const logger = createLogger('test-run', { pretty: false, json: true });
        logger.info('test message', { component: 'tracker', foo: 'bar' });

        expect(errorSpy).toHaveBeenCalledTimes(1);
        const entry: unknown = JSON.parse(String(errorSpy.mock.calls[0][0]));
        expect(entry).toMatchObject({
            level: 'info',
            message: 'test message',
            runId: 'test-run',
            component: 'tracker',
            foo: 'bar',
        });
        expect(entry).toHaveProperty('ts');
    });

    it('drops entries below the configured level', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const logger = createLogger('test-run', { level: 'warn', pretty: false, json: true });
        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');

        expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('renders known events for people', () => {
        const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        const logger = createLogger('test-run');
        logger.info('Story points updated', { component: 'estimate', key: 'ENG-1', points: 5 });
        logger.info('Something routine');
        logger.info('Question rejected', { component: 'qa', question: 'Who?' });
        logger.warn('Failed to create ticket "Docs"', { error: 'HTTP 400' });

        expect(logSpy.mock.calls.map(call => stripVTControlCharacters(String(call[0])))).toEqual([
            '  ✓  Set ENG-1 to 5 points',
            '     Question rejected, generating a new one...',
            '  ⚠  Failed to create ticket "Docs" HTTP 400',
        ]);
    });
});
