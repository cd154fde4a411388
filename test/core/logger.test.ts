import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, errorMessage, setPrettyConsole } from '../../src/core/logger.js';

describe('Logger', () => {
    let originalConsoleLog: typeof console.log;

    beforeEach(() => {
        originalConsoleLog = console.log;
        // Disable pretty console to get pure JSON output
        setPrettyConsole(false);
    });

    afterEach(() => {
        console.log = originalConsoleLog;
        setPrettyConsole(true);
    });

    it('should log structured JSON', () => {
        const logFn = vi.fn();
        console.log = logFn;

        const logger = createLogger('test-logger');
        logger.info('test message', { sessionId: 'session-1', node: 'analyze_demand' });

        expect(logFn).toHaveBeenCalledTimes(1);
        const logEntry = JSON.parse(logFn.mock.calls[0][0]);

        expect(logEntry.level).toBe('info');
        expect(logEntry.message).toBe('test message');
        expect(logEntry.runId).toBe('test-logger');
        expect(logEntry.sessionId).toBe('session-1');
        expect(logEntry.node).toBe('analyze_demand');
        expect(logEntry.ts).toBeDefined();
    });

    it('mirrors known events to the pretty console before the JSON line', () => {
        const logFn = vi.fn();
        console.log = logFn;
        setPrettyConsole(true);

        createLogger('test-logger').info('Clarification round opened', { round: 2 });

        expect(logFn).toHaveBeenCalledTimes(2);
        expect(String(logFn.mock.calls[0][0])).toContain('Clarification round 2');
        expect(JSON.parse(logFn.mock.calls[1][0]).round).toBe(2);
    });

    it('writes only JSON for debug entries', () => {
        const logFn = vi.fn();
        console.log = logFn;
        setPrettyConsole(true);

        createLogger('test-logger').debug('Node started');

        expect(logFn).toHaveBeenCalledTimes(1);
        expect(JSON.parse(logFn.mock.calls[0][0]).level).toBe('debug');
    });
});

describe('errorMessage', () => {
    it('reads Error messages and stringifies everything else', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(42)).toBe('42');
    });
});
