import { console_log } from './console.js';
import type { LogEntry } from './logger.js';

function field(entry: LogEntry, key: string): string {
    const value = entry[key];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

/**
 * Intercepts structured logs and outputs pretty console messages
 */
export function formatLogForConsole(entry: LogEntry): void {
    const { level, message } = entry;

    if (level === 'debug') return;

    if (message === 'Mining session started') {
        console_log.header('REQUIREMENT MINING');
        const input = field(entry, 'input');
        if (input) {
            console_log.info('Request:', input.slice(0, 100) + (input.length > 100 ? '...' : ''));
        }
        return;
    }

    if (message === 'Resuming mining session') {
        console_log.header(`RESUMING ${field(entry, 'sessionId')}`);
        return;
    }

    if (message === 'Demand classified') {
        console_log.classify(`Demand state: ${field(entry, 'demandState')}`, `[${field(entry, 'source')}]`);
        return;
    }

    if (message === 'Clarification round opened') {
        console_log.section(`Clarification round ${field(entry, 'round')}`);
        return;
    }

    if (message === 'Round limit reached; forcing progression') {
        console_log.warning(message);
        return;
    }

    if (message === 'Intent routed') {
        console_log.plan(`Planning path: ${field(entry, 'route')}`, `complexity=${field(entry, 'complexity')}`);
        return;
    }

    if (message === 'Workflow paused for feedback') {
        console_log.pause('Waiting for user feedback', field(entry, 'feedbackType'));
        return;
    }

    if (message === 'Mining result finalized') {
        console_log.divider();
        console_log.success('Mining completed', field(entry, 'demandState'));
        return;
    }

    // Errors
    if (level === 'error') {
        console_log.error(message, field(entry, 'node'));
        return;
    }

    // Warnings
    if (level === 'warn') {
        console_log.warning(message);
    }
}
