import { console_log } from './console.js';
import type { LogEntry } from './logger.js';

/**
 * Intercepts structured logs and outputs pretty console messages
 */
export function formatLogForConsole(entry: LogEntry): void {
    const { level, message } = entry;

    if (level === 'debug') return;

    if (message === 'Ticket created' && typeof entry.key === 'string') {
        console_log.ticket(`Created ${entry.key}`, typeof entry.summary === 'string' ? entry.summary : undefined);
        return;
    }

    if (message === 'Story points updated' && typeof entry.key === 'string') {
        console_log.success(`Set ${entry.key} to ${String(entry.points)} points`);
        return;
    }

    if (message === 'Rejected plan saved' && typeof entry.path === 'string') {
        console_log.dim(`Plan saved to ${entry.path}`);
        return;
    }

    if (message === 'Question rejected') {
        console_log.dim('Question rejected, generating a new one...');
        return;
    }

    if (level === 'error') {
        console_log.error(message, typeof entry.error === 'string' ? entry.error : undefined);
        return;
    }

    if (level === 'warn') {
        console_log.warning(message, typeof entry.error === 'string' ? entry.error : undefined);
    }
}
