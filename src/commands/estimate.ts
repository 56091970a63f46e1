import { fmt } from '../core/console.js';
import { requireDefaultProject } from '../core/config.js';
import { GenerationError } from '../core/llm.js';
import { TrackerError } from '../tracker/errors.js';
import { normalizeTicketKey, unestimatedTicketsQuery } from '../tracker/jql.js';
import { Ticket } from '../tracker/types.js';
import { runSelectionLoop } from '../ui/selection.js';
import { CommandDeps } from './deps.js';
import { truncate } from './shared.js';

export type PointsChoice =
    | { ok: true; points: number }
    | { ok: false; error: string };

export function optionLetter(index: number): string {
    return String.fromCharCode('a'.charCodeAt(0) + index);
}

/**
 * Read a points answer: a letter picks from `options`, digits give the value
 * directly, and empty input takes `suggested` when there is one.
 */
export function parsePointsChoice(input: string, options: readonly number[], suggested?: number): PointsChoice {
    const text = input.trim().toLowerCase();

    if (!text) {
        return suggested !== undefined ? { ok: true, points: suggested } : { ok: false, error: 'No story points entered' };
    }

    if (/^\d+$/.test(text)) {
        const points = Number.parseInt(text, 10);
        return points > 0 ? { ok: true, points } : { ok: false, error: 'Story points must be positive' };
    }

    if (/^[a-z]$/.test(text)) {
        const index = text.charCodeAt(0) - 'a'.charCodeAt(0);
        return index < options.length
            ? { ok: true, points: options[index] }
            : { ok: false, error: `Invalid selection: ${text}` };
    }

    return { ok: false, error: `Invalid input: ${text} (use a letter or number)` };
}

const COLUMNS = [4, 12, 50, 12, 20] as const;

function row(cells: readonly string[], trailing: string): string {
    return cells.map((cell, i) => cell.padEnd(COLUMNS[i] ?? 0)).join(' ') + ' ' + trailing;
}

export const TABLE_HEADER = row(['#', 'Key', 'Summary', 'Priority', 'Assignee'], 'Status') + '\n' + '-'.repeat(110);

export function renderTicketRow(ticket: Ticket, number: number, selected: boolean): string {
    const status = selected ? `${ticket.status} ✓` : ticket.status;
    return row(
        [
            String(number),
            ticket.key,
            truncate(ticket.summary, 48),
            ticket.priority ?? 'None',
            ticket.assignee ?? 'Unassigned',
        ],
        status
    );
}

async function suggestPoints(deps: CommandDeps, ticket: Ticket): Promise<number | undefined> {
    deps.terminal.print(fmt.thinking('Getting AI story point estimate...'));
    try {
        const estimate = await deps.generation.estimateStoryPoints(
            ticket.summary,
            ticket.description,
            deps.config.storyPointOptions
        );
        deps.terminal.print(fmt.info(`AI Estimate: ${estimate.points} story points`));
        if (estimate.reasoning) deps.terminal.print(fmt.dim(`Reasoning: ${estimate.reasoning}`));
        return estimate.points;
    } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        deps.terminal.print(fmt.warning('Could not get AI estimate', error.message));
        deps.terminal.print(fmt.dim('Continuing with manual selection...'));
        return undefined;
    }
}

/**
 * Estimate one ticket. Returns whether its story points were updated.
 */
export async function estimateTicket(deps: CommandDeps, ticket: Ticket): Promise<boolean> {
    const options = deps.config.storyPointOptions;
    const suggested = await suggestPoints(deps, ticket);

    deps.terminal.print('Select story points:');
    options.forEach((points, i) => {
        const marker = points === suggested ? ' (suggested)' : '';
        deps.terminal.print(`[${optionLetter(i)}] ${points}${marker}`);
    });
    deps.terminal.print('Or enter a number directly');

    const prompt = suggested !== undefined ? `> [${suggested}] ` : '> ';
    const choice = parsePointsChoice(await deps.terminal.ask(fmt.prompt(prompt)), options, suggested);
    if (!choice.ok) {
        deps.terminal.print(fmt.warning(`${choice.error}. Skipping ${ticket.key}.`));
        return false;
    }

    try {
        await deps.tracker.updateStoryPoints(ticket.key, choice.points);
    } catch (error) {
        if (!(error instanceof TrackerError)) throw error;
        deps.logger.error(`Failed to update ${ticket.key}`, { component: 'estimate', error: error.message });
        return false;
    }
    deps.logger.info('Story points updated', { component: 'estimate', key: ticket.key, points: choice.points });
    return true;
}

function printTicketHeader(deps: CommandDeps, ticket: Ticket, position: number, total: number): void {
    deps.terminal.print(fmt.section(`[${position}/${total}] ${ticket.key} - ${ticket.summary}`));
}

/**
 * `estimate [KEY...]`: estimate the given tickets, or pick from the project's
 * unestimated ones. Returns how many tickets were updated.
 */
export async function runEstimate(deps: CommandDeps, rawKeys: readonly string[] = []): Promise<number> {
    let updated = 0;
    const estimateOne = async (ticket: Ticket, position: number, total: number) => {
        printTicketHeader(deps, ticket, position, total);
        if (await estimateTicket(deps, ticket)) updated++;
    };

    if (rawKeys.length > 0) {
        for (const [i, rawKey] of rawKeys.entries()) {
            const ticket = await deps.tracker.getTicket(normalizeTicketKey(rawKey, deps.config.defaultProject));
            await estimateOne(ticket, i + 1, rawKeys.length);
        }
        return updated;
    }

    const project = requireDefaultProject(deps.config);
    const found = await deps.tracker.searchTickets(unestimatedTicketsQuery(project, deps.config.storyPointsFieldId));
    const tickets = found.filter(ticket => ticket.storyPoints === 0);

    if (tickets.length === 0) {
        deps.terminal.print(fmt.info('No tickets found without story points.'));
        return 0;
    }

    if (tickets.length === 1) {
        await estimateOne(tickets[0], 1, 1);
    } else {
        const acted = await runSelectionLoop(deps.terminal, tickets, {
            idOf: ticket => ticket.key,
            renderRow: renderTicketRow,
            header: TABLE_HEADER,
            pageSize: deps.config.reviewPageSize,
            action: { key: 'e', label: 'estimate' },
            perform: estimateOne,
        });
        if (acted === 0) return 0;
    }

    deps.terminal.print(fmt.success('Estimation complete!'));
    return updated;
}
