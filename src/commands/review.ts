import { fmt } from '../core/console.js';
import { GenerationError } from '../core/llm.js';
import { getChildTickets } from '../tracker/children.js';
import { TrackerError } from '../tracker/errors.js';
import { normalizeTicketKey, ReviewQueueFilters, reviewQueueQuery } from '../tracker/jql.js';
import { Ticket } from '../tracker/types.js';
import { askYesNo } from '../ui/ask.js';
import { EditorError } from '../ui/editor.js';
import { runSelectionLoop } from '../ui/selection.js';
import { CommandDeps } from './deps.js';
import { estimateTicket, renderTicketRow, TABLE_HEADER } from './estimate.js';
import { generateAndApplyDescription } from './shared.js';

/** Why a description needs work, or undefined when it is long enough. */
export function descriptionIssue(description: string, minLength: number): string | undefined {
    const length = description.trim().length;
    if (minLength > 0 && length < minLength) {
        return `too short (${length} chars, need ${minLength})`;
    }
    return undefined;
}

function checkbox(done: boolean): string {
    return done ? '[x]' : '[ ]';
}

/**
 * Walk one ticket through the review steps: description first, then story points.
 * Steps that are already complete are skipped.
 */
export async function reviewTicket(deps: CommandDeps, ticket: Ticket): Promise<void> {
    const issue = descriptionIssue(ticket.description, deps.config.descriptionMinLength);
    const needsPoints = ticket.storyPoints === 0;

    deps.terminal.print('Progress:');
    deps.terminal.print(`  ${checkbox(issue === undefined)} Description`);
    deps.terminal.print(`  ${checkbox(!needsPoints)} Story Points`);

    if (issue !== undefined) {
        deps.terminal.print(fmt.warning(`Description issue: ${issue}`));
        if (await askYesNo(deps.terminal, 'Generate/update description?', false)) {
            const children = await getChildTickets(deps.tracker, ticket, deps.config.epicLinkFieldId);
            await generateAndApplyDescription(deps, ticket, children.map(child => child.summary));
        }
    }

    if (needsPoints) {
        await estimateTicket(deps, ticket);
    }
}

/**
 * `review [KEY]`: review one ticket, or pick tickets from the review queue.
 * Returns how many reviews completed.
 */
export async function runReview(
    deps: CommandDeps,
    rawKey?: string,
    filters: ReviewQueueFilters = {}
): Promise<number> {
    let completed = 0;
    let cancelled = false;

    const reviewOne = async (ticket: Ticket, position: number, total: number) => {
        if (cancelled) return;
        deps.terminal.print(fmt.section(`[${position}/${total}] ${ticket.key} - ${ticket.summary}`));
        try {
            await reviewTicket(deps, ticket);
        } catch (error) {
            if (!(error instanceof TrackerError || error instanceof GenerationError || error instanceof EditorError)) {
                throw error;
            }
            deps.terminal.print(fmt.error(`Error in workflow for ${ticket.key}`, error.message));
            if (position < total && !(await askYesNo(deps.terminal, 'Continue with next ticket?', true))) {
                deps.terminal.print(fmt.info('Review cancelled.'));
                cancelled = true;
            }
            return;
        }
        completed++;
        deps.terminal.print(fmt.success(`Completed review for ${ticket.key}`));
    };

    if (rawKey) {
        const key = normalizeTicketKey(rawKey, deps.config.defaultProject);
        deps.terminal.print(fmt.info(`Fetching ticket details for ${key}...`));
        await reviewOne(await deps.tracker.getTicket(key), 1, 1);
        return completed;
    }

    const tickets = await deps.tracker.searchTickets(reviewQueueQuery(deps.config.defaultProject, filters));
    if (tickets.length === 0) {
        deps.terminal.print(fmt.info('No tickets found matching the criteria.'));
        return 0;
    }

    if (tickets.length === 1) {
        await reviewOne(tickets[0], 1, 1);
        return completed;
    }

    await runSelectionLoop(deps.terminal, tickets, {
        idOf: ticket => ticket.key,
        renderRow: renderTicketRow,
        header: TABLE_HEADER,
        pageSize: deps.config.reviewPageSize,
        action: { key: 'r', label: 'review' },
        perform: reviewOne,
    });
    return completed;
}
