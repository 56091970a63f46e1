import { ExistingChildTicket, Ticket, TicketClient } from './types.js';

export function isEpic(ticket: Pick<Ticket, 'issueType'>): boolean {
    return ticket.issueType.toLowerCase() === 'epic';
}

const CHILD_TYPES = new Map<string, string>([
    ['epic', 'Story'],
    ['story', 'Task'],
    ['task', 'Sub-task'],
    ['sub-task', 'Sub-task'],
    ['subtask', 'Sub-task'],
]);

/** Default issue type for children of a parent type, or undefined when there is no convention. */
export function childTypeFor(parentType: string): string | undefined {
    return CHILD_TYPES.get(parentType.trim().toLowerCase());
}

/**
 * Children of a ticket: sub-tasks by `parent`, plus epic-linked tickets when
 * the parent is an epic and the link field is known. Deduplicated by key,
 * `parent` results first.
 */
export async function getChildTickets(
    client: TicketClient,
    parent: Ticket,
    epicLinkFieldId?: string
): Promise<ExistingChildTicket[]> {
    const found = await client.searchTickets(`parent = ${parent.key}`);

    if (isEpic(parent) && epicLinkFieldId) {
        found.push(...await client.searchTickets(`${epicLinkFieldId} = ${parent.key}`));
    }

    const seen = new Set<string>();
    const children: ExistingChildTicket[] = [];
    for (const ticket of found) {
        if (seen.has(ticket.key)) continue;
        seen.add(ticket.key);
        children.push({
            key: ticket.key,
            summary: ticket.summary,
            storyPoints: ticket.storyPoints,
            type: ticket.issueType,
        });
    }
    return children;
}
