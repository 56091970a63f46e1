/**
 * AND a configured filter onto a query. The query is parenthesized so its
 * own ORs stay grouped.
 */
export function applyTicketFilter(jql: string, filter?: string): string {
    if (!filter || !filter.trim()) return jql;
    if (!jql.trim()) return filter;
    return `(${jql}) AND (${filter})`;
}

/** Unestimated tickets of a project, newest activity first. */
export function unestimatedTicketsQuery(project: string, storyPointsFieldId: string): string {
    return `project = ${project} AND ${storyPointsFieldId} is EMPTY ORDER BY updated DESC`;
}

export interface ReviewQueueFilters {
    needsDetail?: boolean;
    unassigned?: boolean;
    untriaged?: boolean;
}

/**
 * Tickets waiting for review. Each filter adds an AND condition; with none
 * set, a ticket matches when any of them would.
 */
export function reviewQueueQuery(project: string | undefined, filters: ReviewQueueFilters = {}): string {
    const conditions: string[] = [];
    if (filters.needsDetail) conditions.push('status = "To Do"');
    if (filters.unassigned) conditions.push('assignee is EMPTY');
    if (filters.untriaged) conditions.push('priority is EMPTY');
    if (conditions.length === 0) {
        conditions.push('(status = "To Do" OR assignee is EMPTY OR priority is EMPTY)');
    }
    const parts = project ? [`project = ${project}`, ...conditions] : conditions;
    return parts.join(' AND ');
}

/** Accepts `ENG-12` as-is and turns a bare `12` into `<project>-12`. */
export function normalizeTicketKey(input: string, defaultProject?: string): string {
    const trimmed = input.trim();
    if (/^\d+$/.test(trimmed) && defaultProject) {
        return `${defaultProject.toUpperCase()}-${trimmed}`;
    }
    return trimmed.toUpperCase();
}

/** Project part of a key: `ENG` for `ENG-12`. */
export function projectOfKey(key: string): string {
    const dash = key.lastIndexOf('-');
    return dash > 0 ? key.slice(0, dash) : key;
}
