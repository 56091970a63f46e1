import { ProposedTicket } from './types.js';

export interface ExistingSummary {
    summary: string;
    key: string;
}

export interface DuplicateFilterResult {
    filtered: ProposedTicket[];
    warnings: string[];
}

/**
 * Drop proposals that repeat an existing child ticket.
 *
 * Exact (case-insensitive) matches are checked first; otherwise a proposal is
 * dropped when either summary contains the other. The substring rule is
 * over-eager for short summaries ("API" matches most things).
 */
export function filterDuplicates(
    proposed: ProposedTicket[],
    existing: ExistingSummary[]
): DuplicateFilterResult {
    const byLowerSummary = new Map<string, string>();
    for (const ticket of existing) {
        const lower = ticket.summary.toLowerCase();
        // later children with the same summary replace earlier ones
        if (lower) byLowerSummary.set(lower, ticket.key);
    }

    const filtered: ProposedTicket[] = [];
    const warnings: string[] = [];

    for (const ticket of proposed) {
        const lower = ticket.summary.toLowerCase();

        const exactKey = byLowerSummary.get(lower);
        if (exactKey !== undefined) {
            warnings.push(`Skipping "${ticket.summary}" - already exists as ${exactKey}`);
            continue;
        }

        let similarKey: string | undefined;
        for (const [existingLower, key] of byLowerSummary) {
            if (existingLower.includes(lower) || lower.includes(existingLower)) {
                similarKey = key;
                break;
            }
        }
        if (similarKey !== undefined) {
            warnings.push(`Skipping "${ticket.summary}" - similar to existing ${similarKey}`);
            continue;
        }

        filtered.push(ticket);
    }

    return { filtered, warnings };
}
