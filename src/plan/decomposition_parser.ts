import { DecompositionPlan, ProposedTicket } from './types.js';
import { matchBullet } from './bullets.js';

const NEW_SECTION_RE = /^##\s*NEW\s*TICKETS/;
const EXISTING_SECTION_RE = /^##\s*EXISTING\s*TICKETS/;
const POINTS_RE = /\((\d+)\s*(?:points?|pts?)\)/i;
const POINTS_STRIP_RE = /\s*\(\s*\d*\s*(?:points?|pts?)\b[^)]*\)\s*/gi;
const EXISTING_MARKER_RE = /\s*\[EXISTING\]\s*([A-Z][A-Z0-9_]*-\d+)?\s*/gi;
const TICKET_KEY_RE = /\[EXISTING\]\s*([A-Z][A-Z0-9_]*-\d+)/i;

type Section = 'none' | 'new' | 'existing';

export function parseStoryPoints(text: string): number {
    const match = POINTS_RE.exec(text);
    return match ? Number.parseInt(match[1], 10) : 0;
}

function isExistingLine(line: string): boolean {
    return line.toUpperCase().includes('[EXISTING]') || line.includes('[x]') || line.includes('[X]');
}

function cleanSummary(text: string): string {
    return text
        .replace(POINTS_STRIP_RE, ' ')
        .replace(EXISTING_MARKER_RE, ' ')
        .replace(/\s{2,}/g, ' ')
        .trim();
}

/**
 * Parse a decomposition plan. Permissive: lines that are not bullets are
 * skipped and missing points default to 0. Callers validate before use.
 */
export function parseDecompositionPlan(text: string): DecompositionPlan {
    const plan: DecompositionPlan = { newTickets: [], existingTickets: [] };
    let section: Section = 'none';

    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();

        if (NEW_SECTION_RE.test(line)) {
            section = 'new';
            continue;
        }
        if (EXISTING_SECTION_RE.test(line)) {
            section = 'existing';
            continue;
        }
        if (!line || line.startsWith('#')) continue;

        const bullet = matchBullet(line);
        if (!bullet) continue;

        const summary = cleanSummary(bullet.text);
        if (!summary) continue;

        const existing = isExistingLine(line) || section === 'existing';
        const ticket: ProposedTicket = {
            summary,
            storyPoints: parseStoryPoints(bullet.text),
            isExisting: existing,
        };

        if (existing) {
            const key = TICKET_KEY_RE.exec(bullet.text)?.[1];
            if (key) ticket.key = key;
            plan.existingTickets.push(ticket);
        } else {
            plan.newTickets.push(ticket);
        }
    }

    return plan;
}

function formatPoints(points: number): string {
    return `(${points} ${points === 1 ? 'point' : 'points'})`;
}

/**
 * Render a plan back into the grammar `parseDecompositionPlan` reads, for
 * hand-editing and rejected-plan snapshots.
 */
export function formatPlanForEditing(plan: DecompositionPlan): string {
    const lines = ['# DECOMPOSITION PLAN', '', '## NEW TICKETS'];
    for (const ticket of plan.newTickets) {
        lines.push(`- [ ] ${ticket.summary} ${formatPoints(ticket.storyPoints)}`);
    }

    if (plan.existingTickets.length > 0) {
        lines.push('', '## EXISTING TICKETS (read-only)');
        for (const ticket of plan.existingTickets) {
            const key = ticket.key ? ` ${ticket.key}` : '';
            lines.push(`- [x] ${ticket.summary} ${formatPoints(ticket.storyPoints)} [EXISTING]${key}`);
        }
    }

    return lines.join('\n') + '\n';
}
