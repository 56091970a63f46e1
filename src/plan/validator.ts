import { ProposedTicket } from './types.js';
import {
    EmptySummaryError,
    InvalidPointsError,
    PlanValidationError,
    PointsExceedLimitError,
} from './errors.js';

/**
 * Check a plan before any ticket is created. Stops at the first violation.
 * An empty plan is valid.
 */
export function validatePlan(plan: ProposedTicket[], maxPoints: number): PlanValidationError | undefined {
    for (const [i, ticket] of plan.entries()) {
        if (!ticket.summary.trim()) {
            return new EmptySummaryError(i + 1);
        }
        if (ticket.storyPoints <= 0) {
            return new InvalidPointsError(ticket.summary, ticket.storyPoints);
        }
        if (ticket.storyPoints > maxPoints) {
            return new PointsExceedLimitError(ticket.summary, ticket.storyPoints, maxPoints);
        }
    }
    return undefined;
}

export interface PointsCarrier {
    storyPoints: number;
}

/** Points to roll up onto the parent: new plan tickets plus its existing children. */
export function totalStoryPoints(newTickets: PointsCarrier[], existingChildren: PointsCarrier[]): number {
    const sum = (items: PointsCarrier[]) => items.reduce((acc, item) => acc + item.storyPoints, 0);
    return sum(newTickets) + sum(existingChildren);
}
