import { fmt } from '../core/console.js';
import { renderTemplate } from '../core/prompts.js';
import { formatPlanForEditing, parseDecompositionPlan } from '../plan/decomposition_parser.js';
import { filterDuplicates } from '../plan/duplicates.js';
import { DecompositionPlan, ProposedTicket } from '../plan/types.js';
import { totalStoryPoints, validatePlan } from '../plan/validator.js';
import { childTypeFor, getChildTickets, isEpic } from '../tracker/children.js';
import { TrackerError } from '../tracker/errors.js';
import { normalizeTicketKey, projectOfKey } from '../tracker/jql.js';
import { CreateTicketRequest, ExistingChildTicket, Ticket } from '../tracker/types.js';
import { askPositiveInt, askReviewChoice, askYesNo } from '../ui/ask.js';
import { CommandDeps } from './deps.js';
import { resolveEpicLinkField } from './shared.js';

export const DEFAULT_MAX_POINTS = 5;

export interface DecomposeOptions {
    maxPoints?: number;
}

export interface DecomposeResult {
    created: string[];
    /** Points rolled up onto the parent. */
    totalPoints: number;
}

function pointsLabel(points: number): string {
    return `${points} ${points === 1 ? 'point' : 'points'}`;
}

export function formatExistingChildren(children: readonly ExistingChildTicket[]): string {
    if (children.length === 0) return 'None';
    return children
        .map(child => `- ${child.summary} (${pointsLabel(child.storyPoints)}) - ${child.type} [EXISTING] ${child.key}`)
        .join('\n');
}

export function buildDecomposePrompt(
    template: string,
    parent: Pick<Ticket, 'summary' | 'description'>,
    children: readonly ExistingChildTicket[],
    childType: string,
    maxPoints: number
): string {
    return renderTemplate(template, {
        parent_summary: parent.summary,
        parent_description: parent.description.trim() || '(no description)',
        existing_children: formatExistingChildren(children),
        child_type: childType,
        max_points: String(maxPoints),
    });
}

async function resolveMaxPoints(deps: CommandDeps, option?: number): Promise<number> {
    if (option !== undefined && option > 0) return option;
    if (deps.config.defaultMaxDecomposePoints !== undefined) return deps.config.defaultMaxDecomposePoints;
    return askPositiveInt(deps.terminal, 'Maximum story points per child ticket', DEFAULT_MAX_POINTS);
}

async function resolveChildType(deps: CommandDeps, parentType: string): Promise<string> {
    const known = childTypeFor(parentType);
    if (known) return known;

    deps.terminal.print(fmt.warning(`Parent ticket type "${parentType}" has no default child type mapping.`));
    const answer = (await deps.terminal.ask(fmt.prompt('What type should child tickets be? [Task/Story/Sub-task/Other]: ')))
        .trim()
        .toLowerCase();

    switch (answer) {
        case 'task':
            return 'Task';
        case 'story':
            return 'Story';
        case 'sub-task':
        case 'subtask':
            return 'Sub-task';
        case 'other': {
            const custom = (await deps.terminal.ask(fmt.prompt('Enter custom ticket type: '))).trim();
            return custom || 'Task';
        }
        default:
            deps.terminal.print(fmt.warning('Invalid choice, defaulting to Task'));
            return 'Task';
    }
}

function printTickets(deps: CommandDeps, plan: DecompositionPlan, parentKey: string, childType: string): void {
    deps.terminal.print(fmt.section(`Decomposition plan for ${parentKey}`));

    if (plan.newTickets.length > 0) {
        deps.terminal.print('NEW TICKETS:');
        plan.newTickets.forEach((ticket, i) => {
            deps.terminal.print(`[${i + 1}] ${ticket.summary} (${pointsLabel(ticket.storyPoints)}) - ${childType}`);
        });
        deps.terminal.print();
    }

    if (plan.existingTickets.length > 0) {
        deps.terminal.print('EXISTING TICKETS:');
        for (const ticket of plan.existingTickets) {
            const key = ticket.key ? ` ${ticket.key}` : '';
            deps.terminal.print(`[x] ${ticket.summary} (${pointsLabel(ticket.storyPoints)}) [EXISTING]${key}`);
        }
        deps.terminal.print();
    }

    const newPoints = totalStoryPoints(plan.newTickets, []);
    const existingPoints = totalStoryPoints([], plan.existingTickets);
    deps.terminal.print('Summary:');
    deps.terminal.print(`- New tickets: ${plan.newTickets.length} (${newPoints} total story points)`);
    if (plan.existingTickets.length > 0) {
        deps.terminal.print(`- Existing tickets: ${plan.existingTickets.length} (${existingPoints} total story points)`);
    }
    deps.terminal.print(
        `- Total: ${plan.newTickets.length + plan.existingTickets.length} tickets (${newPoints + existingPoints} total story points)`
    );
}

/**
 * Show the plan and loop on `[Y/n/e(dit)/s(how)]` until it is accepted
 * (returned) or rejected (snapshot saved, undefined returned).
 */
async function reviewPlan(
    deps: CommandDeps,
    initial: DecompositionPlan,
    parentKey: string,
    childType: string,
    maxPoints: number
): Promise<DecompositionPlan | undefined> {
    let plan = initial;
    printTickets(deps, plan, parentKey, childType);

    for (;;) {
        const choice = await askReviewChoice(deps.terminal, `Create these ${plan.newTickets.length} tickets?`, {
            allowShow: true,
        });

        if (choice === 'show') {
            printTickets(deps, plan, parentKey, childType);
            continue;
        }

        if (choice === 'reject') {
            const path = await deps.state.saveRejectedPlan(parentKey, formatPlanForEditing(plan));
            deps.logger.info('Rejected plan saved', { component: 'decompose', path });
            deps.terminal.print(fmt.info('Decomposition canceled.'));
            return undefined;
        }

        if (choice === 'edit') {
            const edited = parseDecompositionPlan(await deps.editor.edit(formatPlanForEditing(plan)));
            const error = validatePlan(edited.newTickets, maxPoints);
            if (error) {
                deps.terminal.print(fmt.error('Edited plan is invalid', error.message));
                continue;
            }
            // The existing section is read-only; edits to it are dropped
            plan = { newTickets: edited.newTickets, existingTickets: plan.existingTickets };
            printTickets(deps, plan, parentKey, childType);
            continue;
        }

        const error = validatePlan(plan.newTickets, maxPoints);
        if (error) {
            deps.terminal.print(fmt.error('Plan is invalid', error.message));
            deps.terminal.print(fmt.dim('Edit the plan to fix it, or reject it.'));
            continue;
        }
        return plan;
    }
}

interface CreatedChild {
    key: string;
    summary: string;
    storyPoints: number;
}

function toExistingProposals(children: readonly ExistingChildTicket[]): ProposedTicket[] {
    return children.map(child => ({
        summary: child.summary,
        storyPoints: child.storyPoints,
        isExisting: true,
        key: child.key,
    }));
}

async function createChildren(
    deps: CommandDeps,
    parent: Ticket,
    tickets: readonly ProposedTicket[],
    childType: string
): Promise<CreatedChild[]> {
    const epicField = isEpic(parent) ? await resolveEpicLinkField(deps) : undefined;
    const project = projectOfKey(parent.key);
    const created: CreatedChild[] = [];

    for (const [i, ticket] of tickets.entries()) {
        deps.terminal.print(fmt.dim(`Creating ticket ${i + 1} of ${tickets.length}...`));

        const request: CreateTicketRequest = { project, issueType: childType, summary: ticket.summary };
        if (epicField) {
            request.epicLink = { fieldId: epicField, epicKey: parent.key };
        } else {
            request.parentKey = parent.key;
        }

        let key: string;
        try {
            key = await deps.tracker.createTicket(request);
        } catch (error) {
            if (!(error instanceof TrackerError)) throw error;
            deps.logger.warn(`Failed to create ticket "${ticket.summary}"`, { component: 'decompose', error: error.message });
            continue;
        }
        deps.logger.info('Ticket created', { component: 'decompose', key, summary: ticket.summary });
        created.push({ key, summary: ticket.summary, storyPoints: ticket.storyPoints });

        try {
            await deps.tracker.updateStoryPoints(key, ticket.storyPoints);
            deps.logger.info('Story points updated', { component: 'decompose', key, points: ticket.storyPoints });
        } catch (error) {
            if (!(error instanceof TrackerError)) throw error;
            deps.logger.warn(`Failed to set story points for ${key}`, { component: 'decompose', error: error.message });
        }
    }
    return created;
}

/**
 * `decompose <KEY>`: break a ticket into children no larger than the point limit.
 * Returns undefined when the user cancels.
 */
export async function runDecompose(
    deps: CommandDeps,
    rawKey: string,
    options: DecomposeOptions = {}
): Promise<DecomposeResult | undefined> {
    const key = normalizeTicketKey(rawKey, deps.config.defaultProject);
    const parent = await deps.tracker.getTicket(key);
    const maxPoints = await resolveMaxPoints(deps, options.maxPoints);

    const epicField = isEpic(parent) ? deps.config.epicLinkFieldId : undefined;
    const children = await getChildTickets(deps.tracker, parent, epicField);
    const childType = await resolveChildType(deps, parent.issueType);

    deps.terminal.print(fmt.thinking(`Generating decomposition plan for ${key}...`));
    const planText = await deps.generation.generateContent(
        buildDecomposePrompt(deps.templates.decompose, parent, children, childType, maxPoints)
    );
    const generated = parseDecompositionPlan(planText);

    const { filtered, warnings } = filterDuplicates(generated.newTickets, children);
    for (const warning of warnings) {
        deps.terminal.print(fmt.warning(warning));
    }

    const plan = await reviewPlan(
        deps,
        { newTickets: filtered, existingTickets: toExistingProposals(children) },
        key,
        childType,
        maxPoints
    );
    if (!plan) return undefined;

    if (!await askYesNo(deps.terminal, 'Create these tickets?', true)) {
        deps.terminal.print(fmt.info('Canceled.'));
        return undefined;
    }

    const created = await createChildren(deps, parent, plan.newTickets, childType);
    const totalPoints = totalStoryPoints(created, children);

    if (totalPoints !== parent.storyPoints) {
        try {
            await deps.tracker.updateStoryPoints(key, totalPoints);
            deps.terminal.print(fmt.success(`Updated parent ${key} story points to ${totalPoints} (was ${parent.storyPoints})`));
        } catch (error) {
            if (!(error instanceof TrackerError)) throw error;
            deps.logger.warn('Failed to update parent story points', { component: 'decompose', error: error.message });
        }
    }

    return { created: created.map(child => child.key), totalPoints };
}
