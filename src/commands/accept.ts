import { fmt } from '../core/console.js';
import { parseEpicPlan } from '../plan/epic_parser.js';
import { PlanParseError } from '../plan/errors.js';
import { EpicPlan } from '../plan/types.js';
import { isSpike } from '../qa/context.js';
import { TrackerError } from '../tracker/errors.js';
import { normalizeTicketKey, projectOfKey } from '../tracker/jql.js';
import { CreateTicketRequest, Ticket } from '../tracker/types.js';
import { askMenuChoice, askYesNo } from '../ui/ask.js';
import { CommandDeps } from './deps.js';
import { createQuestionEngine, interactiveAnswers, reviewDraft } from './shared.js';

const DONE_STATUSES = new Set(['done', 'closed']);

export interface ResearchSource {
    label: string;
    text: string;
}

export interface AcceptResult {
    epicKey: string;
    taskKeys: string[];
}

async function transitionToDone(deps: CommandDeps, ticket: Ticket): Promise<void> {
    if (DONE_STATUSES.has(ticket.status.toLowerCase())) {
        deps.terminal.print(fmt.info(`${ticket.key} is already ${ticket.status}`));
        return;
    }

    const transitions = await deps.tracker.getTransitions(ticket.key);
    const done = transitions.find(t => DONE_STATUSES.has(t.toStatus.toLowerCase()));
    if (!done) {
        throw new TrackerError(`could not find a Done or Closed transition for ticket ${ticket.key}`);
    }

    await deps.tracker.transition(ticket.key, done.id);
    deps.terminal.print(fmt.success(`Moved ${ticket.key} to ${done.toStatus}`));
}

/** The description, then each comment, as places the research may live. */
export async function gatherResearchSources(deps: CommandDeps, ticket: Ticket): Promise<ResearchSource[]> {
    const sources: ResearchSource[] = [];
    if (ticket.description.trim()) {
        sources.push({ label: 'Description: Ticket Description', text: ticket.description });
    }

    const comments = await deps.tracker.getComments(ticket.key);
    comments.forEach((comment, i) => {
        sources.push({
            label: `Comment: Comment #${i + 1} (by ${comment.author} on ${comment.created})`,
            text: comment.body,
        });
    });
    return sources;
}

async function askEpicSummary(deps: CommandDeps): Promise<string> {
    for (;;) {
        const summary = (await deps.terminal.ask(fmt.prompt('New Epic Summary: '))).trim();
        if (summary) return summary;
        deps.terminal.print(fmt.warning('An epic summary is required.'));
    }
}

/**
 * Review until the text parses as an epic plan. Undefined means the user
 * rejected it.
 */
async function confirmEpicPlan(deps: CommandDeps, generated: string): Promise<EpicPlan | undefined> {
    let text = generated;
    for (;;) {
        const reviewed = await reviewDraft(deps, 'Generated epic plan', text, 'Create this Epic and all tasks?');
        if (reviewed === undefined) return undefined;

        try {
            return parseEpicPlan(reviewed);
        } catch (error) {
            if (!(error instanceof PlanParseError)) throw error;
            deps.terminal.print(fmt.error('Could not parse the epic plan', error.message));
            deps.terminal.print(error.rawText);
            if (!await askYesNo(deps.terminal, 'Edit the plan and try again?', true)) throw error;
            text = await deps.editor.edit(reviewed);
        }
    }
}

async function createEpicAndTasks(deps: CommandDeps, project: string, plan: EpicPlan): Promise<AcceptResult> {
    const epicKey = await deps.tracker.createTicket({ project, issueType: 'Epic', summary: plan.title });
    deps.logger.info('Ticket created', { component: 'accept', key: epicKey, summary: plan.title });

    if (plan.description) {
        await deps.tracker.updateDescription(epicKey, plan.description);
    }

    const taskKeys: string[] = [];
    for (const task of plan.tasks) {
        const request: CreateTicketRequest = { project, issueType: deps.config.defaultTaskType, summary: task.summary };
        if (deps.config.epicLinkFieldId) {
            request.epicLink = { fieldId: deps.config.epicLinkFieldId, epicKey };
        } else {
            request.parentKey = epicKey;
        }
        const key = await deps.tracker.createTicket(request);
        deps.logger.info('Ticket created', { component: 'accept', key, summary: task.summary });
        taskKeys.push(key);
    }
    return { epicKey, taskKeys };
}

/**
 * `accept <KEY>`: close a research ticket and turn its findings into an epic with tasks.
 * Returns undefined when the user cancels.
 */
export async function runAccept(deps: CommandDeps, rawKey: string): Promise<AcceptResult | undefined> {
    const key = normalizeTicketKey(rawKey, deps.config.defaultProject);
    const ticket = await deps.tracker.getTicket(key);

    await transitionToDone(deps, ticket);

    const sources = await gatherResearchSources(deps, ticket);
    if (sources.length === 0) {
        throw new Error(`no research sources found in ticket ${key}`);
    }
    const choice = await askMenuChoice(deps.terminal, 'Where is the research?', sources.map(s => s.label));
    const source = sources[choice ?? 0];

    const epicSummary = await askEpicSummary(deps);

    const planText = await createQuestionEngine(deps).runFlow(
        {
            topic: `Epic Summary: ${epicSummary}\n\nResearch Text:\n${source.text}`,
            ticketType: 'Epic',
            isSpike: isSpike(ticket.summary, key),
            kind: 'epic-plan',
        },
        deps.config.maxQuestions,
        interactiveAnswers(deps),
        { continueWithoutQuestions: true }
    );

    const plan = await confirmEpicPlan(deps, planText);
    if (!plan) {
        deps.terminal.print(fmt.info('Canceled.'));
        return undefined;
    }

    return createEpicAndTasks(deps, deps.config.defaultProject ?? projectOfKey(key), plan);
}
