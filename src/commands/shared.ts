import { ConfigError } from '../core/config.js';
import { fmt } from '../core/console.js';
import { renderMarkdownToTerminal } from '../core/markdown.js';
import { createAnswerReader } from '../qa/answer_input.js';
import { appendGeneratedFooter, isSpike } from '../qa/context.js';
import { QuestionEngine } from '../qa/question_engine.js';
import { AnswerSource } from '../qa/types.js';
import { Ticket } from '../tracker/types.js';
import { askReviewChoice } from '../ui/ask.js';
import { CommandDeps } from './deps.js';

export function createQuestionEngine(deps: CommandDeps): QuestionEngine {
    return new QuestionEngine(deps.generation, deps.templates, deps.logger);
}

export function interactiveAnswers(deps: CommandDeps): AnswerSource {
    return {
        method: 'interactive',
        reader: createAnswerReader(deps.config.answerInputMethod, deps.terminal, deps.editor),
    };
}

export function showDraft(deps: CommandDeps, title: string, draft: string): void {
    deps.terminal.print(fmt.section(title));
    deps.terminal.print(fmt.divider());
    deps.terminal.print(renderMarkdownToTerminal(draft));
    deps.terminal.print(fmt.divider());
}

/**
 * Show generated text and ask `[Y/n/e(dit)]`. Returns the accepted (possibly
 * edited) text, or undefined when rejected.
 */
export async function reviewDraft(
    deps: CommandDeps,
    title: string,
    draft: string,
    question: string
): Promise<string | undefined> {
    showDraft(deps, title, draft);
    const choice = await askReviewChoice(deps.terminal, question);
    switch (choice) {
        case 'reject':
            return undefined;
        case 'edit':
            return deps.editor.edit(draft);
        default:
            return draft;
    }
}

/**
 * Configured epic link field, else the one the tracker reports, else asked for.
 */
export async function resolveEpicLinkField(deps: CommandDeps): Promise<string> {
    if (deps.config.epicLinkFieldId) return deps.config.epicLinkFieldId;

    const detected = await deps.tracker.detectEpicLinkField();
    if (detected) {
        deps.logger.info('Epic link field detected', { component: 'tracker', field: detected });
        return detected;
    }

    const answer = (await deps.terminal.ask(fmt.prompt(
        'Epic Link field not detected. Enter the custom field ID (e.g. customfield_10011) or press Enter to skip: '
    ))).trim();
    if (!answer) {
        throw new ConfigError('Epic Link field ID required for an epic parent. Set epic_link_field_id in config.yaml.');
    }
    if (!answer.startsWith('customfield_')) {
        throw new ConfigError(`Invalid Epic Link field ID "${answer}": must start with customfield_`);
    }
    return answer;
}

export type DescribableTicket = Pick<Ticket, 'key' | 'summary' | 'issueType' | 'description'>;

/**
 * Q&A flow, review, then description update. Returns whether the ticket was updated.
 */
export async function generateAndApplyDescription(
    deps: CommandDeps,
    ticket: DescribableTicket,
    childSummaries: string[] = []
): Promise<boolean> {
    deps.terminal.print(fmt.section(`Generating description for ${ticket.key}: ${ticket.summary}`));
    deps.terminal.print(fmt.dim('Answer the questions below to help generate a comprehensive description.'));

    const content = await createQuestionEngine(deps).runFlow(
        {
            topic: ticket.summary,
            existingContent: ticket.description,
            ticketType: ticket.issueType,
            isSpike: isSpike(ticket.summary, ticket.key),
            childSummaries,
        },
        deps.config.maxQuestions,
        interactiveAnswers(deps),
        { continueWithoutQuestions: true }
    );

    const description = await reviewDraft(
        deps,
        'Generated description',
        appendGeneratedFooter(content),
        'Update ticket with this description?'
    );
    if (description === undefined) {
        deps.terminal.print(fmt.info('Description not updated.'));
        return false;
    }

    await deps.tracker.updateDescription(ticket.key, description);
    deps.terminal.print(fmt.success(`Description updated for ${ticket.key}`));
    deps.logger.debug('Description updated', { component: 'describe', key: ticket.key });
    return true;
}

export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
