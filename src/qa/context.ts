import { AnswerPair } from './types.js';

export type GenerationKind = 'description' | 'epic-plan';

export interface GenerationContext {
    topic: string;
    existingContent?: string;
    ticketType?: string;
    isSpike: boolean;
    /** Defaults to 'description'. */
    kind?: GenerationKind;
    /** Summaries of child tickets, shown to the model so it avoids covered ground. */
    childSummaries?: string[];
}

export const MAX_CHILD_SUMMARIES = 20;

export const GENERATED_FOOTER =
    '\n\n---\n\n_This description was generated based on human answers to a limited number of robot questions related to the summary._';

export function isSpike(summary: string, key?: string): boolean {
    return summary.trim().toUpperCase().startsWith('SPIKE') || (key ?? '').toUpperCase().includes('SPIKE');
}

export function appendGeneratedFooter(content: string): string {
    return content + GENERATED_FOOTER;
}

/**
 * Text substituted for `{{context}}`.
 */
export function renderContext(context: GenerationContext): string {
    const parts = [context.topic.trim()];

    if (context.ticketType) {
        parts.push(`Ticket type: ${context.ticketType}`);
    }

    const existing = context.existingContent?.trim();
    if (existing) {
        parts.push(`Existing description: ${existing}\n\nImprove or expand this description based on the following questions:`);
    }

    const children = context.childSummaries ?? [];
    if (children.length > 0) {
        const lines = children.slice(0, MAX_CHILD_SUMMARIES).map(summary => `- ${summary}`);
        if (children.length > MAX_CHILD_SUMMARIES) {
            lines.push(`... and ${children.length - MAX_CHILD_SUMMARIES} more child tickets`);
        }
        parts.push(`Child tickets:\n${lines.join('\n')}`);
    }

    return parts.join('\n\n');
}

/**
 * Text substituted for `{{history}}`: empty without answers, otherwise a
 * numbered list of alternating Q and A entries. A rejected
 * question appears alone, marked REJECTED.
 */
export function renderHistory(answers: readonly AnswerPair[]): string {
    if (answers.length === 0) return '';
    const entries = answers.flatMap(pair =>
        pair.rejected ? [`Q: ${pair.question} - REJECTED`] : [`Q: ${pair.question}`, `A: ${pair.answer}`]
    );
    return 'Conversation history:\n' + entries.map((entry, i) => `${i + 1}. ${entry}`).join('\n') + '\n';
}
