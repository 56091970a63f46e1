import { GenerationClient } from '../ai/generation_client.js';
import { GenerationError } from '../core/llm.js';
import { Logger } from '../core/logger.js';
import { PromptTemplates, renderTemplate } from '../core/prompts.js';
import { GenerationContext, renderContext, renderHistory } from './context.js';
import { AnswerPair, AnswerSource, Question } from './types.js';

/** Interactive answers that end questioning early. Not recorded as answers. */
const STOP_WORDS = new Set(['skip', 'done']);
/** Interactive answer that swaps the current question for a new one. */
const REJECT_WORD = 'reject';

export interface RunFlowOptions {
    /**
     * When question generation fails, log a warning and generate from the
     * context alone instead of failing the flow.
     */
    continueWithoutQuestions?: boolean;
}

function wrapGenerationError(operation: string, error: unknown): GenerationError {
    if (error instanceof GenerationError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new GenerationError(`Failed to ${operation}: ${message}`, error);
}

/**
 * Runs the bounded question/answer dialogue that gathers detail before a
 * description or epic plan is generated.
 */
export class QuestionEngine {
    constructor(
        private readonly generation: GenerationClient,
        private readonly templates: PromptTemplates,
        private readonly logger?: Logger
    ) {}

    buildQuestionsPrompt(
        context: GenerationContext,
        maxQuestions: number,
        history: readonly AnswerPair[] = []
    ): string {
        const template = context.isSpike ? this.templates.spike_question : this.templates.question;
        return renderTemplate(template, {
            context: renderContext(context),
            history: renderHistory(history),
            max_questions: String(maxQuestions),
        });
    }

    async generateQuestions(context: GenerationContext, maxQuestions: number): Promise<Question[]> {
        if (!Number.isInteger(maxQuestions) || maxQuestions < 0) {
            throw new RangeError(`maxQuestions must be a non-negative integer, got ${maxQuestions}`);
        }
        if (maxQuestions === 0) return [];

        let texts: string[];
        try {
            texts = await this.generation.generateQuestions(this.buildQuestionsPrompt(context, maxQuestions));
        } catch (error) {
            throw wrapGenerationError('generate questions', error);
        }

        return texts
            .map(text => text.trim())
            .filter(Boolean)
            .slice(0, maxQuestions)
            .map((text, i) => ({ text, position: i + 1 }));
    }

    /**
     * Asks the model for one question to take the place of a rejected one.
     * The rejected question is already in `history`. Returns null when the
     * model offers nothing usable.
     */
    async replaceQuestion(
        context: GenerationContext,
        rejected: Question,
        history: readonly AnswerPair[]
    ): Promise<Question | null> {
        let texts: string[];
        try {
            texts = await this.generation.generateQuestions(this.buildQuestionsPrompt(context, 1, history));
        } catch (error) {
            throw wrapGenerationError('generate a replacement question', error);
        }
        const text = texts.map(t => t.trim()).find(Boolean);
        return text ? { text, position: rejected.position } : null;
    }

    async collectAnswer(question: Question, source: AnswerSource, total = 1): Promise<AnswerPair> {
        if (source.method === 'structured') {
            return { question: question.text, answer: source.answers[question.position - 1] ?? '' };
        }
        const answer = await source.reader.read(question, total);
        return { question: question.text, answer: answer.trim() };
    }

    private async replaceRejected(
        context: GenerationContext,
        rejected: Question,
        history: readonly AnswerPair[],
        options: RunFlowOptions
    ): Promise<Question | null> {
        try {
            return await this.replaceQuestion(context, rejected, history);
        } catch (error) {
            if (!options.continueWithoutQuestions || !(error instanceof GenerationError)) throw error;
            this.logger?.warn('Replacement question failed, moving on', { component: 'qa', error: error.message });
            return null;
        }
    }

    /**
     * Deterministic: identical inputs give byte-identical prompts.
     */
    buildFinalPrompt(context: GenerationContext, answers: readonly AnswerPair[]): string {
        let template: string;
        if (context.kind === 'epic-plan') {
            template = this.templates.epic_plan;
        } else if (context.isSpike) {
            template = this.templates.spike_description;
        } else {
            template = this.templates.description;
        }

        return renderTemplate(template, {
            context: renderContext(context),
            history: renderHistory(answers),
        });
    }

    async runFlow(
        context: GenerationContext,
        maxQuestions: number,
        source: AnswerSource,
        options: RunFlowOptions = {}
    ): Promise<string> {
        let questions: Question[] = [];
        try {
            questions = await this.generateQuestions(context, maxQuestions);
        } catch (error) {
            if (!options.continueWithoutQuestions || !(error instanceof GenerationError)) throw error;
            this.logger?.warn('Question generation failed, continuing without questions', {
                component: 'qa',
                error: error.message,
            });
        }

        if (questions.length === 0) {
            this.logger?.debug('No clarifying questions', { component: 'qa', event: 'no_questions' });
        }

        const answers: AnswerPair[] = [];
        const pending = [...questions];
        let index = 0;
        while (index < pending.length) {
            const question = pending[index];
            const pair = await this.collectAnswer(question, source, pending.length);
            const word = source.method === 'interactive' ? pair.answer.toLowerCase() : '';
            if (STOP_WORDS.has(word)) break;

            if (word === REJECT_WORD) {
                this.logger?.info('Question rejected', { component: 'qa', question: question.text });
                answers.push({ question: question.text, answer: '', rejected: true });
                const replacement = await this.replaceRejected(context, question, answers, options);
                if (replacement) {
                    pending[index] = replacement;
                } else {
                    index++;
                }
                continue;
            }

            answers.push(pair);
            index++;
        }

        let content: string;
        try {
            content = await this.generation.generateContent(this.buildFinalPrompt(context, answers));
        } catch (error) {
            throw wrapGenerationError('generate content', error);
        }
        return content.trim();
    }
}
