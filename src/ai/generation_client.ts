import { z } from 'zod';
import { LlmBackend } from '../core/llm_backend.js';
import { GenerationError, lastAssistantContent } from '../core/llm.js';
import { PromptTemplates, renderTemplate } from '../core/prompts.js';
import { safeParse } from '../utils/json.js';

export interface StoryPointEstimate {
    points: number;
    reasoning: string;
}

/**
 * Capability the rest of the tool needs from the generative model.
 * Every call is a single attempt; failures surface as GenerationError.
 */
export interface GenerationClient {
    generateQuestions(prompt: string): Promise<string[]>;
    generateContent(prompt: string): Promise<string>;
    estimateStoryPoints(summary: string, description: string, options: number[]): Promise<StoryPointEstimate>;
}

const QuestionListSchema = z.union([
    z.array(z.string()),
    z.object({ questions: z.array(z.string()) }).transform(value => value.questions),
]);

const LIST_MARKER_RE = /^\s*(?:\d+[.)]|[-*•])\s+/;

function cleanQuestion(text: string): string {
    return text.trim().replace(/^["']|["'],?$/g, '').trim();
}

function parseJsonQuestions(raw: string): string[] | null {
    // jsonrepair turns plain prose into a JSON string; only try it on bracketed output
    if (!/[[{]/.test(raw)) return null;

    let value: unknown;
    try {
        value = safeParse(raw);
    } catch {
        return null;
    }
    const result = QuestionListSchema.safeParse(value);
    return result.success ? result.data.map(cleanQuestion).filter(Boolean) : null;
}

/**
 * Read a question list from model output. A JSON array (optionally fenced,
 * or wrapped as `{ "questions": [...] }`) is preferred; otherwise numbered or
 * bulleted lines, or lines ending in `?`, are taken as questions.
 */
export function parseQuestionList(raw: string): string[] {
    const fromJson = parseJsonQuestions(raw);
    if (fromJson) return fromJson;

    const questions = raw
        .split(/\r?\n/)
        .filter(line => LIST_MARKER_RE.test(line) || line.trim().endsWith('?'))
        .map(line => cleanQuestion(line.replace(LIST_MARKER_RE, '')))
        .filter(Boolean);

    if (questions.length === 0) {
        throw new GenerationError(`Could not parse questions from model output: ${raw.slice(0, 200)}`);
    }
    return questions;
}

const LEADING_INT_RE = /^\s*\**\s*(\d+)/;

function leadingInt(line: string): number | null {
    const match = LEADING_INT_RE.exec(line);
    return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Expects the estimate on the first line and the reasoning after it.
 * Falls back to the first line that starts with a positive number.
 */
export function parseEstimateResponse(raw: string): StoryPointEstimate {
    const trimmed = raw.trim();
    const lines = trimmed.split(/\r?\n/).map(line => line.trim());

    let points = leadingInt(lines[0] ?? '');
    if (points === null || points <= 0) {
        points = null;
        for (const line of lines) {
            const candidate = leadingInt(line);
            if (candidate !== null && candidate > 0) {
                points = candidate;
                break;
            }
        }
    }

    if (points === null) {
        throw new GenerationError(`Could not find a valid story point estimate in response: ${trimmed.slice(0, 200)}`);
    }

    const reasoning = lines.slice(1).filter(Boolean).join(' ').trim() || trimmed;
    return { points, reasoning };
}

export function formatPointOptions(options: number[]): string {
    return options.length > 0 ? `${options.join(', ')} (or any other positive integer)` : 'any positive integer';
}

/**
 * Production GenerationClient over an LlmBackend.
 */
export class LlmGenerationClient implements GenerationClient {
    constructor(
        private readonly backend: LlmBackend,
        private readonly templates: PromptTemplates
    ) {}

    private async complete(prompt: string, operation: string): Promise<string> {
        let content: string;
        try {
            const result = await this.backend.callChat([{ role: 'user', content: prompt }]);
            content = lastAssistantContent(result);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new GenerationError(`Failed to ${operation}: ${message}`, error);
        }
        if (!content.trim()) {
            throw new GenerationError(`Failed to ${operation}: the model returned an empty response`);
        }
        return content;
    }

    async generateQuestions(prompt: string): Promise<string[]> {
        const raw = await this.complete(prompt, 'generate questions');
        return parseQuestionList(raw);
    }

    async generateContent(prompt: string): Promise<string> {
        return this.complete(prompt, 'generate content');
    }

    async estimateStoryPoints(summary: string, description: string, options: number[]): Promise<StoryPointEstimate> {
        const prompt = renderTemplate(this.templates.estimate, {
            summary,
            description: description.trim() || '(no description)',
            options: formatPointOptions(options),
        });
        const raw = await this.complete(prompt, 'estimate story points');
        return parseEstimateResponse(raw);
    }
}
