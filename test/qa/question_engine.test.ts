import { describe, it, expect } from 'vitest';
import { QuestionEngine } from '../../src/qa/question_engine.js';
import { GenerationError } from '../../src/core/llm.js';
import { AnswerReader, AnswerSource } from '../../src/qa/types.js';
import { GenerationContext } from '../../src/qa/context.js';
import { FakeGenerationClient, recordingLogger, testTemplates } from '../helpers/fakes.js';

const login: GenerationContext = { topic: 'Add login', isSpike: false };

function scriptedReader(answers: string[]): AnswerReader & { asked: string[] } {
    const asked: string[] = [];
    return {
        asked,
        read: async question => {
            asked.push(question.text);
            return answers.shift() ?? '';
        },
    };
}

describe('QuestionEngine.generateQuestions', () => {
    it('returns nothing without calling the model when the limit is 0', async () => {
        const generation = new FakeGenerationClient({ questions: ['Unused?'] });
        const engine = new QuestionEngine(generation, testTemplates());

        expect(await engine.generateQuestions(login, 0)).toEqual([]);
        expect(generation.questionPrompts).toEqual([]);
    });

    it('rejects a negative limit', async () => {
        const engine = new QuestionEngine(new FakeGenerationClient(), testTemplates());
        await expect(engine.generateQuestions(login, -1)).rejects.toBeInstanceOf(RangeError);
    });

    it('trims, drops blanks and caps at the limit with 1-based positions', async () => {
        const generation = new FakeGenerationClient({ questions: ['  Who uses it? ', '', 'Why now?', 'How big?'] });
        const engine = new QuestionEngine(generation, testTemplates());

        expect(await engine.generateQuestions(login, 2)).toEqual([
            { text: 'Who uses it?', position: 1 },
            { text: 'Why now?', position: 2 },
        ]);
    });

    it('renders the question template for the context', async () => {
        const generation = new FakeGenerationClient({ questions: [] });
        const engine = new QuestionEngine(generation, testTemplates());

        await engine.generateQuestions(login, 3);
        await engine.generateQuestions({ topic: 'SPIKE: caching', isSpike: true }, 1);

        expect(generation.questionPrompts).toEqual([
            'QUESTIONS max=3\nAdd login',
            'SPIKE QUESTIONS max=1\nSPIKE: caching',
        ]);
    });

    it('wraps model failures in GenerationError', async () => {
        const generation = new FakeGenerationClient({ questionError: new Error('boom') });
        const engine = new QuestionEngine(generation, testTemplates());

        const error = await engine.generateQuestions(login, 2).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(GenerationError);
        expect(error).toMatchObject({ message: 'Failed to generate questions: boom' });
    });
});

describe('QuestionEngine.collectAnswer', () => {
    const engine = new QuestionEngine(new FakeGenerationClient(), testTemplates());

    it('takes structured answers by position, blank when missing', async () => {
        const source: AnswerSource = { method: 'structured', answers: ['First'] };

        expect(await engine.collectAnswer({ text: 'Q1', position: 1 }, source)).toEqual({ question: 'Q1', answer: 'First' });
        expect(await engine.collectAnswer({ text: 'Q2', position: 2 }, source)).toEqual({ question: 'Q2', answer: '' });
    });

    it('trims interactive answers', async () => {
        const source: AnswerSource = { method: 'interactive', reader: scriptedReader(['  spaced out  ']) };
        expect(await engine.collectAnswer({ text: 'Q1', position: 1 }, source)).toEqual({ question: 'Q1', answer: 'spaced out' });
    });
});

describe('QuestionEngine.buildFinalPrompt', () => {
    const engine = new QuestionEngine(new FakeGenerationClient(), testTemplates());

    it('renders context and history into the description template', () => {
        const prompt = engine.buildFinalPrompt(
            { topic: 'Add login', ticketType: 'Story', isSpike: false },
            [{ question: 'Who?', answer: 'Admins' }]
        );
        expect(prompt).toBe('DESCRIBE\nAdd login\n\nTicket type: Story\nConversation history:\n1. Q: Who?\n2. A: Admins\n');
    });

    it('picks the spike and epic plan templates', () => {
        expect(engine.buildFinalPrompt({ topic: 'SPIKE: x', isSpike: true }, [])).toBe('SPIKE DESCRIBE\nSPIKE: x\n');
        expect(engine.buildFinalPrompt({ topic: 'Research', isSpike: true, kind: 'epic-plan' }, [])).toBe(
            'EPIC PLAN\nResearch\n'
        );
    });

    it('is deterministic', () => {
        const answers = [{ question: 'Q', answer: 'A' }];
        expect(engine.buildFinalPrompt(login, answers)).toBe(engine.buildFinalPrompt(login, answers));
    });
});

describe('QuestionEngine.runFlow', () => {
    it('records blank structured answers and returns trimmed content', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1', 'Q2'], content: ['  Final text \n'] });
        const engine = new QuestionEngine(generation, testTemplates());

        const content = await engine.runFlow(login, 4, { method: 'structured', answers: ['A1'] });

        expect(content).toBe('Final text');
        expect(generation.contentPrompts).toEqual([
            'DESCRIBE\nAdd login\nConversation history:\n1. Q: Q1\n2. A: A1\n3. Q: Q2\n4. A: \n',
        ]);
    });

    it('stops asking when an interactive answer is "skip"', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1', 'Q2', 'Q3'] });
        const engine = new QuestionEngine(generation, testTemplates());
        const reader = scriptedReader(['A1', 'skip', 'never read']);

        await engine.runFlow(login, 3, { method: 'interactive', reader });

        expect(reader.asked).toEqual(['Q1', 'Q2']);
        expect(generation.contentPrompts[0]).toBe('DESCRIBE\nAdd login\nConversation history:\n1. Q: Q1\n2. A: A1\n');
    });

    it('records an empty interactive answer as a blank answer', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1', 'Q2'] });
        const engine = new QuestionEngine(generation, testTemplates());
        const reader = scriptedReader(['', 'A2']);

        await engine.runFlow(login, 2, { method: 'interactive', reader });

        expect(reader.asked).toEqual(['Q1', 'Q2']);
        expect(generation.contentPrompts).toEqual([
            'DESCRIBE\nAdd login\nConversation history:\n1. Q: Q1\n2. A: \n3. Q: Q2\n4. A: A2\n',
        ]);
    });

    it('replaces a rejected question without counting it against the limit', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1', 'Q2'], replacements: [['Q1b']] });
        const logger = recordingLogger();
        const engine = new QuestionEngine(generation, testTemplates(), logger);
        const reader = scriptedReader(['REJECT', 'A1b', 'A2']);

        await engine.runFlow(login, 2, { method: 'interactive', reader });

        expect(reader.asked).toEqual(['Q1', 'Q1b', 'Q2']);
        expect(generation.questionPrompts).toEqual([
            'QUESTIONS max=2\nAdd login',
            'QUESTIONS max=1\nAdd loginConversation history:\n1. Q: Q1 - REJECTED\n',
        ]);
        expect(generation.contentPrompts).toEqual([
            'DESCRIBE\nAdd login\nConversation history:\n' +
                '1. Q: Q1 - REJECTED\n2. Q: Q1b\n3. A: A1b\n4. Q: Q2\n5. A: A2\n',
        ]);
        expect(logger.entries.filter(e => e.level === 'info')).toEqual([
            { level: 'info', message: 'Question rejected', fields: { component: 'qa', question: 'Q1' } },
        ]);
    });

    it('moves on when no replacement question comes back', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1', 'Q2'] });
        const engine = new QuestionEngine(generation, testTemplates());
        const reader = scriptedReader(['reject', 'A2']);

        await engine.runFlow(login, 2, { method: 'interactive', reader });

        expect(reader.asked).toEqual(['Q1', 'Q2']);
        expect(generation.contentPrompts).toEqual([
            'DESCRIBE\nAdd login\nConversation history:\n1. Q: Q1 - REJECTED\n2. Q: Q2\n3. A: A2\n',
        ]);
    });

    it('treats "reject" as a plain answer from structured input', async () => {
        const generation = new FakeGenerationClient({ questions: ['Q1'] });
        const engine = new QuestionEngine(generation, testTemplates());

        await engine.runFlow(login, 1, { method: 'structured', answers: ['reject'] });

        expect(generation.questionPrompts).toHaveLength(1);
        expect(generation.contentPrompts).toEqual(['DESCRIBE\nAdd login\nConversation history:\n1. Q: Q1\n2. A: reject\n']);
    });

    it('goes straight to generation with no questions', async () => {
        const generation = new FakeGenerationClient({ questions: ['Unused?'] });
        const engine = new QuestionEngine(generation, testTemplates());

        await engine.runFlow(login, 0, { method: 'structured', answers: [] });

        expect(generation.questionPrompts).toEqual([]);
        expect(generation.contentPrompts).toEqual(['DESCRIBE\nAdd login\n']);
    });

    it('propagates question failures by default', async () => {
        const generation = new FakeGenerationClient({ questionError: new Error('down') });
        const engine = new QuestionEngine(generation, testTemplates());

        await expect(engine.runFlow(login, 2, { method: 'structured', answers: [] })).rejects.toThrow(
            'Failed to generate questions: down'
        );
        expect(generation.contentPrompts).toEqual([]);
    });

    it('continues without questions when asked to, logging a warning', async () => {
        const generation = new FakeGenerationClient({ questionError: new Error('down') });
        const logger = recordingLogger();
        const engine = new QuestionEngine(generation, testTemplates(), logger);

        const content = await engine.runFlow(login, 2, { method: 'structured', answers: [] }, {
            continueWithoutQuestions: true,
        });

        expect(content).toBe('Generated content');
        expect(logger.entries.filter(e => e.level === 'warn')).toEqual([
            {
                level: 'warn',
                message: 'Question generation failed, continuing without questions',
                fields: { component: 'qa', error: 'Failed to generate questions: down' },
            },
        ]);
    });
});
