import { describe, it, expect } from 'vitest';
import { PROMPT_NAMES } from '../../src/core/config.js';
import { loadPromptTemplates, renderTemplate } from '../../src/core/prompts.js';

describe('loadPromptTemplates', () => {
    it('loads every bundled prompt', async () => {
        const templates = await loadPromptTemplates();

        for (const name of PROMPT_NAMES) {
            expect(templates[name].trim().length).toBeGreaterThan(0);
        }
        expect(templates.estimate).toContain('{{summary}}');
        expect(templates.decompose).toContain('{{existing_children}}');
    });

    it('lets overrides replace bundled prompts', async () => {
        const templates = await loadPromptTemplates({ estimate: 'Points for {{summary}}?' });
        expect(templates.estimate).toBe('Points for {{summary}}?');
        expect(templates.question).not.toBe('Points for {{summary}}?');
    });
});

describe('renderTemplate', () => {
    it('fills known placeholders and leaves unknown ones', () => {
        expect(renderTemplate('{{a}} and {{b}} and {{a}}', { a: 'x' })).toBe('x and {{b}} and x');
    });

    it('does not read inherited properties', () => {
        expect(renderTemplate('{{constructor}}', {})).toBe('{{constructor}}');
    });

    it('inserts values literally', () => {
        expect(renderTemplate('{{v}}', { v: '$& $1' })).toBe('$& $1');
    });
});
