import { describe, it, expect } from 'vitest';
import { createAnswerReader } from '../../src/qa/answer_input.js';
import { EditorError } from '../../src/ui/editor.js';
import { FakeEditor, ScriptedTerminal } from '../helpers/fakes.js';

const question = { text: 'Who uses it?', position: 1 };

describe('createAnswerReader', () => {
    describe('readline', () => {
        it('shows the position and returns the trimmed line', async () => {
            const terminal = new ScriptedTerminal(['  Support staff  ']);
            const reader = createAnswerReader('readline', terminal, new FakeEditor());

            expect(await reader.read(question, 3)).toBe('Support staff');
            expect(terminal.prompts).toEqual(['(1/3) Who uses it? > ']);
        });

        it('opens the editor seeded with the text after :e', async () => {
            const editor = new FakeEditor(['Long answer']);
            const reader = createAnswerReader('readline', new ScriptedTerminal([':e draft']), editor);

            expect(await reader.read(question, 1)).toBe('Long answer');
            expect(editor.seen).toEqual(['draft']);
        });

        it('opens an empty editor for a bare :edit', async () => {
            const editor = new FakeEditor(['Typed in editor']);
            const reader = createAnswerReader('readline', new ScriptedTerminal([':edit']), editor);

            expect(await reader.read(question, 1)).toBe('Typed in editor');
            expect(editor.seen).toEqual(['']);
        });

        it('falls back to the seed when the editor fails', async () => {
            const terminal = new ScriptedTerminal([':e keep this']);
            const editor = new FakeEditor([new EditorError('vi missing')]);
            const reader = createAnswerReader('readline', terminal, editor);

            expect(await reader.read(question, 1)).toBe('keep this');
            expect(terminal.output).toEqual(['  ⚠  Editor error: vi missing. Continuing with current input.']);
        });
    });

    it('editor mode always uses the editor', async () => {
        const terminal = new ScriptedTerminal();
        const editor = new FakeEditor(['From editor']);
        const reader = createAnswerReader('editor', terminal, editor);

        expect(await reader.read(question, 2)).toBe('From editor');
        expect(editor.seen).toEqual(['']);
        expect(terminal.output[0]).toBe('  ℹ  (1/2) Who uses it?');
    });

    it('preview mode offers edits until declined', async () => {
        const terminal = new ScriptedTerminal(['first try', 'y', 'n']);
        const editor = new FakeEditor(['second try']);
        const reader = createAnswerReader('readline_with_preview', terminal, editor);

        expect(await reader.read(question, 1)).toBe('second try');
        expect(editor.seen).toEqual(['first try']);
        expect(terminal.output).toEqual(['\nYour answer: first try', '\nYour answer: second try']);
        expect(terminal.prompts).toEqual(['(1/1) Who uses it? > ', 'Edit? [y/N] ', 'Edit? [y/N] ']);
    });
});
