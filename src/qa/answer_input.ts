import { AnswerInputMethod } from '../core/config.js';
import { fmt } from '../core/console.js';
import { Editor } from '../ui/editor.js';
import { Terminal } from '../ui/terminal.js';
import { AnswerReader, Question } from './types.js';

const EDIT_COMMAND_RE = /^:e(?:dit)?(?:\s+(.*))?$/;

async function editOrFallback(terminal: Terminal, editor: Editor, seed: string): Promise<string> {
    try {
        return await editor.edit(seed);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        terminal.print(fmt.warning(`Editor error: ${message}. Continuing with current input.`));
        return seed;
    }
}

/**
 * Reads answers the way `answer_input_method` asks:
 *
 * - `readline`: one line; `:e` or `:edit [text]` switches to the editor
 * - `editor`: always the editor
 * - `readline_with_preview`: a line, then `Edit? [y/N]` until accepted
 */
export function createAnswerReader(method: AnswerInputMethod, terminal: Terminal, editor: Editor): AnswerReader {
    const readLine = async (question: Question, total: number): Promise<string> => {
        const line = (await terminal.ask(fmt.prompt(`(${question.position}/${total}) ${question.text} > `))).trim();
        const edit = EDIT_COMMAND_RE.exec(line);
        if (edit) {
            return editOrFallback(terminal, editor, edit[1]?.trim() ?? '');
        }
        return line;
    };

    switch (method) {
        case 'editor':
            return {
                read: async (question, total) => {
                    terminal.print(fmt.info(`(${question.position}/${total}) ${question.text}`));
                    terminal.print(fmt.dim('Opening editor for your answer...'));
                    return editOrFallback(terminal, editor, '');
                },
            };

        case 'readline_with_preview':
            return {
                read: async (question, total) => {
                    let answer = await readLine(question, total);
                    for (;;) {
                        terminal.print(`\nYour answer: ${answer}`);
                        const choice = (await terminal.ask(fmt.prompt('Edit? [y/N] '))).trim().toLowerCase();
                        if (choice !== 'y' && choice !== 'yes') return answer;
                        answer = await editOrFallback(terminal, editor, answer);
                    }
                },
            };

        case 'readline':
            return { read: readLine };
    }
}
