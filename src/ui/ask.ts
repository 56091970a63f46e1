import { fmt } from '../core/console.js';
import { Terminal } from './terminal.js';

/**
 * Yes/no question. Empty input takes the default.
 */
export async function askYesNo(terminal: Terminal, question: string, defaultYes: boolean): Promise<boolean> {
    const hint = defaultYes ? '[Y/n]' : '[y/N]';
    const answer = (await terminal.ask(fmt.prompt(`${question} ${hint} `))).trim().toLowerCase();
    if (!answer) return defaultYes;
    return answer === 'y' || answer === 'yes';
}

export type ReviewChoice = 'accept' | 'reject' | 'edit' | 'show';

/**
 * `[Y/n/e(dit)]`-style prompt. Empty input accepts; unknown input asks again.
 */
export async function askReviewChoice(
    terminal: Terminal,
    question: string,
    options: { allowShow?: boolean } = {}
): Promise<ReviewChoice> {
    const hint = options.allowShow ? '[Y/n/e(dit)/s(how)]' : '[Y/n/e(dit)]';
    for (;;) {
        const answer = (await terminal.ask(fmt.prompt(`${question} ${hint} `))).trim().toLowerCase();
        if (answer === '' || answer === 'y' || answer === 'yes') return 'accept';
        if (answer === 'n' || answer === 'no') return 'reject';
        if (answer === 'e' || answer === 'edit') return 'edit';
        if (options.allowShow && (answer === 's' || answer === 'show')) return 'show';
        terminal.print(fmt.warning(`Unrecognized choice: ${answer}`));
    }
}

/**
 * Numbered menu. Returns the zero-based index, or undefined when the user
 * enters nothing and `allowEmpty` is set. Invalid input is reported and the
 * question repeats.
 */
export async function askMenuChoice(
    terminal: Terminal,
    title: string,
    labels: string[],
    options: { allowEmpty?: boolean } = {}
): Promise<number | undefined> {
    terminal.print(title);
    labels.forEach((label, i) => terminal.print(`  [${i + 1}] ${label}`));

    for (;;) {
        const answer = (await terminal.ask(fmt.prompt('> '))).trim();
        if (!answer && options.allowEmpty) return undefined;
        const choice = Number(answer);
        if (answer && Number.isInteger(choice) && choice >= 1 && choice <= labels.length) {
            return choice - 1;
        }
        terminal.print(fmt.warning(`Invalid selection: ${answer || '(empty)'}`));
    }
}

/** Prompt for a positive integer; empty input takes `defaultValue` when given. */
export async function askPositiveInt(terminal: Terminal, question: string, defaultValue?: number): Promise<number> {
    const hint = defaultValue !== undefined ? ` [${defaultValue}]` : '';
    for (;;) {
        const answer = (await terminal.ask(fmt.prompt(`${question}${hint}: `))).trim();
        if (!answer && defaultValue !== undefined) return defaultValue;
        const value = Number(answer);
        if (Number.isInteger(value) && value > 0) return value;
        terminal.print(fmt.warning(`Please enter a positive whole number (got "${answer}")`));
    }
}
