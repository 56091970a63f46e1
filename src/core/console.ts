import chalk from 'chalk';

/**
 * Pretty console output for user-facing messages
 * Separate from structured JSON logs
 */

const icons = {
    info: 'ℹ',
    success: '✓',
    warning: '⚠',
    error: '✗',
    ticket: '🎫',
    brain: '🧠',
};

type Styler = (value: string) => string;

function line(color: Styler, icon: string, text: string, detail?: string): string {
    return color(`  ${icon}  ${text}`) + (detail ? chalk.gray(` ${detail}`) : '');
}

/** String builders, for output that goes through a Terminal. */
export const fmt = {
    section: (text: string) => '\n' + chalk.bold.white(`▸ ${text}`),
    info: (text: string, detail?: string) => line(chalk.blue, icons.info, text, detail),
    success: (text: string, detail?: string) => line(chalk.green, icons.success, text, detail),
    warning: (text: string, detail?: string) => line(chalk.yellow, icons.warning, text, detail),
    error: (text: string, detail?: string) => line(chalk.red, icons.error, text, detail),
    ticket: (text: string, detail?: string) => line(chalk.blue, icons.ticket, text, detail),
    thinking: (text: string) => line(chalk.magenta, icons.brain, text),
    dim: (text: string) => chalk.gray(`     ${text}`),
    prompt: (text: string) => chalk.yellow(text),
    divider: () => chalk.gray('  ' + '─'.repeat(68)),
};

/** Direct-to-stdout variants, for log lines rendered outside a command's Terminal. */
export const console_log = {
    success: (text: string, detail?: string) => console.log(fmt.success(text, detail)),
    warning: (text: string, detail?: string) => console.log(fmt.warning(text, detail)),
    error: (text: string, detail?: string) => console.log(fmt.error(text, detail)),
    ticket: (text: string, detail?: string) => console.log(fmt.ticket(text, detail)),
    dim: (text: string) => console.log(fmt.dim(text)),
};
