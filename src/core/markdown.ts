import chalk from 'chalk';
import MarkdownIt from 'markdown-it';

const md = new MarkdownIt({
    breaks: true,
    linkify: true
});

const NAMED_ENTITIES = new Map<string, string>([
    ['&amp;', '&'],
    ['&lt;', '<'],
    ['&gt;', '>'],
    ['&quot;', '"'],
    ['&#39;', "'"],
    ['&apos;', "'"],
    ['&nbsp;', ' '],
]);

export function decodeHtmlEntities(value: string): string {
    return value
        .replace(/&#x([0-9a-f]+);/gi, (_match: string, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
        .replace(/&#(\d+);/g, (_match: string, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
        .replace(/&[a-z]+;/gi, (entity: string) => NAMED_ENTITIES.get(entity) ?? entity);
}

/**
 * Render generated markdown (descriptions, plans) for the terminal.
 * Only the subset the prompts ask the model for is styled; other tags are dropped.
 */
export function renderMarkdownToTerminal(markdown: string): string {
    const html = md.render(markdown);

    const formatted = html
        // Headers
        .replace(/<h1>(.*?)<\/h1>/gi, (_m: string, text: string) => chalk.bold.blue(`\n${text}\n`) + '='.repeat(50))
        .replace(/<h2>(.*?)<\/h2>/gi, (_m: string, text: string) => chalk.bold.cyan(`\n${text}\n`) + '-'.repeat(30))
        .replace(/<h3>(.*?)<\/h3>/gi, (_m: string, text: string) => chalk.bold.yellow(`\n${text}`))
        .replace(/<h[4-6]>(.*?)<\/h[4-6]>/gi, (_m: string, text: string) => chalk.bold.magenta(`\n${text}`))
        // Bold and italic
        .replace(/<strong>(.*?)<\/strong>/gi, (_m: string, text: string) => chalk.bold(text))
        .replace(/<em>(.*?)<\/em>/gi, (_m: string, text: string) => chalk.italic(text))
        // Code blocks before inline code, so the inner <code> is not styled twice
        .replace(/<pre><code[^>]*>([\s\S]*?)<\/code><\/pre>/gi, (_m: string, code: string) => {
            return '\n' + chalk.gray(code.trimEnd()) + '\n';
        })
        .replace(/<code>(.*?)<\/code>/gi, (_m: string, code: string) => chalk.bgGray.white(` ${code} `))
        .replace(/<a href="([^"]+)">(.*?)<\/a>/gi, (_m: string, href: string, text: string) => {
            return text === href ? chalk.blue.underline(href) : chalk.blue.underline(text) + ' ' + chalk.gray(`(${href})`);
        })
        // Lists
        .replace(/<\/?(?:ul|ol)>/gi, '')
        .replace(/<li>\s*(?:<p>)?([\s\S]*?)(?:<\/p>)?\s*<\/li>/gi, '  • $1\n')
        .replace(/<hr\s*\/?>/gi, chalk.gray('─'.repeat(30)) + '\n')
        .replace(/<p>([\s\S]*?)<\/p>/gi, '$1\n')
        .replace(/<br\s*\/?>(?!\n)/gi, '\n')
        // Clean up remaining HTML tags
        .replace(/<\/?[^>]+(>|$)/g, '')
        .replace(/\n\s*\n/g, '\n\n')
        .trim();

    return decodeHtmlEntities(formatted);
}
