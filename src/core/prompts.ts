import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { PROMPT_NAMES, PromptName } from './config.js';

// Get current directory in ESM
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type PromptTemplates = Record<PromptName, string>;

async function readPromptFile(promptName: PromptName): Promise<string> {
    // src/core in development, dist/src/core once built
    const candidatePaths = [
        path.resolve(__dirname, '../../prompts', `${promptName}.md`),
        path.resolve(__dirname, '../../../prompts', `${promptName}.md`),
    ];

    let lastError: unknown;

    for (const promptPath of candidatePaths) {
        try {
            const content = await fs.readFile(promptPath, 'utf8');
            if (!content.trim()) {
                throw new Error(`Prompt is empty: ${promptName} (${promptPath})`);
            }
            return content;
        } catch (error: unknown) {
            lastError = error;
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                // Try next candidate.
                continue;
            }
            throw error;
        }
    }

    throw new Error(`Prompt not found: ${promptName}`, { cause: lastError });
}

/**
 * Load every bundled template, letting configured overrides win.
 */
export async function loadPromptTemplates(
    overrides: Partial<Record<PromptName, string>> = {}
): Promise<PromptTemplates> {
    const entries = await Promise.all(
        PROMPT_NAMES.map(async (name): Promise<[PromptName, string]> => {
            const override = overrides[name];
            return [name, override ?? await readPromptFile(name)];
        })
    );

    const templates = Object.fromEntries(entries);
    return {
        question: templates.question,
        spike_question: templates.spike_question,
        description: templates.description,
        spike_description: templates.spike_description,
        epic_plan: templates.epic_plan,
        decompose: templates.decompose,
        estimate: templates.estimate,
    };
}

/**
 * Replace `{{name}}` placeholders. Unknown placeholders are left in place.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
        return Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match;
    });
}
