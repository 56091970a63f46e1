import { z } from 'zod';
import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import YAML from 'yaml';

// Load environment variables from .env file
dotenv.config();

export const PROMPT_NAMES = [
    'question',
    'spike_question',
    'description',
    'spike_description',
    'epic_plan',
    'decompose',
    'estimate',
] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

export const AnswerInputMethodSchema = z.enum(['readline', 'editor', 'readline_with_preview']);
export type AnswerInputMethod = z.infer<typeof AnswerInputMethodSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const TicketwrightConfigSchema = z.object({
    /** Directory holding config.yaml, state.yaml and rejected plan snapshots. */
    configDir: z.string(),
    /** Base URL of the issue tracker, e.g. https://issues.example.com */
    jiraUrl: z.string().url().optional(),
    /** Bearer token, passed through as-is. */
    jiraToken: z.string().min(1).optional(),
    geminiApiKey: z.string().min(1).optional(),
    /** OpenAI-compatible endpoint of the generative model provider. */
    geminiBaseUrl: z.string().default('https://generativelanguage.googleapis.com/v1beta/openai/'),
    geminiModel: z.string().default('gemini-2.5-flash'),

    defaultProject: z.string().optional(),
    defaultTaskType: z.string().default('Task'),

    /** Upper bound on clarifying questions per Q&A flow; 0 skips straight to generation. */
    maxQuestions: z.number().int().min(0).default(4),
    answerInputMethod: AnswerInputMethodSchema.default('readline'),

    storyPointsFieldId: z.string().default('customfield_10016'),
    /** Detected from the field list when unset. */
    epicLinkFieldId: z.string().optional(),
    storyPointOptions: z.array(z.number().int().positive()).min(1).default([1, 2, 3, 5, 8, 13]),
    reviewPageSize: z.number().int().positive().default(10),
    /** Descriptions shorter than this are offered for rewriting during review; 0 turns the check off. */
    descriptionMinLength: z.number().int().min(0).default(128),
    defaultMaxDecomposePoints: z.number().int().positive().optional(),
    /** Extra JQL ANDed onto every search. */
    ticketFilter: z.string().optional(),

    /** Replaces the bundled prompt of the same name. */
    promptTemplates: z.record(z.enum(PROMPT_NAMES), z.string()).default({}),

    /** If true, use deterministic mock responses for LLM calls */
    mockMode: z.boolean().default(false),
    logLevel: LogLevelSchema.default('info'),
});

export type TicketwrightConfig = z.infer<typeof TicketwrightConfigSchema>;

/** Shape of `<configDir>/config.yaml`. Keys are snake_case on disk. */
const FileConfigSchema = z.object({
    jira_url: z.string().optional(),
    default_project: z.string().optional(),
    default_task_type: z.string().optional(),
    gemini_model: z.string().optional(),
    gemini_base_url: z.string().optional(),
    max_questions: z.number().optional(),
    answer_input_method: z.string().optional(),
    story_points_field_id: z.string().optional(),
    epic_link_field_id: z.string().optional(),
    story_point_options: z.array(z.number()).optional(),
    review_page_size: z.number().optional(),
    description_min_length: z.number().optional(),
    default_max_decompose_points: z.number().optional(),
    ticket_filter: z.string().optional(),
    question_prompt_template: z.string().optional(),
    spike_question_prompt_template: z.string().optional(),
    description_prompt_template: z.string().optional(),
    spike_prompt_template: z.string().optional(),
    epic_plan_prompt_template: z.string().optional(),
    decompose_prompt_template: z.string().optional(),
    estimate_prompt_template: z.string().optional(),
}).passthrough();

type FileConfig = z.infer<typeof FileConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function expandPath(p: string): string {
    if (p.startsWith('~/') || p === '~') {
        return path.join(os.homedir(), p.slice(1));
    }
    return p;
}

export function getConfigPath(configDir: string): string {
    return path.join(configDir, 'config.yaml');
}

function readConfigFile(configPath: string): FileConfig {
    let raw: string;
    try {
        raw = readFileSync(configPath, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return {};
        }
        throw new ConfigError(`Failed to read config file ${configPath}`, error);
    }

    let parsed: unknown;
    try {
        parsed = YAML.parse(raw) ?? {};
    } catch (error: unknown) {
        throw new ConfigError(`Config file ${configPath} is not valid YAML`, error);
    }

    const result = FileConfigSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigError(`Invalid config file ${configPath}: ${result.error.message}`, result.error);
    }
    return result.data;
}

function promptOverrides(file: FileConfig): Partial<Record<PromptName, string>> {
    const overrides: Partial<Record<PromptName, string>> = {};
    const entries: Array<[PromptName, string | undefined]> = [
        ['question', file.question_prompt_template],
        ['spike_question', file.spike_question_prompt_template],
        ['description', file.description_prompt_template],
        ['spike_description', file.spike_prompt_template],
        ['epic_plan', file.epic_plan_prompt_template],
        ['decompose', file.decompose_prompt_template],
        ['estimate', file.estimate_prompt_template],
    ];
    for (const [name, template] of entries) {
        if (template && template.trim()) overrides[name] = template;
    }
    return overrides;
}

function parseIntEnv(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
}

/**
 * Build the configuration from config.yaml, then environment variables,
 * validated by the schema. Command-line flags are applied by each command.
 */
export function loadConfig(env = process.env, argv = process.argv): TicketwrightConfig {
    const args = argv.slice(2);
    const configDirIndex = args.indexOf('--config-dir');
    const configDirRaw = configDirIndex !== -1 && args[configDirIndex + 1]
        ? args[configDirIndex + 1]
        : env.TICKETWRIGHT_CONFIG_DIR || '~/.ticketwright';
    const configDir = path.resolve(expandPath(configDirRaw));

    const file = readConfigFile(getConfigPath(configDir));

    const config = {
        configDir,
        jiraUrl: env.JIRA_URL || file.jira_url,
        jiraToken: env.JIRA_API_TOKEN || env.TICKETWRIGHT_JIRA_TOKEN,
        geminiApiKey: env.GEMINI_API_KEY || env.TICKETWRIGHT_GEMINI_API_KEY,
        geminiBaseUrl: env.GEMINI_BASE_URL || file.gemini_base_url,
        geminiModel: env.GEMINI_MODEL || file.gemini_model,
        defaultProject: env.TICKETWRIGHT_DEFAULT_PROJECT || file.default_project,
        defaultTaskType: file.default_task_type,
        maxQuestions: parseIntEnv(env.TICKETWRIGHT_MAX_QUESTIONS) ?? file.max_questions,
        answerInputMethod: file.answer_input_method,
        storyPointsFieldId: file.story_points_field_id,
        epicLinkFieldId: file.epic_link_field_id,
        storyPointOptions: file.story_point_options,
        reviewPageSize: file.review_page_size,
        descriptionMinLength: file.description_min_length,
        defaultMaxDecomposePoints: file.default_max_decompose_points,
        ticketFilter: file.ticket_filter,
        promptTemplates: promptOverrides(file),
        mockMode: env.TICKETWRIGHT_MOCK_MODE === 'true',
        logLevel: env.TICKETWRIGHT_LOG_LEVEL || undefined,
    };

    const parsed = TicketwrightConfigSchema.safeParse(config);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }
    return parsed.data;
}

export interface TrackerCredentials {
    baseUrl: string;
    token: string;
}

export function requireTrackerCredentials(config: TicketwrightConfig): TrackerCredentials {
    if (!config.jiraUrl || !config.jiraToken) {
        throw new ConfigError(
            'Issue tracker is not configured.\n' +
            `Set jira_url in ${getConfigPath(config.configDir)} (or JIRA_URL),\n` +
            'and the JIRA_API_TOKEN environment variable.'
        );
    }
    return { baseUrl: config.jiraUrl, token: config.jiraToken };
}

export function requireDefaultProject(config: TicketwrightConfig, override?: string): string {
    const project = override || config.defaultProject;
    if (!project) {
        throw new ConfigError(
            `No project given. Pass --project or set default_project in ${getConfigPath(config.configDir)}.`
        );
    }
    return project;
}
