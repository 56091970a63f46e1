import { GenerationClient, LlmGenerationClient } from '../ai/generation_client.js';
import { requireTrackerCredentials, TicketwrightConfig } from '../core/config.js';
import { createLlmBackend } from '../core/llm_backend.js';
import { Logger } from '../core/logger.js';
import { loadPromptTemplates, PromptTemplates } from '../core/prompts.js';
import { StateStore } from '../state/store.js';
import { JiraTicketClient } from '../tracker/jira_client.js';
import { TicketClient } from '../tracker/types.js';
import { Editor, ExternalEditor } from '../ui/editor.js';
import { ReadlineTerminal, Terminal } from '../ui/terminal.js';

/**
 * Everything a command handler touches. Built once per invocation and
 * passed down explicitly; tests swap in fakes field by field.
 */
export interface CommandDeps {
    config: TicketwrightConfig;
    tracker: TicketClient;
    generation: GenerationClient;
    templates: PromptTemplates;
    terminal: Terminal;
    editor: Editor;
    logger: Logger;
    state: StateStore;
}

export async function createCommandDeps(config: TicketwrightConfig, logger: Logger): Promise<CommandDeps> {
    const credentials = requireTrackerCredentials(config);
    const templates = await loadPromptTemplates(config.promptTemplates);
    const backend = await createLlmBackend(config);
    const terminal = new ReadlineTerminal();

    return {
        config,
        tracker: new JiraTicketClient({
            baseUrl: credentials.baseUrl,
            token: credentials.token,
            storyPointsFieldId: config.storyPointsFieldId,
            ticketFilter: config.ticketFilter,
        }),
        generation: new LlmGenerationClient(backend, templates),
        templates,
        terminal,
        editor: new ExternalEditor(terminal),
        logger,
        state: new StateStore(config.configDir),
    };
}
