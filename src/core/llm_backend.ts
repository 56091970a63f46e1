import { ChatCompletionOptions, ChatMessage, ChatResult } from './llm.js';
import { TicketwrightConfig } from './config.js';

/**
 * Abstract interface for LLM backends.
 */
export interface LlmBackend {
    callChat(messages: ChatMessage[], options?: ChatCompletionOptions): Promise<ChatResult>;
}

/**
 * Factory function to create the appropriate LLM backend based on configuration.
 */
export async function createLlmBackend(config: TicketwrightConfig): Promise<LlmBackend> {
    if (config.mockMode) {
        // Lazy load so production runs never pull in canned responses
        const { MockLlmBackend } = await import('./mock_backend.js');
        return new MockLlmBackend();
    }

    const { OpenAiLlmBackend } = await import('./openai_backend.js');
    return new OpenAiLlmBackend(config);
}
