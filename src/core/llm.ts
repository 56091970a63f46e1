export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string | null;
}

export interface ChatCompletionOptions {
    temperature?: number;
    maxTokens?: number;
}

export interface ChatResult {
    messages: ChatMessage[];
}

/**
 * Raised for any failed call to the generative model: transport, HTTP
 * status, empty completion or output that cannot be interpreted.
 */
export class GenerationError extends Error {
    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'GenerationError';
    }
}

/** Text of the last assistant message, or empty string. */
export function lastAssistantContent(result: ChatResult): string {
    for (let i = result.messages.length - 1; i >= 0; i--) {
        const message = result.messages[i];
        if (message.role === 'assistant') return message.content ?? '';
    }
    return '';
}
