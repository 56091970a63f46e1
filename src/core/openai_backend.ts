import OpenAI from 'openai';
import { ChatCompletionOptions, ChatMessage, ChatResult, GenerationError } from './llm.js';
import { TicketwrightConfig } from './config.js';
import { LlmBackend } from './llm_backend.js';

function describeStatus(error: InstanceType<typeof OpenAI.APIError>): string {
    switch (error.status) {
        case 401:
        case 403:
            return 'authentication failed. Your Gemini API key may be invalid (GEMINI_API_KEY)';
        case 429:
            return 'rate limit exceeded. Please wait a moment and try again';
        case 503:
            return 'the model service is temporarily unavailable. Please try again later';
        default:
            return error.message;
    }
}

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    const content = message.content ?? '';
    switch (message.role) {
        case 'system':
            return { role: 'system', content };
        case 'user':
            return { role: 'user', content };
        case 'assistant':
            return { role: 'assistant', content };
    }
}

/**
 * OpenAI-compatible LLM backend.
 * Talks to Gemini through its OpenAI-compatible endpoint.
 */
export class OpenAiLlmBackend implements LlmBackend {
    private client: OpenAI | null = null;

    constructor(private readonly config: TicketwrightConfig) {}

    private getClient(): OpenAI {
        if (!this.config.geminiApiKey) {
            throw new GenerationError('Gemini API key is not configured. Set GEMINI_API_KEY.');
        }
        if (!this.client) {
            this.client = new OpenAI({
                apiKey: this.config.geminiApiKey,
                baseURL: this.config.geminiBaseUrl,
                // a failed call is reported, never retried
                maxRetries: 0,
            });
        }
        return this.client;
    }

    async callChat(messages: ChatMessage[], options: ChatCompletionOptions = {}): Promise<ChatResult> {
        const openai = this.getClient();

        try {
            const response = await openai.chat.completions.create({
                model: this.config.geminiModel,
                messages: messages.map(toOpenAiMessage),
                temperature: options.temperature ?? 0.2,
                max_tokens: options.maxTokens,
            });

            const choice = response.choices[0];
            if (!choice) {
                throw new GenerationError('No completion choices returned');
            }

            return {
                messages: [...messages, { role: 'assistant', content: choice.message.content }],
            };
        } catch (error) {
            if (error instanceof GenerationError) throw error;
            if (error instanceof OpenAI.APIError) {
                throw new GenerationError(`Gemini API error: ${describeStatus(error)}`, error);
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new GenerationError(`LLM call failed: ${message}`, error);
        }
    }
}
