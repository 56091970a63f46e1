import { ChatCompletionOptions, ChatMessage, ChatResult } from './llm.js';
import { LlmBackend } from './llm_backend.js';

const MOCK_QUESTIONS = [
    'Who is the primary user affected by this change?',
    'What does "done" look like for this ticket?',
    'Are there any systems or teams this depends on?',
];

const MOCK_DECOMPOSITION = `# DECOMPOSITION PLAN

## NEW TICKETS
- [ ] Define the data model (2 points)
- [ ] Implement the service endpoint (3 points)
- [ ] Add integration tests (2 points)
`;

const MOCK_EPIC = `# EPIC: Mock epic from research
Deliver the approach recommended by the research.

## TASKS
- [ ] Build a prototype
- [ ] Harden the prototype for production
`;

/**
 * Handles mock responses for testing and development.
 * Picks a canned answer by looking at what the prompt asks for.
 */
export class MockLlmBackend implements LlmBackend {
    async callChat(messages: ChatMessage[], _options: ChatCompletionOptions = {}): Promise<ChatResult> {
        const prompt = messages.map(m => m.content ?? '').join('\n');

        let content: string;
        if (prompt.includes('JSON array of question strings')) {
            content = JSON.stringify(MOCK_QUESTIONS);
        } else if (prompt.includes('# DECOMPOSITION PLAN')) {
            content = MOCK_DECOMPOSITION;
        } else if (prompt.includes('# EPIC:')) {
            content = MOCK_EPIC;
        } else if (prompt.includes('story point estimate')) {
            content = '3\nMock estimate: moderate scope with clear requirements.';
        } else {
            content = 'Mock description generated from the answers above.';
        }

        return { messages: [...messages, { role: 'assistant', content }] };
    }
}
