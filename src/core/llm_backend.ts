import { ChatMessage, ChatCompletionOptions, ChatResponse } from './llm.js';
import { MinerConfig } from './config.js';

/**
 * Abstract interface for LLM backends.
 * Allows pluggable providers (OpenAI-compatible gateways, offline mock).
 */
export interface LlmBackend {
    callChat(
        config: MinerConfig,
        messages: ChatMessage[],
        options: ChatCompletionOptions
    ): Promise<ChatResponse>;
}

/**
 * Factory function to create the appropriate LLM backend based on configuration.
 */
export async function createLlmBackend(config: MinerConfig): Promise<LlmBackend> {
    if (config.mockMode) {
        const { MockLlmBackend } = await import('./mock_backend.js');
        return new MockLlmBackend();
    }

    const { OpenAiLlmBackend } = await import('./openai_backend.js');
    return new OpenAiLlmBackend();
}
