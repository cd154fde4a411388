import OpenAI from 'openai';
import { ChatMessage, ChatCompletionOptions, ChatResponse, LlmError } from './llm.js';
import { MinerConfig } from './config.js';
import { LlmBackend } from './llm_backend.js';
import { errorMessage } from './logger.js';

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    const content = message.content ?? '';
    switch (message.role) {
        case 'system':
            return { role: 'system', content };
        case 'assistant':
            return { role: 'assistant', content };
        default:
            return { role: 'user', content };
    }
}

/**
 * OpenAI-compatible LLM backend.
 * Supports OpenAI API and compatible providers (OpenRouter, etc.)
 */
export class OpenAiLlmBackend implements LlmBackend {
    private client: OpenAI | null = null;

    private getClient(config: MinerConfig): OpenAI {
        if (!config.apiKey) {
            throw new LlmError('OpenAI API key is not configured.');
        }
        if (!this.client) {
            this.client = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseUrl,
                timeout: config.llmTimeoutMs,
                maxRetries: 3,
            });
        }
        return this.client;
    }

    async callChat(
        config: MinerConfig,
        messages: ChatMessage[],
        options: ChatCompletionOptions = {}
    ): Promise<ChatResponse> {
        const openai = this.getClient(config);

        try {
            const model = options.model || (options.useStrongModel ? config.modelStrong : config.modelFast);

            const response = await openai.chat.completions.create({
                model,
                messages: messages.map(toOpenAiMessage),
                temperature: options.temperature ?? 0,
                max_tokens: options.maxTokens,
                response_format: options.response_format,
            }, { signal: options.signal });

            const choice = response.choices[0];
            if (!choice) {
                throw new LlmError('No completion choices returned');
            }

            return {
                messages: [...messages, { role: 'assistant', content: choice.message.content }],
            };
        } catch (error) {
            if (error instanceof LlmError) {
                throw error;
            }
            if (error instanceof OpenAI.APIError) {
                throw new LlmError(`OpenAI API Error: ${error.message}`, error);
            }
            throw new LlmError(`LLM Call Failed: ${errorMessage(error)}`, error);
        }
    }
}
