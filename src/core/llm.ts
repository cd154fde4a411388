import { MinerConfig } from './config.js';
import { LlmBackend, createLlmBackend } from './llm_backend.js';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string | null;
}

export interface ChatCompletionOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
    response_format?: { type: 'json_object' | 'text' };
    /** If true, use the strong model (modelStrong) instead of default (modelFast) */
    useStrongModel?: boolean;
}

export interface ChatResponse {
    messages: ChatMessage[];
}

export type ChatFn = (
    config: MinerConfig,
    messages: ChatMessage[],
    options?: ChatCompletionOptions
) => Promise<ChatResponse>;

export class LlmError extends Error {
    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'LlmError';
    }
}

// Singleton backend instance (created lazily)
let _backend: LlmBackend | null = null;

/**
 * Main entry point for LLM chat completions.
 * Automatically selects the appropriate backend based on configuration.
 */
export async function callChat(
    config: MinerConfig,
    messages: ChatMessage[],
    options: ChatCompletionOptions = {}
): Promise<ChatResponse> {
    // Create backend on first use
    if (!_backend) {
        _backend = await createLlmBackend(config);
    }

    // Delegate to the selected backend
    return _backend.callChat(config, messages, options);
}

export function resetLlmBackend() {
    _backend = null;
}

/** Content of the last assistant message, or '' when the backend returned none. */
export function lastAssistantContent(response: ChatResponse): string {
    for (let i = response.messages.length - 1; i >= 0; i--) {
        const message = response.messages[i];
        if (message.role === 'assistant') {
            return message.content ?? '';
        }
    }
    return '';
}
