import { ChatMessage, ChatCompletionOptions, ChatResponse } from './llm.js';
import { LlmBackend } from './llm_backend.js';
import { MinerConfig } from './config.js';

const CATEGORY_KEYWORDS: Array<[string, RegExp]> = [
    ['collect', /\b(collect|gather|scrape|fetch)/],
    ['process', /\b(process|clean|transform|merge)/],
    ['analyze', /\b(analy[sz]e|compare|evaluate|assess)/],
    ['generate', /\b(generate|report|create|write|draft)/],
];

/**
 * Deterministic offline responses keyed on the role line of each prompt.
 * Used by `--mock` and MINER_MOCK_MODE so the workflow runs without a provider.
 */
export class MockLlmBackend implements LlmBackend {
    async callChat(
        _config: MinerConfig,
        messages: ChatMessage[],
        options: ChatCompletionOptions
    ): Promise<ChatResponse> {
        const systemMsg = messages.find(m => m.role === 'system')?.content ?? '';
        const lastMsg = messages[messages.length - 1]?.content ?? '';

        const assistantMessage: ChatMessage = {
            role: 'assistant',
            content: this.respond(systemMsg, lastMsg, options),
        };
        return { messages: [...messages, assistantMessage] };
    }

    private respond(systemMsg: string, request: string, options: ChatCompletionOptions): string {
        if (systemMsg.includes('You are the Demand Classifier')) {
            // No verdict: the adapter's fallback chain decides offline.
            return JSON.stringify({ reasoning: 'Mock classification', clarificationNeeded: [] });
        }

        if (systemMsg.includes('You are the Intent Extractor')) {
            const lower = request.toLowerCase();
            const categories = CATEGORY_KEYWORDS
                .filter(([, pattern]) => pattern.test(lower))
                .map(([category]) => category);
            return JSON.stringify({
                categories: categories.length > 0 ? categories : ['answer'],
                reasoning: 'Mock intent extraction',
                output: request.split('\n')[0],
            });
        }

        if (systemMsg.includes('You are the Strategic Planner')) {
            return JSON.stringify({
                problemAnalysis: 'Mock problem analysis',
                objectives: ['Establish a baseline', 'Identify the main drivers'],
                frameworks: ['SWOT Analysis'],
                phases: [
                    { name: 'Discovery', description: 'Collect the inputs' },
                    { name: 'Analysis', description: 'Work through the data' },
                ],
                risks: ['Incomplete source data'],
            });
        }

        if (systemMsg.includes('You are the Roadmap Generator')) {
            return JSON.stringify({
                steps: [
                    { order: 1, title: 'Gather inputs', description: 'Collect the source data', dependsOn: [] },
                    { order: 2, title: 'Analyze', description: 'Run the analysis', dependsOn: [1] },
                    { order: 3, title: 'Report', description: 'Write up the findings', dependsOn: [2] },
                ],
                estimatedDuration: '2 weeks',
            });
        }

        return options.response_format?.type === 'json_object' ? '{}' : 'Mock response';
    }
}
