import { MinerConfig } from '../../core/config.js';
import { ChatFn, LlmError, callChat, lastAssistantContent } from '../../core/llm.js';
import { loadPrompt, renderPrompt } from '../../core/prompts.js';
import {
    Classification,
    ClassificationSchema,
    IntentExtraction,
    IntentExtractionSchema,
    MiningContext,
} from '../state.js';
import { parseLlmJsonAs } from '../utils/llm_json.js';
import { DemandClassifier } from './types.js';

/** Demand classifier backed by the fast chat model. */
export class LlmDemandClassifier implements DemandClassifier {
    constructor(
        private readonly cfg: MinerConfig,
        private readonly chatFn: ChatFn = callChat
    ) {}

    async classify(text: string, context: MiningContext): Promise<Classification> {
        const template = await loadPrompt('demand_classifier');
        const systemPrompt = renderPrompt(template, {
            USER_INPUT: text,
            DOMAIN: context.domain,
            ROUND: context.currentRound,
        });

        const response = await this.chatFn(this.cfg, [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: text },
        ], {
            model: this.cfg.modelFast,
            temperature: 0,
            response_format: { type: 'json_object' },
        });

        const parsed = parseLlmJsonAs(lastAssistantContent(response), ClassificationSchema);
        if (!parsed.ok) {
            throw new LlmError(`Demand classifier returned unusable output (${parsed.error.kind}): ${parsed.error.message}`);
        }
        return parsed.value;
    }

    async extractIntent(text: string, context: MiningContext): Promise<IntentExtraction> {
        const template = await loadPrompt('intent_extractor');
        const systemPrompt = renderPrompt(template, {
            USER_INPUT: text,
            DOMAIN: context.domain,
        });

        const response = await this.chatFn(this.cfg, [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: text },
        ], {
            model: this.cfg.modelFast,
            temperature: 0,
            response_format: { type: 'json_object' },
        });

        const parsed = parseLlmJsonAs(lastAssistantContent(response), IntentExtractionSchema);
        if (!parsed.ok) {
            throw new LlmError(`Intent extractor returned unusable output (${parsed.error.kind}): ${parsed.error.message}`);
        }
        return parsed.value;
    }
}
