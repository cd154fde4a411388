import { MinerConfig } from '../../core/config.js';
import { ChatFn, LlmError, callChat, lastAssistantContent } from '../../core/llm.js';
import { loadPrompt, renderPrompt } from '../../core/prompts.js';
import { Blueprint, BlueprintSchema, MiningContext, Roadmap, RoadmapSchema } from '../state.js';
import { parseLlmJsonAs } from '../utils/llm_json.js';
import { StrategicPlanner } from './types.js';

/** Blueprint and roadmap generation on the strong chat model. */
export class LlmStrategicPlanner implements StrategicPlanner {
    constructor(
        private readonly cfg: MinerConfig,
        private readonly chatFn: ChatFn = callChat
    ) {}

    async plan(problem: string, requirements: string[], context: MiningContext): Promise<Blueprint> {
        const template = await loadPrompt('strategic_planner');
        const systemPrompt = renderPrompt(template, {
            PROBLEM: problem,
            REQUIREMENTS: requirements.length > 0 ? requirements.map((r) => `- ${r}`).join('\n') : '(none recorded)',
            DOMAIN: context.domain,
        });

        const response = await this.chatFn(this.cfg, [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: problem },
        ], {
            useStrongModel: true,
            temperature: 0.2,
            response_format: { type: 'json_object' },
        });

        const parsed = parseLlmJsonAs(lastAssistantContent(response), BlueprintSchema);
        if (!parsed.ok) {
            throw new LlmError(`Strategic planner returned unusable blueprint (${parsed.error.kind}): ${parsed.error.message}`);
        }
        return parsed.value;
    }

    async generateRoadmap(blueprint: Blueprint, context: MiningContext): Promise<Roadmap> {
        const template = await loadPrompt('roadmap_generator');
        const systemPrompt = renderPrompt(template, {
            BLUEPRINT: blueprint,
            DOMAIN: context.domain,
        });

        const response = await this.chatFn(this.cfg, [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: blueprint.problemAnalysis },
        ], {
            useStrongModel: true,
            temperature: 0.2,
            response_format: { type: 'json_object' },
        });

        const parsed = parseLlmJsonAs(lastAssistantContent(response), RoadmapSchema);
        if (!parsed.ok) {
            throw new LlmError(`Strategic planner returned unusable roadmap (${parsed.error.kind}): ${parsed.error.message}`);
        }
        return parsed.value;
    }
}
