import { createLogger } from '../../core/logger.js';
import { DemandClassifier } from '../collaborators/types.js';
import { IntentAnalysis, MiningNode, ServiceStatus, transcript } from '../state.js';
import { assessRequestComplexity, isComplexRequest, normalizeCategories } from '../utils/request_heuristics.js';

export function intentAnalysisNode(classifier: DemandClassifier): MiningNode {
    return async (state) => {
        const log = createLogger('intent_analysis');

        const extraction = await classifier.extractIntent(state.userInput, state.context);
        const categories = normalizeCategories(extraction.categories);
        const complexity = assessRequestComplexity(state.userInput, categories);

        const intentAnalysis: IntentAnalysis = {
            categories,
            complexity,
            reasoning: extraction.reasoning,
            output: extraction.output,
        };
        const route = isComplexRequest(intentAnalysis) ? 'meta_architect_flow' : 'simple_strategy_flow';

        log.info('Intent routed', {
            sessionId: state.context.sessionId,
            route,
            complexity: complexity.level,
            categories,
        });

        return {
            intentAnalysis,
            status: ServiceStatus.RUNNING,
            messages: [transcript(
                'intent_analysis',
                `Identified ${categories.length > 0 ? categories.join(', ') : 'no'} task categories at ${complexity.level} complexity.`
            )],
        };
    };
}
