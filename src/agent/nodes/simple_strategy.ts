import { createLogger } from '../../core/logger.js';
import { FeedbackType, MiningNode, SimpleStrategyResult, transcript } from '../state.js';
import { classifyQuestionType, suggestExecutionStrategy } from '../utils/request_heuristics.js';

/** Direct execution plan for requests that need no blueprint. No model call. */
export function simpleStrategyNode(): MiningNode {
    return async (state) => {
        const log = createLogger('simple_strategy_flow');
        const intent = state.intentAnalysis;
        if (!intent) {
            throw new Error('Intent analysis is missing; cannot propose a strategy');
        }

        const result: SimpleStrategyResult = {
            questionType: classifyQuestionType(state.userInput),
            executionStrategy: suggestExecutionStrategy(intent.categories, intent.complexity.level),
            categories: intent.categories,
            complexityLevel: intent.complexity.level,
        };

        const { executionMode, agentRequirements } = result.executionStrategy;
        log.info('Simple strategy proposed', { sessionId: state.context.sessionId, executionMode });

        const agents = agentRequirements.length > 0 ? agentRequirements.join(', ') : 'a single agent';
        return {
            simpleStrategyResult: result,
            metaArchitectResult: null,
            feedbackType: FeedbackType.SIMPLE_STRATEGY_CONFIRMATION,
            messages: [transcript(
                'simple_strategy_flow',
                `Proposed ${executionMode} execution using ${agents}. Confirm to proceed or send adjustments.`
            )],
        };
    };
}
