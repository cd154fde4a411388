import { createLogger } from '../../core/logger.js';
import { StrategicPlanner } from '../collaborators/types.js';
import { FeedbackType, MetaArchitectResult, MiningNode, transcript } from '../state.js';
import {
    extractAnalysisFocus,
    extractEntitiesAndKeywords,
    extractFrameworkHints,
} from '../utils/request_heuristics.js';

/**
 * Blueprint path for broad, multi-stage requests. Re-running it after an
 * adjustment replaces the blueprint and drops any roadmap built on the old one.
 */
export function metaArchitectNode(planner: StrategicPlanner): MiningNode {
    return async (state) => {
        const log = createLogger('meta_architect_flow');
        const intent = state.intentAnalysis;
        if (!intent) {
            throw new Error('Intent analysis is missing; cannot plan');
        }

        const entitiesKeywords = extractEntitiesAndKeywords(state.userInput);
        const analysisFocus = extractAnalysisFocus(intent.categories, intent.complexity.level);
        const frameworkHints = extractFrameworkHints(entitiesKeywords, intent.categories);

        const requirements = [...state.userResponses];
        if (intent.categories.length > 0) requirements.push(`Task categories: ${intent.categories.join(', ')}`);
        if (analysisFocus.length > 0) requirements.push(`Analysis focus: ${analysisFocus.join(', ')}`);
        if (frameworkHints.length > 0) requirements.push(`Framework hints: ${frameworkHints.join(', ')}`);

        const blueprint = await planner.plan(state.userInput, requirements, state.context);

        const result: MetaArchitectResult = {
            blueprint,
            roadmap: null,
            entitiesKeywords,
            analysisFocus,
            frameworkHints,
        };

        log.info('Blueprint drafted', {
            sessionId: state.context.sessionId,
            phases: blueprint.phases.length,
            frameworks: blueprint.frameworks.length,
        });

        return {
            metaArchitectResult: result,
            simpleStrategyResult: null,
            feedbackType: FeedbackType.META_ARCHITECT_CONFIRMATION,
            messages: [transcript(
                'meta_architect_flow',
                `Blueprint ready: ${blueprint.problemAnalysis}\nConfirm to generate the roadmap or send adjustments.`
            )],
        };
    };
}
