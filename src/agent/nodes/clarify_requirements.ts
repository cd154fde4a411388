import { MinerConfig } from '../../core/config.js';
import { createLogger } from '../../core/logger.js';
import { DemandState, FeedbackType, MiningNode, transcript } from '../state.js';
import { defaultClarificationQuestions } from '../utils/request_heuristics.js';
import { applyRoundLimit, dedupeQuestions } from '../utils/round_limiter.js';

/**
 * Opens a clarification round, or forces the request forward once the
 * round limit is spent.
 */
export function clarifyRequirementsNode(cfg: MinerConfig): MiningNode {
    return async (state) => {
        const log = createLogger('clarify_requirements');
        const sessionId = state.context.sessionId;

        const decision = applyRoundLimit(state.context, cfg.maxClarificationRounds);
        if (decision.kind === 'forced') {
            log.warn('Round limit reached; forcing progression', { sessionId, round: decision.round });
            return {
                demandState: DemandState.SMART_COMPLIANT,
                forcedProgression: true,
                clarificationQuestions: [],
                messages: [transcript(
                    'clarify_requirements',
                    `Clarification limit of ${cfg.maxClarificationRounds} rounds reached; proceeding with the current requirements.`
                )],
            };
        }

        let questions = dedupeQuestions(state.clarificationQuestions);
        if (questions.length === 0) {
            questions = defaultClarificationQuestions(state.smartAnalysis?.criteriaAnalysis, state.context.domain);
        }

        log.info('Clarification round opened', { sessionId, round: decision.round, questions: questions.length });

        return {
            context: decision.context,
            clarificationQuestions: questions,
            clarificationRounds: [...state.clarificationRounds, { round: decision.round, questions, responses: [] }],
            feedbackType: FeedbackType.CLARIFICATION,
            messages: [transcript(
                'clarify_requirements',
                `To refine your request, please answer:\n${questions.map((q, i) => `${i + 1}. ${q}`).join('\n')}`
            )],
        };
    };
}
