import { createLogger } from '../../core/logger.js';
import { MiningNode, ServiceStatus, transcript } from '../state.js';
import { enrichWithAdjustments, enrichWithResponses } from '../utils/feedback_dispatcher.js';

/**
 * Folds clarification answers into the request and onto the round they
 * answer. The next stop is a fresh classification.
 */
export function processClarificationNode(): MiningNode {
    return async (state) => {
        const log = createLogger('process_clarification');
        const responses = state.userFeedback?.responses ?? [];
        const rounds = [...state.clarificationRounds];
        const round = Math.max(state.context.currentRound, 1);

        const last = rounds[rounds.length - 1];
        if (last) {
            rounds[rounds.length - 1] = { ...last, responses: [...last.responses, ...responses] };
        }

        log.info('Clarification received', { sessionId: state.context.sessionId, round, responses: responses.length });

        return {
            userInput: enrichWithResponses(state.userInput, responses, round),
            clarificationRounds: rounds,
            clarificationQuestions: [],
            feedbackType: null,
            status: ServiceStatus.RUNNING,
            messages: responses.length > 0
                ? [transcript('process_clarification', responses.join('\n'), 'user')]
                : [],
        };
    };
}

/** Applies requested changes to the input; the branch already chosen is kept. */
export function processAdjustmentNode(): MiningNode {
    return async (state) => {
        const log = createLogger('process_adjustment');
        const adjustments = state.userFeedback?.adjustments ?? '';

        log.info('Adjustments received', { sessionId: state.context.sessionId, hasAdjustments: adjustments.length > 0 });

        return {
            userInput: enrichWithAdjustments(state.userInput, adjustments),
            status: ServiceStatus.RUNNING,
            messages: adjustments ? [transcript('process_adjustment', adjustments, 'user')] : [],
        };
    };
}
