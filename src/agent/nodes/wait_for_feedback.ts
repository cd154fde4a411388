import { createLogger } from '../../core/logger.js';
import { CheckpointStore } from '../collaborators/types.js';
import { FeedbackType, MiningNode, MiningState, ServiceStatus, transcript } from '../state.js';

const PROMPTS: Record<FeedbackType, string> = {
    CLARIFICATION: 'Awaiting answers to the clarification questions.',
    SIMPLE_STRATEGY_CONFIRMATION: 'Awaiting confirmation of the proposed execution strategy.',
    META_ARCHITECT_CONFIRMATION: 'Awaiting confirmation of the strategic blueprint.',
};

/**
 * Pause point. Writes the snapshot a later resume starts from, then ends
 * the invocation.
 */
export function waitForFeedbackNode(store: CheckpointStore): MiningNode {
    return async (state) => {
        const log = createLogger('wait_for_user_feedback');
        const { feedbackType } = state;
        if (!feedbackType) {
            throw new Error('Paused without a pending feedback type');
        }

        const message = transcript('wait_for_user_feedback', PROMPTS[feedbackType], 'system');
        const snapshot: MiningState = {
            ...state,
            status: ServiceStatus.WAITING_FOR_USER_FEEDBACK,
            messages: [...state.messages, message],
        };
        await store.save(state.context.sessionId, snapshot);

        log.info('Workflow paused for feedback', { sessionId: state.context.sessionId, feedbackType });

        return {
            status: ServiceStatus.WAITING_FOR_USER_FEEDBACK,
            messages: [message],
        };
    };
}
