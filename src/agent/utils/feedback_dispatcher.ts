import { FeedbackPayload, FeedbackType, FeedbackTypeSchema, MiningState, NodeName } from '../state.js';

export type FeedbackRoute = Extract<
    NodeName,
    'process_clarification' | 'process_adjustment' | 'package_results' | 'generate_roadmap'
>;

/** Narrows a payload type to a known FeedbackType; null for anything else. */
export function knownFeedbackType(value: string | null | undefined): FeedbackType | null {
    const parsed = FeedbackTypeSchema.safeParse(value?.trim().toUpperCase());
    return parsed.success ? parsed.data : null;
}

/** The payload's own type wins; the pending type from the checkpoint fills in. */
export function effectiveFeedbackType(state: Pick<MiningState, 'feedbackType' | 'userFeedback'>): string | null {
    return state.userFeedback?.type ?? state.feedbackType;
}

/**
 * A known payload type naming a different decision than the one the session
 * waits on. Unknown types are not a conflict: they go to packaging.
 */
export function conflictingFeedbackType(
    pending: FeedbackType | null,
    payload: Pick<FeedbackPayload, 'type'>
): FeedbackType | null {
    const requested = knownFeedbackType(payload.type);
    if (!requested || !pending || requested === pending) return null;
    return requested;
}

/**
 * Picks the node a resumed session re-enters through.
 * Anything unrecognized goes to packaging.
 */
export function dispatchFeedback(state: Pick<MiningState, 'feedbackType' | 'userFeedback'>): FeedbackRoute {
    const confirmed = state.userFeedback?.confirmation ?? false;

    switch (knownFeedbackType(effectiveFeedbackType(state))) {
        case FeedbackType.CLARIFICATION:
            return 'process_clarification';
        case FeedbackType.SIMPLE_STRATEGY_CONFIRMATION:
            return confirmed ? 'package_results' : 'process_adjustment';
        case FeedbackType.META_ARCHITECT_CONFIRMATION:
            return confirmed ? 'generate_roadmap' : 'process_adjustment';
        default:
            return 'package_results';
    }
}

/** Where `process_adjustment` hands over: the branch that was already chosen. */
export function adjustmentTarget(feedbackType: string | null): 'intent_analysis' | 'meta_architect_flow' {
    return knownFeedbackType(feedbackType) === FeedbackType.META_ARCHITECT_CONFIRMATION ? 'meta_architect_flow' : 'intent_analysis';
}

export function enrichWithResponses(userInput: string, responses: string[], round: number): string {
    const lines = responses.map((response) => response.trim()).filter(Boolean);
    if (lines.length === 0) return userInput;
    return `${userInput}\n\nAdditional details (round ${round}):\n${lines.map((line) => `- ${line}`).join('\n')}`;
}

export function enrichWithAdjustments(userInput: string, adjustments: string): string {
    const trimmed = adjustments.trim();
    if (!trimmed) return userInput;
    return `${userInput}\n\nRequested adjustments: ${trimmed}`;
}

export function normalizeFeedback(payload: FeedbackPayload): FeedbackPayload {
    return {
        ...payload,
        type: payload.type?.trim() || undefined,
        responses: payload.responses.map((response) => response.trim()).filter(Boolean),
        adjustments: payload.adjustments.trim(),
    };
}
