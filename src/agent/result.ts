import {
    ClarificationRound,
    DemandState,
    FeedbackType,
    IntentAnalysis,
    MetaArchitectResult,
    MiningState,
    ResultSummary,
    ServiceStatus,
    SimpleStrategyResult,
    SmartAnalysis,
    TranscriptMessage,
    WorkflowError,
} from './state.js';
import { DEFAULT_DEMAND_STATE } from './utils/demand_fallback.js';

export interface ClarificationEntry {
    round: number;
    question: string;
    response: string;
}

export interface MiningResult {
    sessionId: string;
    taskId: string;
    originalInput: string;
    finalRequirements: string[];
    demandState: DemandState;
    smartAnalysis: SmartAnalysis | null;
    clarificationHistory: ClarificationEntry[];
    processingTimeMs: number;
    intentAnalysis: IntentAnalysis | null;
    simpleStrategyResult: SimpleStrategyResult | null;
    metaArchitectResult: MetaArchitectResult | null;
    messages: TranscriptMessage[];
    status: ServiceStatus;
    error: WorkflowError | null;
    /** What the caller must answer next; null unless the session is paused. */
    feedbackType: FeedbackType | null;
    summary: ResultSummary | null;
}

export function clarificationHistory(rounds: ClarificationRound[]): ClarificationEntry[] {
    return rounds.map((round) => ({
        round: round.round,
        question: round.questions.join('; '),
        response: round.responses.join('; '),
    }));
}

/**
 * The request as the user stated it, every answer they gave, and one line per
 * analysis result that downstream planning depends on.
 */
export function extractFinalRequirements(
    state: Pick<MiningState, 'originalInput' | 'userResponses' | 'intentAnalysis' | 'metaArchitectResult' | 'simpleStrategyResult'>
): string[] {
    const requirements = [state.originalInput, ...state.userResponses];

    const intent = state.intentAnalysis;
    if (intent) {
        if (intent.categories.length > 0) {
            requirements.push(`Intent categories: ${intent.categories.join(', ')}`);
        }
        requirements.push(`Complexity level: ${intent.complexity.level}`);
    }

    if (state.metaArchitectResult) {
        requirements.push(`Strategic analysis: ${state.metaArchitectResult.blueprint.problemAnalysis}`);
    } else if (state.simpleStrategyResult) {
        requirements.push(`Execution mode: ${state.simpleStrategyResult.executionStrategy.executionMode}`);
    }

    return requirements;
}

export function buildMiningResult(state: MiningState, processingTimeMs: number): MiningResult {
    const waiting = state.status === ServiceStatus.WAITING_FOR_USER_FEEDBACK;
    return {
        sessionId: state.context.sessionId,
        taskId: state.context.taskId,
        originalInput: state.originalInput,
        finalRequirements: state.summary?.finalRequirements ?? extractFinalRequirements(state),
        demandState: state.demandState ?? DEFAULT_DEMAND_STATE,
        smartAnalysis: state.smartAnalysis,
        clarificationHistory: clarificationHistory(state.clarificationRounds),
        processingTimeMs,
        intentAnalysis: state.intentAnalysis,
        simpleStrategyResult: state.simpleStrategyResult,
        metaArchitectResult: state.metaArchitectResult,
        messages: state.messages,
        status: state.status,
        error: state.error,
        feedbackType: waiting ? state.feedbackType : null,
        summary: state.summary,
    };
}
