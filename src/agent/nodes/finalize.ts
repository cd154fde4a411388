import { createLogger } from '../../core/logger.js';
import { MiningNode, ResultSummary, ServiceStatus, transcript } from '../state.js';
import { extractFinalRequirements } from '../result.js';
import { DEFAULT_DEMAND_STATE } from '../utils/demand_fallback.js';

export const COMPLETION_MESSAGE = 'Mining process completed successfully. Analysis is ready for workflow planning.';

export function packageResultsNode(): MiningNode {
    return async (state) => {
        const log = createLogger('package_results');

        const summary: ResultSummary = {
            flowType: state.metaArchitectResult ? 'meta_architect' : 'simple_strategy',
            finalRequirements: extractFinalRequirements(state),
            confirmed: state.userFeedback?.confirmation ?? false,
            executionMode: state.simpleStrategyResult?.executionStrategy.executionMode ?? null,
            roadmapSteps: state.metaArchitectResult?.roadmap?.steps.length ?? 0,
        };

        log.info('Results packaged', {
            sessionId: state.context.sessionId,
            flowType: summary.flowType,
            requirements: summary.finalRequirements.length,
        });

        return { summary, status: ServiceStatus.RUNNING };
    };
}

export function finalizeResultNode(): MiningNode {
    return async (state) => {
        const log = createLogger('finalize_result');
        const demandState = state.demandState ?? DEFAULT_DEMAND_STATE;

        log.info('Mining result finalized', { sessionId: state.context.sessionId, demandState });

        return {
            demandState,
            feedbackType: null,
            status: ServiceStatus.COMPLETED,
            messages: [transcript('finalize_result', COMPLETION_MESSAGE)],
        };
    };
}

/** Terminal for any node failure. The error itself is already in state. */
export function handleErrorNode(): MiningNode {
    return async (state) => {
        const log = createLogger('handle_error');
        const node = state.error?.node ?? 'unknown';
        const message = state.error?.message ?? 'Unknown error';

        log.error('Mining workflow failed', { sessionId: state.context.sessionId, node, error: message });

        return {
            status: ServiceStatus.ERROR,
            messages: [transcript('handle_error', `Workflow failed at ${node}: ${message}`, 'system')],
        };
    };
}
