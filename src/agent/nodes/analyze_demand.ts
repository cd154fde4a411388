import { createLogger } from '../../core/logger.js';
import { classifyDemand } from '../collaborators/demand_classifier.js';
import { DemandClassifier } from '../collaborators/types.js';
import { MiningNode, ServiceStatus, transcript } from '../state.js';

export function analyzeDemandNode(classifier: DemandClassifier): MiningNode {
    return async (state) => {
        const log = createLogger('analyze_demand');
        log.debug('Node started', { sessionId: state.context.sessionId, node: 'analyze_demand' });

        const { demandState, analysis } = await classifyDemand(classifier, state.userInput, state.context, log);

        return {
            demandState,
            smartAnalysis: analysis,
            clarificationQuestions: analysis.clarificationNeeded,
            forcedProgression: false,
            feedbackType: null,
            status: ServiceStatus.RUNNING,
            messages: [transcript('analyze_demand', `Request classified as ${demandState} (${analysis.source}).`)],
        };
    };
}
