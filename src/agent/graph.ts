import { StateGraph, END, START } from '@langchain/langgraph';

import { MinerConfig } from '../core/config.js';
import { createLogger, errorMessage } from '../core/logger.js';
import { MiningDeps } from './collaborators/types.js';
import { DemandState, MiningNode, MiningState, MiningStateAnnotation, NodeName, ServiceStatus } from './state.js';
import { adjustmentTarget, dispatchFeedback, effectiveFeedbackType, FeedbackRoute } from './utils/feedback_dispatcher.js';
import { isComplexRequest } from './utils/request_heuristics.js';
import { analyzeDemandNode } from './nodes/analyze_demand.js';
import { clarifyRequirementsNode } from './nodes/clarify_requirements.js';
import { intentAnalysisNode } from './nodes/intent_analysis.js';
import { simpleStrategyNode } from './nodes/simple_strategy.js';
import { metaArchitectNode } from './nodes/meta_architect.js';
import { generateRoadmapNode } from './nodes/generate_roadmap.js';
import { waitForFeedbackNode } from './nodes/wait_for_feedback.js';
import { processAdjustmentNode, processClarificationNode } from './nodes/process_feedback.js';
import { finalizeResultNode, handleErrorNode, packageResultsNode } from './nodes/finalize.js';

const HANDLE_ERROR = 'handle_error';

/**
 * Wraps a node so a throw becomes a recorded error instead of aborting the
 * invocation. Every outgoing edge checks for it first.
 */
export function guard(node: NodeName, handler: MiningNode): MiningNode {
    return async (state) => {
        try {
            return await handler(state);
        } catch (error) {
            const message = errorMessage(error);
            createLogger(node).error('Node failed', { sessionId: state.context.sessionId, node, error: message });
            return {
                error: { node, message, at: new Date().toISOString() },
                status: ServiceStatus.ERROR,
            };
        }
    };
}

function failed(state: MiningState): boolean {
    return state.error !== null;
}

export function routeEntry(state: MiningState): 'analyze_demand' | FeedbackRoute {
    if (state.status === ServiceStatus.PROCESSING_FEEDBACK) {
        return dispatchFeedback(state);
    }
    return 'analyze_demand';
}

export function routeAfterAnalysis(state: MiningState): 'handle_error' | 'intent_analysis' | 'clarify_requirements' {
    if (failed(state)) return HANDLE_ERROR;
    return state.demandState === DemandState.SMART_COMPLIANT ? 'intent_analysis' : 'clarify_requirements';
}

export function routeAfterClarify(state: MiningState): 'handle_error' | 'intent_analysis' | 'wait_for_user_feedback' {
    if (failed(state)) return HANDLE_ERROR;
    return state.forcedProgression ? 'intent_analysis' : 'wait_for_user_feedback';
}

export function routeAfterIntent(state: MiningState): 'handle_error' | 'meta_architect_flow' | 'simple_strategy_flow' {
    if (failed(state)) return HANDLE_ERROR;
    if (state.intentAnalysis && isComplexRequest(state.intentAnalysis)) {
        return 'meta_architect_flow';
    }
    return 'simple_strategy_flow';
}

export function routeAfterAdjustment(state: MiningState): 'handle_error' | 'intent_analysis' | 'meta_architect_flow' {
    if (failed(state)) return HANDLE_ERROR;
    return adjustmentTarget(effectiveFeedbackType(state));
}

/** Single-successor edge that still diverts to the error terminal. */
function then<T extends NodeName>(next: T) {
    return (state: MiningState): 'handle_error' | T => (failed(state) ? HANDLE_ERROR : next);
}

function endUnlessFailed(state: MiningState): 'handle_error' | typeof END {
    return failed(state) ? HANDLE_ERROR : END;
}

export function buildMiningGraph(cfg: MinerConfig, deps: MiningDeps) {
    const graph = new StateGraph(MiningStateAnnotation)
        .addNode('analyze_demand', guard('analyze_demand', analyzeDemandNode(deps.classifier)))
        .addNode('clarify_requirements', guard('clarify_requirements', clarifyRequirementsNode(cfg)))
        .addNode('intent_analysis', guard('intent_analysis', intentAnalysisNode(deps.classifier)))
        .addNode('simple_strategy_flow', guard('simple_strategy_flow', simpleStrategyNode()))
        .addNode('meta_architect_flow', guard('meta_architect_flow', metaArchitectNode(deps.planner)))
        .addNode('generate_roadmap', guard('generate_roadmap', generateRoadmapNode(deps.planner)))
        .addNode('wait_for_user_feedback', guard('wait_for_user_feedback', waitForFeedbackNode(deps.store)))
        .addNode('process_clarification', guard('process_clarification', processClarificationNode()))
        .addNode('process_adjustment', guard('process_adjustment', processAdjustmentNode()))
        .addNode('package_results', guard('package_results', packageResultsNode()))
        .addNode('finalize_result', guard('finalize_result', finalizeResultNode()))
        .addNode('handle_error', handleErrorNode());

    // Fresh runs classify; resumed runs go through the dispatcher.
    graph.addConditionalEdges(START, routeEntry, [
        'analyze_demand',
        'process_clarification',
        'process_adjustment',
        'package_results',
        'generate_roadmap',
    ]);

    graph.addConditionalEdges('analyze_demand', routeAfterAnalysis, [
        'intent_analysis',
        'clarify_requirements',
        'handle_error',
    ]);
    graph.addConditionalEdges('clarify_requirements', routeAfterClarify, [
        'intent_analysis',
        'wait_for_user_feedback',
        'handle_error',
    ]);
    graph.addConditionalEdges('intent_analysis', routeAfterIntent, [
        'meta_architect_flow',
        'simple_strategy_flow',
        'handle_error',
    ]);
    graph.addConditionalEdges('simple_strategy_flow', then('wait_for_user_feedback'), ['wait_for_user_feedback', 'handle_error']);
    graph.addConditionalEdges('meta_architect_flow', then('wait_for_user_feedback'), ['wait_for_user_feedback', 'handle_error']);

    // The pause point ends the invocation; resume starts over from START.
    graph.addConditionalEdges('wait_for_user_feedback', endUnlessFailed, ['handle_error', END]);

    graph.addConditionalEdges('process_clarification', then('analyze_demand'), ['analyze_demand', 'handle_error']);
    graph.addConditionalEdges('process_adjustment', routeAfterAdjustment, [
        'intent_analysis',
        'meta_architect_flow',
        'handle_error',
    ]);

    graph.addConditionalEdges('generate_roadmap', then('package_results'), ['package_results', 'handle_error']);
    graph.addConditionalEdges('package_results', then('finalize_result'), ['finalize_result', 'handle_error']);
    graph.addConditionalEdges('finalize_result', endUnlessFailed, ['handle_error', END]);

    graph.addEdge('handle_error', END);

    return graph.compile();
}

export type MiningGraph = ReturnType<typeof buildMiningGraph>;
