import { createLogger } from '../../core/logger.js';
import { StrategicPlanner } from '../collaborators/types.js';
import { MiningNode, ServiceStatus, transcript } from '../state.js';

export function generateRoadmapNode(planner: StrategicPlanner): MiningNode {
    return async (state) => {
        const log = createLogger('generate_roadmap');
        const sessionId = state.context.sessionId;
        const result = state.metaArchitectResult;
        if (!result) {
            throw new Error('No blueprint recorded; cannot generate a roadmap');
        }

        if (result.roadmap) {
            log.info('Roadmap already present; skipping planner', { sessionId });
            return { status: ServiceStatus.RUNNING };
        }

        const roadmap = await planner.generateRoadmap(result.blueprint, state.context);
        log.info('Roadmap generated', { sessionId, steps: roadmap.steps.length });

        return {
            metaArchitectResult: { ...result, roadmap },
            status: ServiceStatus.RUNNING,
            messages: [transcript(
                'generate_roadmap',
                `Roadmap generated with ${roadmap.steps.length} steps (estimated ${roadmap.estimatedDuration}).`
            )],
        };
    };
}
