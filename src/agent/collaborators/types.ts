import {
    Blueprint,
    Classification,
    IntentExtraction,
    MiningContext,
    MiningState,
    Roadmap,
} from '../state.js';

/**
 * Scores a request against SMART criteria and maps it onto task categories.
 * Any field of a classification may be missing; the adapter fills the gaps.
 */
export interface DemandClassifier {
    classify(text: string, context: MiningContext): Promise<Classification>;
    extractIntent(text: string, context: MiningContext): Promise<IntentExtraction>;
}

export interface StrategicPlanner {
    plan(problem: string, requirements: string[], context: MiningContext): Promise<Blueprint>;
    generateRoadmap(blueprint: Blueprint, context: MiningContext): Promise<Roadmap>;
}

/**
 * Durable snapshots keyed by session id, last write wins.
 * `load` resolves null for an unknown session and throws
 * `SessionNotFoundError` for a snapshot that cannot be used.
 */
export interface CheckpointStore {
    save(sessionId: string, state: MiningState): Promise<void>;
    load(sessionId: string): Promise<MiningState | null>;
    /** For external cleanup; the workflow never removes a session itself. */
    delete(sessionId: string): Promise<void>;
}

export interface MiningDeps {
    classifier: DemandClassifier;
    planner: StrategicPlanner;
    store: CheckpointStore;
}
