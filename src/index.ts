import { MinerConfig } from './core/config.js';
import { FileCheckpointStore, MemoryCheckpointStore } from './agent/checkpoint.js';
import { LlmDemandClassifier } from './agent/collaborators/llm_demand_classifier.js';
import { LlmStrategicPlanner } from './agent/collaborators/llm_strategic_planner.js';
import { CheckpointStore } from './agent/collaborators/types.js';
import { MiningService } from './agent/mining_service.js';

export { loadConfig, MinerConfigSchema } from './core/config.js';
export type { MinerConfig } from './core/config.js';
export { createLogger, setPrettyConsole } from './core/logger.js';
export {
    MiningError,
    MiningValidationError,
    SessionNotFoundError,
    WorkflowExecutionError,
} from './core/errors.js';
export type { SessionLookupFailure } from './core/errors.js';
export { LlmError } from './core/llm.js';

export { MiningService } from './agent/mining_service.js';
export type { HealthReport, MiningContextInput, ServiceMetrics } from './agent/mining_service.js';
export { buildMiningGraph } from './agent/graph.js';
export { FileCheckpointStore, MemoryCheckpointStore, CheckpointSchema } from './agent/checkpoint.js';
export type { Checkpoint, CheckpointStoreOptions } from './agent/checkpoint.js';
export { classifyDemand } from './agent/collaborators/demand_classifier.js';
export { LlmDemandClassifier } from './agent/collaborators/llm_demand_classifier.js';
export { LlmStrategicPlanner } from './agent/collaborators/llm_strategic_planner.js';
export type { CheckpointStore, DemandClassifier, MiningDeps, StrategicPlanner } from './agent/collaborators/types.js';
export type { ClarificationEntry, MiningResult } from './agent/result.js';
export * from './agent/state.js';

export interface CreateMiningServiceOptions {
    /** Keep checkpoints in memory instead of under `cfg.checkpointDir`. */
    inMemory?: boolean;
    store?: CheckpointStore;
}

/** Wires the chat-backed collaborators and a checkpoint store from config. */
export function createMiningService(cfg: MinerConfig, options: CreateMiningServiceOptions = {}): MiningService {
    const storeOptions = { ttlSeconds: cfg.checkpointTtlSeconds };
    const store = options.store
        ?? (options.inMemory
            ? new MemoryCheckpointStore(storeOptions)
            : new FileCheckpointStore(cfg.checkpointDir, storeOptions));

    return new MiningService(cfg, {
        classifier: new LlmDemandClassifier(cfg),
        planner: new LlmStrategicPlanner(cfg),
        store,
    });
}
