import { MinerConfig, MinerConfigSchema } from '../../src/core/config.js';
import { createInitialState, MiningContext, MiningState } from '../../src/agent/state.js';

export function testConfig(overrides: Partial<MinerConfig> = {}): MinerConfig {
    return MinerConfigSchema.parse({
        rootDir: '/tmp/miner-test',
        apiKey: 'test-secret',
        checkpointDir: '/tmp/miner-test/.miner/checkpoints',
        mockMode: true,
        ...overrides,
    });
}

export function testContext(overrides: Partial<MiningContext> = {}): MiningContext {
    return {
        sessionId: 'session-1',
        taskId: 'task_session-',
        domain: 'general',
        userId: 'tester',
        timestamp: '2026-01-01T00:00:00.000Z',
        currentRound: 0,
        ...overrides,
    };
}

export function testState(input = 'Analyze Q2 2024 revenue growth for our SaaS product', overrides: Partial<MiningState> = {}): MiningState {
    return { ...createInitialState(input, testContext()), ...overrides };
}
