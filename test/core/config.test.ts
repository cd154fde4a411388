import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../../src/core/config.js';

// Mock dotenv to prevent reloading env vars from .env file
vi.mock('dotenv', () => ({
    default: {
        config: vi.fn(),
    },
}));

const ARGV = ['node', 'miner'];

describe('Config', () => {
    it('should load config from env vars', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-key',
            OPENAI_MODEL: 'gpt-4.1-test',
            MINER_MAX_CLARIFICATION_ROUNDS: '5',
            MINER_CHECKPOINT_TTL_SECONDS: '600',
        }, ARGV);

        expect(config.apiKey).toBe('test-key');
        expect(config.modelFast).toBe('gpt-4.1-test');
        expect(config.modelStrong).toBe('gpt-4.1-test');
        expect(config.maxClarificationRounds).toBe(5);
        expect(config.checkpointTtlSeconds).toBe(600);
    });

    it('should use defaults when env vars are missing', () => {
        const config = loadConfig({ OPENAI_API_KEY: 'test-key' }, ARGV);

        expect(config.baseUrl).toBe('https://api.openai.com/v1');
        expect(config.modelFast).toBe('gpt-4.1-mini');
        expect(config.modelStrong).toBe('gpt-4.1');
        expect(config.mockMode).toBe(false);
        expect(config.maxClarificationRounds).toBe(3);
        expect(config.checkpointTtlSeconds).toBe(0);
        expect(config.recursionLimit).toBe(50);
        expect(config.checkpointDir).toBe(path.resolve(process.cwd(), '.miner/checkpoints'));
    });

    it('prefers the CHAT_LLM_* variables over the provider-specific ones', () => {
        const config = loadConfig({
            CHAT_LLM_API_KEY: 'chat-key',
            OPENAI_API_KEY: 'openai-key',
            CHAT_LLM_BASE_URL: 'http://localhost:4000/v1',
        }, ARGV);

        expect(config.apiKey).toBe('chat-key');
        expect(config.baseUrl).toBe('http://localhost:4000/v1');
    });

    it('should throw if required keys are missing', () => {
        expect(() => loadConfig({ OPENAI_API_KEY: '' }, ARGV)).toThrow(/API Key is required/i);
    });

    it('does not require a key in mock mode', () => {
        const fromFlag = loadConfig({}, [...ARGV, 'mine', '--mock']);
        expect(fromFlag.mockMode).toBe(true);
        expect(fromFlag.apiKey).toBeUndefined();

        const fromEnv = loadConfig({ MINER_MOCK_MODE: 'true' }, ARGV);
        expect(fromEnv.mockMode).toBe(true);
    });

    it('resolves the checkpoint directory against --root', () => {
        const config = loadConfig({}, [...ARGV, '--root', '/tmp/miner-root', '--mock']);

        expect(config.rootDir).toBe('/tmp/miner-root');
        expect(config.checkpointDir).toBe('/tmp/miner-root/.miner/checkpoints');
    });

    it('falls back on unparsable numbers and rejects out-of-range ones', () => {
        const fallback = loadConfig({ OPENAI_API_KEY: 'test-key', MINER_MAX_CLARIFICATION_ROUNDS: 'abc' }, ARGV);
        expect(fallback.maxClarificationRounds).toBe(3);

        expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', MINER_MAX_CLARIFICATION_ROUNDS: '11' }, ARGV)).toThrow();
    });
});
