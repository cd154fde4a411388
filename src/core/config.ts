import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import os from 'os';

// Load environment variables from .env file
dotenv.config();

export const MinerConfigSchema = z.object({
    rootDir: z.string().default(process.cwd()),
    /** Generic OpenAI-compatible API key. */
    apiKey: z.string().min(1, "API Key is required (OPENAI_API_KEY or MINER_API_KEY)").optional(),
    /** Base URL for the LLM provider (OpenAI, OpenRouter, custom gateway, etc.). */
    baseUrl: z.string().default("https://api.openai.com/v1"),
    /** Cheaper model used for demand classification and intent extraction. */
    modelFast: z.string().default("gpt-4.1-mini"),
    /** Stronger model used for blueprints and roadmaps. */
    modelStrong: z.string().default("gpt-4.1"),
    /** Per-request timeout for the chat backend. */
    llmTimeoutMs: z.number().int().positive().default(30000),
    /** If true, use deterministic mock responses for LLM calls */
    mockMode: z.boolean().default(false),

    /** Clarification rounds before the round limiter forces progress. */
    maxClarificationRounds: z.number().int().min(0).max(10).default(3),
    /** Where the file checkpoint store keeps one JSON snapshot per session. */
    checkpointDir: z.string().default('.miner/checkpoints'),
    /** Checkpoints older than this are treated as expired (0 = never expire). */
    checkpointTtlSeconds: z.number().int().min(0).default(0),
    /** Upper bound on node executions in a single graph invocation. */
    recursionLimit: z.number().int().min(10).default(50),
});

export type MinerConfig = z.infer<typeof MinerConfigSchema>;

function expandPath(p: string): string {
    if (p.startsWith('~/') || p === '~') {
        return path.join(os.homedir(), p.slice(1));
    }
    return p;
}

function parseIntEnv(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env = process.env, argv = process.argv): MinerConfig {
    const args = argv.slice(2);
    const rootDirIndex = args.indexOf('--root');
    const rootDirRaw = rootDirIndex !== -1 ? args[rootDirIndex + 1] : env.MINER_ROOT_DIR || process.cwd();
    const rootDir = path.resolve(expandPath(rootDirRaw));

    const mockMode = args.includes('--mock') || env.MINER_MOCK_MODE === 'true';

    const checkpointDirRaw = expandPath(env.MINER_CHECKPOINT_DIR || '.miner/checkpoints');

    const config = {
        rootDir,
        apiKey: env.CHAT_LLM_API_KEY || env.MINER_API_KEY || env.OPENAI_API_KEY || undefined,
        baseUrl: env.CHAT_LLM_BASE_URL || env.MINER_BASE_URL || env.OPENAI_BASE_URL || undefined,
        modelFast: env.CHAT_LLM_MODEL || env.MINER_MODEL_FAST || env.OPENAI_MODEL || undefined,
        modelStrong: env.CHAT_LLM_MODEL || env.MINER_MODEL_STRONG || env.OPENAI_MODEL || undefined,
        llmTimeoutMs: parseIntEnv(env.MINER_LLM_TIMEOUT_MS, 30000),
        mockMode,

        maxClarificationRounds: parseIntEnv(env.MINER_MAX_CLARIFICATION_ROUNDS, 3),
        checkpointDir: path.resolve(rootDir, checkpointDirRaw),
        checkpointTtlSeconds: parseIntEnv(env.MINER_CHECKPOINT_TTL_SECONDS, 0),
        recursionLimit: parseIntEnv(env.MINER_RECURSION_LIMIT, 50),
    };

    const parsed = MinerConfigSchema.parse(config);

    // Mock mode never reaches the network, so it does not need a key.
    if (!parsed.mockMode && !parsed.apiKey) {
        throw new Error(
            'API Key is required unless mock mode is enabled.\n' +
            'Set CHAT_LLM_API_KEY, MINER_API_KEY or OPENAI_API_KEY,\n' +
            'or run with MINER_MOCK_MODE=true / --mock'
        );
    }

    return parsed;
}
