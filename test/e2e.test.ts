import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createMiningService } from '../src/index.js';
import { resetLlmBackend } from '../src/core/llm.js';
import { setPrettyConsole } from '../src/core/logger.js';
import { testConfig } from './helpers/fixtures.js';

describe('offline mining sessions', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'miner-e2e-'));
        resetLlmBackend();
        setPrettyConsole(false);
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        setPrettyConsole(true);
        resetLlmBackend();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function service() {
        return createMiningService(testConfig({ mockMode: true, checkpointDir: tempDir }));
    }

    it('runs a focused request through the simple strategy', async () => {
        const request = 'Analyze Q2 2024 revenue growth for our SaaS product';
        const paused = await service().mineRequirements(request, { sessionId: 'e2e-simple' });

        expect(paused.demandState).toBe('SMART_COMPLIANT');
        expect(paused.smartAnalysis?.source).toBe('heuristic');
        expect(paused.feedbackType).toBe('SIMPLE_STRATEGY_CONFIRMATION');
        await expect(fs.access(path.join(tempDir, 'e2e-simple.json'))).resolves.toBeUndefined();

        // A fresh service instance only shares the checkpoint directory.
        const done = await service().resumeWorkflow('e2e-simple', { confirmation: true });
        expect(done.status).toBe('COMPLETED');
        expect(done.finalRequirements).toEqual([
            request,
            'Intent categories: analyze',
            'Complexity level: low',
            'Execution mode: sequential',
        ]);
        // Completion leaves the last pause snapshot in place.
        await expect(fs.access(path.join(tempDir, 'e2e-simple.json'))).resolves.toBeUndefined();
    });

    it('asks the default questions for a vague request', async () => {
        const paused = await service().mineRequirements('help me', { sessionId: 'e2e-vague' });

        expect(paused.feedbackType).toBe('CLARIFICATION');
        expect(paused.clarificationHistory).toEqual([{
            round: 1,
            question: [
                'Could you provide more specific details about what you want to achieve?',
                'What specific measurable metrics or outcomes would indicate success?',
                'What is your desired timeframe for this request?',
                'What is the context or purpose behind this request?',
            ].join('; '),
            response: '',
        }]);
    });

    it('plans, confirms and schedules a multi-stage request', async () => {
        const request = 'Collect sales data and analyze trends, then generate a report for the board';
        const paused = await service().mineRequirements(request, { sessionId: 'e2e-meta' });

        expect(paused.feedbackType).toBe('META_ARCHITECT_CONFIRMATION');
        expect(paused.metaArchitectResult?.blueprint.problemAnalysis).toBe('Mock problem analysis');

        const done = await service().resumeWorkflow('e2e-meta', { confirmation: true });
        expect(done.status).toBe('COMPLETED');
        expect(done.summary).toEqual({
            flowType: 'meta_architect',
            finalRequirements: [
                request,
                'Intent categories: collect, analyze, generate',
                'Complexity level: medium',
                'Strategic analysis: Mock problem analysis',
            ],
            confirmed: true,
            executionMode: null,
            roadmapSteps: 3,
        });
    });
});
