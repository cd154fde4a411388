import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { classifyDemand, sanitizeClassification } from '../../../src/agent/collaborators/demand_classifier.js';
import { LlmDemandClassifier } from '../../../src/agent/collaborators/llm_demand_classifier.js';
import { DemandClassifier } from '../../../src/agent/collaborators/types.js';
import { Classification } from '../../../src/agent/state.js';
import { ChatFn, LlmError } from '../../../src/core/llm.js';
import { createLogger, setPrettyConsole } from '../../../src/core/logger.js';
import { testConfig, testContext } from '../../helpers/fixtures.js';

function classifierReturning(result: Partial<Classification> | Error): DemandClassifier {
    return {
        classify: async () => {
            if (result instanceof Error) throw result;
            return { clarificationNeeded: [], reasoning: '', ...result };
        },
        extractIntent: async () => ({ categories: [], reasoning: '', output: '' }),
    };
}

function chatReplying(content: string) {
    return vi.fn<ChatFn>(async (_cfg, messages) => ({
        messages: [...messages, { role: 'assistant', content }],
    }));
}

describe('classifyDemand', () => {
    const log = createLogger('demand_classifier_test');
    const context = testContext();

    beforeEach(() => {
        setPrettyConsole(false);
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
        setPrettyConsole(true);
    });

    it('takes a valid classifier verdict as is', async () => {
        const { demandState, analysis } = await classifyDemand(
            classifierReturning({ demandState: 'smart_compliant', reasoning: 'clear ask', confidence: 0.9 }),
            'anything at all',
            context,
            log
        );
        expect(demandState).toBe('SMART_COMPLIANT');
        expect(analysis).toEqual({
            demandState: 'SMART_COMPLIANT',
            clarificationNeeded: [],
            reasoning: 'clear ask',
            confidence: 0.9,
            source: 'classifier',
        });
    });

    it('reads criteria when the verdict is unknown', async () => {
        const { demandState, analysis } = await classifyDemand(
            classifierReturning({
                demandState: 'MOSTLY_FINE',
                criteriaAnalysis: { specific: true, measurable: false, achievable: true, relevant: false, timeBound: false },
                clarificationNeeded: ['What is the goal?'],
            }),
            'Analyze Q2 2024 revenue growth for our SaaS product',
            context,
            log
        );
        expect(demandState).toBe('VAGUE_UNCLEAR');
        expect(analysis.source).toBe('analysis');
        expect(analysis.clarificationNeeded).toEqual(['What is the goal?']);
    });

    it('falls back to heuristics when the classifier throws', async () => {
        const { demandState, analysis } = await classifyDemand(
            classifierReturning(new Error('rate limited')),
            'help me',
            context,
            log
        );
        expect(demandState).toBe('VAGUE_UNCLEAR');
        expect(analysis).toEqual({
            demandState: 'VAGUE_UNCLEAR',
            clarificationNeeded: [],
            reasoning: '',
            source: 'heuristic',
            classifierError: 'rate limited',
        });
    });

    it('uses the default when nothing else decides', async () => {
        const { demandState, analysis } = await classifyDemand(classifierReturning({}), '   ', context, log);
        expect(demandState).toBe('SMART_LARGE_SCOPE');
        expect(analysis.source).toBe('default');
    });
});

describe('sanitizeClassification', () => {
    it('clamps confidence into the unit range', () => {
        const base = { clarificationNeeded: [], reasoning: '' };
        expect(sanitizeClassification({ ...base, confidence: 1.5 }).confidence).toBe(1);
        expect(sanitizeClassification({ ...base, confidence: -0.2 }).confidence).toBe(0);
        expect(sanitizeClassification({ ...base, confidence: 0.4 }).confidence).toBe(0.4);
    });

    it('drops a confidence that is not a finite number', () => {
        expect(sanitizeClassification({ clarificationNeeded: [], reasoning: '', confidence: Number.NaN })).toEqual({
            clarificationNeeded: [],
            reasoning: '',
        });
    });
});

describe('LlmDemandClassifier', () => {
    const cfg = testConfig({ modelFast: 'fast-model' });

    it('sends the rendered prompt and parses the reply', async () => {
        const chat = chatReplying('```json\n{"demandState":"VAGUE_UNCLEAR","clarificationNeeded":["Which period?"],"reasoning":"no period"}\n```');
        const classifier = new LlmDemandClassifier(cfg, chat);

        const result = await classifier.classify('Show revenue', testContext({ domain: 'finance', currentRound: 2 }));

        expect(result).toEqual({
            demandState: 'VAGUE_UNCLEAR',
            clarificationNeeded: ['Which period?'],
            reasoning: 'no period',
        });
        const [calledCfg, messages, options] = chat.mock.calls[0];
        expect(calledCfg).toBe(cfg);
        expect(messages[0].role).toBe('system');
        expect(messages[0].content).toContain('You are the Demand Classifier');
        expect(messages[0].content).toContain('- Domain: finance');
        expect(messages[0].content).toContain('- Clarification rounds so far: 2');
        expect(messages[1]).toEqual({ role: 'user', content: 'Show revenue' });
        expect(options).toEqual({ model: 'fast-model', temperature: 0, response_format: { type: 'json_object' } });
    });

    it('extracts intent', async () => {
        const chat = chatReplying('{"categories":["collect","analyze"],"reasoning":"two stages","output":"Pull and study data"}');
        const classifier = new LlmDemandClassifier(cfg, chat);

        await expect(classifier.extractIntent('Pull and study data', testContext())).resolves.toEqual({
            categories: ['collect', 'analyze'],
            reasoning: 'two stages',
            output: 'Pull and study data',
        });
        expect(chat.mock.calls[0][1][0].content).toContain('You are the Intent Extractor');
    });

    it('rejects replies that are not JSON', async () => {
        const classifier = new LlmDemandClassifier(cfg, chatReplying('I cannot help with that.'));
        await expect(classifier.classify('Show revenue', testContext())).rejects.toBeInstanceOf(LlmError);
    });
});
