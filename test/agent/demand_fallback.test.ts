import { describe, it, expect } from 'vitest';
import {
    countWords,
    DEFAULT_DEMAND_STATE,
    heuristicDemandState,
    inferFromAnalysis,
    normalizeDemandState,
} from '../../src/agent/utils/demand_fallback.js';
import { Classification } from '../../src/agent/state.js';

function analysis(overrides: Partial<Classification> = {}): Classification {
    return { clarificationNeeded: [], reasoning: '', ...overrides };
}

const FOUR_MET = { specific: true, measurable: true, achievable: true, relevant: true, timeBound: false };

describe('normalizeDemandState', () => {
    it('accepts the known labels regardless of case and padding', () => {
        expect(normalizeDemandState(' smart_compliant ')).toBe('SMART_COMPLIANT');
        expect(normalizeDemandState('VAGUE_UNCLEAR')).toBe('VAGUE_UNCLEAR');
    });

    it('treats anything else as missing', () => {
        expect(normalizeDemandState('SOMEWHAT_CLEAR')).toBeNull();
        expect(normalizeDemandState(42)).toBeNull();
        expect(normalizeDemandState(undefined)).toBeNull();
    });
});

describe('inferFromAnalysis', () => {
    it('returns null without criteria to count', () => {
        expect(inferFromAnalysis(null)).toBeNull();
        expect(inferFromAnalysis(analysis())).toBeNull();
        expect(inferFromAnalysis(analysis({ criteriaAnalysis: null }))).toBeNull();
    });

    it('marks fewer than four met criteria as vague', () => {
        const criteria = { specific: true, measurable: true, achievable: true, relevant: false, timeBound: false };
        expect(inferFromAnalysis(analysis({ criteriaAnalysis: criteria }))).toBe('VAGUE_UNCLEAR');
    });

    it('uses the scope assessment to separate compliant from large scope', () => {
        expect(inferFromAnalysis(analysis({ criteriaAnalysis: FOUR_MET }))).toBe('SMART_COMPLIANT');
        expect(inferFromAnalysis(analysis({
            criteriaAnalysis: FOUR_MET,
            scopeAssessment: { complexity: 'high' },
        }))).toBe('SMART_LARGE_SCOPE');
        expect(inferFromAnalysis(analysis({
            criteriaAnalysis: FOUR_MET,
            scopeAssessment: { complexity: 'low', domainBreadth: 'broad' },
        }))).toBe('SMART_LARGE_SCOPE');
    });
});

describe('heuristicDemandState', () => {
    it('flags vague phrasing', () => {
        expect(heuristicDemandState('help me')).toBe('VAGUE_UNCLEAR');
        expect(heuristicDemandState('Could you look into revenue growth for 2024 please')).toBe('VAGUE_UNCLEAR');
    });

    it('flags very short requests', () => {
        expect(heuristicDemandState('Quarterly dashboard')).toBe('VAGUE_UNCLEAR');
    });

    it('accepts a focused request with topic and time indicators', () => {
        expect(heuristicDemandState('Analyze Q2 2024 revenue growth for our SaaS product')).toBe('SMART_COMPLIANT');
    });

    it('treats a long topic and time request as large scope', () => {
        const request = `Analyze 2024 revenue ${Array(27).fill('segment').join(' ')}`;
        expect(countWords(request)).toBe(30);
        expect(heuristicDemandState(request)).toBe('SMART_LARGE_SCOPE');
    });

    it('accepts topic indicators alone', () => {
        expect(heuristicDemandState('Compare the performance of our three regional sales teams')).toBe('SMART_COMPLIANT');
    });

    it('defaults other specific-looking requests to large scope', () => {
        expect(heuristicDemandState('Build a new onboarding flow for mobile users')).toBe('SMART_LARGE_SCOPE');
    });

    it('has no opinion on blank input', () => {
        expect(heuristicDemandState('   ')).toBeNull();
    });
});

describe('fallback constants', () => {
    it('defaults to large scope', () => {
        expect(DEFAULT_DEMAND_STATE).toBe('SMART_LARGE_SCOPE');
    });

    it('counts whitespace-separated words', () => {
        expect(countWords('  two   words ')).toBe(2);
    });
});
