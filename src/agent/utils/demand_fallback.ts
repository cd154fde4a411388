import { Classification, DemandState, DemandStateSchema, SmartCriteria } from '../state.js';

export const DEFAULT_DEMAND_STATE: DemandState = DemandState.SMART_LARGE_SCOPE;

const VAGUE_PHRASES = ['help me', 'give me', 'please help', 'can you', 'could you'];
const TOPIC_INDICATORS = ['analyze', 'compare', 'performance', 'financial', 'revenue', 'profit', 'growth'];
const TIME_INDICATORS = ['2024', '2025', 'q1', 'q2', 'q3', 'q4', 'quarter', 'year', 'month', 'week'];

/** Below this many words a request is too thin to act on. */
const MIN_SPECIFIC_WORDS = 4;
/** Above this many words a topic + time request is treated as broad. */
const MAX_FOCUSED_WORDS = 25;
/** SMART criteria that must hold before the analysis counts as compliant. */
const MIN_CRITERIA_MET = 4;

function containsAny(text: string, needles: string[]): boolean {
    return needles.some((needle) => text.includes(needle));
}

export function countWords(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
}

/** Accepts only the three known labels; anything else counts as missing. */
export function normalizeDemandState(value: unknown): DemandState | null {
    if (typeof value !== 'string') return null;
    const parsed = DemandStateSchema.safeParse(value.trim().toUpperCase());
    return parsed.success ? parsed.data : null;
}

export function countCriteriaMet(criteria: SmartCriteria): number {
    return Object.values(criteria).filter((value) => value === true).length;
}

/**
 * Tier 1: read the demand state off the classifier's own auxiliary fields.
 * Returns null when the analysis carries no criteria to count.
 */
export function inferFromAnalysis(analysis: Classification | null): DemandState | null {
    if (!analysis?.criteriaAnalysis) return null;

    if (countCriteriaMet(analysis.criteriaAnalysis) < MIN_CRITERIA_MET) {
        return DemandState.VAGUE_UNCLEAR;
    }

    const scope = analysis.scopeAssessment;
    if (scope?.complexity === 'high' || scope?.domainBreadth === 'broad') {
        return DemandState.SMART_LARGE_SCOPE;
    }
    return DemandState.SMART_COMPLIANT;
}

/**
 * Tier 2: lexical heuristics over the raw request.
 * Vague phrasing wins over everything else, then length, then topic/time signals.
 */
export function heuristicDemandState(userInput: string): DemandState | null {
    const text = userInput.trim().toLowerCase();
    if (!text) return null;

    const wordCount = countWords(text);
    const hasTopic = containsAny(text, TOPIC_INDICATORS);
    const hasTime = containsAny(text, TIME_INDICATORS);

    if (containsAny(text, VAGUE_PHRASES)) return DemandState.VAGUE_UNCLEAR;
    if (wordCount < MIN_SPECIFIC_WORDS) return DemandState.VAGUE_UNCLEAR;
    if (hasTopic && hasTime) {
        return wordCount <= MAX_FOCUSED_WORDS ? DemandState.SMART_COMPLIANT : DemandState.SMART_LARGE_SCOPE;
    }
    if (hasTopic) return DemandState.SMART_COMPLIANT;
    return DemandState.SMART_LARGE_SCOPE;
}
