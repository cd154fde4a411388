import { MiningContext } from '../state.js';

export const DEFAULT_MAX_CLARIFICATION_ROUNDS = 3;

export type RoundDecision =
    | { kind: 'forced'; round: number }
    | { kind: 'ask'; round: number; context: MiningContext };

/**
 * Decides whether another clarification round may be opened.
 * `ask` carries the context with the counter already advanced.
 */
export function applyRoundLimit(context: MiningContext, maxRounds = DEFAULT_MAX_CLARIFICATION_ROUNDS): RoundDecision {
    if (context.currentRound >= maxRounds) {
        return { kind: 'forced', round: context.currentRound };
    }
    const round = context.currentRound + 1;
    return { kind: 'ask', round, context: { ...context, currentRound: round } };
}

/** Trims, drops blanks and repeats; first occurrence wins. */
export function dedupeQuestions(questions: string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const question of questions) {
        const trimmed = question.trim();
        if (!trimmed || seen.has(trimmed)) continue;
        seen.add(trimmed);
        result.push(trimmed);
    }
    return result;
}
