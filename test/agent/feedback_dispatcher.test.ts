import { describe, it, expect } from 'vitest';
import {
    adjustmentTarget,
    conflictingFeedbackType,
    dispatchFeedback,
    effectiveFeedbackType,
    knownFeedbackType,
    enrichWithAdjustments,
    enrichWithResponses,
    normalizeFeedback,
} from '../../src/agent/utils/feedback_dispatcher.js';
import { FeedbackPayload, FeedbackType } from '../../src/agent/state.js';

function feedback(overrides: Partial<FeedbackPayload> = {}): FeedbackPayload {
    return { confirmation: false, responses: [], adjustments: '', ...overrides };
}

describe('dispatchFeedback', () => {
    it('routes clarification answers to processing', () => {
        expect(dispatchFeedback({
            feedbackType: FeedbackType.CLARIFICATION,
            userFeedback: feedback({ responses: ['Q1'] }),
        })).toBe('process_clarification');
    });

    it('packages a confirmed simple strategy and adjusts a rejected one', () => {
        const feedbackType = FeedbackType.SIMPLE_STRATEGY_CONFIRMATION;
        expect(dispatchFeedback({ feedbackType, userFeedback: feedback({ confirmation: true }) })).toBe('package_results');
        expect(dispatchFeedback({ feedbackType, userFeedback: feedback() })).toBe('process_adjustment');
    });

    it('generates a roadmap for a confirmed blueprint and adjusts a rejected one', () => {
        const feedbackType = FeedbackType.META_ARCHITECT_CONFIRMATION;
        expect(dispatchFeedback({ feedbackType, userFeedback: feedback({ confirmation: true }) })).toBe('generate_roadmap');
        expect(dispatchFeedback({ feedbackType, userFeedback: feedback() })).toBe('process_adjustment');
    });

    it('lets the payload type override the pending type', () => {
        expect(dispatchFeedback({
            feedbackType: FeedbackType.SIMPLE_STRATEGY_CONFIRMATION,
            userFeedback: feedback({ type: FeedbackType.CLARIFICATION }),
        })).toBe('process_clarification');
    });

    it('packages a type outside the known set', () => {
        expect(dispatchFeedback({
            feedbackType: FeedbackType.SIMPLE_STRATEGY_CONFIRMATION,
            userFeedback: feedback({ type: 'SOMETHING_ELSE', confirmation: false }),
        })).toBe('package_results');
    });

    it('matches known types regardless of case', () => {
        expect(dispatchFeedback({
            feedbackType: null,
            userFeedback: feedback({ type: 'meta_architect_confirmation', confirmation: true }),
        })).toBe('generate_roadmap');
    });

    it('packages when nothing identifies the feedback', () => {
        expect(dispatchFeedback({ feedbackType: null, userFeedback: feedback() })).toBe('package_results');
        expect(dispatchFeedback({ feedbackType: null, userFeedback: null })).toBe('package_results');
    });
});

describe('effectiveFeedbackType and adjustmentTarget', () => {
    it('falls back to the pending type', () => {
        expect(effectiveFeedbackType({
            feedbackType: FeedbackType.META_ARCHITECT_CONFIRMATION,
            userFeedback: feedback(),
        })).toBe('META_ARCHITECT_CONFIRMATION');
    });

    it('re-enters the branch that produced the rejected plan', () => {
        expect(adjustmentTarget(FeedbackType.META_ARCHITECT_CONFIRMATION)).toBe('meta_architect_flow');
        expect(adjustmentTarget(FeedbackType.SIMPLE_STRATEGY_CONFIRMATION)).toBe('intent_analysis');
        expect(adjustmentTarget(null)).toBe('intent_analysis');
    });
});

describe('knownFeedbackType and conflictingFeedbackType', () => {
    it('narrows strings to known types', () => {
        expect(knownFeedbackType(' clarification ')).toBe('CLARIFICATION');
        expect(knownFeedbackType('SOMETHING_ELSE')).toBeNull();
        expect(knownFeedbackType(undefined)).toBeNull();
    });

    it('flags only a known type that differs from the pending one', () => {
        const pending = FeedbackType.SIMPLE_STRATEGY_CONFIRMATION;
        expect(conflictingFeedbackType(pending, { type: 'META_ARCHITECT_CONFIRMATION' })).toBe('META_ARCHITECT_CONFIRMATION');
        expect(conflictingFeedbackType(pending, { type: 'simple_strategy_confirmation' })).toBeNull();
        expect(conflictingFeedbackType(pending, { type: 'SOMETHING_ELSE' })).toBeNull();
        expect(conflictingFeedbackType(pending, {})).toBeNull();
        expect(conflictingFeedbackType(null, { type: 'CLARIFICATION' })).toBeNull();
    });
});

describe('input enrichment', () => {
    it('appends answered details under a round heading', () => {
        expect(enrichWithResponses('help me', ['Q1 budget is $10k', ' ', ' EU only '], 2)).toBe(
            'help me\n\nAdditional details (round 2):\n- Q1 budget is $10k\n- EU only'
        );
    });

    it('leaves the input alone without answers', () => {
        expect(enrichWithResponses('help me', ['', '  '], 1)).toBe('help me');
    });

    it('appends requested adjustments', () => {
        expect(enrichWithAdjustments('Plan the launch', ' narrow scope to EU market ')).toBe(
            'Plan the launch\n\nRequested adjustments: narrow scope to EU market'
        );
        expect(enrichWithAdjustments('Plan the launch', '   ')).toBe('Plan the launch');
    });

    it('normalizes payload text', () => {
        expect(normalizeFeedback(feedback({ type: ' OTHER ', responses: [' a ', '', 'b'], adjustments: ' more ' }))).toEqual(
            feedback({ type: 'OTHER', responses: ['a', 'b'], adjustments: 'more' })
        );
        expect(normalizeFeedback(feedback({ type: '  ' })).type).toBeUndefined();
    });
});
