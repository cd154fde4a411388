import { Logger, errorMessage } from '../../core/logger.js';
import { Classification, ClassificationSchema, DemandSource, DemandState, MiningContext, SmartAnalysis } from '../state.js';
import {
    DEFAULT_DEMAND_STATE,
    heuristicDemandState,
    inferFromAnalysis,
    normalizeDemandState,
} from '../utils/demand_fallback.js';
import { DemandClassifier } from './types.js';

export interface DemandResolution {
    demandState: DemandState;
    analysis: SmartAnalysis;
}

function clampConfidence(value: number | undefined): number | undefined {
    if (value === undefined || !Number.isFinite(value)) return undefined;
    return Math.min(Math.max(value, 0), 1);
}

/**
 * Brings a classifier result in line with the state schema, since it ends up
 * in every checkpoint. Confidence is clamped; anything else invalid throws.
 */
export function sanitizeClassification(raw: Classification): Classification {
    const { confidence, ...rest } = raw;
    const clamped = clampConfidence(confidence);
    const parsed = ClassificationSchema.safeParse(clamped === undefined ? rest : { ...rest, confidence: clamped });
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Classifier returned invalid output: ${issues}`);
    }
    return parsed.data;
}

/**
 * Runs the classifier and resolves a demand state through the fallback
 * chain: classifier verdict, then its own criteria, then lexical heuristics,
 * then the fixed default. A classifier that throws counts as an empty result.
 */
export async function classifyDemand(
    classifier: DemandClassifier,
    userInput: string,
    context: MiningContext,
    log: Logger
): Promise<DemandResolution> {
    let classification: Classification | null = null;
    let classifierError: string | undefined;

    try {
        classification = sanitizeClassification(await classifier.classify(userInput, context));
    } catch (error) {
        classifierError = errorMessage(error);
        log.warn('Demand classifier failed; falling back to heuristics', {
            sessionId: context.sessionId,
            error: classifierError,
        });
    }

    let demandState: DemandState | null = normalizeDemandState(classification?.demandState);
    let source: DemandSource = 'classifier';

    if (!demandState) {
        demandState = inferFromAnalysis(classification);
        source = 'analysis';
    }
    if (!demandState) {
        demandState = heuristicDemandState(userInput);
        source = 'heuristic';
    }
    if (!demandState) {
        demandState = DEFAULT_DEMAND_STATE;
        source = 'default';
    }

    const analysis: SmartAnalysis = {
        clarificationNeeded: [],
        reasoning: '',
        ...classification,
        demandState,
        source,
        ...(classifierError ? { classifierError } : {}),
    };

    log.info('Demand classified', { sessionId: context.sessionId, demandState, source });
    return { demandState, analysis };
}
