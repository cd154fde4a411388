import { z } from 'zod';
import { Annotation } from '@langchain/langgraph';

export const DemandStateSchema = z.enum(['VAGUE_UNCLEAR', 'SMART_COMPLIANT', 'SMART_LARGE_SCOPE']);
export type DemandState = z.infer<typeof DemandStateSchema>;
export const DemandState = DemandStateSchema.enum;

export const ServiceStatusSchema = z.enum([
    'RUNNING',
    'COMPLETED',
    'WAITING_FOR_USER_FEEDBACK',
    'PROCESSING_FEEDBACK',
    'ERROR',
]);
export type ServiceStatus = z.infer<typeof ServiceStatusSchema>;
export const ServiceStatus = ServiceStatusSchema.enum;

export const FeedbackTypeSchema = z.enum([
    'CLARIFICATION',
    'SIMPLE_STRATEGY_CONFIRMATION',
    'META_ARCHITECT_CONFIRMATION',
]);
export type FeedbackType = z.infer<typeof FeedbackTypeSchema>;
export const FeedbackType = FeedbackTypeSchema.enum;

export const TaskCategorySchema = z.enum(['answer', 'collect', 'process', 'analyze', 'generate']);
export type TaskCategory = z.infer<typeof TaskCategorySchema>;

export const LevelSchema = z.enum(['low', 'medium', 'high']);
export type Level = z.infer<typeof LevelSchema>;

/** Which tier of the fallback chain produced the demand state. */
export const DemandSourceSchema = z.enum(['classifier', 'analysis', 'heuristic', 'default']);
export type DemandSource = z.infer<typeof DemandSourceSchema>;

export const MiningContextSchema = z.object({
    sessionId: z.string().min(1),
    taskId: z.string(),
    domain: z.string(),
    userId: z.string(),
    /** ISO timestamp of the call that opened the session. */
    timestamp: z.string(),
    /** Clarification rounds already asked in this session. */
    currentRound: z.number().int().min(0),
});
export type MiningContext = z.infer<typeof MiningContextSchema>;

export const TranscriptMessageSchema = z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
    node: z.string().optional(),
});
export type TranscriptMessage = z.infer<typeof TranscriptMessageSchema>;

export const SmartCriteriaSchema = z.object({
    specific: z.boolean().optional(),
    measurable: z.boolean().optional(),
    achievable: z.boolean().optional(),
    relevant: z.boolean().optional(),
    timeBound: z.boolean().optional(),
});
export type SmartCriteria = z.infer<typeof SmartCriteriaSchema>;

export const ScopeAssessmentSchema = z.object({
    complexity: LevelSchema.optional(),
    timeSpan: z.enum(['short', 'medium', 'long']).optional(),
    domainBreadth: z.enum(['narrow', 'medium', 'broad']).optional(),
});
export type ScopeAssessment = z.infer<typeof ScopeAssessmentSchema>;

/**
 * What a demand classifier reports back. Every field may be missing: the
 * fallback chain in the classifier adapter fills the gaps.
 */
export const ClassificationSchema = z.object({
    demandState: z.string().nullable().optional(),
    criteriaAnalysis: SmartCriteriaSchema.nullable().optional(),
    scopeAssessment: ScopeAssessmentSchema.nullable().optional(),
    clarificationNeeded: z.array(z.string()).default([]),
    reasoning: z.string().default(''),
    confidence: z.number().min(0).max(1).optional(),
});
export type Classification = z.infer<typeof ClassificationSchema>;

export const SmartAnalysisSchema = ClassificationSchema.extend({
    source: DemandSourceSchema,
    /** Message of the classifier failure that pushed the chain past tier 1. */
    classifierError: z.string().optional(),
});
export type SmartAnalysis = z.infer<typeof SmartAnalysisSchema>;

export const IntentExtractionSchema = z.object({
    categories: z.array(z.string()).default([]),
    reasoning: z.string().default(''),
    output: z.string().default(''),
});
export type IntentExtraction = z.infer<typeof IntentExtractionSchema>;

export const ComplexityAssessmentSchema = z.object({
    score: z.number(),
    level: LevelSchema,
    factors: z.object({
        categoryCount: z.number(),
        textLength: z.number(),
        wordCount: z.number(),
        questionMarks: z.number(),
        conjunctions: z.number(),
    }),
    estimatedEffort: LevelSchema,
    recommendedApproach: z.array(z.string()),
});
export type ComplexityAssessment = z.infer<typeof ComplexityAssessmentSchema>;

export const IntentAnalysisSchema = z.object({
    categories: z.array(TaskCategorySchema),
    complexity: ComplexityAssessmentSchema,
    reasoning: z.string(),
    output: z.string(),
});
export type IntentAnalysis = z.infer<typeof IntentAnalysisSchema>;

export const QuestionTypeSchema = z.object({
    questionTypes: z.array(z.string()),
    primaryType: z.string(),
    confidenceScores: z.record(z.string(), z.number()),
    isQuestion: z.boolean(),
});
export type QuestionTypeClassification = z.infer<typeof QuestionTypeSchema>;

export const ExecutionModeSchema = z.enum(['sequential', 'parallel', 'workflow']);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const ExecutionStrategySchema = z.object({
    executionMode: ExecutionModeSchema,
    agentRequirements: z.array(z.string()),
    estimatedSteps: z.number().int(),
    parallelExecution: z.boolean(),
    workflowNeeded: z.boolean(),
    notes: z.string().optional(),
});
export type ExecutionStrategy = z.infer<typeof ExecutionStrategySchema>;

export const SimpleStrategyResultSchema = z.object({
    questionType: QuestionTypeSchema,
    executionStrategy: ExecutionStrategySchema,
    categories: z.array(TaskCategorySchema),
    complexityLevel: LevelSchema,
});
export type SimpleStrategyResult = z.infer<typeof SimpleStrategyResultSchema>;

export const EntitiesKeywordsSchema = z.object({
    keywords: z.array(z.string()),
    entities: z.object({
        numbers: z.array(z.string()),
        capitalized: z.array(z.string()),
        technicalTerms: z.array(z.string()),
        actionWords: z.array(z.string()),
    }),
    wordCount: z.number(),
    uniqueWords: z.number(),
    lexicalDiversity: z.number(),
});
export type EntitiesKeywords = z.infer<typeof EntitiesKeywordsSchema>;

export const BlueprintSchema = z.object({
    problemAnalysis: z.string(),
    objectives: z.array(z.string()).default([]),
    frameworks: z.array(z.string()).default([]),
    phases: z.array(z.object({
        name: z.string(),
        description: z.string().default(''),
    })).default([]),
    risks: z.array(z.string()).default([]),
});
export type Blueprint = z.infer<typeof BlueprintSchema>;

export const RoadmapSchema = z.object({
    steps: z.array(z.object({
        order: z.number().int(),
        title: z.string(),
        description: z.string().default(''),
        dependsOn: z.array(z.number().int()).default([]),
    })),
    estimatedDuration: z.string().default('unknown'),
});
export type Roadmap = z.infer<typeof RoadmapSchema>;

export const MetaArchitectResultSchema = z.object({
    blueprint: BlueprintSchema,
    roadmap: RoadmapSchema.nullable(),
    entitiesKeywords: EntitiesKeywordsSchema,
    analysisFocus: z.array(z.string()),
    frameworkHints: z.array(z.string()),
});
export type MetaArchitectResult = z.infer<typeof MetaArchitectResultSchema>;

export const ClarificationRoundSchema = z.object({
    round: z.number().int().min(1),
    questions: z.array(z.string()),
    responses: z.array(z.string()),
});
export type ClarificationRound = z.infer<typeof ClarificationRoundSchema>;

export const FeedbackPayloadSchema = z.object({
    /**
     * Which pending decision this answers. Falls back to the session's pending
     * type; values outside FeedbackType are dispatched to packaging.
     */
    type: z.string().optional(),
    confirmation: z.boolean().default(false),
    responses: z.array(z.string()).default([]),
    adjustments: z.string().default(''),
});
export type FeedbackPayload = z.infer<typeof FeedbackPayloadSchema>;
export type FeedbackPayloadInput = z.input<typeof FeedbackPayloadSchema>;

export const WorkflowErrorSchema = z.object({
    node: z.string(),
    message: z.string(),
    at: z.string(),
});
export type WorkflowError = z.infer<typeof WorkflowErrorSchema>;

export const FlowTypeSchema = z.enum(['simple_strategy', 'meta_architect']);
export type FlowType = z.infer<typeof FlowTypeSchema>;

export const ResultSummarySchema = z.object({
    flowType: FlowTypeSchema,
    finalRequirements: z.array(z.string()),
    confirmed: z.boolean(),
    executionMode: ExecutionModeSchema.nullable(),
    roadmapSteps: z.number().int(),
});
export type ResultSummary = z.infer<typeof ResultSummarySchema>;

/**
 * The complete workflow record. This is exactly what a checkpoint holds, so
 * every field must survive a JSON round trip.
 */
export const MiningStateSchema = z.object({
    originalInput: z.string(),
    /** Original input plus any clarification responses or adjustments. */
    userInput: z.string(),
    context: MiningContextSchema,
    demandState: DemandStateSchema.nullable(),
    smartAnalysis: SmartAnalysisSchema.nullable(),
    clarificationQuestions: z.array(z.string()),
    clarificationRounds: z.array(ClarificationRoundSchema),
    userResponses: z.array(z.string()),
    messages: z.array(TranscriptMessageSchema),
    feedbackType: FeedbackTypeSchema.nullable(),
    userFeedback: FeedbackPayloadSchema.nullable(),
    status: ServiceStatusSchema,
    error: WorkflowErrorSchema.nullable(),
    /** Set when the round limiter pushed a still-vague request forward. */
    forcedProgression: z.boolean(),
    intentAnalysis: IntentAnalysisSchema.nullable(),
    simpleStrategyResult: SimpleStrategyResultSchema.nullable(),
    metaArchitectResult: MetaArchitectResultSchema.nullable(),
    summary: ResultSummarySchema.nullable(),
});
export type MiningState = z.infer<typeof MiningStateSchema>;

const EMPTY_CONTEXT: MiningContext = {
    sessionId: 'unassigned',
    taskId: '',
    domain: 'general',
    userId: 'anonymous',
    timestamp: '',
    currentRound: 0,
};

// Every field except the transcript is "latest wins"; the transcript is append-only.
export const MiningStateAnnotation = Annotation.Root({
    originalInput: Annotation<string>({ reducer: (_a, b) => b, default: () => '' }),
    userInput: Annotation<string>({ reducer: (_a, b) => b, default: () => '' }),
    context: Annotation<MiningContext>({ reducer: (_a, b) => b, default: () => EMPTY_CONTEXT }),
    demandState: Annotation<DemandState | null>({ reducer: (_a, b) => b, default: () => null }),
    smartAnalysis: Annotation<SmartAnalysis | null>({ reducer: (_a, b) => b, default: () => null }),
    clarificationQuestions: Annotation<string[]>({ reducer: (_a, b) => b, default: () => [] }),
    clarificationRounds: Annotation<ClarificationRound[]>({ reducer: (_a, b) => b, default: () => [] }),
    userResponses: Annotation<string[]>({ reducer: (_a, b) => b, default: () => [] }),
    messages: Annotation<TranscriptMessage[]>({ reducer: (a, b) => a.concat(b), default: () => [] }),
    feedbackType: Annotation<FeedbackType | null>({ reducer: (_a, b) => b, default: () => null }),
    userFeedback: Annotation<FeedbackPayload | null>({ reducer: (_a, b) => b, default: () => null }),
    status: Annotation<ServiceStatus>({ reducer: (_a, b) => b, default: () => ServiceStatus.RUNNING }),
    error: Annotation<WorkflowError | null>({ reducer: (_a, b) => b, default: () => null }),
    forcedProgression: Annotation<boolean>({ reducer: (_a, b) => b, default: () => false }),
    intentAnalysis: Annotation<IntentAnalysis | null>({ reducer: (_a, b) => b, default: () => null }),
    simpleStrategyResult: Annotation<SimpleStrategyResult | null>({ reducer: (_a, b) => b, default: () => null }),
    metaArchitectResult: Annotation<MetaArchitectResult | null>({ reducer: (_a, b) => b, default: () => null }),
    summary: Annotation<ResultSummary | null>({ reducer: (_a, b) => b, default: () => null }),
});

export type MiningStateUpdate = typeof MiningStateAnnotation.Update;

export type NodeName =
    | 'analyze_demand'
    | 'clarify_requirements'
    | 'intent_analysis'
    | 'simple_strategy_flow'
    | 'meta_architect_flow'
    | 'generate_roadmap'
    | 'wait_for_user_feedback'
    | 'process_clarification'
    | 'process_adjustment'
    | 'package_results'
    | 'finalize_result'
    | 'handle_error';

export function createInitialState(userInput: string, context: MiningContext): MiningState {
    return {
        originalInput: userInput,
        userInput,
        context,
        demandState: null,
        smartAnalysis: null,
        clarificationQuestions: [],
        clarificationRounds: [],
        userResponses: [],
        messages: [],
        feedbackType: null,
        userFeedback: null,
        status: ServiceStatus.RUNNING,
        error: null,
        forcedProgression: false,
        intentAnalysis: null,
        simpleStrategyResult: null,
        metaArchitectResult: null,
        summary: null,
    };
}

export function transcript(node: NodeName, content: string, role: TranscriptMessage['role'] = 'assistant'): TranscriptMessage {
    return { role, content, node };
}

export type MiningNode = (state: MiningState) => Promise<MiningStateUpdate>;
