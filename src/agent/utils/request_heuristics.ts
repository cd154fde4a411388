import {
    ComplexityAssessment,
    EntitiesKeywords,
    ExecutionStrategy,
    IntentAnalysis,
    Level,
    QuestionTypeClassification,
    SmartCriteria,
    TaskCategory,
    TaskCategorySchema,
} from '../state.js';

/** Categories whose combination marks a multi-stage request. */
export const COMPLEX_CATEGORIES: ReadonlySet<TaskCategory> = new Set(['collect', 'process', 'analyze', 'generate']);

const CONJUNCTIONS = ['and', 'or', 'but', 'also', 'then'];

const STOP_WORDS = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
    'of', 'with', 'by', 'is', 'are', 'was', 'were', 'be', 'been', 'have',
    'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could', 'should',
]);

const QUESTION_INDICATORS: Record<string, string[]> = {
    factual: ['what is', 'define', 'who is', 'when did', 'where is'],
    procedural: ['how to', 'how do', 'steps to', 'process of'],
    causal: ['why', 'because', 'reason', 'cause'],
    comparative: ['compare', 'difference', 'versus', 'better'],
    analytical: ['analyze', 'evaluate', 'assess', 'examine'],
    creative: ['create', 'design', 'imagine', 'brainstorm'],
};

const CATEGORY_AGENTS: Record<TaskCategory, string> = {
    answer: 'researcher',
    collect: 'researcher',
    process: 'analyst',
    analyze: 'analyst',
    generate: 'writer',
};

const COMPLEXITY_RECOMMENDATIONS: Record<Level, string[]> = {
    low: [
        'Single agent execution should be sufficient',
        'Direct processing recommended',
    ],
    medium: [
        'Consider breaking into subtasks',
        'May benefit from specialized agents',
        'Monitor execution progress',
    ],
    high: [
        'Decompose into multiple subtasks',
        'Use multiple specialized agents',
        'Implement step-by-step execution',
        'Consider workflow orchestration',
    ],
};

/** Keeps known categories in first-seen order; drops anything else. */
export function normalizeCategories(raw: string[]): TaskCategory[] {
    const seen = new Set<TaskCategory>();
    for (const value of raw) {
        const parsed = TaskCategorySchema.safeParse(value.trim().toLowerCase());
        if (parsed.success) seen.add(parsed.data);
    }
    return [...seen];
}

/**
 * Two or more of the multi-stage categories at medium or high complexity
 * send a request down the blueprint path.
 */
export function isComplexRequest(intent: Pick<IntentAnalysis, 'categories' | 'complexity'>): boolean {
    const stages = intent.categories.filter((category) => COMPLEX_CATEGORIES.has(category)).length;
    return stages >= 2 && intent.complexity.level !== 'low';
}

export function assessRequestComplexity(userText: string, categories: TaskCategory[]): ComplexityAssessment {
    const lower = userText.toLowerCase();
    const words = lower.split(/\s+/).filter(Boolean);
    const factors = {
        categoryCount: categories.length,
        textLength: userText.length,
        wordCount: words.length,
        questionMarks: (userText.match(/\?/g) ?? []).length,
        conjunctions: CONJUNCTIONS.filter((word) => words.includes(word)).length,
    };

    let score = 0;
    if (factors.categoryCount > 1) score += 0.3;
    if (factors.wordCount > 20) score += 0.2;
    else if (factors.wordCount > 10) score += 0.1;
    if (factors.questionMarks > 1) score += 0.2;
    score += 0.1 * Math.min(factors.conjunctions, 3);

    // Float sums like 0.1 * 3 drift; keep two decimals so thresholds behave.
    score = Math.round(Math.min(score, 1) * 100) / 100;

    const level: Level = score > 0.6 ? 'high' : score > 0.3 ? 'medium' : 'low';
    const estimatedEffort: Level = score > 0.7 ? 'high' : score > 0.4 ? 'medium' : 'low';

    return {
        score,
        level,
        factors,
        estimatedEffort,
        recommendedApproach: COMPLEXITY_RECOMMENDATIONS[level],
    };
}

export function classifyQuestionType(userText: string): QuestionTypeClassification {
    const lower = userText.toLowerCase();
    const confidenceScores: Record<string, number> = {};

    for (const [type, indicators] of Object.entries(QUESTION_INDICATORS)) {
        const matches = indicators.filter((indicator) => lower.includes(indicator)).length;
        if (matches > 0) {
            confidenceScores[type] = Math.min(matches / indicators.length, 1);
        }
    }

    if (Object.keys(confidenceScores).length === 0) {
        confidenceScores.factual = 0.5;
    }

    const questionTypes = Object.keys(confidenceScores);
    // First type wins ties, matching indicator table order.
    const primaryType = questionTypes.reduce((best, type) =>
        confidenceScores[type] > confidenceScores[best] ? type : best
    );

    return {
        questionTypes,
        primaryType,
        confidenceScores,
        isQuestion: ['?', 'what', 'how', 'why', 'when', 'where', 'who'].some((marker) => lower.includes(marker)),
    };
}

export function suggestExecutionStrategy(categories: TaskCategory[], complexity: Level): ExecutionStrategy {
    const strategy: ExecutionStrategy = {
        executionMode: 'sequential',
        agentRequirements: [...new Set(categories.map((category) => CATEGORY_AGENTS[category]))],
        estimatedSteps: categories.length,
        parallelExecution: false,
        workflowNeeded: false,
    };

    if (complexity === 'high') {
        strategy.executionMode = 'workflow';
        strategy.workflowNeeded = true;
        strategy.estimatedSteps = categories.length * 2;
    } else if (complexity === 'medium' && categories.length > 2) {
        strategy.executionMode = 'parallel';
        strategy.parallelExecution = true;
    }

    // Ordering constraints override the mode chosen above.
    if (categories.includes('collect') && categories.includes('analyze')) {
        strategy.executionMode = 'sequential';
        strategy.parallelExecution = false;
        strategy.notes = 'Data collection must precede analysis';
    }
    if (categories.includes('process') && categories.includes('generate')) {
        strategy.executionMode = 'sequential';
        strategy.parallelExecution = false;
        strategy.notes = 'Data processing should precede content generation';
    }

    return strategy;
}

export function extractEntitiesAndKeywords(userText: string): EntitiesKeywords {
    const rawWords = userText.split(/\s+/).filter(Boolean);
    const words = rawWords.map((word) => word.toLowerCase());
    const keywords = words
        .filter((word) => !STOP_WORDS.has(word) && word.length > 2)
        .map((word) => word.replace(/^[.,!?;:]+|[.,!?;:]+$/g, ''));
    const uniqueWords = new Set(words).size;

    return {
        keywords: keywords.slice(0, 10),
        entities: {
            numbers: words.filter((word) => /^\d+$/.test(word)),
            capitalized: rawWords.filter((word) => word.length > 1 && /^[A-Z]/.test(word)),
            technicalTerms: keywords.filter((word) => word.length > 6),
            actionWords: keywords.filter((word) => /(ing|ed|er|ly)$/.test(word)),
        },
        wordCount: words.length,
        uniqueWords,
        lexicalDiversity: words.length > 0 ? uniqueWords / words.length : 0,
    };
}

const FOCUS_BY_CATEGORY: Partial<Record<TaskCategory, string[]>> = {
    analyze: ['data_analysis', 'performance_metrics', 'trend_identification'],
    generate: ['content_creation', 'strategy_development', 'solution_design'],
    process: ['workflow_optimization', 'process_improvement', 'automation_opportunities'],
    collect: ['data_gathering', 'information_consolidation', 'source_validation'],
};

const FOCUS_BY_COMPLEXITY: Record<Level, string[]> = {
    low: [],
    medium: ['requirement_analysis', 'feasibility_assessment'],
    high: ['stakeholder_analysis', 'risk_assessment', 'dependency_mapping'],
};

export function extractAnalysisFocus(categories: TaskCategory[], complexity: Level): string[] {
    const focus = categories.flatMap((category) => FOCUS_BY_CATEGORY[category] ?? []);
    return [...new Set([...focus, ...FOCUS_BY_COMPLEXITY[complexity]])];
}

const FRAMEWORKS_BY_TERM: Array<{ terms: string[]; frameworks: string[] }> = [
    { terms: ['financial', 'revenue', 'profit', 'cost', 'budget'], frameworks: ['Financial Ratio Analysis', 'Cost-Benefit Analysis', 'ROI Analysis'] },
    { terms: ['performance', 'kpi', 'metric', 'benchmark'], frameworks: ['Performance Gap Analysis', 'Balanced Scorecard', 'KPI Framework'] },
    { terms: ['market', 'customer', 'competitor', 'segment'], frameworks: ['Market Analysis', 'Customer Segmentation', 'Competitive Analysis'] },
    { terms: ['strategy', 'plan', 'roadmap', 'vision'], frameworks: ['Strategic Planning', 'SWOT Analysis', 'Scenario Planning'] },
    { terms: ['process', 'workflow', 'procedure', 'operation'], frameworks: ['Business Process Modeling', 'Value Stream Mapping', 'Lean Analysis'] },
];

const FRAMEWORKS_BY_CATEGORY: Partial<Record<TaskCategory, string[]>> = {
    analyze: ['Root Cause Analysis', 'Data Analysis Framework'],
    generate: ['Content Strategy Framework', 'Solution Design Framework'],
    process: ['Process Optimization Framework', 'Workflow Design'],
};

export function extractFrameworkHints(entities: EntitiesKeywords, categories: TaskCategory[]): string[] {
    const haystack = [
        ...entities.keywords,
        ...entities.entities.capitalized,
        ...entities.entities.technicalTerms,
    ].join(' ').toLowerCase();

    const hints = FRAMEWORKS_BY_TERM
        .filter(({ terms }) => terms.some((term) => haystack.includes(term)))
        .flatMap(({ frameworks }) => frameworks);

    for (const category of categories) {
        hints.push(...(FRAMEWORKS_BY_CATEGORY[category] ?? []));
    }

    return [...new Set(hints)];
}

/**
 * Questions asked when the classifier flagged the request as vague but did
 * not say what to ask. One per unmet SMART criterion, plus a domain question.
 */
export function defaultClarificationQuestions(criteria: SmartCriteria | null | undefined, domain: string): string[] {
    const met = criteria ?? {};
    const questions: string[] = [];

    if (!met.specific) questions.push('Could you provide more specific details about what you want to achieve?');
    if (!met.measurable) questions.push('What specific measurable metrics or outcomes would indicate success?');
    if (!met.timeBound) questions.push('What is your desired timeframe for this request?');
    if (!met.relevant) questions.push('What is the context or purpose behind this request?');
    if (domain !== 'general') questions.push(`Are there any ${domain}-specific requirements or constraints?`);

    return questions.length > 0 ? questions : ['Could you please provide more details about your requirements?'];
}
