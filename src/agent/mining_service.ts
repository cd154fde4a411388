import { randomUUID } from 'node:crypto';

import { MinerConfig } from '../core/config.js';
import { MiningError, MiningValidationError, SessionNotFoundError, WorkflowExecutionError } from '../core/errors.js';
import { createLogger, errorMessage } from '../core/logger.js';
import { MiningDeps } from './collaborators/types.js';
import { buildMiningGraph, MiningGraph } from './graph.js';
import { buildMiningResult, MiningResult } from './result.js';
import {
    createInitialState,
    FeedbackPayload,
    FeedbackPayloadInput,
    FeedbackPayloadSchema,
    MiningContext,
    MiningContextSchema,
    MiningState,
    ServiceStatus,
} from './state.js';
import { conflictingFeedbackType, normalizeFeedback } from './utils/feedback_dispatcher.js';
import { KeyedLock } from './utils/session_lock.js';

/** Caller-supplied context. Anything left out gets a default. */
export type MiningContextInput = Partial<Omit<MiningContext, 'currentRound'>>;

export interface ServiceMetrics {
    sessionsStarted: number;
    sessionsResumed: number;
    completed: number;
    paused: number;
    failed: number;
    activeSessions: number;
    averageProcessingTimeMs: number;
}

export interface HealthReport {
    status: 'healthy' | 'unhealthy';
    checks: { graph: boolean; checkpointStore: boolean };
    error?: string;
    timestamp: string;
}

const HEALTH_CHECK_SESSION = '__health_check__';

/**
 * Public entry points of the workflow. Calls for the same session id run one
 * at a time; different sessions proceed independently.
 */
export class MiningService {
    private readonly graph: MiningGraph;
    private readonly lock = new KeyedLock();
    private readonly log = createLogger('mining_service');
    private readonly counters = {
        sessionsStarted: 0,
        sessionsResumed: 0,
        completed: 0,
        paused: 0,
        failed: 0,
        totalProcessingTimeMs: 0,
        runs: 0,
    };

    constructor(
        private readonly cfg: MinerConfig,
        private readonly deps: MiningDeps
    ) {
        this.graph = buildMiningGraph(cfg, deps);
    }

    async mineRequirements(userInput: string, context: MiningContextInput = {}): Promise<MiningResult> {
        const request = typeof userInput === 'string' ? userInput.trim() : '';
        if (!request) {
            throw new MiningValidationError('User input must not be empty', ['userInput: must be a non-empty string'], context.sessionId);
        }

        const sessionId = context.sessionId?.trim() || randomUUID();
        const parsedContext = MiningContextSchema.safeParse({
            sessionId,
            taskId: context.taskId?.trim() || `task_${sessionId.slice(0, 8)}`,
            domain: context.domain?.trim() || 'general',
            userId: context.userId?.trim() || 'anonymous',
            timestamp: context.timestamp || new Date().toISOString(),
            currentRound: 0,
        });
        if (!parsedContext.success) {
            throw new MiningValidationError(
                'Invalid mining context',
                parsedContext.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
                sessionId
            );
        }

        return this.lock.run(sessionId, async () => {
            this.counters.sessionsStarted++;
            this.log.info('Mining session started', { sessionId, input: request, domain: parsedContext.data.domain });
            return this.execute(createInitialState(request, parsedContext.data));
        });
    }

    /**
     * Reloads the last checkpoint and re-enters the graph. Without feedback the
     * paused state is replayed from classification.
     */
    async resumeWorkflow(sessionId: string, feedback?: FeedbackPayloadInput): Promise<MiningResult> {
        if (typeof sessionId !== 'string' || !sessionId.trim()) {
            throw new MiningValidationError('Session id must not be empty', ['sessionId: must be a non-empty string']);
        }

        let payload: FeedbackPayload | null = null;
        if (feedback !== undefined) {
            const parsed = FeedbackPayloadSchema.safeParse(feedback);
            if (!parsed.success) {
                throw new MiningValidationError(
                    'Invalid feedback payload',
                    parsed.error.issues.map((issue) => `${issue.path.join('.') || 'feedback'}: ${issue.message}`),
                    sessionId
                );
            }
            payload = normalizeFeedback(parsed.data);
        }

        return this.lock.run(sessionId, async () => {
            const restored = await this.deps.store.load(sessionId);
            if (!restored) {
                throw new SessionNotFoundError(sessionId, 'missing');
            }

            const conflict = payload ? conflictingFeedbackType(restored.feedbackType, payload) : null;
            if (conflict) {
                throw new MiningValidationError(
                    `Feedback type ${conflict} does not match the pending ${restored.feedbackType}`,
                    [`type: session ${sessionId} is waiting for ${restored.feedbackType}`],
                    sessionId
                );
            }

            this.counters.sessionsResumed++;
            this.log.info('Resuming mining session', {
                sessionId,
                feedbackType: payload?.type ?? restored.feedbackType,
                withFeedback: payload !== null,
            });

            const state: MiningState = payload
                ? {
                    ...restored,
                    userFeedback: payload,
                    status: ServiceStatus.PROCESSING_FEEDBACK,
                    userResponses: [...restored.userResponses, ...payload.responses],
                    error: null,
                }
                : {
                    ...restored,
                    userFeedback: null,
                    status: ServiceStatus.RUNNING,
                    error: null,
                };

            return this.execute(state);
        });
    }

    getServiceMetrics(): ServiceMetrics {
        const { totalProcessingTimeMs, runs, ...counts } = this.counters;
        return {
            ...counts,
            activeSessions: this.lock.activeKeys,
            averageProcessingTimeMs: runs > 0 ? Math.round(totalProcessingTimeMs / runs) : 0,
        };
    }

    async healthCheck(): Promise<HealthReport> {
        const timestamp = new Date().toISOString();
        try {
            await this.deps.store.load(HEALTH_CHECK_SESSION);
            return { status: 'healthy', checks: { graph: true, checkpointStore: true }, timestamp };
        } catch (error) {
            // A corrupt health-check entry still proves the store answers.
            if (error instanceof SessionNotFoundError) {
                return { status: 'healthy', checks: { graph: true, checkpointStore: true }, timestamp };
            }
            return {
                status: 'unhealthy',
                checks: { graph: true, checkpointStore: false },
                error: errorMessage(error),
                timestamp,
            };
        }
    }

    private async execute(initial: MiningState): Promise<MiningResult> {
        const sessionId = initial.context.sessionId;
        const startedAt = Date.now();

        let final: MiningState;
        try {
            final = await this.graph.invoke(initial, { recursionLimit: this.cfg.recursionLimit });
        } catch (error) {
            this.counters.failed++;
            if (error instanceof MiningError) throw error;
            throw new WorkflowExecutionError(sessionId, 'graph', errorMessage(error), error);
        }

        const processingTimeMs = Date.now() - startedAt;
        this.counters.totalProcessingTimeMs += processingTimeMs;
        this.counters.runs++;

        if (final.status === ServiceStatus.ERROR) {
            this.counters.failed++;
            const node = final.error?.node ?? 'unknown';
            const message = final.error?.message ?? 'Workflow ended in error';
            throw new WorkflowExecutionError(sessionId, node, message);
        }

        if (final.status === ServiceStatus.COMPLETED) {
            this.counters.completed++;
        } else if (final.status === ServiceStatus.WAITING_FOR_USER_FEEDBACK) {
            this.counters.paused++;
        }

        return buildMiningResult(final, processingTimeMs);
    }
}
