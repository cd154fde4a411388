/** Base class for every error the mining workflow raises to its callers. */
export class MiningError extends Error {
    constructor(message: string, public readonly sessionId?: string, public cause?: unknown) {
        super(message);
        this.name = 'MiningError';
    }
}

/** Rejected request or feedback payload. Nothing is persisted for it. */
export class MiningValidationError extends MiningError {
    constructor(message: string, public readonly issues: string[] = [], sessionId?: string) {
        super(message, sessionId);
        this.name = 'MiningValidationError';
    }
}

export type SessionLookupFailure = 'missing' | 'corrupt' | 'expired';

/** Resume targeted a session whose checkpoint cannot be used. */
export class SessionNotFoundError extends MiningError {
    constructor(sessionId: string, public readonly reason: SessionLookupFailure, cause?: unknown) {
        super(`Session ${sessionId} not found or expired (${reason})`, sessionId, cause);
        this.name = 'SessionNotFoundError';
    }
}

/**
 * A node failed. The last checkpoint is left untouched so the caller can
 * retry the resume.
 */
export class WorkflowExecutionError extends MiningError {
    constructor(sessionId: string, public readonly node: string, message: string, cause?: unknown) {
        super(`Mining workflow failed at ${node}: ${message}`, sessionId, cause);
        this.name = 'WorkflowExecutionError';
    }
}
