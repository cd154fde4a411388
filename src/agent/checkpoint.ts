import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { SessionNotFoundError } from '../core/errors.js';
import { MiningState, MiningStateSchema } from './state.js';
import { CheckpointStore } from './collaborators/types.js';

export const CheckpointSchema = z.object({
    sessionId: z.string().min(1),
    savedAt: z.string(),
    state: MiningStateSchema,
});
export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointStoreOptions {
    /** Snapshots older than this are rejected as expired. 0 disables expiry. */
    ttlSeconds?: number;
    now?: () => number;
}

function encodeCheckpoint(sessionId: string, state: MiningState, now: number): string {
    const checkpoint: Checkpoint = { sessionId, savedAt: new Date(now).toISOString(), state };
    return JSON.stringify(checkpoint, null, 2);
}

/**
 * Parses and validates a stored snapshot. Anything that does not match the
 * state schema, or belongs to another session, is reported as corrupt.
 */
export function decodeCheckpoint(sessionId: string, raw: string, ttlSeconds: number, now: number): MiningState {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new SessionNotFoundError(sessionId, 'corrupt', error);
    }

    const parsed = CheckpointSchema.safeParse(json);
    if (!parsed.success) {
        throw new SessionNotFoundError(sessionId, 'corrupt', parsed.error);
    }
    if (parsed.data.sessionId !== sessionId) {
        throw new SessionNotFoundError(sessionId, 'corrupt');
    }

    if (ttlSeconds > 0) {
        const savedAt = Date.parse(parsed.data.savedAt);
        if (Number.isNaN(savedAt)) {
            throw new SessionNotFoundError(sessionId, 'corrupt');
        }
        if (now - savedAt > ttlSeconds * 1000) {
            throw new SessionNotFoundError(sessionId, 'expired');
        }
    }

    return parsed.data.state;
}

/**
 * In-process store. Snapshots are kept serialized so a caller mutating the
 * state it saved cannot change what a later resume sees.
 */
export class MemoryCheckpointStore implements CheckpointStore {
    private readonly entries = new Map<string, string>();
    private readonly ttlSeconds: number;
    private readonly now: () => number;

    constructor(options: CheckpointStoreOptions = {}) {
        this.ttlSeconds = options.ttlSeconds ?? 0;
        this.now = options.now ?? Date.now;
    }

    async save(sessionId: string, state: MiningState): Promise<void> {
        this.entries.set(sessionId, encodeCheckpoint(sessionId, state, this.now()));
    }

    async load(sessionId: string): Promise<MiningState | null> {
        const raw = this.entries.get(sessionId);
        if (raw === undefined) return null;
        try {
            return decodeCheckpoint(sessionId, raw, this.ttlSeconds, this.now());
        } catch (error) {
            if (error instanceof SessionNotFoundError && error.reason === 'expired') {
                this.entries.delete(sessionId);
            }
            throw error;
        }
    }

    async delete(sessionId: string): Promise<void> {
        this.entries.delete(sessionId);
    }

    /** Raw stored text, for inspection in tests and tooling. */
    peek(sessionId: string): string | undefined {
        return this.entries.get(sessionId);
    }

    get size(): number {
        return this.entries.size;
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** One pretty-printed JSON file per session under `dir`. */
export class FileCheckpointStore implements CheckpointStore {
    private readonly ttlSeconds: number;
    private readonly now: () => number;

    constructor(private readonly dir: string, options: CheckpointStoreOptions = {}) {
        this.ttlSeconds = options.ttlSeconds ?? 0;
        this.now = options.now ?? Date.now;
    }

    pathFor(sessionId: string): string {
        return path.join(this.dir, `${encodeURIComponent(sessionId)}.json`);
    }

    async save(sessionId: string, state: MiningState): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        const target = this.pathFor(sessionId);
        const temp = `${target}.${process.pid}.tmp`;
        await fs.writeFile(temp, encodeCheckpoint(sessionId, state, this.now()), 'utf8');
        await fs.rename(temp, target);
    }

    async load(sessionId: string): Promise<MiningState | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.pathFor(sessionId), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw error;
        }

        try {
            return decodeCheckpoint(sessionId, raw, this.ttlSeconds, this.now());
        } catch (error) {
            if (error instanceof SessionNotFoundError && error.reason === 'expired') {
                await this.delete(sessionId);
            }
            throw error;
        }
    }

    async delete(sessionId: string): Promise<void> {
        await fs.rm(this.pathFor(sessionId), { force: true });
    }
}
