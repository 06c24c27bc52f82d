/**
 * Session persistence
 *
 * The engine writes through the SessionRepository interface only; a host
 * backs it with its own store. InMemorySessionRepository keeps everything in
 * process and is what tests and single-process hosts use.
 *
 * @module persistence/SessionRepository
 */

import { v4 as uuidv4 } from 'uuid';
import { SessionNotFoundError } from '$lib/session/errors';
import type {
	FinalSessionCounters,
	FrameRecord,
	SessionConfig,
	SessionRecord,
	SessionStatus
} from '$lib/session/types';

export interface SessionRepository {
	/** @returns The new session id */
	createSession(userId: string, config: SessionConfig, startedAt: number): Promise<string>;
	appendFrame(sessionId: string, frame: FrameRecord): Promise<void>;
	updateStatus(sessionId: string, status: SessionStatus, reason?: string): Promise<void>;
	/**
	 * Fix end time and final counters. Calling it again for a finalized
	 * session leaves the stored values unchanged.
	 */
	finalizeSession(
		sessionId: string,
		endedAt: number,
		finalCounters: FinalSessionCounters
	): Promise<SessionRecord>;
	getSession(sessionId: string): Promise<SessionRecord | null>;
	/** Frames in the order they were appended */
	listFrames(sessionId: string): Promise<FrameRecord[]>;
}

interface StoredSession {
	record: SessionRecord;
	frames: FrameRecord[];
}

/**
 * InMemorySessionRepository - Process-local SessionRepository
 *
 * @example
 * ```typescript
 * const repository = new InMemorySessionRepository();
 * const id = await repository.createSession('user-1', config, Date.now());
 * await repository.appendFrame(id, frame);
 * ```
 */
export class InMemorySessionRepository implements SessionRepository {
	private readonly sessions = new Map<string, StoredSession>();
	private readonly createId: () => string;

	constructor(createId: () => string = uuidv4) {
		this.createId = createId;
	}

	get size(): number {
		return this.sessions.size;
	}

	async createSession(userId: string, config: SessionConfig, startedAt: number): Promise<string> {
		const id = this.createId();
		this.sessions.set(id, {
			record: {
				id,
				userId,
				status: 'active',
				startedAt,
				endedAt: null,
				captureIntervalMs: config.captureIntervalMs,
				sourceId: config.sourceId,
				abortReason: null,
				final: null,
				totalFrames: 0,
				goodCount: 0,
				defectCount: 0
			},
			frames: []
		});
		return id;
	}

	async appendFrame(sessionId: string, frame: FrameRecord): Promise<void> {
		const stored = this.require(sessionId);
		stored.frames.push(frame);
		stored.record.totalFrames++;
		if (frame.isDefect) {
			stored.record.defectCount++;
		} else {
			stored.record.goodCount++;
		}
	}

	async updateStatus(sessionId: string, status: SessionStatus, reason?: string): Promise<void> {
		const { record } = this.require(sessionId);
		record.status = status;
		if (status === 'aborted') {
			record.abortReason = reason ?? null;
		}
	}

	async finalizeSession(
		sessionId: string,
		endedAt: number,
		finalCounters: FinalSessionCounters
	): Promise<SessionRecord> {
		const { record } = this.require(sessionId);

		if (record.final === null) {
			record.endedAt = endedAt;
			record.final = { ...finalCounters };
			record.totalFrames = finalCounters.totalFrames;
			record.goodCount = finalCounters.goodCount;
			record.defectCount = finalCounters.defectCount;
			if (record.status !== 'aborted') {
				record.status = 'completed';
			}
		}

		return this.copy(record);
	}

	async getSession(sessionId: string): Promise<SessionRecord | null> {
		const stored = this.sessions.get(sessionId);
		return stored ? this.copy(stored.record) : null;
	}

	async listFrames(sessionId: string): Promise<FrameRecord[]> {
		return [...this.require(sessionId).frames];
	}

	private require(sessionId: string): StoredSession {
		const stored = this.sessions.get(sessionId);
		if (!stored) {
			throw new SessionNotFoundError(sessionId);
		}
		return stored;
	}

	private copy(record: SessionRecord): SessionRecord {
		return { ...record, final: record.final ? { ...record.final } : null };
	}
}
