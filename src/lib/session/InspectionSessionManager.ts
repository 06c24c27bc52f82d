/**
 * InspectionSessionManager - At most one live session per user
 *
 * Hands out InspectionSession contexts keyed by user. A user may hold one
 * session that is not yet stopped or aborted; a terminal session is
 * finalized and forgotten when the user starts the next one.
 *
 * Pass an ExclusiveFrameSource so two users cannot lease the same device.
 *
 * @module session/InspectionSessionManager
 */

import { SessionAlreadyActiveError, errorMessage } from './errors';
import { InspectionSession, type InspectionSessionDeps } from './InspectionSession';
import type { SessionConfig, SessionRecord } from './types';

export type SessionManagerDeps<H> = Omit<InspectionSessionDeps<H>, 'userId'>;

/**
 * InspectionSessionManager - Session registry
 *
 * @example
 * ```typescript
 * const manager = new InspectionSessionManager({
 *   source: new ExclusiveFrameSource(cameraSource),
 *   analyzer: new HttpAnalysisClient(loadAnalysisClientConfig()),
 *   repository: new InMemorySessionRepository()
 * });
 *
 * const session = await manager.startSession('inspector-7', { sourceId: 'line-3-camera' });
 * // ...
 * const record = await manager.stopSession('inspector-7');
 * ```
 */
export class InspectionSessionManager<H = unknown> {
	private readonly deps: SessionManagerDeps<H>;
	private readonly sessions = new Map<string, InspectionSession<H>>();

	constructor(deps: SessionManagerDeps<H>) {
		this.deps = deps;
	}

	/** Number of sessions currently tracked */
	get size(): number {
		return this.sessions.size;
	}

	/**
	 * Create and start a session for `userId`
	 *
	 * @throws SessionAlreadyActiveError if the user has a non-terminal session
	 * @throws InvalidConfigurationError before anything is persisted
	 * @throws DeviceUnavailableError if the device cannot be acquired
	 */
	async startSession(
		userId: string,
		config: Partial<SessionConfig> = {}
	): Promise<InspectionSession<H>> {
		const existing = this.sessions.get(userId);
		if (existing) {
			if (!existing.isTerminal) {
				throw new SessionAlreadyActiveError(userId, existing.id ?? 'starting');
			}
			await this.retire(userId, existing);
		}

		const session = InspectionSession.create({ ...this.deps, userId }, config);
		this.sessions.set(userId, session);

		try {
			await session.start();
		} catch (err) {
			if (this.sessions.get(userId) === session && !session.isTerminal) {
				this.sessions.delete(userId);
			}
			throw err;
		}

		return session;
	}

	/**
	 * The user's session, unless it has been finalized
	 */
	getCurrentSession(userId: string): InspectionSession<H> | null {
		const session = this.sessions.get(userId);
		if (!session) return null;
		if (session.isFinalized) {
			this.sessions.delete(userId);
			return null;
		}
		return session;
	}

	/**
	 * Stop and finalize the user's session
	 *
	 * @returns The finalized record, or null when the user has no session
	 */
	async stopSession(userId: string): Promise<SessionRecord | null> {
		const session = this.sessions.get(userId);
		if (!session) return null;

		try {
			return await session.stopAndFinalize();
		} finally {
			if (this.sessions.get(userId) === session) {
				this.sessions.delete(userId);
			}
		}
	}

	private async retire(userId: string, session: InspectionSession<H>): Promise<void> {
		try {
			await session.finalize();
		} catch (err) {
			console.warn(
				`[InspectionSessionManager] Could not finalize previous session for "${userId}":`,
				errorMessage(err)
			);
		}
		if (this.sessions.get(userId) === session) {
			this.sessions.delete(userId);
		}
	}
}
