/**
 * InspectionSession - Per-session context
 *
 * Owns everything one live inspection run needs: the state machine, the
 * capture scheduler, the submission pipeline and the running aggregator.
 * Nothing is shared between sessions except the FrameSource, which leases
 * device handles exclusively.
 *
 * Lifecycle changes are mirrored into the SessionRepository. Accepted frames
 * are persisted first and then folded into the aggregator, so the live
 * statistics never count a frame the repository does not have.
 *
 * @module session/InspectionSession
 */

import type {
	AnalysisCollaborator,
	PipelineConfig,
	SinkVerdict,
	SubmissionOutcome
} from '$lib/analysis/SubmissionPipeline';
import { SubmissionPipeline } from '$lib/analysis/SubmissionPipeline';
import { CaptureScheduler, type TickOutcome } from '$lib/capture/CaptureScheduler';
import type { FrameSource } from '$lib/capture/FrameSource';
import { assertCaptureInterval, resolveSessionConfig } from '$lib/config/engineConfig';
import type { SessionRepository } from '$lib/persistence/SessionRepository';
import { ResultAggregator } from '$lib/stats/ResultAggregator';
import { buildReport, type ReportOptions, type SessionReport } from '$lib/stats/SessionReportBuilder';
import { roundTo } from '$lib/stats/format';
import {
	AnalysisError,
	InvalidTransitionError,
	SessionNotFoundError,
	type SubmissionFailedError,
	errorMessage
} from './errors';
import { SessionStateMachine } from './SessionStateMachine';
import type {
	FinalSessionCounters,
	FrameRecord,
	LifecycleEvent,
	SessionConfig,
	SessionRecord,
	SessionState,
	SessionStatistics,
	SessionStatus
} from './types';

export interface InspectionSessionDeps<H> {
	userId: string;
	source: FrameSource<H>;
	analyzer: AnalysisCollaborator;
	repository: SessionRepository;
	clock?: () => number;
	pipeline?: Partial<PipelineConfig>;
	/** Frame id generator, uuid v4 by default */
	createFrameId?: () => string;
}

/**
 * Payloads of the events a session emits
 */
export interface InspectionSessionEvents {
	lifecycle: LifecycleEvent;
	'submission-failed': SubmissionFailedError;
	frame: FrameRecord;
}

export type InspectionSessionEventType = keyof InspectionSessionEvents;

type ListenerSets = {
	[K in InspectionSessionEventType]: Set<(payload: InspectionSessionEvents[K]) => void>;
};

/**
 * Components that exist once the session has a persisted record
 */
interface SessionRun<H> {
	id: string;
	startedAt: number;
	aggregator: ResultAggregator;
	pipeline: SubmissionPipeline;
	scheduler: CaptureScheduler<H>;
}

const STATUS_BY_EVENT: Record<LifecycleEvent['type'], SessionStatus | null> = {
	// createSession already stores 'active'
	started: null,
	paused: 'paused',
	resumed: 'active',
	stopped: 'completed',
	aborted: 'aborted'
};

/**
 * InspectionSession - One user's live inspection run
 *
 * @example
 * ```typescript
 * const session = InspectionSession.create(
 *   { userId: 'inspector-7', source, analyzer, repository },
 *   { captureIntervalMs: 500, sourceId: 'line-3-camera' }
 * );
 *
 * session.on('submission-failed', (err) => console.warn(err.message));
 * await session.start();
 * // ...
 * const record = await session.stopAndFinalize();
 * const report = await session.report({ granularity: 'hourly' });
 * ```
 */
export class InspectionSession<H = unknown> {
	private readonly userId: string;
	private readonly source: FrameSource<H>;
	private readonly analyzer: AnalysisCollaborator;
	private readonly repository: SessionRepository;
	private readonly clock: () => number;
	private readonly pipelineConfig: Partial<PipelineConfig>;
	private readonly createFrameId?: () => string;
	private readonly _config: SessionConfig;
	private readonly machine: SessionStateMachine<H>;
	private readonly listeners: ListenerSets = {
		lifecycle: new Set(),
		'submission-failed': new Set(),
		frame: new Set()
	};

	private run: SessionRun<H> | null = null;
	private starting = false;
	private endedAt: number | null = null;
	private statusWrites: Promise<void> = Promise.resolve();
	private pendingSink: Promise<void> = Promise.resolve();
	private finalizeRequested = false;
	private finalizing: Promise<SessionRecord> | null = null;

	private constructor(deps: InspectionSessionDeps<H>, config: SessionConfig) {
		this.userId = deps.userId;
		this.source = deps.source;
		this.analyzer = deps.analyzer;
		this.repository = deps.repository;
		this.clock = deps.clock ?? Date.now;
		this.pipelineConfig = deps.pipeline ?? {};
		this.createFrameId = deps.createFrameId;
		this._config = config;

		this.machine = new SessionStateMachine(this.source, config.sourceId, this.clock);
		this.machine.on((event) => this.handleLifecycle(event));
	}

	/**
	 * Validate configuration and build an idle session
	 *
	 * @throws InvalidConfigurationError on an invalid field; nothing is created
	 */
	static create<H>(
		deps: InspectionSessionDeps<H>,
		config: Partial<SessionConfig> = {}
	): InspectionSession<H> {
		return new InspectionSession(deps, resolveSessionConfig(config));
	}

	/** Persisted session id, null until started */
	get id(): string | null {
		return this.run?.id ?? null;
	}

	get owner(): string {
		return this.userId;
	}

	get state(): SessionState {
		return this.machine.state;
	}

	get isTerminal(): boolean {
		return this.machine.isTerminal;
	}

	get isFinalized(): boolean {
		return this.finalizeRequested;
	}

	get abortReason(): string | null {
		return this.machine.abortReason;
	}

	get config(): Readonly<SessionConfig> {
		return { ...this._config };
	}

	/**
	 * Subscribe to session events
	 *
	 * @returns Unsubscribe function
	 */
	on<K extends InspectionSessionEventType>(
		type: K,
		listener: (payload: InspectionSessionEvents[K]) => void
	): () => void {
		const set: Set<(payload: InspectionSessionEvents[K]) => void> = this.listeners[type];
		set.add(listener);
		return () => {
			set.delete(listener);
		};
	}

	/**
	 * Check the detection service, persist the session and acquire the device
	 *
	 * On DeviceUnavailableError the persisted record is marked aborted, this
	 * session stays idle and `start()` may be called again.
	 *
	 * @throws AnalysisError('service') if the detection service reports unhealthy
	 * @throws DeviceUnavailableError if the device cannot be acquired
	 * @throws InvalidTransitionError if not idle
	 */
	async start(): Promise<void> {
		if (this.machine.state !== 'idle' || this.starting) {
			throw new InvalidTransitionError(this.starting ? 'starting' : this.machine.state, 'start');
		}

		this.starting = true;
		try {
			await this.ensureServiceHealthy();

			const startedAt = this.clock();
			const id = await this.repository.createSession(this.userId, this._config, startedAt);
			const run = this.prepareRun(id, startedAt);
			this.run = run;

			try {
				await this.machine.start();
			} catch (err) {
				// aborted while acquiring: the run stays so it can be finalized
				if (this.machine.state === 'idle') {
					run.scheduler.detach();
					this.run = null;
					await this.repository.updateStatus(id, 'aborted', errorMessage(err));
				}
				throw err;
			}

			console.log(
				`[InspectionSession] Session ${id} started on "${this._config.sourceId}" every ${this._config.captureIntervalMs}ms`
			);
		} finally {
			this.starting = false;
		}
	}

	pause(): void {
		this.machine.pause();
	}

	resume(): void {
		this.machine.resume();
	}

	/**
	 * Stop capturing and release the device. Does not wait for an in-flight
	 * submission; its frame is still counted unless the session is finalized
	 * first. No-op when already stopped or aborted.
	 */
	stop(): void {
		this.machine.stop();
	}

	abort(reason: string): void {
		this.machine.abort(reason);
	}

	/**
	 * Fix end time and final counters in the repository
	 *
	 * Idempotent: every call after the first returns the same promise. Frames
	 * that arrive afterwards are discarded.
	 *
	 * @throws InvalidTransitionError unless the session has been started and
	 * is stopped or aborted
	 */
	finalize(): Promise<SessionRecord> {
		if (this.finalizing) return this.finalizing;

		const run = this.run;
		if (run === null || !this.machine.isTerminal) {
			return Promise.reject(new InvalidTransitionError(this.machine.state, 'finalize'));
		}

		this.finalizeRequested = true;
		this.finalizing = this.completeRun(run);
		return this.finalizing;
	}

	/**
	 * Stop, let any outstanding capture and submission settle, then finalize
	 */
	async stopAndFinalize(): Promise<SessionRecord> {
		this.machine.stop();

		const run = this.run;
		if (run !== null && !this.finalizeRequested) {
			await run.scheduler.whenTickSettled();
			await run.pipeline.whenIdle();
		}

		return this.finalize();
	}

	/**
	 * Change the capture cadence, live if the session is running
	 *
	 * @throws InvalidConfigurationError unless intervalMs is a positive integer
	 */
	configure(intervalMs: number): void {
		assertCaptureInterval(intervalMs);
		this._config.captureIntervalMs = intervalMs;
		this.run?.scheduler.configure(intervalMs);
	}

	/**
	 * Capture one frame now, under the scheduler's gating rules
	 */
	captureNow(): Promise<TickOutcome> {
		if (this.run === null) {
			return Promise.reject(new InvalidTransitionError(this.machine.state, 'capture in'));
		}
		return this.run.scheduler.triggerNow();
	}

	/**
	 * Current statistics from the running aggregator
	 */
	statistics(): SessionStatistics {
		if (this.run === null) {
			const now = this.clock();
			return new ResultAggregator({ startedAt: now }).snapshot(now);
		}
		return this.run.aggregator.snapshot(this.endedAt ?? this.clock());
	}

	/**
	 * Build a report from the persisted record and frames
	 */
	async report(options: Partial<ReportOptions> = {}): Promise<SessionReport> {
		const run = this.run;
		if (run === null) {
			throw new InvalidTransitionError(this.machine.state, 'report on');
		}

		const session = await this.repository.getSession(run.id);
		if (session === null) {
			throw new SessionNotFoundError(run.id);
		}
		const frames = await this.repository.listFrames(run.id);

		return buildReport(session, frames, { now: this.clock(), ...options });
	}

	private async ensureServiceHealthy(): Promise<void> {
		if (!this.analyzer.checkHealth) return;

		const healthy = await this.analyzer.checkHealth();
		if (!healthy) {
			throw new AnalysisError('service', 'Detection service is not available');
		}
	}

	private prepareRun(id: string, startedAt: number): SessionRun<H> {
		const aggregator = new ResultAggregator({ startedAt }, this.clock);
		const pipeline = new SubmissionPipeline(
			id,
			this.analyzer,
			(frame) => this.acceptFrame(id, aggregator, frame),
			this.pipelineConfig,
			this.createFrameId
		);
		pipeline.onSubmissionFailed((error) => this.emit('submission-failed', error));

		const scheduler = new CaptureScheduler(
			{
				machine: this.machine,
				source: this.source,
				pipeline,
				clock: this.clock,
				onDeviceFailure: (error) => this.machine.abort(error.message),
				onSubmission: (outcome: SubmissionOutcome) => {
					if (outcome.status === 'accepted') this.emit('frame', outcome.frame);
				}
			},
			{ intervalMs: this._config.captureIntervalMs, autoCapture: this._config.autoCapture }
		);

		return { id, startedAt, aggregator, pipeline, scheduler };
	}

	private acceptFrame(
		id: string,
		aggregator: ResultAggregator,
		frame: FrameRecord
	): Promise<SinkVerdict> {
		if (this.finalizeRequested) {
			console.warn(
				`[InspectionSession] Discarding frame captured at ${frame.capturedAt}: session ${id} is finalized`
			);
			return Promise.resolve('discarded');
		}

		const write = this.repository.appendFrame(id, frame).then((): SinkVerdict => {
			aggregator.ingest(frame);
			return 'stored';
		});
		// A failed write is reported by the pipeline as a dropped frame
		this.pendingSink = write.then(
			() => undefined,
			() => undefined
		);
		return write;
	}

	private handleLifecycle(event: LifecycleEvent): void {
		if (event.to === 'stopped' || event.to === 'aborted') {
			this.endedAt = event.at;
			this.run?.aggregator.close(event.at);
		}

		const status = STATUS_BY_EVENT[event.type];
		const run = this.run;
		if (status !== null && run !== null) {
			this.statusWrites = this.statusWrites
				.then(() => this.repository.updateStatus(run.id, status, event.reason))
				.catch((err: unknown) => {
					console.error(
						`[InspectionSession] Failed to record status "${status}" for ${run.id}:`,
						errorMessage(err)
					);
				});
		}

		this.emit('lifecycle', event);
	}

	private async completeRun(run: SessionRun<H>): Promise<SessionRecord> {
		await this.pendingSink;
		await this.statusWrites;
		run.scheduler.detach();
		await this.machine.whenReleased();

		const endedAt = this.endedAt ?? this.clock();
		run.aggregator.close(endedAt);
		const stats = run.aggregator.snapshot(endedAt);

		const finalCounters: FinalSessionCounters = {
			totalFrames: stats.totalFrames,
			goodCount: stats.goodFrames,
			defectCount: stats.defectiveFrames,
			durationSeconds: roundTo(Math.max(0, (endedAt - run.startedAt) / 1000), 2),
			defectRate: stats.defectRate,
			goodRate: stats.goodRate,
			throughputFps: stats.throughputFps
		};

		const record = await this.repository.finalizeSession(run.id, endedAt, finalCounters);
		console.log(
			`[InspectionSession] Session ${run.id} finalized: ${finalCounters.totalFrames} frames, ${finalCounters.defectRate}% defective`
		);
		return record;
	}

	private emit<K extends InspectionSessionEventType>(
		type: K,
		payload: InspectionSessionEvents[K]
	): void {
		const set: Set<(payload: InspectionSessionEvents[K]) => void> = this.listeners[type];
		for (const listener of [...set]) {
			try {
				listener(payload);
			} catch (err) {
				console.error(`[InspectionSession] "${type}" listener error:`, errorMessage(err));
			}
		}
	}
}
