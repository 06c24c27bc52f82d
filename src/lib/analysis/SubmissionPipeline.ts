/**
 * SubmissionPipeline - One-at-a-time frame analysis
 *
 * Takes one captured frame, sends it to the analysis collaborator under a
 * bounded timeout, validates the answer and hands the resulting FrameRecord
 * to the session's frame sink (persistence, then aggregation).
 *
 * At most one submission is outstanding. The capture scheduler already
 * skips ticks while the pipeline is busy; `submit` still rejects with
 * AlreadyInFlightError if it is called anyway.
 *
 * A failed round-trip (transport error, timeout, malformed answer, sink
 * failure) drops the frame: no retry, no placeholder, not counted. The
 * failure is reported to `onSubmissionFailed` listeners and the pipeline is
 * free again. A sink that answers 'discarded' (the session no longer takes
 * frames) ends the submission as `discarded`, which is not a failure.
 *
 * @module analysis/SubmissionPipeline
 */

import { v4 as uuidv4 } from 'uuid';
import type { RawImage } from '$lib/capture/FrameSource';
import {
	AlreadyInFlightError,
	AnalysisError,
	InspectionError,
	SubmissionFailedError,
	errorMessage
} from '$lib/session/errors';
import type { FrameRecord } from '$lib/session/types';
import { validateAnalysisResult } from './AnalysisResultSchema';

export interface AnalyzeOptions {
	/** Aborted when the pipeline gives up waiting */
	signal: AbortSignal;
}

/**
 * External defect-detection collaborator
 *
 * Resolves to a value in the canonical AnalysisResult shape; it is
 * validated by the pipeline before use.
 */
export interface AnalysisCollaborator {
	analyze(image: RawImage, options: AnalyzeOptions): Promise<unknown>;
	/** When present, consulted before a session starts */
	checkHealth?(): Promise<boolean>;
}

/**
 * A frame as it leaves the capture scheduler
 */
export interface CapturedFrame {
	image: RawImage;
	capturedAt: number;
}

export type SinkVerdict = 'stored' | 'discarded';

/**
 * Receives every analysed frame. Throwing drops the frame; resolving to
 * 'discarded' means it was deliberately not kept.
 */
export type FrameSink = (frame: FrameRecord) => Promise<SinkVerdict | void> | SinkVerdict | void;

export type SubmissionOutcome =
	| { status: 'accepted'; frame: FrameRecord; durationMs: number }
	| { status: 'discarded'; frame: FrameRecord; durationMs: number }
	| { status: 'dropped'; error: SubmissionFailedError; durationMs: number };

export type SubmissionFailedListener = (error: SubmissionFailedError) => void;

export interface PipelineConfig {
	/** Deadline for one analysis round-trip in milliseconds */
	timeoutMs: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	timeoutMs: 30000
};

export interface PipelineCounters {
	submitted: number;
	accepted: number;
	discarded: number;
	dropped: number;
}

/**
 * SubmissionPipeline - Serializes frame analysis for one session
 *
 * @example
 * ```typescript
 * const pipeline = new SubmissionPipeline(session.id, analyzer, (frame) => aggregator.ingest(frame));
 *
 * const outcome = await pipeline.submit({ image, capturedAt: Date.now() });
 * if (outcome.status === 'dropped') {
 *   console.warn(outcome.error.message);
 * }
 * ```
 */
export class SubmissionPipeline {
	private readonly sessionId: string;
	private readonly analyzer: AnalysisCollaborator;
	private readonly sink: FrameSink;
	private readonly config: PipelineConfig;
	private readonly createId: () => string;
	private readonly failureListeners = new Set<SubmissionFailedListener>();

	private busy = false;
	private idle: Promise<void> = Promise.resolve();
	private readonly _counters: PipelineCounters = {
		submitted: 0,
		accepted: 0,
		discarded: 0,
		dropped: 0
	};

	constructor(
		sessionId: string,
		analyzer: AnalysisCollaborator,
		sink: FrameSink,
		config: Partial<PipelineConfig> = {},
		createId: () => string = uuidv4
	) {
		this.sessionId = sessionId;
		this.analyzer = analyzer;
		this.sink = sink;
		this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
		this.createId = createId;
	}

	/** Whether a submission is outstanding */
	get isBusy(): boolean {
		return this.busy;
	}

	get counters(): Readonly<PipelineCounters> {
		return { ...this._counters };
	}

	get timeoutMs(): number {
		return this.config.timeoutMs;
	}

	/**
	 * Subscribe to dropped-frame events
	 *
	 * @returns Unsubscribe function
	 */
	onSubmissionFailed(listener: SubmissionFailedListener): () => void {
		this.failureListeners.add(listener);
		return () => {
			this.failureListeners.delete(listener);
		};
	}

	/**
	 * Analyze one frame
	 *
	 * Never rejects for a per-frame failure; those resolve as `dropped`.
	 * Rejects with AlreadyInFlightError if a submission is outstanding.
	 */
	submit(capture: CapturedFrame): Promise<SubmissionOutcome> {
		if (this.busy) {
			return Promise.reject(new AlreadyInFlightError());
		}

		this.busy = true;
		const run = this.process(capture).finally(() => {
			this.busy = false;
		});
		this.idle = run.then(() => undefined);
		return run;
	}

	/**
	 * Resolves once no submission is outstanding
	 */
	whenIdle(): Promise<void> {
		return this.idle;
	}

	private async process(capture: CapturedFrame): Promise<SubmissionOutcome> {
		this._counters.submitted++;
		const startTime = performance.now();

		try {
			const raw = await this.analyzeWithTimeout(capture.image);
			const result = validateAnalysisResult(raw);

			const frame: FrameRecord = Object.freeze({
				id: this.createId(),
				sessionId: this.sessionId,
				capturedAt: capture.capturedAt,
				isDefect: result.isDefect,
				anomalyScore: result.anomalyScore,
				confidenceLevel: result.confidenceLevel,
				defects: result.defects,
				stageTimings: Object.freeze({ ...result.stageTimings })
			});

			const verdict = await this.sink(frame);
			if (verdict === 'discarded') {
				this._counters.discarded++;
				return { status: 'discarded', frame, durationMs: performance.now() - startTime };
			}

			this._counters.accepted++;
			return { status: 'accepted', frame, durationMs: performance.now() - startTime };
		} catch (err: unknown) {
			const error = new SubmissionFailedError(capture.capturedAt, err);
			this._counters.dropped++;
			console.warn(`[SubmissionPipeline] ${error.message}`);

			for (const listener of [...this.failureListeners]) {
				try {
					listener(error);
				} catch (listenerErr) {
					console.error(
						'[SubmissionPipeline] Failure listener error:',
						errorMessage(listenerErr)
					);
				}
			}

			return { status: 'dropped', error, durationMs: performance.now() - startTime };
		}
	}

	private async analyzeWithTimeout(image: RawImage): Promise<unknown> {
		const controller = new AbortController();
		const timeoutMs = this.config.timeoutMs;
		let timer: ReturnType<typeof setTimeout> | undefined;

		const deadline = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				controller.abort();
				reject(new AnalysisError('timeout', `Analysis did not complete within ${timeoutMs}ms`));
			}, timeoutMs);
		});

		try {
			return await Promise.race([
				this.analyzer.analyze(image, { signal: controller.signal }),
				deadline
			]);
		} catch (err: unknown) {
			if (err instanceof InspectionError) throw err;
			throw new AnalysisError('transport', `Analysis request failed: ${errorMessage(err)}`, {
				cause: err
			});
		} finally {
			clearTimeout(timer);
		}
	}
}
