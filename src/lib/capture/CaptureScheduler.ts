/**
 * CaptureScheduler - Interval-driven capture for one inspection session
 *
 * Fires a capture-and-submit action every `intervalMs`, but only while the
 * session state machine is `active`. Timer start/stop follows lifecycle
 * events; clients never call `start()` / `stop()` themselves.
 *
 * Backpressure is skip-on-busy: a tick that finds a capture or submission
 * still outstanding does nothing and is not queued. When analysis is slower
 * than the interval the effective frame rate drops instead of a backlog
 * building up.
 *
 * @module capture/CaptureScheduler
 */

import { assertCaptureInterval } from '$lib/config/engineConfig';
import type { SubmissionOutcome, SubmissionPipeline } from '$lib/analysis/SubmissionPipeline';
import { AbortedByDeviceError, errorMessage } from '$lib/session/errors';
import type { SessionStateMachine } from '$lib/session/SessionStateMachine';
import type { LifecycleEvent } from '$lib/session/types';
import type { FrameSource } from './FrameSource';

/**
 * What a single tick did
 */
export type TickOutcome = 'fired' | 'skipped-busy' | 'skipped-inactive' | 'capture-failed';

export interface SchedulerConfig {
	/** Tick period in milliseconds (positive integer) */
	intervalMs: number;
	/** Follow lifecycle events; with false only `triggerNow` captures */
	autoCapture: boolean;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
	intervalMs: 1000,
	autoCapture: true
};

export interface SchedulerStats {
	ticks: number;
	fired: number;
	skippedBusy: number;
	skippedInactive: number;
	captureFailures: number;
}

export interface CaptureSchedulerDeps<H> {
	machine: SessionStateMachine<H>;
	source: FrameSource<H>;
	pipeline: SubmissionPipeline;
	/** Timestamp source for capturedAt */
	clock?: () => number;
	/** Called when the device fails to produce a frame */
	onDeviceFailure?: (error: AbortedByDeviceError) => void;
	/** Called with every submission result */
	onSubmission?: (outcome: SubmissionOutcome) => void;
}

/**
 * CaptureScheduler - Skip-on-busy periodic capture
 *
 * @example
 * ```typescript
 * const scheduler = new CaptureScheduler(
 *   { machine, source, pipeline, onDeviceFailure: (e) => machine.abort(e.message) },
 *   { intervalMs: 500 }
 * );
 *
 * await machine.start();      // timer starts on 'started'
 * scheduler.configure(250);   // restarts the timer at the new period
 * machine.stop();             // timer cleared before stop() returns
 * ```
 */
export class CaptureScheduler<H = unknown> {
	private readonly machine: SessionStateMachine<H>;
	private readonly source: FrameSource<H>;
	private readonly pipeline: SubmissionPipeline;
	private readonly clock: () => number;
	private readonly onDeviceFailure?: (error: AbortedByDeviceError) => void;
	private readonly onSubmission?: (outcome: SubmissionOutcome) => void;
	private readonly config: SchedulerConfig;

	private timer: ReturnType<typeof setInterval> | null = null;
	private capturing = false;
	private unsubscribe: (() => void) | null = null;
	private lastTick: Promise<TickOutcome> = Promise.resolve('skipped-inactive');
	private readonly _stats: SchedulerStats = {
		ticks: 0,
		fired: 0,
		skippedBusy: 0,
		skippedInactive: 0,
		captureFailures: 0
	};

	constructor(deps: CaptureSchedulerDeps<H>, config: Partial<SchedulerConfig> = {}) {
		this.machine = deps.machine;
		this.source = deps.source;
		this.pipeline = deps.pipeline;
		this.clock = deps.clock ?? Date.now;
		this.onDeviceFailure = deps.onDeviceFailure;
		this.onSubmission = deps.onSubmission;
		this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };

		assertCaptureInterval(this.config.intervalMs);

		if (this.config.autoCapture) {
			this.unsubscribe = this.machine.on((event) => this.handleLifecycle(event));
		}
	}

	/** Current tick period */
	get intervalMs(): number {
		return this.config.intervalMs;
	}

	/** Whether the repeating timer is armed */
	get isRunning(): boolean {
		return this.timer !== null;
	}

	/** Whether a capture or submission is outstanding */
	get isBusy(): boolean {
		return this.capturing || this.pipeline.isBusy;
	}

	get stats(): Readonly<SchedulerStats> {
		return { ...this._stats };
	}

	/**
	 * Change the tick period
	 *
	 * A running timer is restarted with the new period. A capture already in
	 * flight is not affected.
	 *
	 * @throws InvalidConfigurationError unless intervalMs is a positive integer
	 */
	configure(intervalMs: number): void {
		assertCaptureInterval(intervalMs);
		this.config.intervalMs = intervalMs;

		if (this.timer !== null) {
			clearInterval(this.timer);
			this.timer = null;
			this.arm();
		}

		console.log(`[CaptureScheduler] Interval set to ${intervalMs}ms`);
	}

	/**
	 * Arm the repeating timer. Driven by lifecycle events.
	 */
	start(): void {
		if (this.timer !== null) return;
		this.arm();
		console.log(`[CaptureScheduler] Started at ${this.config.intervalMs}ms`);
	}

	/**
	 * Cancel the repeating timer synchronously; no tick fires after this
	 * returns. An outstanding submission is left to finish.
	 */
	stop(): void {
		if (this.timer === null) return;
		clearInterval(this.timer);
		this.timer = null;
		console.log('[CaptureScheduler] Stopped');
	}

	/**
	 * Stop and stop listening to lifecycle events
	 */
	detach(): void {
		this.stop();
		this.unsubscribe?.();
		this.unsubscribe = null;
	}

	/**
	 * Capture immediately, under the same gating rules as a timer tick
	 */
	triggerNow(): Promise<TickOutcome> {
		this.lastTick = this.runTick();
		return this.lastTick;
	}

	/**
	 * Resolves when the most recent tick has finished (including its
	 * submission, if it fired)
	 */
	whenTickSettled(): Promise<TickOutcome> {
		return this.lastTick;
	}

	private arm(): void {
		this.timer = setInterval(() => {
			this.lastTick = this.runTick();
		}, this.config.intervalMs);
	}

	private handleLifecycle(event: LifecycleEvent): void {
		switch (event.type) {
			case 'started':
			case 'resumed':
				this.start();
				break;
			case 'paused':
			case 'stopped':
			case 'aborted':
				this.stop();
				break;
		}
	}

	private runTick(): Promise<TickOutcome> {
		return this.tick().catch((err: unknown) => {
			console.error('[CaptureScheduler] Tick failed:', errorMessage(err));
			return 'skipped-busy' as const;
		});
	}

	private async tick(): Promise<TickOutcome> {
		this._stats.ticks++;

		const handle = this.machine.handle;
		if (!this.machine.isActive || handle === null) {
			this._stats.skippedInactive++;
			return 'skipped-inactive';
		}

		if (this.isBusy) {
			this._stats.skippedBusy++;
			console.debug('[CaptureScheduler] Pipeline busy, skipping tick');
			return 'skipped-busy';
		}

		this.capturing = true;
		const capturedAt = this.clock();
		let submission: Promise<SubmissionOutcome>;

		try {
			const image = await this.source.captureFrame(handle);
			// stopped or paused while the device was producing the frame
			if (!this.machine.isActive) {
				this._stats.skippedInactive++;
				return 'skipped-inactive';
			}
			submission = this.pipeline.submit({ image, capturedAt });
		} catch (err: unknown) {
			this._stats.captureFailures++;
			const error = new AbortedByDeviceError(`Frame capture failed: ${errorMessage(err)}`, {
				cause: err
			});
			console.error(`[CaptureScheduler] ${error.message}`);
			this.onDeviceFailure?.(error);
			return 'capture-failed';
		} finally {
			this.capturing = false;
		}

		this._stats.fired++;
		const outcome = await submission;
		this.onSubmission?.(outcome);
		return 'fired';
	}
}
