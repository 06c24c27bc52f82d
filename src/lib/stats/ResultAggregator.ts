/**
 * ResultAggregator - Running statistics for one inspection session
 *
 * Keeps counters, running sums and count maps only; no frame history.
 * Every `ingest` is O(1) apart from the distribution maps, which grow with
 * the number of distinct labels, severities and hours rather than with the
 * number of frames.
 *
 * Ingestion order does not matter for any counter or distribution. Hour
 * buckets use each frame's own capturedAt, never arrival time.
 *
 * `ingest` is synchronous, so each call completes as one uninterrupted step
 * on the event loop even when several pipelines feed the same aggregator.
 *
 * @module stats/ResultAggregator
 */

import {
	PROCESSING_STAGES,
	type FrameRecord,
	type SessionRecord,
	type SessionStatistics,
	type StageTimings
} from '$lib/session/types';
import { percentage, roundTo, sortedRecord, utcHourOfDay } from './format';

/**
 * Time window used for throughput
 */
export interface AggregatorWindow {
	startedAt: number;
	endedAt?: number | null;
}

function emptyTimings(): StageTimings {
	return {
		preprocessingMs: 0,
		anomalyInferenceMs: 0,
		classificationInferenceMs: 0,
		postprocessingMs: 0
	};
}

function increment(map: Map<string, number>, key: string): void {
	map.set(key, (map.get(key) ?? 0) + 1);
}

/**
 * ResultAggregator - Streaming session statistics
 *
 * @example
 * ```typescript
 * const aggregator = new ResultAggregator({ startedAt: session.startedAt });
 * aggregator.ingest(frame);
 *
 * const stats = aggregator.snapshot();
 * console.log(`${stats.defectiveFrames}/${stats.totalFrames} (${stats.defectRate}%)`);
 * ```
 */
export class ResultAggregator {
	private readonly startedAt: number;
	private endedAt: number | null;
	private readonly clock: () => number;

	private total = 0;
	private defective = 0;
	private defectsFound = 0;
	private anomalySum = 0;
	private anomalyMin = Number.POSITIVE_INFINITY;
	private anomalyMax = Number.NEGATIVE_INFINITY;
	private readonly stageSums: StageTimings = emptyTimings();
	private firstCapturedAt: number | null = null;
	private lastCapturedAt: number | null = null;

	private readonly labels = new Map<string, number>();
	private readonly severities = new Map<string, number>();
	private readonly confidenceLevels = new Map<string, number>();
	private readonly hours = new Map<string, number>();

	constructor(window: AggregatorWindow, clock: () => number = Date.now) {
		this.startedAt = window.startedAt;
		this.endedAt = window.endedAt ?? null;
		this.clock = clock;
	}

	/**
	 * Recompute statistics from stored frames
	 */
	static fromFrames(
		frames: Iterable<FrameRecord>,
		window: AggregatorWindow,
		clock?: () => number
	): ResultAggregator {
		const aggregator = new ResultAggregator(window, clock);
		for (const frame of frames) {
			aggregator.ingest(frame);
		}
		return aggregator;
	}

	/** Number of frames ingested */
	get frameCount(): number {
		return this.total;
	}

	/**
	 * Fold one frame into the running state
	 */
	ingest(frame: FrameRecord): void {
		this.total++;
		if (frame.isDefect) this.defective++;

		this.anomalySum += frame.anomalyScore;
		this.anomalyMin = Math.min(this.anomalyMin, frame.anomalyScore);
		this.anomalyMax = Math.max(this.anomalyMax, frame.anomalyScore);

		for (const stage of PROCESSING_STAGES) {
			this.stageSums[stage] += frame.stageTimings[stage];
		}

		for (const defect of frame.defects) {
			this.defectsFound++;
			increment(this.labels, defect.label);
			increment(this.severities, defect.severity);
		}

		increment(this.confidenceLevels, frame.confidenceLevel);
		increment(this.hours, utcHourOfDay(frame.capturedAt));

		if (this.firstCapturedAt === null || frame.capturedAt < this.firstCapturedAt) {
			this.firstCapturedAt = frame.capturedAt;
		}
		if (this.lastCapturedAt === null || frame.capturedAt > this.lastCapturedAt) {
			this.lastCapturedAt = frame.capturedAt;
		}
	}

	/**
	 * Fix the end of the throughput window
	 */
	close(endedAt: number): void {
		this.endedAt = endedAt;
	}

	/**
	 * Immutable statistics computed from the running state
	 *
	 * @param now - End of the throughput window while the session is open
	 */
	snapshot(now: number = this.clock()): SessionStatistics {
		const total = this.total;
		const good = total - this.defective;

		const averageStageTimings = emptyTimings();
		let processingSum = 0;
		for (const stage of PROCESSING_STAGES) {
			averageStageTimings[stage] = total > 0 ? roundTo(this.stageSums[stage] / total, 2) : 0;
			processingSum += this.stageSums[stage];
		}

		const windowEnd = this.endedAt ?? now;
		const durationSeconds = Math.max(0, (windowEnd - this.startedAt) / 1000);
		const throughputFps = durationSeconds > 0 ? roundTo(total / durationSeconds, 3) : 0;
		const throughputPerMinute =
			durationSeconds > 0 ? roundTo(total / (durationSeconds / 60), 3) : 0;

		return Object.freeze({
			totalFrames: total,
			goodFrames: good,
			defectiveFrames: this.defective,
			defectRate: percentage(this.defective, total),
			goodRate: percentage(good, total),
			totalDefectsFound: this.defectsFound,
			anomalyScore: Object.freeze({
				average: total > 0 ? roundTo(this.anomalySum / total, 4) : 0,
				min: total > 0 ? roundTo(this.anomalyMin, 4) : 0,
				max: total > 0 ? roundTo(this.anomalyMax, 4) : 0
			}),
			averageStageTimings: Object.freeze(averageStageTimings),
			averageProcessingTimeMs: total > 0 ? roundTo(processingSum / total, 2) : 0,
			throughputFps,
			throughputPerMinute,
			labelDistribution: sortedRecord(this.labels),
			severityDistribution: sortedRecord(this.severities),
			confidenceLevelDistribution: sortedRecord(this.confidenceLevels),
			hourOfDayDistribution: sortedRecord(this.hours),
			firstCapturedAt: this.firstCapturedAt,
			lastCapturedAt: this.lastCapturedAt
		});
	}
}

/**
 * Statistics for a stored session, derived from its record and frames
 *
 * Gives the same result as the live aggregator that saw the same frames.
 *
 * @param now - End of the throughput window while the session has no endedAt;
 *   the current time when omitted
 */
export function computeSessionStatistics(
	session: Pick<SessionRecord, 'startedAt' | 'endedAt'>,
	frames: Iterable<FrameRecord>,
	now?: number
): SessionStatistics {
	const aggregator = ResultAggregator.fromFrames(frames, {
		startedAt: session.startedAt,
		endedAt: session.endedAt
	});
	return aggregator.snapshot(now);
}
