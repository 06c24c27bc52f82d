/**
 * SessionReportBuilder - Summaries, trends and breakdowns for one session
 *
 * Pure transformation of a session record plus its stored frames. The only
 * clock input is `options.now`, consulted only while the session has no
 * `endedAt`; such reports carry `durationIsFinal: false`.
 *
 * Numeric conventions:
 * - percentages: 1 decimal place
 * - anomaly scores and confidences: 4 decimal places
 * - stage durations: milliseconds, 2 decimal places
 *
 * @module stats/SessionReportBuilder
 */

import {
	PROCESSING_STAGES,
	type BoundingBox,
	type FrameRecord,
	type ProcessingStage,
	type SessionRecord,
	type SessionStatistics,
	type SessionStatus
} from '$lib/session/types';
import {
	formatDefectLabel,
	formatDuration,
	percentage,
	roundTo,
	utcDayKey,
	utcHourKey,
	utcHourOfDay
} from './format';
import { computeSessionStatistics } from './ResultAggregator';

export type TrendGranularity = 'daily' | 'hourly';

/**
 * Explanations keyed by raw defect label
 */
export type DefectCatalog = Readonly<Record<string, string>>;

export const DEFAULT_DEFECT_EXPLANATION = 'No detailed explanation available for this defect type.';

export interface ReportOptions {
	granularity: TrendGranularity;
	/** End of the duration window for sessions that have not ended */
	now?: number;
	defectCatalog?: DefectCatalog;
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
	granularity: 'daily'
};

export interface ReportSummary {
	sessionId: string;
	status: SessionStatus;
	sourceId: string;
	startedAt: number;
	endedAt: number | null;
	durationSeconds: number;
	/** e.g. "1h 2m 5s" */
	durationText: string;
	durationIsFinal: boolean;
	totalFrames: number;
	goodFrames: number;
	defectiveFrames: number;
	defectRate: number;
	goodRate: number;
	totalDefectsFound: number;
	/** Most frequent raw defect label, null when no defects */
	topDefectType: string | null;
	throughputFps: number;
	throughputPerMinute: number;
}

export interface TrendBucket {
	/** "YYYY-MM-DD" or "YYYY-MM-DD HH:00" (UTC) */
	bucket: string;
	total: number;
	defective: number;
	good: number;
}

export interface DistributionEntry {
	label: string;
	count: number;
	/** Share of all findings */
	percentage: number;
}

export interface DefectTypeEntry extends DistributionEntry {
	/** Mean finding confidence for this label */
	averageConfidence: number;
	/** Sum of finding areas, percent of frame, 2 decimal places */
	totalAreaPercentage: number;
}

export interface ConfidenceLevelEntry {
	level: string;
	/** Frames at this level */
	count: number;
	/** Share of all frames */
	percentage: number;
	averageAnomalyScore: number;
}

export interface StageBreakdown {
	stage: ProcessingStage;
	averageMs: number;
	minMs: number;
	maxMs: number;
	/** Stage average over the sum of stage averages */
	percentageOfTotal: number;
}

export interface HistogramBucket {
	/** e.g. "0.2-0.4" */
	range: string;
	min: number;
	max: number;
	count: number;
	percentage: number;
}

export interface HourlyPattern {
	/** "HH:00" (UTC) */
	hour: string;
	total: number;
	defective: number;
	good: number;
}

export interface ReportedDefect {
	frameId: string;
	capturedAt: number;
	label: string;
	displayLabel: string;
	severity: string;
	confidence: number;
	areaPercentage: number;
	boundingBox: Readonly<BoundingBox> | null;
	explanation: string;
}

export interface SessionReport {
	summary: ReportSummary;
	trends: { granularity: TrendGranularity; buckets: TrendBucket[] };
	defectDistribution: DefectTypeEntry[];
	severityDistribution: DistributionEntry[];
	confidenceLevels: ConfidenceLevelEntry[];
	processingBreakdown: StageBreakdown[];
	anomalyHistogram: HistogramBucket[];
	hourlyPattern: HourlyPattern[];
	defects: ReportedDefect[];
	statistics: SessionStatistics;
}

/** Lower bounds of the anomaly histogram; the last bucket includes 1.0 */
const HISTOGRAM_BOUNDS: readonly number[] = [0, 0.2, 0.4, 0.6, 0.8];

function compareLabels(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function distribution(counts: Readonly<Record<string, number>>, totalFindings: number): DistributionEntry[] {
	return Object.entries(counts)
		.map(([label, count]) => ({ label, count, percentage: percentage(count, totalFindings) }))
		.sort((a, b) => b.count - a.count || compareLabels(a.label, b.label));
}

function buildDefectTypes(
	frames: readonly FrameRecord[],
	counts: Readonly<Record<string, number>>,
	totalFindings: number
): DefectTypeEntry[] {
	const sums = new Map<string, { confidence: number; area: number }>();
	for (const frame of frames) {
		for (const defect of frame.defects) {
			const entry = sums.get(defect.label) ?? { confidence: 0, area: 0 };
			entry.confidence += defect.confidence;
			entry.area += defect.areaPercentage;
			sums.set(defect.label, entry);
		}
	}

	return distribution(counts, totalFindings).map((entry) => {
		const sum = sums.get(entry.label) ?? { confidence: 0, area: 0 };
		return {
			...entry,
			averageConfidence: entry.count > 0 ? roundTo(sum.confidence / entry.count, 4) : 0,
			totalAreaPercentage: roundTo(sum.area, 2)
		};
	});
}

function buildConfidenceLevels(frames: readonly FrameRecord[]): ConfidenceLevelEntry[] {
	const levels = new Map<string, { count: number; anomalySum: number }>();
	for (const frame of frames) {
		const entry = levels.get(frame.confidenceLevel) ?? { count: 0, anomalySum: 0 };
		entry.count++;
		entry.anomalySum += frame.anomalyScore;
		levels.set(frame.confidenceLevel, entry);
	}

	return [...levels.entries()]
		.map(([level, { count, anomalySum }]) => ({
			level,
			count,
			percentage: percentage(count, frames.length),
			averageAnomalyScore: roundTo(anomalySum / count, 4)
		}))
		.sort((a, b) => b.count - a.count || compareLabels(a.level, b.level));
}

function buildTrends(frames: readonly FrameRecord[], granularity: TrendGranularity): TrendBucket[] {
	const keyOf = granularity === 'hourly' ? utcHourKey : utcDayKey;
	const buckets = new Map<string, { total: number; defective: number }>();

	for (const frame of frames) {
		const key = keyOf(frame.capturedAt);
		const bucket = buckets.get(key) ?? { total: 0, defective: 0 };
		bucket.total++;
		if (frame.isDefect) bucket.defective++;
		buckets.set(key, bucket);
	}

	return [...buckets.keys()].sort().map((key) => {
		const { total, defective } = buckets.get(key) ?? { total: 0, defective: 0 };
		return { bucket: key, total, defective, good: total - defective };
	});
}

function buildProcessingBreakdown(frames: readonly FrameRecord[]): StageBreakdown[] {
	const rows = PROCESSING_STAGES.map((stage) => {
		let sum = 0;
		let min = Number.POSITIVE_INFINITY;
		let max = Number.NEGATIVE_INFINITY;
		for (const frame of frames) {
			const value = frame.stageTimings[stage];
			sum += value;
			min = Math.min(min, value);
			max = Math.max(max, value);
		}
		const empty = frames.length === 0;
		return {
			stage,
			average: empty ? 0 : sum / frames.length,
			min: empty ? 0 : min,
			max: empty ? 0 : max
		};
	});

	const totalAverage = rows.reduce((acc, row) => acc + row.average, 0);

	return rows.map((row) => ({
		stage: row.stage,
		averageMs: roundTo(row.average, 2),
		minMs: roundTo(row.min, 2),
		maxMs: roundTo(row.max, 2),
		percentageOfTotal: totalAverage > 0 ? roundTo((row.average / totalAverage) * 100, 1) : 0
	}));
}

function buildAnomalyHistogram(frames: readonly FrameRecord[]): HistogramBucket[] {
	const counts = HISTOGRAM_BOUNDS.map(() => 0);

	for (const frame of frames) {
		let index = HISTOGRAM_BOUNDS.length - 1;
		while (index > 0 && frame.anomalyScore < HISTOGRAM_BOUNDS[index]) {
			index--;
		}
		counts[index]++;
	}

	return HISTOGRAM_BOUNDS.map((min, i) => {
		const max = i + 1 < HISTOGRAM_BOUNDS.length ? HISTOGRAM_BOUNDS[i + 1] : 1;
		return {
			range: `${min.toFixed(1)}-${max.toFixed(1)}`,
			min,
			max,
			count: counts[i],
			percentage: percentage(counts[i], frames.length)
		};
	});
}

function buildHourlyPattern(frames: readonly FrameRecord[]): HourlyPattern[] {
	const hours = new Map<string, HourlyPattern>();

	for (const frame of frames) {
		const hour = `${utcHourOfDay(frame.capturedAt)}:00`;
		const entry = hours.get(hour) ?? { hour, total: 0, defective: 0, good: 0 };
		entry.total++;
		if (frame.isDefect) {
			entry.defective++;
		} else {
			entry.good++;
		}
		hours.set(hour, entry);
	}

	return [...hours.values()].sort((a, b) => compareLabels(a.hour, b.hour));
}

function listDefects(frames: readonly FrameRecord[], catalog: DefectCatalog): ReportedDefect[] {
	const defects: ReportedDefect[] = [];
	for (const frame of frames) {
		for (const defect of frame.defects) {
			const explanation = Object.hasOwn(catalog, defect.label) ? catalog[defect.label] : undefined;
			defects.push({
				frameId: frame.id,
				capturedAt: frame.capturedAt,
				label: defect.label,
				displayLabel: formatDefectLabel(defect.label),
				severity: defect.severity,
				confidence: defect.confidence,
				areaPercentage: defect.areaPercentage,
				boundingBox: defect.boundingBox,
				explanation: explanation ?? DEFAULT_DEFECT_EXPLANATION
			});
		}
	}
	return defects;
}

/**
 * Build the full report for one session
 *
 * Frames are sorted by capturedAt before use, so callers may pass them in
 * arrival order.
 *
 * @example
 * ```typescript
 * const frames = await repository.listFrames(sessionId);
 * const session = await repository.getSession(sessionId);
 * const report = buildReport(session, frames, { granularity: 'hourly', now: Date.now() });
 * console.log(report.summary.durationText, report.summary.defectRate);
 * ```
 */
export function buildReport(
	session: SessionRecord,
	frames: readonly FrameRecord[],
	options: Partial<ReportOptions> = {}
): SessionReport {
	const { granularity, now, defectCatalog } = { ...DEFAULT_REPORT_OPTIONS, ...options };
	const ordered = [...frames].sort((a, b) => a.capturedAt - b.capturedAt);

	const durationIsFinal = session.endedAt !== null;
	const lastCapturedAt = ordered.length > 0 ? ordered[ordered.length - 1].capturedAt : null;
	const windowEnd = session.endedAt ?? now ?? lastCapturedAt ?? session.startedAt;
	const durationSeconds = roundTo(Math.max(0, (windowEnd - session.startedAt) / 1000), 2);

	const statistics = computeSessionStatistics(session, ordered, windowEnd);

	const defectDistribution = buildDefectTypes(
		ordered,
		statistics.labelDistribution,
		statistics.totalDefectsFound
	);
	const severityDistribution = distribution(
		statistics.severityDistribution,
		statistics.totalDefectsFound
	);

	return {
		summary: {
			sessionId: session.id,
			status: session.status,
			sourceId: session.sourceId,
			startedAt: session.startedAt,
			endedAt: session.endedAt,
			durationSeconds,
			durationText: formatDuration(durationSeconds),
			durationIsFinal,
			totalFrames: statistics.totalFrames,
			goodFrames: statistics.goodFrames,
			defectiveFrames: statistics.defectiveFrames,
			defectRate: statistics.defectRate,
			goodRate: statistics.goodRate,
			totalDefectsFound: statistics.totalDefectsFound,
			topDefectType: defectDistribution.length > 0 ? defectDistribution[0].label : null,
			throughputFps: statistics.throughputFps,
			throughputPerMinute: statistics.throughputPerMinute
		},
		trends: { granularity, buckets: buildTrends(ordered, granularity) },
		defectDistribution,
		severityDistribution,
		confidenceLevels: buildConfidenceLevels(ordered),
		processingBreakdown: buildProcessingBreakdown(ordered),
		anomalyHistogram: buildAnomalyHistogram(ordered),
		hourlyPattern: buildHourlyPattern(ordered),
		defects: listDefects(ordered, defectCatalog ?? {}),
		statistics
	};
}
