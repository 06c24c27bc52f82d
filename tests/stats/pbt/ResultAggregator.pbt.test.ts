/**
 * ResultAggregator Property-Based Tests
 *
 * Properties tested:
 * 1. Counters and distributions do not depend on ingestion order
 * 2. good + defective = total, and defectRate + goodRate is 100 (within rounding);
 *    every frame has exactly one confidence level
 * 3. Anomaly min <= average <= max
 * 4. Hour buckets follow each frame's capture time
 */

import { describe, expect } from 'vitest';
import { fc, test as fcTest } from '@fast-check/vitest';
import { ResultAggregator } from '$lib/stats/ResultAggregator';
import { utcHourOfDay } from '$lib/stats/format';
import type { FrameRecord } from '$lib/session/types';
import { DAY_MS, frameArbitrary } from '../../arbitraries';

const START = Date.UTC(2024, 0, 15, 0, 0, 0);

const framesArb = fc.array(frameArbitrary(START), { maxLength: 40 });

function withShuffle(frames: FrameRecord[]): fc.Arbitrary<[FrameRecord[], FrameRecord[]]> {
	const all = { minLength: frames.length, maxLength: frames.length };
	return fc.tuple(fc.constant(frames), fc.shuffledSubarray(frames, all));
}

function aggregate(frames: FrameRecord[]) {
	return ResultAggregator.fromFrames(frames, { startedAt: START, endedAt: START + DAY_MS }).snapshot();
}

describe('ResultAggregator properties', () => {
	fcTest.prop([framesArb.chain(withShuffle)])(
		'counts and distributions are independent of ingestion order',
		([frames, shuffled]) => {
			const a = aggregate(frames);
			const b = aggregate(shuffled);

			expect(b.totalFrames).toBe(a.totalFrames);
			expect(b.goodFrames).toBe(a.goodFrames);
			expect(b.defectiveFrames).toBe(a.defectiveFrames);
			expect(b.totalDefectsFound).toBe(a.totalDefectsFound);
			expect(b.labelDistribution).toEqual(a.labelDistribution);
			expect(b.severityDistribution).toEqual(a.severityDistribution);
			expect(b.confidenceLevelDistribution).toEqual(a.confidenceLevelDistribution);
			expect(b.hourOfDayDistribution).toEqual(a.hourOfDayDistribution);
		}
	);

	fcTest.prop([framesArb])('counters add up', (frames) => {
		const stats = aggregate(frames);

		expect(stats.goodFrames + stats.defectiveFrames).toBe(stats.totalFrames);
		expect(stats.totalFrames).toBe(frames.length);
		if (stats.totalFrames > 0) {
			expect(Math.abs(stats.defectRate + stats.goodRate - 100)).toBeLessThanOrEqual(0.1 + 1e-9);
		}

		const findings = Object.values(stats.labelDistribution).reduce((sum, n) => sum + n, 0);
		expect(findings).toBe(stats.totalDefectsFound);

		const levels = Object.values(stats.confidenceLevelDistribution).reduce((sum, n) => sum + n, 0);
		expect(levels).toBe(stats.totalFrames);
	});

	fcTest.prop([framesArb.filter((frames) => frames.length > 0)])(
		'average anomaly score lies between min and max',
		(frames) => {
			const { anomalyScore } = aggregate(frames);
			expect(anomalyScore.min).toBeLessThanOrEqual(anomalyScore.average);
			expect(anomalyScore.average).toBeLessThanOrEqual(anomalyScore.max);
		}
	);

	fcTest.prop([framesArb])('hour buckets follow capture time', (frames) => {
		const stats = aggregate(frames);
		const expected = new Map<string, number>();
		for (const frame of frames) {
			const hour = utcHourOfDay(frame.capturedAt);
			expected.set(hour, (expected.get(hour) ?? 0) + 1);
		}

		expect(stats.hourOfDayDistribution).toEqual(Object.fromEntries(expected));
	});
});
