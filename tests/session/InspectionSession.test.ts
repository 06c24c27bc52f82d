/**
 * InspectionSession Tests
 *
 * End-to-end runs over fake timers: capture cadence, pause gating, dropped
 * frames, device failure, finalization and reports.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemorySessionRepository } from '$lib/persistence/SessionRepository';
import {
	AnalysisError,
	DeviceUnavailableError,
	InvalidConfigurationError,
	InvalidTransitionError,
	type SubmissionFailedError
} from '$lib/session/errors';
import { InspectionSession } from '$lib/session/InspectionSession';
import type { FrameRecord, LifecycleEvent, SessionConfig } from '$lib/session/types';
import {
	FakeFrameSource,
	HealthCheckedAnalyzer,
	ScriptedAnalyzer,
	deferred,
	defectResult,
	flushMicrotasks,
	goodResult,
	type FakeHandle,
	type Step
} from '../helpers';

const START = Date.UTC(2024, 0, 15, 9, 0, 0);

interface SetupOptions {
	config?: Partial<SessionConfig>;
	script?: Step[];
	analyzer?: ScriptedAnalyzer;
}

function setup(options: SetupOptions = {}) {
	const source = new FakeFrameSource();
	const analyzer = options.analyzer ?? new ScriptedAnalyzer(options.script);
	const repository = new InMemorySessionRepository(() => 'session-1');
	const session: InspectionSession<FakeHandle> = InspectionSession.create(
		{ userId: 'inspector-1', source, analyzer, repository },
		{ captureIntervalMs: 1000, sourceId: 'cam-1', ...options.config }
	);
	return { source, analyzer, repository, session };
}

describe('InspectionSession', () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(START);
	});

	describe('create', () => {
		it('should reject an invalid interval before anything is persisted', () => {
			const repository = new InMemorySessionRepository();
			expect(() =>
				InspectionSession.create(
					{
						userId: 'inspector-1',
						source: new FakeFrameSource(),
						analyzer: new ScriptedAnalyzer(),
						repository
					},
					{ captureIntervalMs: 0 }
				)
			).toThrow(InvalidConfigurationError);
			expect(repository.size).toBe(0);
		});

		it('should start idle with no id', () => {
			const { session } = setup();
			expect(session.state).toBe('idle');
			expect(session.id).toBeNull();
			expect(session.config).toEqual({ captureIntervalMs: 1000, sourceId: 'cam-1', autoCapture: true });
		});
	});

	describe('end-to-end runs', () => {
		it('should count five clean frames from five ticks', async () => {
			const { session } = setup();
			await session.start();

			await vi.advanceTimersByTimeAsync(5000);
			const record = await session.stopAndFinalize();

			expect(record.final).toEqual({
				totalFrames: 5,
				goodCount: 5,
				defectCount: 0,
				durationSeconds: 5,
				defectRate: 0,
				goodRate: 100,
				throughputFps: 1
			});
			expect(record.status).toBe('completed');
			expect(record.endedAt).toBe(START + 5000);
		});

		it('should build the label distribution from defective frames', async () => {
			const { session } = setup({
				script: [
					() => defectResult(['scratch']),
					() => goodResult(),
					() => defectResult(['scratch'])
				]
			});
			await session.start();

			await vi.advanceTimersByTimeAsync(3000);
			await session.stopAndFinalize();

			const stats = session.statistics();
			expect(stats.totalFrames).toBe(3);
			expect(stats.defectiveFrames).toBe(2);
			expect(stats.labelDistribution).toEqual({ scratch: 2 });
			expect(stats.defectRate).toBe(66.7);
		});

		it('should not capture while paused', async () => {
			const { session, source } = setup();
			await session.start();

			await vi.advanceTimersByTimeAsync(1000);
			expect(source.captures).toBe(1);

			session.pause();
			await vi.advanceTimersByTimeAsync(3000);
			expect(source.captures).toBe(1);

			session.resume();
			await vi.advanceTimersByTimeAsync(1000);
			expect(source.captures).toBe(2);
		});

		it('should let an outstanding submission finish when paused mid-tick', async () => {
			const gate = deferred<unknown>();
			const { session, source } = setup({ script: [() => gate.promise] });
			const frames: FrameRecord[] = [];
			session.on('frame', (frame) => frames.push(frame));
			await session.start();

			await vi.advanceTimersByTimeAsync(1000);
			expect(source.captures).toBe(1);

			session.pause();
			gate.resolve(defectResult(['dent'], 0.8));
			await vi.advanceTimersByTimeAsync(3000);

			expect(source.captures).toBe(1);
			expect(frames).toHaveLength(1);
			expect(session.statistics().totalFrames).toBe(1);
			expect(session.statistics().defectiveFrames).toBe(1);
		});

		it('should drop a failed frame and keep the schedule', async () => {
			const { session, source } = setup({
				script: [
					() => goodResult(),
					() => {
						throw new Error('service returned 503');
					}
				]
			});
			const failures: SubmissionFailedError[] = [];
			session.on('submission-failed', (error) => failures.push(error));
			await session.start();

			await vi.advanceTimersByTimeAsync(3000);
			expect(source.captures).toBe(3);

			await vi.advanceTimersByTimeAsync(2000);
			const record = await session.stopAndFinalize();

			expect(record.totalFrames).toBe(4);
			expect(failures).toHaveLength(1);
			expect(failures[0].capturedAt).toBe(START + 2000);
			expect(session.state).toBe('stopped');
		});
	});

	describe('start', () => {
		it('should persist the session as active', async () => {
			const { session, repository } = setup();
			await session.start();

			const record = await repository.getSession('session-1');
			expect(session.id).toBe('session-1');
			expect(record?.status).toBe('active');
			expect(record?.userId).toBe('inspector-1');
			expect(record?.startedAt).toBe(START);
			expect(record?.captureIntervalMs).toBe(1000);
			expect(record?.sourceId).toBe('cam-1');
		});

		it('should stay idle and mark the record aborted when the device is unavailable', async () => {
			const { session, source, repository } = setup();
			source.acquireError = new Error('no camera');

			await expect(session.start()).rejects.toBeInstanceOf(DeviceUnavailableError);

			const record = await repository.getSession('session-1');
			expect(session.state).toBe('idle');
			expect(session.id).toBeNull();
			expect(record?.status).toBe('aborted');
			expect(record?.abortReason).toBe('Capture device "cam-1" is unavailable');
		});

		it('should refuse to start when the detection service is unhealthy', async () => {
			const analyzer = new HealthCheckedAnalyzer(false);
			const { session, repository } = setup({ analyzer });

			const error = await session.start().catch((err: unknown) => err);

			expect(error).toBeInstanceOf(AnalysisError);
			expect(error instanceof AnalysisError && error.reason).toBe('service');
			expect(repository.size).toBe(0);
			expect(session.state).toBe('idle');
		});

		it('should start when the detection service is healthy', async () => {
			const { session } = setup({ analyzer: new HealthCheckedAnalyzer(true) });
			await session.start();
			expect(session.state).toBe('active');
		});

		it('should reject a second start', async () => {
			const { session } = setup();
			await session.start();
			await expect(session.start()).rejects.toBeInstanceOf(InvalidTransitionError);
		});
	});

	describe('status mirroring', () => {
		it('should write pause and resume through to the repository', async () => {
			const { session, repository } = setup();
			await session.start();

			session.pause();
			await flushMicrotasks();
			expect((await repository.getSession('session-1'))?.status).toBe('paused');

			session.resume();
			await flushMicrotasks();
			expect((await repository.getSession('session-1'))?.status).toBe('active');
		});

		it('should re-emit lifecycle events', async () => {
			const { session } = setup();
			const events: LifecycleEvent[] = [];
			session.on('lifecycle', (event) => events.push(event));

			await session.start();
			session.pause();
			session.stop();

			expect(events.map((e) => `${e.from}->${e.to}`)).toEqual([
				'idle->active',
				'active->paused',
				'paused->stopped'
			]);
		});
	});

	describe('device failure', () => {
		it('should abort with the capture error as reason', async () => {
			const { session, source, repository } = setup();
			await session.start();
			source.captureErrors.push(new Error('USB disconnected'));

			await vi.advanceTimersByTimeAsync(1000);
			expect(session.state).toBe('aborted');
			expect(session.abortReason).toBe('Frame capture failed: USB disconnected');

			await vi.advanceTimersByTimeAsync(3000);
			expect(source.captures).toBe(0);

			const record = await session.finalize();
			expect(record.status).toBe('aborted');
			expect(record.abortReason).toBe('Frame capture failed: USB disconnected');
			expect(source.released).toHaveLength(1);
			expect(await repository.listFrames('session-1')).toEqual([]);
		});
	});

	describe('finalize', () => {
		it('should finalize once when stopped twice', async () => {
			const { session, repository } = setup();
			const finalizeSpy = vi.spyOn(repository, 'finalizeSession');
			await session.start();
			await vi.advanceTimersByTimeAsync(2000);

			const [first, second] = await Promise.all([
				session.stopAndFinalize(),
				session.stopAndFinalize()
			]);
			const third = await session.stopAndFinalize();

			expect(finalizeSpy).toHaveBeenCalledTimes(1);
			expect(first).toEqual(second);
			expect(third).toEqual(first);
			expect(session.isFinalized).toBe(true);
		});

		it('should reject finalize while running', async () => {
			const { session } = setup();
			await session.start();
			await expect(session.finalize()).rejects.toBeInstanceOf(InvalidTransitionError);
		});

		it('should reject finalize before start', async () => {
			const { session } = setup();
			await expect(session.finalize()).rejects.toBeInstanceOf(InvalidTransitionError);
		});

		it('should count a frame that lands after stop but before finalize', async () => {
			const gate = deferred<unknown>();
			const { session, repository } = setup({ script: [() => gate.promise] });
			await session.start();

			await vi.advanceTimersByTimeAsync(1000);
			session.stop();
			const finalizing = session.stopAndFinalize();
			gate.resolve(defectResult(['dent']));

			const record = await finalizing;
			expect(record.totalFrames).toBe(1);
			expect(record.defectCount).toBe(1);
			expect(await repository.listFrames('session-1')).toHaveLength(1);
		});

		it('should discard a frame that lands after finalize', async () => {
			const gate = deferred<unknown>();
			const { session, repository } = setup({ script: [() => gate.promise] });
			const frames: FrameRecord[] = [];
			const failures: SubmissionFailedError[] = [];
			session.on('frame', (frame) => frames.push(frame));
			session.on('submission-failed', (error) => failures.push(error));
			await session.start();

			await vi.advanceTimersByTimeAsync(1000);
			session.stop();
			const record = await session.finalize();
			expect(record.totalFrames).toBe(0);

			gate.resolve(goodResult());
			await flushMicrotasks(50);

			expect(frames).toEqual([]);
			expect(failures).toEqual([]);
			expect(session.statistics().totalFrames).toBe(0);
			expect(await repository.listFrames('session-1')).toEqual([]);
			expect((await repository.getSession('session-1'))?.totalFrames).toBe(0);
		});
	});

	describe('configure', () => {
		it('should change the cadence of a running session', async () => {
			const { session, source } = setup();
			await session.start();

			session.configure(250);
			await vi.advanceTimersByTimeAsync(1000);

			expect(source.captures).toBe(4);
			expect(session.config.captureIntervalMs).toBe(250);
		});

		it('should reject a non-positive interval and keep the old one', async () => {
			const { session } = setup();
			await session.start();

			expect(() => session.configure(-5)).toThrow(InvalidConfigurationError);
			expect(session.config.captureIntervalMs).toBe(1000);
		});
	});

	describe('manual capture', () => {
		it('should capture only on request when autoCapture is off', async () => {
			const { session, source } = setup({ config: { autoCapture: false } });
			await session.start();

			await vi.advanceTimersByTimeAsync(5000);
			expect(source.captures).toBe(0);

			await expect(session.captureNow()).resolves.toBe('fired');
			expect(session.statistics().totalFrames).toBe(1);
		});

		it('should reject captureNow before start', async () => {
			const { session } = setup();
			await expect(session.captureNow()).rejects.toBeInstanceOf(InvalidTransitionError);
		});
	});

	describe('report', () => {
		it('should report from persisted frames', async () => {
			const { session } = setup({
				script: [() => defectResult(['surface_scratch']), () => goodResult()]
			});
			await session.start();
			await vi.advanceTimersByTimeAsync(2000);
			await session.stopAndFinalize();

			const report = await session.report({ granularity: 'hourly' });

			expect(report.summary.sessionId).toBe('session-1');
			expect(report.summary.totalFrames).toBe(2);
			expect(report.summary.defectRate).toBe(50);
			expect(report.summary.topDefectType).toBe('surface_scratch');
			expect(report.summary.durationIsFinal).toBe(true);
			expect(report.trends.buckets).toEqual([
				{ bucket: '2024-01-15 09:00', total: 2, defective: 1, good: 1 }
			]);
			expect(report.defects[0].displayLabel).toBe('Surface Scratch');
		});

		it('should use the clock for a running session', async () => {
			const { session } = setup();
			await session.start();
			await vi.advanceTimersByTimeAsync(3000);

			const report = await session.report();
			expect(report.summary.durationIsFinal).toBe(false);
			expect(report.summary.durationSeconds).toBe(3);
		});
	});
});
