/**
 * Shared test fixtures: in-process device, analysis and frame factories
 */

import { vi } from 'vitest';
import type { AnalysisCollaborator, AnalyzeOptions } from '$lib/analysis/SubmissionPipeline';
import type { FrameSource, RawImage } from '$lib/capture/FrameSource';
import { DeviceUnavailableError } from '$lib/session/errors';
import type { DefectFinding, FrameRecord, StageTimings } from '$lib/session/types';

export interface FakeHandle {
	sourceId: string;
	serial: number;
}

export function createImage(): RawImage {
	return { data: new Uint8Array([0xff, 0xd8, 0xff, 0xd9]), mimeType: 'image/jpeg', width: 4, height: 4 };
}

/**
 * Camera stand-in. Set `acquireError` or queue `captureErrors` to fail.
 */
export class FakeFrameSource implements FrameSource<FakeHandle> {
	acquireError: Error | null = null;
	readonly captureErrors: Error[] = [];
	readonly released: FakeHandle[] = [];
	captures = 0;
	private serial = 0;

	readonly acquire = vi.fn(async (sourceId: string): Promise<FakeHandle> => {
		if (this.acquireError) throw this.acquireError;
		this.serial++;
		return { sourceId, serial: this.serial };
	});

	async captureFrame(handle: FakeHandle): Promise<RawImage> {
		const error = this.captureErrors.shift();
		if (error) throw error;
		if (this.released.includes(handle)) {
			throw new DeviceUnavailableError(handle.sourceId, 'handle already released');
		}
		this.captures++;
		return createImage();
	}

	release(handle: FakeHandle): void {
		this.released.push(handle);
	}
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (reason: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

export function stageTimings(ms = 10): StageTimings {
	return {
		preprocessingMs: ms,
		anomalyInferenceMs: ms,
		classificationInferenceMs: ms,
		postprocessingMs: ms
	};
}

/** Canonical analysis result for a clean frame */
export function goodResult(anomalyScore = 0.1): unknown {
	return { isDefect: false, anomalyScore, defects: [], stageTimings: stageTimings() };
}

/** Canonical analysis result with one finding per label */
export function defectResult(labels: string[], anomalyScore = 0.9, severity = 'high'): unknown {
	return {
		isDefect: true,
		anomalyScore,
		defects: labels.map((label) => ({
			label,
			confidence: 0.8,
			severity,
			areaPercentage: 2.5,
			boundingBox: { x: 1, y: 2, width: 3, height: 4 }
		})),
		stageTimings: stageTimings()
	};
}

/** One scripted answer; may return a promise or throw */
export type Step = () => unknown;

/**
 * Analysis stand-in that answers from a script, then falls back to
 * `goodResult()`
 */
export class ScriptedAnalyzer implements AnalysisCollaborator {
	readonly script: Step[];
	readonly signals: AbortSignal[] = [];
	calls = 0;

	constructor(script: Step[] = []) {
		this.script = [...script];
	}

	async analyze(_image: RawImage, options: AnalyzeOptions): Promise<unknown> {
		this.calls++;
		this.signals.push(options.signal);
		const step = this.script.shift();
		return step ? step() : goodResult();
	}
}

/**
 * Same as ScriptedAnalyzer, plus a health check
 */
export class HealthCheckedAnalyzer extends ScriptedAnalyzer {
	constructor(
		private readonly healthAnswer: boolean,
		script: Step[] = []
	) {
		super(script);
	}

	async checkHealth(): Promise<boolean> {
		return this.healthAnswer;
	}
}

export function defect(label: string, severity = 'high'): DefectFinding {
	return { label, confidence: 0.8, severity, areaPercentage: 2.5, boundingBox: null };
}

let frameSerial = 0;

export function makeFrame(overrides: Partial<FrameRecord> = {}): FrameRecord {
	frameSerial++;
	return {
		id: `frame-${frameSerial}`,
		sessionId: 'session-1',
		capturedAt: Date.UTC(2024, 0, 15, 9, 30, 0),
		isDefect: false,
		anomalyScore: 0.1,
		confidenceLevel: 'low',
		defects: [],
		stageTimings: stageTimings(),
		...overrides
	};
}

/** Let queued promise callbacks run */
export async function flushMicrotasks(rounds = 10): Promise<void> {
	for (let i = 0; i < rounds; i++) {
		await Promise.resolve();
	}
}
