/**
 * Inspection session data model
 *
 * Timestamps are epoch milliseconds. Durations are milliseconds unless the
 * field name says otherwise.
 */

/**
 * Persisted session status
 */
export type SessionStatus = 'active' | 'paused' | 'completed' | 'aborted';

/**
 * State machine state. `stopped` and `aborted` are terminal.
 */
export type SessionState = 'idle' | 'active' | 'paused' | 'stopped' | 'aborted';

/**
 * Event emitted on every state machine transition
 */
export type LifecycleEventType = 'started' | 'paused' | 'resumed' | 'stopped' | 'aborted';

export interface LifecycleEvent {
	type: LifecycleEventType;
	from: SessionState;
	to: SessionState;
	/** Wall-clock time of the transition */
	at: number;
	/** Set for `aborted` */
	reason?: string;
}

/**
 * Configuration exposed to whoever starts a session
 */
export interface SessionConfig {
	/** Capture cadence in milliseconds (positive integer) */
	captureIntervalMs: number;
	/** Opaque device/camera identifier */
	sourceId: string;
	/** Whether the scheduler captures on its own; manual capture otherwise */
	autoCapture: boolean;
}

export interface BoundingBox {
	x: number;
	y: number;
	width: number;
	height: number;
}

/**
 * One detected quality issue within a frame. Immutable once created.
 */
export interface DefectFinding {
	readonly label: string;
	/** 0..1 */
	readonly confidence: number;
	/** Lower-case categorical level, e.g. low | moderate | high */
	readonly severity: string;
	/** 0..100 */
	readonly areaPercentage: number;
	readonly boundingBox: Readonly<BoundingBox> | null;
}

/**
 * Per-stage processing durations reported by the analysis service
 */
export interface StageTimings {
	preprocessingMs: number;
	anomalyInferenceMs: number;
	classificationInferenceMs: number;
	postprocessingMs: number;
}

export type ProcessingStage = keyof StageTimings;

export const PROCESSING_STAGES: readonly ProcessingStage[] = [
	'preprocessingMs',
	'anomalyInferenceMs',
	'classificationInferenceMs',
	'postprocessingMs'
];

/**
 * One captured-and-analyzed image
 */
export interface FrameRecord {
	readonly id: string;
	readonly sessionId: string;
	readonly capturedAt: number;
	readonly isDefect: boolean;
	/** 0..1 */
	readonly anomalyScore: number;
	/** How sure the service is of its decision: very_high | high | medium | low */
	readonly confidenceLevel: string;
	readonly defects: readonly DefectFinding[];
	readonly stageTimings: Readonly<StageTimings>;
}

export interface SessionCounters {
	totalFrames: number;
	goodCount: number;
	defectCount: number;
}

/**
 * Values fixed when a session is finalized
 */
export interface FinalSessionCounters extends SessionCounters {
	durationSeconds: number;
	/** Percent, 1 decimal place */
	defectRate: number;
	/** Percent, 1 decimal place */
	goodRate: number;
	/** Frames per second, 3 decimal places */
	throughputFps: number;
}

export interface SessionRecord extends SessionCounters {
	id: string;
	userId: string;
	status: SessionStatus;
	startedAt: number;
	endedAt: number | null;
	captureIntervalMs: number;
	sourceId: string;
	abortReason: string | null;
	/** Populated by finalizeSession */
	final: FinalSessionCounters | null;
}

export interface AnomalyScoreSummary {
	/** 4 decimal places; 0 when no frames */
	average: number;
	min: number;
	max: number;
}

/**
 * Aggregate statistics for one session. Always re-derivable from the
 * session record and its frames.
 */
export interface SessionStatistics {
	totalFrames: number;
	goodFrames: number;
	defectiveFrames: number;
	/** Percent, 1 decimal place; 0 for an empty session */
	defectRate: number;
	goodRate: number;
	/** Number of defect findings across all frames */
	totalDefectsFound: number;
	anomalyScore: AnomalyScoreSummary;
	/** Average duration per stage, ms, 2 decimal places */
	averageStageTimings: StageTimings;
	/** Average of the summed stage durations per frame, ms */
	averageProcessingTimeMs: number;
	/** Frames per second over the session window, 3 decimal places */
	throughputFps: number;
	/** Frames per minute over the session window, 3 decimal places */
	throughputPerMinute: number;
	labelDistribution: Readonly<Record<string, number>>;
	severityDistribution: Readonly<Record<string, number>>;
	/** Frames per decision confidence level */
	confidenceLevelDistribution: Readonly<Record<string, number>>;
	/** Keyed by UTC hour "00".."23" */
	hourOfDayDistribution: Readonly<Record<string, number>>;
	/** capturedAt of the earliest / latest frame, null when empty */
	firstCapturedAt: number | null;
	lastCapturedAt: number | null;
}
