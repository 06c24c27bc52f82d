/**
 * Inspection error taxonomy
 *
 * Every failure the engine raises carries a stable `code` so hosts can map
 * it to a user-facing message without matching on text.
 *
 * Per-frame failures (AnalysisError, SubmissionFailedError) never change the
 * session state. Device-level failures (DeviceUnavailableError on start,
 * AbortedByDeviceError mid-session) do.
 *
 * @module session/errors
 */

export type InspectionErrorCode =
	| 'DEVICE_UNAVAILABLE'
	| 'INVALID_CONFIGURATION'
	| 'INVALID_TRANSITION'
	| 'ALREADY_IN_FLIGHT'
	| 'ANALYSIS_ERROR'
	| 'SUBMISSION_FAILED'
	| 'ABORTED_BY_DEVICE'
	| 'SESSION_ALREADY_ACTIVE'
	| 'SESSION_NOT_FOUND';

/**
 * Base class for all engine errors
 */
export class InspectionError extends Error {
	readonly code: InspectionErrorCode;

	constructor(code: InspectionErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** The capture device could not be acquired (or went away during capture) */
export class DeviceUnavailableError extends InspectionError {
	readonly sourceId: string;

	constructor(sourceId: string, message?: string, options?: { cause?: unknown }) {
		super('DEVICE_UNAVAILABLE', message ?? `Capture device "${sourceId}" is unavailable`, options);
		this.sourceId = sourceId;
	}
}

export class InvalidConfigurationError extends InspectionError {
	readonly field: string;

	constructor(field: string, message: string) {
		super('INVALID_CONFIGURATION', message);
		this.field = field;
	}
}

export class InvalidTransitionError extends InspectionError {
	readonly from: string;
	readonly action: string;

	constructor(from: string, action: string) {
		super('INVALID_TRANSITION', `Cannot ${action} a session in "${from}" state`);
		this.from = from;
		this.action = action;
	}
}

export class AlreadyInFlightError extends InspectionError {
	constructor() {
		super('ALREADY_IN_FLIGHT', 'A frame submission is already in flight');
	}
}

/**
 * Why an analysis round-trip failed
 *
 * - timeout: no answer within the pipeline's deadline
 * - malformed: the answer did not match the result schema
 * - transport: network failure before a response arrived
 * - service: the service answered with an error status
 */
export type AnalysisFailureReason = 'timeout' | 'malformed' | 'transport' | 'service';

export class AnalysisError extends InspectionError {
	readonly reason: AnalysisFailureReason;

	constructor(reason: AnalysisFailureReason, message: string, options?: { cause?: unknown }) {
		super('ANALYSIS_ERROR', message, options);
		this.reason = reason;
	}
}

/** Raised (as an event, not thrown) when a captured frame is dropped */
export class SubmissionFailedError extends InspectionError {
	readonly capturedAt: number;

	constructor(capturedAt: number, cause: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		super('SUBMISSION_FAILED', `Frame captured at ${capturedAt} was dropped: ${detail}`, { cause });
		this.capturedAt = capturedAt;
	}
}

export class AbortedByDeviceError extends InspectionError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('ABORTED_BY_DEVICE', message, options);
	}
}

export class SessionAlreadyActiveError extends InspectionError {
	readonly existingSessionId: string;

	constructor(userId: string, existingSessionId: string) {
		super(
			'SESSION_ALREADY_ACTIVE',
			`User "${userId}" already has an active session (${existingSessionId}); stop it before starting a new one`
		);
		this.existingSessionId = existingSessionId;
	}
}

export class SessionNotFoundError extends InspectionError {
	constructor(sessionId: string) {
		super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
	}
}

/**
 * Normalise an unknown thrown value into a log-friendly message
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
