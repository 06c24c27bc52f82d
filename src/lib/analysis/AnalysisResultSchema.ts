/**
 * AnalysisResultSchema - Boundary validation for analysis results
 *
 * Whatever the analysis collaborator hands back is `unknown` until it has
 * passed through here. Any field of the wrong type or outside its range
 * becomes an AnalysisError('malformed'); nothing undefined reaches the
 * aggregator.
 *
 * Two entry points:
 * - validateAnalysisResult: the engine's canonical camelCase shape
 * - parseDetectionResponse: the detection service's snake_case wire shape
 *
 * @module analysis/AnalysisResultSchema
 */

import { AnalysisError } from '$lib/session/errors';
import type { BoundingBox, DefectFinding, StageTimings } from '$lib/session/types';

/**
 * Validated result of analysing one frame
 */
export interface AnalysisResult {
	isDefect: boolean;
	anomalyScore: number;
	confidenceLevel: string;
	defects: readonly DefectFinding[];
	stageTimings: StageTimings;
}

/**
 * Defaults applied to defect fields the service leaves out
 */
export const DEFECT_DEFAULTS = {
	label: 'anomaly',
	confidence: 0.5,
	severity: 'moderate',
	areaPercentage: 0
} as const;

/** Stored when the service does not say how confident it is */
export const DEFAULT_CONFIDENCE_LEVEL = 'low';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): AnalysisError {
	return new AnalysisError('malformed', `Malformed analysis result: ${message}`);
}

function readNumber(
	source: Record<string, unknown>,
	key: string,
	path: string,
	range: { min: number; max?: number },
	fallback?: number
): number {
	const value = source[key];
	if (value === undefined || value === null) {
		if (fallback !== undefined) return fallback;
		throw malformed(`${path}.${key} is required`);
	}
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw malformed(`${path}.${key} must be a finite number`);
	}
	if (value < range.min || (range.max !== undefined && value > range.max)) {
		const upper = range.max !== undefined ? `..${range.max}` : ' or more';
		throw malformed(`${path}.${key} must be ${range.min}${upper}, got ${value}`);
	}
	return value;
}

function readString(
	source: Record<string, unknown>,
	key: string,
	path: string,
	fallback: string
): string {
	const value = source[key];
	if (value === undefined || value === null) return fallback;
	if (typeof value !== 'string') {
		throw malformed(`${path}.${key} must be a string`);
	}
	const trimmed = value.trim();
	return trimmed === '' ? fallback : trimmed;
}

function readBoundingBox(value: unknown, path: string): Readonly<BoundingBox> | null {
	if (value === undefined || value === null) return null;
	// The service sends [] when it has no box
	if (Array.isArray(value) && value.length === 0) return null;
	if (!isRecord(value)) {
		throw malformed(`${path} must be an object`);
	}
	return Object.freeze({
		x: readNumber(value, 'x', path, { min: Number.NEGATIVE_INFINITY }, 0),
		y: readNumber(value, 'y', path, { min: Number.NEGATIVE_INFINITY }, 0),
		width: readNumber(value, 'width', path, { min: 0 }, 0),
		height: readNumber(value, 'height', path, { min: 0 }, 0)
	});
}

function readDefect(value: unknown, index: number): DefectFinding {
	const path = `defects[${index}]`;
	if (!isRecord(value)) {
		throw malformed(`${path} must be an object`);
	}

	return Object.freeze({
		label: readString(value, 'label', path, DEFECT_DEFAULTS.label),
		confidence: readNumber(value, 'confidence', path, { min: 0, max: 1 }, DEFECT_DEFAULTS.confidence),
		severity: readString(value, 'severity', path, DEFECT_DEFAULTS.severity).toLowerCase(),
		areaPercentage: readNumber(
			value,
			'areaPercentage',
			path,
			{ min: 0, max: 100 },
			DEFECT_DEFAULTS.areaPercentage
		),
		boundingBox: readBoundingBox(value.boundingBox, `${path}.boundingBox`)
	});
}

function readStageTimings(value: unknown): StageTimings {
	if (!isRecord(value)) {
		throw malformed('stageTimings must be an object');
	}
	const path = 'stageTimings';
	return {
		preprocessingMs: readNumber(value, 'preprocessingMs', path, { min: 0 }, 0),
		anomalyInferenceMs: readNumber(value, 'anomalyInferenceMs', path, { min: 0 }, 0),
		classificationInferenceMs: readNumber(value, 'classificationInferenceMs', path, { min: 0 }, 0),
		postprocessingMs: readNumber(value, 'postprocessingMs', path, { min: 0 }, 0)
	};
}

/**
 * Validate a result in the engine's canonical shape
 *
 * @throws AnalysisError with reason 'malformed'
 */
export function validateAnalysisResult(value: unknown): AnalysisResult {
	if (!isRecord(value)) {
		throw malformed('result must be an object');
	}

	if (typeof value.isDefect !== 'boolean') {
		throw malformed('isDefect must be a boolean');
	}

	const anomalyScore = readNumber(value, 'anomalyScore', 'result', { min: 0, max: 1 });

	if (!Array.isArray(value.defects)) {
		throw malformed('defects must be an array');
	}
	const defects = Object.freeze(value.defects.map((defect, index) => readDefect(defect, index)));

	return {
		isDefect: value.isDefect,
		anomalyScore,
		confidenceLevel: readString(
			value,
			'confidenceLevel',
			'result',
			DEFAULT_CONFIDENCE_LEVEL
		).toLowerCase(),
		defects,
		stageTimings: readStageTimings(value.stageTimings)
	};
}

/**
 * Seconds (as the service reports them) to milliseconds
 */
function secondsToMs(source: Record<string, unknown>, key: string): unknown {
	const value = source[key];
	return typeof value === 'number' ? value * 1000 : value;
}

/**
 * Map a detection service response body onto the canonical shape and
 * validate it
 *
 * `final_decision` must be DEFECT or GOOD. Defect findings are only kept
 * for DEFECT decisions. Stage times arrive in seconds.
 * `anomaly_confidence_level` defaults to low.
 *
 * @throws AnalysisError with reason 'malformed'
 */
export function parseDetectionResponse(body: unknown): AnalysisResult {
	if (!isRecord(body)) {
		throw malformed('response body must be a JSON object');
	}

	const decision = body.final_decision;
	if (decision !== 'DEFECT' && decision !== 'GOOD') {
		throw malformed(`final_decision must be DEFECT or GOOD, got ${JSON.stringify(decision)}`);
	}
	const isDefect = decision === 'DEFECT';

	const rawDefects = body.defects ?? [];
	if (!Array.isArray(rawDefects)) {
		throw malformed('defects must be an array');
	}

	const defects = isDefect
		? rawDefects.map((raw: unknown, index: number) => {
				if (!isRecord(raw)) {
					throw malformed(`defects[${index}] must be an object`);
				}
				return {
					label: raw.label,
					confidence: raw.confidence_score,
					severity: raw.severity_level,
					areaPercentage: raw.area_percentage,
					boundingBox: raw.bounding_box
				};
			})
		: [];

	return validateAnalysisResult({
		isDefect,
		anomalyScore: body.anomaly_score ?? 0,
		confidenceLevel: body.anomaly_confidence_level,
		defects,
		stageTimings: {
			preprocessingMs: secondsToMs(body, 'preprocessing_time'),
			anomalyInferenceMs: secondsToMs(body, 'anomaly_processing_time'),
			classificationInferenceMs: secondsToMs(body, 'classification_processing_time'),
			postprocessingMs: secondsToMs(body, 'postprocessing_time')
		}
	});
}
